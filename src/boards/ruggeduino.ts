import type { Backend } from '../backends/backend.js'
import { ComponentClass } from '../components/component.js'
import { GPIOPin, GPIOPinInterface, GPIOPinMode } from '../components/gpioPin.js'
import { LED, LEDInterface } from '../components/led.js'
import { StringCommand, StringCommandInterface } from '../components/stringCommand.js'
import { Board } from './board.js'

export type RuggeduinoBackend = Backend & GPIOPinInterface & LEDInterface & StringCommandInterface

export enum AnaloguePin {
  A0 = 14,
  A1 = 15,
  A2 = 16,
  A3 = 17,
  A4 = 18,
  A5 = 19,
}

// pins 0 and 1 carry the serial link
export const FIRST_DIGITAL_PIN = 2
export const FIRST_ANALOGUE_PIN = 14
export const LAST_ANALOGUE_PIN = 19
/** The on-board LED is wired to this digital pin. */
export const LED_PIN = 13

export const digitalPinModes: readonly GPIOPinMode[] = [GPIOPinMode.DIGITAL_INPUT, GPIOPinMode.DIGITAL_INPUT_PULLUP, GPIOPinMode.DIGITAL_OUTPUT]
export const analoguePinModes: readonly GPIOPinMode[] = [GPIOPinMode.ANALOGUE_INPUT]

export function isDigitalPin(identifier: number): boolean {
  return Number.isInteger(identifier) && identifier >= FIRST_DIGITAL_PIN && identifier < FIRST_ANALOGUE_PIN
}
export function isAnaloguePin(identifier: number): boolean {
  return Number.isInteger(identifier) && identifier >= FIRST_ANALOGUE_PIN && identifier <= LAST_ANALOGUE_PIN
}

export class Ruggeduino extends Board<RuggeduinoBackend> {
  readonly name = 'Ruggeduino'
  readonly led: LED
  readonly command: StringCommand
  readonly pins: ReadonlyMap<number, GPIOPin>

  constructor(serialNumber: string, backend: RuggeduinoBackend) {
    super(serialNumber, backend)
    this.led = new LED(0, backend)
    this.command = new StringCommand(0, backend)
    const pins = new Map<number, GPIOPin>()
    for (let i = FIRST_DIGITAL_PIN; i < FIRST_ANALOGUE_PIN; i++) pins.set(i, new GPIOPin(i, backend, digitalPinModes))
    for (let i = FIRST_ANALOGUE_PIN; i <= LAST_ANALOGUE_PIN; i++) pins.set(i, new GPIOPin(i, backend, analoguePinModes))
    this.pins = pins
  }

  pin(identifier: number | AnaloguePin): GPIOPin {
    const pin = this.pins.get(identifier)
    if (pin == undefined) throw new RangeError('Ruggeduino has no pin ' + identifier)
    return pin
  }

  static supportedComponents(): readonly ComponentClass[] {
    return [GPIOPin, LED, StringCommand]
  }
}
