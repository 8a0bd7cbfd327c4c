import { BadGPIOPinModeError, NotSupportedByHardwareError } from '../errors.js'
import { Component, defineInterface, requireBoolean } from './component.js'

export enum GPIOPinMode {
  DIGITAL_INPUT = 'DIGITAL_INPUT',
  DIGITAL_INPUT_PULLUP = 'DIGITAL_INPUT_PULLUP',
  DIGITAL_INPUT_PULLDOWN = 'DIGITAL_INPUT_PULLDOWN',
  DIGITAL_OUTPUT = 'DIGITAL_OUTPUT',
  ANALOGUE_INPUT = 'ANALOGUE_INPUT',
}

export const digitalInputModes: readonly GPIOPinMode[] = [
  GPIOPinMode.DIGITAL_INPUT,
  GPIOPinMode.DIGITAL_INPUT_PULLUP,
  GPIOPinMode.DIGITAL_INPUT_PULLDOWN,
]

export interface GPIOPinInterface {
  setGpioPinMode(identifier: number, mode: GPIOPinMode): Promise<void>
  getGpioPinMode(identifier: number): Promise<GPIOPinMode>
  writeGpioPinDigitalState(identifier: number, state: boolean): Promise<void>
  /** Last written state of an output pin. */
  getGpioPinDigitalState(identifier: number): Promise<boolean>
  /** Sensed state of an input pin. */
  readGpioPinDigitalState(identifier: number): Promise<boolean>
  /** Volts. */
  readGpioPinAnalogueValue(identifier: number): Promise<number>
}
export const GPIOPinInterface = defineInterface<GPIOPinInterface>('GPIOPinInterface', [
  'setGpioPinMode',
  'getGpioPinMode',
  'writeGpioPinDigitalState',
  'getGpioPinDigitalState',
  'readGpioPinDigitalState',
  'readGpioPinAnalogueValue',
])

export class GPIOPin extends Component<GPIOPinInterface> {
  static readonly requiredInterface = GPIOPinInterface
  readonly supportedModes: readonly GPIOPinMode[]

  constructor(identifier: number, backend: GPIOPinInterface, supportedModes: readonly GPIOPinMode[]) {
    super(identifier, backend)
    if (supportedModes.length < 1) throw new RangeError('A GPIO pin must support at least one GPIOPinMode')
    this.supportedModes = supportedModes
  }

  getMode(): Promise<GPIOPinMode> {
    return this.backend.getGpioPinMode(this.identifier)
  }

  async setMode(mode: GPIOPinMode): Promise<void> {
    if (!this.supportedModes.includes(mode)) throw new NotSupportedByHardwareError('Pin ' + this.identifier + ' does not support ' + mode)
    await this.backend.setGpioPinMode(this.identifier, mode)
  }

  async getDigitalState(): Promise<boolean> {
    const mode = await this.requireMode([GPIOPinMode.DIGITAL_OUTPUT, ...digitalInputModes])
    if (mode == GPIOPinMode.DIGITAL_OUTPUT) return this.backend.getGpioPinDigitalState(this.identifier)
    return this.backend.readGpioPinDigitalState(this.identifier)
  }

  async setDigitalState(state: boolean): Promise<void> {
    requireBoolean(state, 'Digital state')
    await this.requireMode([GPIOPinMode.DIGITAL_OUTPUT])
    await this.backend.writeGpioPinDigitalState(this.identifier, state)
  }

  async readAnalogueValue(): Promise<number> {
    await this.requireMode([GPIOPinMode.ANALOGUE_INPUT])
    return this.backend.readGpioPinAnalogueValue(this.identifier)
  }

  private async requireMode(modes: readonly GPIOPinMode[]): Promise<GPIOPinMode> {
    const mode = await this.getMode()
    if (!modes.includes(mode)) throw new BadGPIOPinModeError('Pin ' + this.identifier + ' needs to be in one of ' + modes.join(', '))
    return mode
  }
}
