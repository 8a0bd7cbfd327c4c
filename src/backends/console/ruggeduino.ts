import { FIRST_DIGITAL_PIN, LAST_ANALOGUE_PIN, LED_PIN, Ruggeduino, isAnaloguePin } from '../../boards/ruggeduino.js'
import { GPIOPinInterface, GPIOPinMode, digitalInputModes } from '../../components/gpioPin.js'
import { LEDInterface } from '../../components/led.js'
import { StringCommandInterface } from '../../components/stringCommand.js'
import { BadGPIOPinModeError, InvalidArgumentError } from '../../errors.js'
import { ConsoleFactory, boolParser, floatParser, stringParser } from './console.js'
import { ConsoleBackend, ConsoleDiscoveryOptions, resolveConsoleOptions } from './consoleBackend.js'

interface IpinData {
  mode: GPIOPinMode
  digitalState: boolean
}

export class ConsoleRuggeduinoBackend extends ConsoleBackend implements GPIOPinInterface, LEDInterface, StringCommandInterface {
  static readonly board = Ruggeduino
  static readonly interfaces = [GPIOPinInterface, LEDInterface, StringCommandInterface]

  static async discover(options: ConsoleDiscoveryOptions = {}): Promise<Ruggeduino[]> {
    const o = resolveConsoleOptions(options)
    return [new Ruggeduino(o.serialNumber, new ConsoleRuggeduinoBackend(o.serialNumber, o.console))]
  }

  private pins = new Map<number, IpinData>()

  constructor(serialNumber: string, consoleFactory: ConsoleFactory) {
    super(serialNumber, Ruggeduino.name, consoleFactory)
    for (let i = FIRST_DIGITAL_PIN; i <= LAST_ANALOGUE_PIN; i++)
      this.pins.set(i, { mode: isAnaloguePin(i) ? GPIOPinMode.ANALOGUE_INPUT : GPIOPinMode.DIGITAL_INPUT, digitalState: false })
  }

  private pin(identifier: number): IpinData {
    const pin = this.pins.get(identifier)
    if (pin == undefined) throw new InvalidArgumentError(`Invalid pin identifier: ${identifier}`)
    return pin
  }

  async setGpioPinMode(identifier: number, mode: GPIOPinMode): Promise<void> {
    const pin = this.pin(identifier)
    this.console.info(`Set pin ${identifier} to ${mode}`)
    pin.mode = mode
  }

  async getGpioPinMode(identifier: number): Promise<GPIOPinMode> {
    return this.pin(identifier).mode
  }

  async writeGpioPinDigitalState(identifier: number, state: boolean): Promise<void> {
    const pin = this.pin(identifier)
    if (pin.mode != GPIOPinMode.DIGITAL_OUTPUT)
      throw new BadGPIOPinModeError(`Pin ${identifier} mode needs to be DIGITAL_OUTPUT in order to set the digital state.`)
    this.console.info(`Set pin ${identifier} state to ${state}`)
    pin.digitalState = state
  }

  async getGpioPinDigitalState(identifier: number): Promise<boolean> {
    const pin = this.pin(identifier)
    if (pin.mode != GPIOPinMode.DIGITAL_OUTPUT)
      throw new BadGPIOPinModeError(`Pin ${identifier} mode needs to be DIGITAL_OUTPUT in order to read the digital state.`)
    return pin.digitalState
  }

  async readGpioPinDigitalState(identifier: number): Promise<boolean> {
    const pin = this.pin(identifier)
    if (!digitalInputModes.includes(pin.mode))
      throw new BadGPIOPinModeError(`Pin ${identifier} mode needs to be DIGITAL_INPUT_* in order to read the digital state.`)
    return this.console.read(`Pin ${identifier} digital state [true/false]`, boolParser)
  }

  async readGpioPinAnalogueValue(identifier: number): Promise<number> {
    const pin = this.pin(identifier)
    if (pin.mode != GPIOPinMode.ANALOGUE_INPUT)
      throw new BadGPIOPinModeError(`Pin ${identifier} mode needs to be ANALOGUE_INPUT in order to read the analogue value.`)
    return this.console.read(`Pin ${identifier} ADC state [float]`, floatParser)
  }

  async getLedState(identifier: number): Promise<boolean> {
    this.checkIdentifier('LED', identifier, 1)
    const pin = this.pin(LED_PIN)
    return pin.mode == GPIOPinMode.DIGITAL_OUTPUT && pin.digitalState
  }

  // The LED shares pin 13, which is switched to an output first.
  async setLedState(identifier: number, state: boolean): Promise<void> {
    this.checkIdentifier('LED', identifier, 1)
    if (this.pin(LED_PIN).mode != GPIOPinMode.DIGITAL_OUTPUT) await this.setGpioPinMode(LED_PIN, GPIOPinMode.DIGITAL_OUTPUT)
    await this.writeGpioPinDigitalState(LED_PIN, state)
  }

  async executeStringCommand(identifier: number, command: string): Promise<string> {
    this.checkIdentifier('string command', identifier, 1)
    return this.console.read(`Response to string command "${command}" [str]`, stringParser)
  }
}
