import { Config } from '../../config.js'
import {
  FIRST_ANALOGUE_PIN,
  FIRST_DIGITAL_PIN,
  LED_PIN,
  Ruggeduino,
  analoguePinModes,
  digitalPinModes,
  isAnaloguePin,
  isDigitalPin,
} from '../../boards/ruggeduino.js'
import { GPIOPinInterface, GPIOPinMode, digitalInputModes } from '../../components/gpioPin.js'
import { LEDInterface } from '../../components/led.js'
import { StringCommandInterface } from '../../components/stringCommand.js'
import { BadGPIOPinModeError, CommunicationError, InvalidArgumentError, NotSupportedByHardwareError, TransportTimeoutError } from '../../errors.js'
import { RequestTasks } from '../../transport/requestQueue.js'
import { SerialPortInfo } from '../../transport/serial.js'
import { UsbIdentity } from '../../transport/usb.js'
import { IserialConnection, SerialBackend, SerialDiscoveryOptions, discoverSerialBackends } from './serialBackend.js'

export const RUGGEDUINO_USB_IDS: readonly UsbIdentity[] = [
  { vendorId: 0x2341, productId: 0x0043 }, // Uno
  { vendorId: 0x2a03, productId: 0x0043 }, // Uno from arduino.org
  { vendorId: 0x1a86, productId: 0x7523 }, // CH340 clone
]
const SUPPORTED_FIRMWARE = 1
const VERSION_ATTEMPTS = 25
const OFFICIAL_FIRMWARE = 'SRduino'

export function isRuggeduinoPort(port: SerialPortInfo): boolean {
  return RUGGEDUINO_USB_IDS.some((id) => id.vendorId == port.vendorId && id.productId == port.productId)
}

/** Pins are sent as one letter: 0 is 'a', 1 is 'b' and so on. */
export function encodePin(pin: number): string {
  return String.fromCharCode('a'.charCodeAt(0) + pin)
}

interface IdigitalPin {
  mode: GPIOPinMode
  state: boolean
}

export class HardwareRuggeduinoBackend extends SerialBackend implements GPIOPinInterface, LEDInterface, StringCommandInterface {
  static readonly board = Ruggeduino
  static readonly interfaces = [GPIOPinInterface, LEDInterface, StringCommandInterface]

  static async discover(options: SerialDiscoveryOptions): Promise<Ruggeduino[]> {
    const config = Config.getConfiguration()
    const backends = await discoverSerialBackends(
      Ruggeduino.name,
      options,
      { baudRate: config.ruggeduino.baudRate, timeoutMs: config.ruggeduino.timeoutMs ?? config.serial.timeoutMs },
      isRuggeduinoPort,
      (connection, port) => HardwareRuggeduinoBackend.create(connection, port)
    )
    return backends.map((b) => new Ruggeduino(b.serialNumber, b))
  }

  static async create(connection: IserialConnection, port: SerialPortInfo): Promise<HardwareRuggeduinoBackend> {
    const backend = new HardwareRuggeduinoBackend(connection, port.serialNumber ?? port.path)
    await backend.initialise()
    return backend
  }

  private digitalPins = new Map<number, IdigitalPin>()
  private versionLine = ''

  constructor(connection: IserialConnection, serialNumber: string) {
    super(connection, serialNumber)
    for (let i = FIRST_DIGITAL_PIN; i < FIRST_ANALOGUE_PIN; i++) this.digitalPins.set(i, { mode: GPIOPinMode.DIGITAL_INPUT, state: false })
  }

  get firmwareVersion(): string | undefined {
    if (this.versionLine.length == 0) return undefined
    return this.versionLine.split(':').pop()
  }

  private async initialise(): Promise<void> {
    // The board resets when the port is opened and may not answer until it has booted
    let line = ''
    for (let attempt = 0; line.length == 0; attempt++) {
      if (attempt > VERSION_ATTEMPTS)
        throw new CommunicationError(`Ruggeduino (${this.connection.handle.path}) is not responding or runs custom firmware.`)
      line = await this.command('v', undefined, RequestTasks.validation)
    }
    this.versionLine = line
    const version = Number.parseInt(this.firmwareVersion ?? '', 10)
    if (version != SUPPORTED_FIRMWARE)
      throw new CommunicationError(`Unexpected firmware version: ${this.firmwareVersion ?? ''}, expected "${SUPPORTED_FIRMWARE}".`)
    for (const identifier of this.digitalPins.keys()) await this.setGpioPinMode(identifier, GPIOPinMode.DIGITAL_INPUT)
  }

  get isOfficialFirmware(): boolean {
    return this.versionLine.split(':')[0] == OFFICIAL_FIRMWARE
  }

  /*
   * Sends a one letter command, optionally followed by a pin, and returns the reply line.
   * Mode and write commands get no reply, so their timeout yields an empty string.
   * Reads must be answered.
   */
  private command(command: string, pin: number | undefined, task: RequestTasks): Promise<string> {
    return this.exchange(command + (pin == undefined ? '' : encodePin(pin)), task, task != RequestTasks.read)
  }

  private exchange(text: string, task: RequestTasks, replyOptional: boolean): Promise<string> {
    return this.request(text, task, async () => {
      await this.writeBytes(Buffer.from(text, 'utf-8'))
      try {
        return (await this.readLine()).trimEnd()
      } catch (e: unknown) {
        if (replyOptional && e instanceof TransportTimeoutError) return ''
        throw e
      }
    })
  }

  private digitalPin(identifier: number): IdigitalPin {
    const pin = this.digitalPins.get(identifier)
    if (pin == undefined) throw new InvalidArgumentError(`Pin ${identifier} is not a digital pin`)
    return pin
  }

  private checkPin(identifier: number): void {
    if (!isDigitalPin(identifier) && !isAnaloguePin(identifier)) throw new InvalidArgumentError(`Invalid pin identifier: ${identifier}`)
  }

  // Sends the pin's new settings and caches them once the board has taken them
  private async updateDigitalPin(identifier: number, update: IdigitalPin): Promise<void> {
    const pin = this.digitalPin(identifier)
    switch (update.mode) {
      case GPIOPinMode.DIGITAL_INPUT:
        await this.command('i', identifier, RequestTasks.write)
        break
      case GPIOPinMode.DIGITAL_INPUT_PULLUP:
        await this.command('p', identifier, RequestTasks.write)
        break
      case GPIOPinMode.DIGITAL_OUTPUT:
        await this.command('o', identifier, RequestTasks.write)
        await this.command(update.state ? 'h' : 'l', identifier, RequestTasks.write)
        break
      default:
        throw new NotSupportedByHardwareError(`Pin ${identifier} does not support ${update.mode}`)
    }
    pin.mode = update.mode
    pin.state = update.state
  }

  async setGpioPinMode(identifier: number, mode: GPIOPinMode): Promise<void> {
    this.checkPin(identifier)
    if (isAnaloguePin(identifier)) {
      if (!analoguePinModes.includes(mode)) throw new NotSupportedByHardwareError(`Analogue pin ${identifier} does not support ${mode}`)
      return
    }
    if (!digitalPinModes.includes(mode)) throw new NotSupportedByHardwareError(`Pin ${identifier} does not support ${mode}`)
    const pin = this.digitalPin(identifier)
    await this.updateDigitalPin(identifier, { mode: mode, state: pin.state })
  }

  async getGpioPinMode(identifier: number): Promise<GPIOPinMode> {
    this.checkPin(identifier)
    return isAnaloguePin(identifier) ? GPIOPinMode.ANALOGUE_INPUT : this.digitalPin(identifier).mode
  }

  async writeGpioPinDigitalState(identifier: number, state: boolean): Promise<void> {
    const pin = this.digitalPin(identifier)
    if (pin.mode != GPIOPinMode.DIGITAL_OUTPUT)
      throw new BadGPIOPinModeError(`Pin ${identifier} mode needs to be DIGITAL_OUTPUT in order to set the digital state.`)
    await this.updateDigitalPin(identifier, { mode: pin.mode, state: state })
  }

  async getGpioPinDigitalState(identifier: number): Promise<boolean> {
    const pin = this.digitalPin(identifier)
    if (pin.mode != GPIOPinMode.DIGITAL_OUTPUT)
      throw new BadGPIOPinModeError(`Pin ${identifier} mode needs to be DIGITAL_OUTPUT in order to read the digital state.`)
    return pin.state
  }

  async readGpioPinDigitalState(identifier: number): Promise<boolean> {
    const pin = this.digitalPin(identifier)
    if (!digitalInputModes.includes(pin.mode))
      throw new BadGPIOPinModeError(`Pin ${identifier} mode needs to be DIGITAL_INPUT_* in order to read the digital state.`)
    const result = await this.command('r', identifier, RequestTasks.read)
    if (result == 'h') return true
    if (result == 'l') return false
    throw new CommunicationError(`Invalid response from Ruggeduino: '${result}'`)
  }

  async readGpioPinAnalogueValue(identifier: number): Promise<number> {
    if (!isAnaloguePin(identifier)) throw new BadGPIOPinModeError(`Pin ${identifier} mode needs to be ANALOGUE_INPUT in order to read the analogue value.`)
    const result = await this.command('a', identifier - FIRST_ANALOGUE_PIN, RequestTasks.read)
    const raw = Number.parseInt(result, 10)
    if (Number.isNaN(raw)) throw new CommunicationError(`Invalid response from Ruggeduino: '${result}'`)
    return (raw / 1024) * 5
  }

  async getLedState(identifier: number): Promise<boolean> {
    this.checkLed(identifier)
    const pin = this.digitalPin(LED_PIN)
    return pin.mode == GPIOPinMode.DIGITAL_OUTPUT && pin.state
  }

  // The LED shares pin 13, which is switched to an output first.
  async setLedState(identifier: number, state: boolean): Promise<void> {
    this.checkLed(identifier)
    await this.updateDigitalPin(LED_PIN, { mode: GPIOPinMode.DIGITAL_OUTPUT, state: state })
  }

  private checkLed(identifier: number): void {
    if (identifier != 0) throw new InvalidArgumentError('Ruggeduino only has LED 0 (digital pin 13).')
  }

  /** Sends the command as it is and returns the reply line. Needs custom firmware. */
  async executeStringCommand(identifier: number, command: string): Promise<string> {
    if (identifier != 0) throw new InvalidArgumentError('Ruggeduino only has string command 0.')
    if (this.isOfficialFirmware) throw new NotSupportedByHardwareError('Ruggeduino should run custom firmware for command support')
    return this.exchange(command, RequestTasks.write, true)
  }
}
