import { setTimeout as sleep } from 'timers/promises'
import { Config } from '../../config.js'
import { ERROR_LED, PowerBoard, RUN_LED, powerOutputPositions } from '../../boards/powerBoard.js'
import { BatterySensorInterface } from '../../components/batterySensor.js'
import { ButtonInterface } from '../../components/button.js'
import { LEDInterface } from '../../components/led.js'
import { PiezoInterface } from '../../components/piezo.js'
import { PowerOutputInterface } from '../../components/powerOutput.js'
import { CommunicationError, InvalidArgumentError, NotSupportedByHardwareError } from '../../errors.js'
import { UsbDeviceDescriptor, UsbHandle, UsbIdentity, UsbTransport } from '../../transport/usb.js'
import { RawUsbBackend, ReadCommand, UsbDiscoveryOptions, WriteCommand, discoverUsbBackends } from './rawUsbBackend.js'

export const POWER_BOARD_USB_ID: UsbIdentity = { vendorId: 0x1bda, productId: 0x0010 }
const SUPPORTED_FIRMWARE = '3'
const BUTTON_POLL_MS = 50
const MAX_U16 = 65535

// Codes match the command table of the board firmware
const CMD_READ_OUTPUT = new Map<number, ReadCommand>(powerOutputPositions.map((p): [number, ReadCommand] => [p, { code: p, length: 4 }]))
const CMD_READ_BATTERY: ReadCommand = { code: 7, length: 8 }
const CMD_READ_BUTTON: ReadCommand = { code: 8, length: 4 }
const CMD_READ_FWVER: ReadCommand = { code: 9, length: 4 }
const CMD_WRITE_OUTPUT = new Map<number, WriteCommand>(powerOutputPositions.map((p): [number, WriteCommand] => [p, { code: p }]))
const CMD_WRITE_LED = new Map<number, WriteCommand>([
  [RUN_LED, { code: 6 }],
  [ERROR_LED, { code: 7 }],
])
const CMD_WRITE_PIEZO: WriteCommand = { code: 8 }

// Boards with a newer firmware expose a second interface and speak another protocol
export function isLegacyPowerBoard(descriptor: UsbDeviceDescriptor): boolean {
  return descriptor.interfaceCount <= 1
}

/** Data stage of a buzz: frequency then duration, both uint16 little endian. */
export function encodeBuzz(frequencyHz: number, durationMs: number): Buffer {
  const frequency = Math.round(frequencyHz)
  const duration = Math.round(durationMs)
  if (duration > MAX_U16) throw new NotSupportedByHardwareError(`Maximum piezo duration is ${MAX_U16}ms.`)
  if (frequency > MAX_U16) throw new NotSupportedByHardwareError(`Maximum piezo frequency is ${MAX_U16}Hz.`)
  const data = Buffer.alloc(4)
  data.writeUInt16LE(frequency, 0)
  data.writeUInt16LE(duration, 2)
  return data
}

export class HardwarePowerBoardBackend
  extends RawUsbBackend
  implements PowerOutputInterface, PiezoInterface, ButtonInterface, BatterySensorInterface, LEDInterface
{
  static readonly board = PowerBoard
  static readonly interfaces = [PowerOutputInterface, PiezoInterface, ButtonInterface, BatterySensorInterface, LEDInterface]

  static async discover(options: UsbDiscoveryOptions): Promise<PowerBoard[]> {
    const backends = await discoverUsbBackends(
      PowerBoard.name,
      POWER_BOARD_USB_ID,
      options,
      Config.getConfiguration().usb.timeoutMs,
      isLegacyPowerBoard,
      (transport, handle, timeoutMs) => HardwarePowerBoardBackend.create(transport, handle, timeoutMs)
    )
    return backends.map((b) => new PowerBoard(b.serialNumber, b))
  }

  static async create(transport: UsbTransport, handle: UsbHandle, timeoutMs: number): Promise<HardwarePowerBoardBackend> {
    const backend = new HardwarePowerBoardBackend(transport, handle, timeoutMs)
    const version = String((await backend.read(CMD_READ_FWVER)).readUInt32LE(0))
    if (version != SUPPORTED_FIRMWARE)
      throw new CommunicationError(`This power board is running firmware version ${version}, but only version ${SUPPORTED_FIRMWARE} is supported.`)
    backend.version = version
    return backend
  }

  private outputStates = new Map<number, boolean>(powerOutputPositions.map((p): [number, boolean] => [p, false]))
  private ledStates = new Map<number, boolean>([
    [RUN_LED, false],
    [ERROR_LED, false],
  ])
  private version: string | undefined

  get firmwareVersion(): string | undefined {
    return this.version
  }

  private outputCommand<C>(commands: Map<number, C>, identifier: number): C {
    const cmd = commands.get(identifier)
    if (cmd == undefined)
      throw new InvalidArgumentError(`Invalid power output identifier ${identifier}; valid identifiers are ${[...commands.keys()].join(', ')}.`)
    return cmd
  }

  private checkSingle(kind: string, identifier: number): void {
    if (identifier != 0) throw new InvalidArgumentError(`Invalid ${kind} identifier ${identifier}; the only valid identifier is 0.`)
  }

  async getPowerOutputEnabled(identifier: number): Promise<boolean> {
    this.outputCommand(CMD_WRITE_OUTPUT, identifier)
    return this.outputStates.get(identifier) == true
  }

  async setPowerOutputEnabled(identifier: number, enabled: boolean): Promise<void> {
    await this.write(this.outputCommand(CMD_WRITE_OUTPUT, identifier), enabled ? 1 : 0)
    this.outputStates.set(identifier, enabled)
  }

  async getPowerOutputCurrent(identifier: number): Promise<number> {
    const data = await this.read(this.outputCommand(CMD_READ_OUTPUT, identifier))
    return data.readUInt32LE(0) / 1000
  }

  async buzz(identifier: number, durationMs: number, frequencyHz: number, blocking: boolean): Promise<void> {
    this.checkSingle('piezo', identifier)
    await this.write(CMD_WRITE_PIEZO, encodeBuzz(frequencyHz, durationMs))
    if (blocking) await sleep(Math.round(durationMs))
  }

  async getButtonState(identifier: number): Promise<boolean> {
    this.checkSingle('button', identifier)
    const data = await this.read(CMD_READ_BUTTON)
    return data.readUInt32LE(0) != 0
  }

  async waitUntilButtonPressed(identifier: number): Promise<void> {
    while (!(await this.getButtonState(identifier))) await sleep(BUTTON_POLL_MS)
  }

  private async readBattery(identifier: number): Promise<{ current: number; voltage: number }> {
    this.checkSingle('battery sensor', identifier)
    const data = await this.read(CMD_READ_BATTERY)
    return { current: data.readUInt32LE(0) / 1000, voltage: data.readUInt32LE(4) / 1000 }
  }

  async getBatterySensorVoltage(identifier: number): Promise<number> {
    return (await this.readBattery(identifier)).voltage
  }

  async getBatterySensorCurrent(identifier: number): Promise<number> {
    return (await this.readBattery(identifier)).current
  }

  async getLedState(identifier: number): Promise<boolean> {
    const state = this.ledStates.get(identifier)
    if (state == undefined) throw new InvalidArgumentError(`Invalid LED identifier ${identifier}; valid identifiers are 0 (run LED) and 1 (error LED).`)
    return state
  }

  async setLedState(identifier: number, state: boolean): Promise<void> {
    const cmd = CMD_WRITE_LED.get(identifier)
    if (cmd == undefined) throw new InvalidArgumentError(`Invalid LED identifier ${identifier}; valid identifiers are 0 (run LED) and 1 (error LED).`)
    await this.write(cmd, state ? 1 : 0)
    this.ledStates.set(identifier, state)
  }
}
