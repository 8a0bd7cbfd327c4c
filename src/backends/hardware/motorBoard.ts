import { Config } from '../../config.js'
import { MotorBoard } from '../../boards/motorBoard.js'
import { MotorInterface, MotorSpecialState, MotorState } from '../../components/motor.js'
import { CommunicationError, InvalidArgumentError } from '../../errors.js'
import { RequestTasks } from '../../transport/requestQueue.js'
import { SerialPortInfo } from '../../transport/serial.js'
import { IserialConnection, SerialBackend, SerialDiscoveryOptions, discoverSerialBackends } from './serialBackend.js'

export const MOTOR_BOARD_VENDOR_ID = 0x0403
export const MOTOR_BOARD_PRODUCT_ID = 0x6001
export const MOTOR_BOARD_MANUFACTURER = 'Student Robotics'
const MODEL = 'MCV4B'
const SUPPORTED_FIRMWARE = '3'

const CMD_VERSION = 1
const CMD_MOTOR = [2, 3]

const SPEED_COAST = 1
const SPEED_BRAKE = 2

/**
 * Wire value of a motor state: 1 coasts, 2 brakes and a power p is sent as round(p * 125) + 128.
 */
export function encodeMotorState(state: MotorState): number {
  if (state === MotorSpecialState.BRAKE) return SPEED_BRAKE
  if (state === MotorSpecialState.COAST) return SPEED_COAST
  if (!Number.isFinite(state) || state < -1 || state > 1) throw new InvalidArgumentError('Only motor powers between -1 and 1 are supported.')
  return Math.round(state * 125) + 128
}

// Ports without a product string are left to the firmware check.
export function isMotorBoardPort(port: SerialPortInfo): boolean {
  return (
    port.manufacturer == MOTOR_BOARD_MANUFACTURER &&
    port.vendorId == MOTOR_BOARD_VENDOR_ID &&
    port.productId == MOTOR_BOARD_PRODUCT_ID &&
    (port.product == undefined || port.product == MODEL)
  )
}

export class HardwareMotorBoardBackend extends SerialBackend implements MotorInterface {
  static readonly board = MotorBoard
  static readonly interfaces = [MotorInterface]

  static async discover(options: SerialDiscoveryOptions): Promise<MotorBoard[]> {
    const config = Config.getConfiguration()
    const backends = await discoverSerialBackends(
      MotorBoard.name,
      options,
      { baudRate: config.motorBoard.baudRate, timeoutMs: config.motorBoard.timeoutMs ?? config.serial.timeoutMs },
      isMotorBoardPort,
      (connection, port) => HardwareMotorBoardBackend.create(connection, port)
    )
    return backends.map((b) => new MotorBoard(b.serialNumber, b))
  }

  static async create(connection: IserialConnection, port: SerialPortInfo): Promise<HardwareMotorBoardBackend> {
    if (port.serialNumber == undefined || port.serialNumber.length == 0)
      throw new CommunicationError(`Motor board on ${port.path} reports no serial number`)
    const backend = new HardwareMotorBoardBackend(connection, port.serialNumber)
    await backend.initialise()
    return backend
  }

  private states: MotorState[] = [MotorSpecialState.BRAKE, MotorSpecialState.BRAKE]
  private version: string | undefined

  get firmwareVersion(): string | undefined {
    return this.version
  }

  private async initialise(): Promise<void> {
    const version = await this.readFirmwareVersion()
    if (version != SUPPORTED_FIRMWARE) throw new CommunicationError(`Unexpected firmware version: ${version}, expected: "${SUPPORTED_FIRMWARE}".`)
    this.version = version
    for (let i = 0; i < this.states.length; i++) await this.setMotorState(i, MotorSpecialState.BRAKE)
  }

  readFirmwareVersion(): Promise<string> {
    return this.request('version', RequestTasks.validation, async () => {
      await this.writeBytes(Buffer.from([CMD_VERSION]))
      const line = await this.readLine()
      const model = line.substring(0, MODEL.length)
      if (model != MODEL) throw new CommunicationError(`Unexpected model string: ${model}, expected ${MODEL}.`)
      return line.substring(MODEL.length + 1)
    })
  }

  private checkIdentifier(identifier: number): void {
    if (!Number.isInteger(identifier) || identifier < 0 || identifier >= CMD_MOTOR.length)
      throw new InvalidArgumentError(`Invalid motor identifier: ${identifier}, valid values are: 0, 1`)
  }

  // The board cannot report its state, so this is the last value set.
  async getMotorState(identifier: number): Promise<MotorState> {
    this.checkIdentifier(identifier)
    return this.states[identifier]
  }

  async setMotorState(identifier: number, state: MotorState): Promise<void> {
    this.checkIdentifier(identifier)
    const value = encodeMotorState(state)
    await this.request('motor ' + identifier, RequestTasks.write, () => this.writeBytes(Buffer.from([CMD_MOTOR[identifier], value])))
    this.states[identifier] = state
  }

  protected override async beforeClose(): Promise<void> {
    for (let i = 0; i < this.states.length; i++) await this.setMotorState(i, MotorSpecialState.BRAKE)
  }
}
