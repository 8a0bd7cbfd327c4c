import { Config } from '../../config.js'
import { SERVO_COUNT, ServoBoard } from '../../boards/servoBoard.js'
import { ServoInterface, ServoPosition } from '../../components/servo.js'
import { CommunicationError, InvalidArgumentError, NotSupportedByHardwareError } from '../../errors.js'
import { UsbHandle, UsbIdentity, UsbTransport } from '../../transport/usb.js'
import { RawUsbBackend, ReadCommand, UsbDiscoveryOptions, WriteCommand, discoverUsbBackends } from './rawUsbBackend.js'

export const SERVO_BOARD_USB_ID: UsbIdentity = { vendorId: 0x1bda, productId: 0x0011 }
const SUPPORTED_FIRMWARE = '2'

const CMD_READ_FWVER: ReadCommand = { code: 9, length: 4 }
const CMD_WRITE_SET_SERVO: WriteCommand[] = Array.from({ length: SERVO_COUNT }, (_v, i) => ({ code: i }))
const CMD_WRITE_INIT: WriteCommand = { code: 12 }

/** Position to wValue: hundredths, as a 16 bit two's complement. */
export function encodeServoPosition(position: number): number {
  return Math.round(position * 100) & 0xffff
}

export class HardwareServoBoardBackend extends RawUsbBackend implements ServoInterface {
  static readonly board = ServoBoard
  static readonly interfaces = [ServoInterface]

  static async discover(options: UsbDiscoveryOptions): Promise<ServoBoard[]> {
    const backends = await discoverUsbBackends(
      ServoBoard.name,
      SERVO_BOARD_USB_ID,
      options,
      Config.getConfiguration().usb.timeoutMs,
      () => true,
      (transport, handle, timeoutMs) => HardwareServoBoardBackend.create(transport, handle, timeoutMs)
    )
    return backends.map((b) => new ServoBoard(b.serialNumber, b))
  }

  static async create(transport: UsbTransport, handle: UsbHandle, timeoutMs: number): Promise<HardwareServoBoardBackend> {
    const backend = new HardwareServoBoardBackend(transport, handle, timeoutMs)
    await backend.initialise()
    return backend
  }

  private positions: number[] = new Array<number>(SERVO_COUNT).fill(0)
  private version: string | undefined

  get firmwareVersion(): string | undefined {
    return this.version
  }

  private async initialise(): Promise<void> {
    const data = await this.read(CMD_READ_FWVER)
    const version = String(data.readUInt32LE(0))
    if (version != SUPPORTED_FIRMWARE)
      throw new CommunicationError(`Servo Board (${this.serialNumber}) is running firmware version ${version}, but only version ${SUPPORTED_FIRMWARE} is supported`)
    this.version = version
    await this.write(CMD_WRITE_INIT, Buffer.alloc(0))
    for (let i = 0; i < SERVO_COUNT; i++) await this.setServoPosition(i, 0)
  }

  private checkIdentifier(identifier: number): void {
    if (!Number.isInteger(identifier) || identifier < 0 || identifier >= SERVO_COUNT)
      throw new InvalidArgumentError('Only integers 0 - 11 are valid servo identifiers.')
  }

  // Positions cannot be read back from the board, so this is the last value set.
  async getServoPosition(identifier: number): Promise<ServoPosition> {
    this.checkIdentifier(identifier)
    return this.positions[identifier]
  }

  async setServoPosition(identifier: number, position: ServoPosition): Promise<void> {
    this.checkIdentifier(identifier)
    if (position === null) throw new NotSupportedByHardwareError('Student Robotics v4 Servo Board does not support unpowered servos.')
    if (!Number.isFinite(position) || position < -1 || position > 1)
      throw new InvalidArgumentError('Only numbers between -1 and 1 are valid servo positions.')
    await this.write(CMD_WRITE_SET_SERVO[identifier], encodeServoPosition(position))
    this.positions[identifier] = position
  }
}
