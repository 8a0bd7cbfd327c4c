import { SERVO_COUNT, ServoBoard } from '../../boards/servoBoard.js'
import { ServoInterface, ServoPosition } from '../../components/servo.js'
import { ConsoleFactory } from './console.js'
import { ConsoleBackend, ConsoleDiscoveryOptions, resolveConsoleOptions } from './consoleBackend.js'

export class ConsoleServoBoardBackend extends ConsoleBackend implements ServoInterface {
  static readonly board = ServoBoard
  static readonly interfaces = [ServoInterface]

  static async discover(options: ConsoleDiscoveryOptions = {}): Promise<ServoBoard[]> {
    const o = resolveConsoleOptions(options)
    return [new ServoBoard(o.serialNumber, new ConsoleServoBoardBackend(o.serialNumber, o.console))]
  }

  private positions: ServoPosition[] = new Array<ServoPosition>(SERVO_COUNT).fill(null)

  constructor(serialNumber: string, consoleFactory: ConsoleFactory) {
    super(serialNumber, ServoBoard.name, consoleFactory)
  }

  async getServoPosition(identifier: number): Promise<ServoPosition> {
    this.checkIdentifier('servo', identifier, SERVO_COUNT)
    return this.positions[identifier]
  }

  async setServoPosition(identifier: number, position: ServoPosition): Promise<void> {
    this.checkIdentifier('servo', identifier, SERVO_COUNT)
    this.positions[identifier] = position
    this.console.info(`Setting servo ${identifier} to ${position === null ? 'unpowered' : String(position)}.`)
  }
}
