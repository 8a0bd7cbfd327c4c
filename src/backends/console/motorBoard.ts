import { MotorBoard } from '../../boards/motorBoard.js'
import { MotorInterface, MotorSpecialState, MotorState, formatMotorState } from '../../components/motor.js'
import { ConsoleBackend, ConsoleDiscoveryOptions, resolveConsoleOptions } from './consoleBackend.js'
import { ConsoleFactory } from './console.js'

export class ConsoleMotorBoardBackend extends ConsoleBackend implements MotorInterface {
  static readonly board = MotorBoard
  static readonly interfaces = [MotorInterface]

  static async discover(options: ConsoleDiscoveryOptions = {}): Promise<MotorBoard[]> {
    const o = resolveConsoleOptions(options)
    return [new MotorBoard(o.serialNumber, new ConsoleMotorBoardBackend(o.serialNumber, o.console))]
  }

  private states: MotorState[] = [MotorSpecialState.BRAKE, MotorSpecialState.BRAKE]

  constructor(serialNumber: string, consoleFactory: ConsoleFactory) {
    super(serialNumber, MotorBoard.name, consoleFactory)
  }

  // The state cannot be read back from the board either, so this is the last value set.
  async getMotorState(identifier: number): Promise<MotorState> {
    this.checkIdentifier('motor', identifier, this.states.length)
    return this.states[identifier]
  }

  async setMotorState(identifier: number, state: MotorState): Promise<void> {
    this.checkIdentifier('motor', identifier, this.states.length)
    this.states[identifier] = state
    this.console.info(`Setting motor ${identifier} to ${formatMotorState(state)}.`)
  }
}
