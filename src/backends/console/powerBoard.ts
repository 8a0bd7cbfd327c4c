import { setTimeout as sleep } from 'timers/promises'
import { PowerBoard, powerOutputPositions } from '../../boards/powerBoard.js'
import { BatterySensorInterface } from '../../components/batterySensor.js'
import { ButtonInterface } from '../../components/button.js'
import { LEDInterface } from '../../components/led.js'
import { PiezoInterface } from '../../components/piezo.js'
import { PowerOutputInterface } from '../../components/powerOutput.js'
import { InvalidArgumentError } from '../../errors.js'
import { ConsoleFactory, boolParser, floatParser } from './console.js'
import { ConsoleBackend, ConsoleDiscoveryOptions, resolveConsoleOptions } from './consoleBackend.js'

const MAX_PIEZO_DURATION_MS = 65535

export class ConsolePowerBoardBackend
  extends ConsoleBackend
  implements PowerOutputInterface, PiezoInterface, ButtonInterface, BatterySensorInterface, LEDInterface
{
  static readonly board = PowerBoard
  static readonly interfaces = [PowerOutputInterface, PiezoInterface, ButtonInterface, BatterySensorInterface, LEDInterface]

  static async discover(options: ConsoleDiscoveryOptions = {}): Promise<PowerBoard[]> {
    const o = resolveConsoleOptions(options)
    return [new PowerBoard(o.serialNumber, new ConsolePowerBoardBackend(o.serialNumber, o.console))]
  }

  private outputStates = new Map<number, boolean>(powerOutputPositions.map((p): [number, boolean] => [p, false]))
  private ledStates: boolean[] = [false, false]

  constructor(serialNumber: string, consoleFactory: ConsoleFactory) {
    super(serialNumber, PowerBoard.name, consoleFactory)
  }

  private checkOutput(identifier: number): void {
    if (!this.outputStates.has(identifier))
      throw new InvalidArgumentError(
        `Invalid power output identifier ${identifier}; valid identifiers are ${[...this.outputStates.keys()].join(', ')}`
      )
  }

  async getPowerOutputEnabled(identifier: number): Promise<boolean> {
    this.checkOutput(identifier)
    return this.outputStates.get(identifier) == true
  }

  async setPowerOutputEnabled(identifier: number, enabled: boolean): Promise<void> {
    this.checkOutput(identifier)
    this.console.info(`Setting output ${identifier} to ${enabled}`)
    this.outputStates.set(identifier, enabled)
  }

  async getPowerOutputCurrent(identifier: number): Promise<number> {
    this.checkOutput(identifier)
    return this.console.read(`Current for power output ${identifier} [amps]`, floatParser)
  }

  async buzz(identifier: number, durationMs: number, frequencyHz: number, blocking: boolean): Promise<void> {
    this.checkIdentifier('piezo', identifier, 1)
    const duration = Math.round(durationMs)
    if (duration > MAX_PIEZO_DURATION_MS) throw new InvalidArgumentError(`Maximum piezo duration is ${MAX_PIEZO_DURATION_MS}ms.`)
    this.console.info(`Buzzing at ${frequencyHz}Hz for ${duration}ms`)
    if (blocking) await sleep(duration)
  }

  async getButtonState(identifier: number): Promise<boolean> {
    this.checkIdentifier('button', identifier, 1)
    return this.console.read('Start button state [true/false]', boolParser)
  }

  async waitUntilButtonPressed(identifier: number): Promise<void> {
    this.checkIdentifier('button', identifier, 1)
    this.console.info('Waiting for start button press.')
    await this.console.waitForReturn('Hit return to press start button')
  }

  async getBatterySensorVoltage(identifier: number): Promise<number> {
    this.checkIdentifier('battery sensor', identifier, 1)
    return this.console.read('Battery voltage [volts]', floatParser)
  }

  async getBatterySensorCurrent(identifier: number): Promise<number> {
    this.checkIdentifier('battery sensor', identifier, 1)
    return this.console.read('Battery current [amps]', floatParser)
  }

  async getLedState(identifier: number): Promise<boolean> {
    this.checkIdentifier('LED', identifier, this.ledStates.length)
    return this.ledStates[identifier]
  }

  async setLedState(identifier: number, state: boolean): Promise<void> {
    this.checkIdentifier('LED', identifier, this.ledStates.length)
    this.console.info(`Set LED ${identifier} to ${state}`)
    this.ledStates[identifier] = state
  }
}
