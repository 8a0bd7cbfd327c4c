import { Config } from '../../config.js'
import { InvalidArgumentError } from '../../errors.js'
import { Backend } from '../backend.js'
import { Console, ConsoleFactory, defaultConsoleFactory } from './console.js'

export interface ConsoleDiscoveryOptions {
  /** Defaults to console.serialNumber of the configuration. */
  serialNumber?: string
  /** Defaults to a console on stdin and stdout. */
  console?: ConsoleFactory
}

export interface IresolvedConsoleOptions {
  serialNumber: string
  console: ConsoleFactory
}

export function resolveConsoleOptions(options: ConsoleDiscoveryOptions): IresolvedConsoleOptions {
  return {
    serialNumber: options.serialNumber ?? Config.getConfiguration().console.serialNumber,
    console: options.console ?? defaultConsoleFactory,
  }
}

/**
 * A backend without hardware: it remembers what was written and asks the user for what is sensed.
 */
export abstract class ConsoleBackend extends Backend {
  readonly firmwareVersion = undefined
  protected readonly console: Console

  constructor(
    readonly serialNumber: string,
    boardClassName: string,
    consoleFactory: ConsoleFactory
  ) {
    super()
    this.console = consoleFactory(boardClassName + '(' + serialNumber + ')')
  }

  protected checkIdentifier(kind: string, identifier: number, count: number): void {
    if (!Number.isInteger(identifier) || identifier < 0 || identifier >= count)
      throw new InvalidArgumentError(`Invalid ${kind} identifier: ${identifier}, valid values are: 0 - ${count - 1}`)
  }

  async close(): Promise<void> {
    this.console.complete()
  }
}
