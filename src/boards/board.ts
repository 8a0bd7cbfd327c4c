import type { Backend } from '../backends/backend.js'
import { Component, ComponentClass } from '../components/component.js'
import { errorMessage } from '../errors.js'
import { LogLevelEnum, Logger } from '../log.js'

const log = new Logger('board')

export interface ImakeSafeFailure {
  component: string
  identifier: number
  error: unknown
}

export interface MakeSafeReport {
  board: string
  failures: ImakeSafeFailure[]
}

export interface SafeStep {
  component: Component<unknown>
  run: () => Promise<void>
}

export interface BoardClass<T extends Board = Board> {
  new (...args: never): T
  readonly name: string
  supportedComponents(): readonly ComponentClass[]
}

/**
 * A physical (or simulated) unit. All components are created in the constructor and all I/O
 * goes through the backend.
 */
export abstract class Board<B extends Backend = Backend> {
  abstract readonly name: string

  constructor(
    readonly serialNumber: string,
    protected readonly backend: B
  ) {}

  get firmwareVersion(): string | undefined {
    return this.backend.firmwareVersion
  }

  /** One entry per component that has a safe state. */
  protected safeSteps(): SafeStep[] {
    return []
  }

  /**
   * Brings every component with a safe state into it. Every step is attempted, failures are
   * logged and returned in the report.
   */
  async makeSafe(): Promise<MakeSafeReport> {
    const report: MakeSafeReport = { board: this.toString(), failures: [] }
    for (const step of this.safeSteps()) {
      try {
        await step.run()
      } catch (e: unknown) {
        log.log(LogLevelEnum.error, '%s: making %s safe failed: %s', report.board, step.component.toString(), errorMessage(e))
        report.failures.push({
          component: step.component.constructor.name,
          identifier: step.component.identifier,
          error: e,
        })
      }
    }
    return report
  }

  close(): Promise<void> {
    return this.backend.close()
  }

  toString(): string {
    return this.name + ' - ' + this.serialNumber
  }
}
