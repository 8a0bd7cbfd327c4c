import Debug from 'debug'
import { format } from 'util'
import winston, { Logger as WinstonLogger } from 'winston'
import Transport from 'winston-transport'
export enum LogLevelEnum {
  verbose = 'verbose',
  info = 'info',
  warn = 'warn',
  error = 'error',
}
const debug = Debug('logger')

interface IlogRecord {
  level?: unknown
  message?: unknown
  [key: string]: unknown
}

function field(info: IlogRecord, key: string): string | undefined {
  const value = info[key]
  return typeof value === 'string' ? value : undefined
}

function isTestWorker(): boolean {
  return process.env['VITEST_WORKER_ID'] !== undefined || process.env['JEST_WORKER_ID'] !== undefined
}

class DebugTransport extends Transport {
  constructor() {
    super()
  }
  // Winston transport contract: log(info, next)
  override log(info: IlogRecord, next?: () => void) {
    setImmediate(() => {
      const level = field(info, 'level') ?? 'info'
      const label = field(info, 'label') ?? field(info, 'prefix') ?? ''
      const msg = info.message !== undefined ? String(info.message) : JSON.stringify(info)
      const prefix = label ? ` ${label}` : ''
      debug(`${level}${prefix}: ${msg}`)
      this.emit('logged', info)
    })
    if (next) next()
  }
}

function formatLine(info: IlogRecord): string {
  const label = field(info, 'label') ?? field(info, 'prefix') ?? ''
  return `${field(info, 'level') ?? ''}${label ? ' ' + label : ''}: ${String(info.message ?? '')}`
}

/* Logger makes it easy to set a source file specific prefix.
 * Inside a test worker the output is routed through debug() (quiet unless DEBUG includes 'logger').
 */
export class Logger {
  private static level: LogLevelEnum = LogLevelEnum.info
  private static loggers: Logger[] = []
  private logger: WinstonLogger

  constructor(private prefix: string) {
    const commonLabel = winston.format.label({ label: this.prefix })
    const lineFormat = isTestWorker()
      ? winston.format.combine(
          commonLabel,
          winston.format.printf((info) => formatLine(info))
        )
      : winston.format.combine(
          winston.format.timestamp(),
          commonLabel,
          winston.format.printf((info) => `${field(info, 'timestamp') ?? ''} ${formatLine(info)}`)
        )

    const loggerTransport = isTestWorker() ? new DebugTransport() : new winston.transports.Console()
    this.logger = winston.createLogger({
      level: Logger.level,
      format: lineFormat,
      transports: [loggerTransport],
    })
    Logger.loggers.push(this)
  }

  static setLevel(level: LogLevelEnum) {
    Logger.level = level
    Logger.loggers.forEach((l) => {
      l.logger.level = level
    })
  }
  static getLevel(): LogLevelEnum {
    return Logger.level
  }

  log(level: LogLevelEnum, message: unknown, ...args: unknown[]) {
    const msg = format(message, ...args)
    this.logger.log({ level: level, message: msg, prefix: this.prefix })
  }
}
