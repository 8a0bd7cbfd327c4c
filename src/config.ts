import Debug from 'debug'
import * as fs from 'fs'
import { parse } from 'yaml'
import { LogLevelEnum, Logger } from './log.js'
import { errorMessage } from './errors.js'

const CONFIG_VERSION = '0.1'
const CONFIG_ENV = 'BOARDLINK_CONFIG'
const log = new Logger('config')
const debug = Debug('config')

export interface IserialConfiguration {
  timeoutMs: number
}
export interface IusbConfiguration {
  timeoutMs: number
}
export interface IconsoleConfiguration {
  serialNumber: string
}
export interface IserialBoardConfiguration {
  baudRate: number
  timeoutMs?: number
}
export interface Iconfiguration {
  version: string
  logLevel: LogLevelEnum
  debugComponents?: string
  serial: IserialConfiguration
  usb: IusbConfiguration
  console: IconsoleConfiguration
  motorBoard: IserialBoardConfiguration
  ruggeduino: IserialBoardConfiguration
}

function isLogLevel(value: unknown): value is LogLevelEnum {
  return Object.values<unknown>(LogLevelEnum).includes(value)
}
function positiveNumber(value: unknown, defaultValue: number): number {
  return typeof value === 'number' && Number.isFinite(value) && value > 0 ? value : defaultValue
}
function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

export class Config {
  private static config: Iconfiguration | undefined
  private static newConfig: Iconfiguration = {
    version: CONFIG_VERSION,
    logLevel: LogLevelEnum.info,
    serial: {
      timeoutMs: 250,
    },
    usb: {
      timeoutMs: 1000,
    },
    console: {
      serialNumber: 'SERIAL',
    },
    motorBoard: {
      baudRate: 1000000,
    },
    ruggeduino: {
      baudRate: 115200,
      timeoutMs: 1250,
    },
  }

  static getConfiguration(): Iconfiguration {
    if (!Config.config) Config.config = structuredClone(Config.newConfig)
    return structuredClone(Config.config)
  }

  /*
   * Fills every missing or invalid entry of a parsed configuration file with its default.
   */
  static fromFile(file: unknown): Iconfiguration {
    const defaults = Config.newConfig
    const rc = structuredClone(defaults)
    if (!isObject(file)) return rc
    const f = file
    if (typeof f['version'] === 'string') rc.version = f['version']
    if (isLogLevel(f['logLevel'])) rc.logLevel = f['logLevel']
    if (typeof f['debugComponents'] === 'string') rc.debugComponents = f['debugComponents']
    const serial = f['serial']
    if (isObject(serial)) rc.serial.timeoutMs = positiveNumber(serial['timeoutMs'], defaults.serial.timeoutMs)
    const usb = f['usb']
    if (isObject(usb)) rc.usb.timeoutMs = positiveNumber(usb['timeoutMs'], defaults.usb.timeoutMs)
    const consoleSection = f['console']
    if (isObject(consoleSection) && typeof consoleSection['serialNumber'] === 'string' && consoleSection['serialNumber'].length > 0)
      rc.console.serialNumber = consoleSection['serialNumber']
    const motorBoard = f['motorBoard']
    if (isObject(motorBoard)) rc.motorBoard.baudRate = positiveNumber(motorBoard['baudRate'], defaults.motorBoard.baudRate)
    const ruggeduino = f['ruggeduino']
    if (isObject(ruggeduino)) {
      rc.ruggeduino.baudRate = positiveNumber(ruggeduino['baudRate'], defaults.ruggeduino.baudRate)
      rc.ruggeduino.timeoutMs = positiveNumber(ruggeduino['timeoutMs'], defaults.ruggeduino.timeoutMs ?? rc.serial.timeoutMs)
    }
    return rc
  }

  static getConfigPath(): string | undefined {
    const p = process.env[CONFIG_ENV]
    return p && p.length > 0 ? p : undefined
  }

  async readYamlAsync(path: string | undefined = Config.getConfigPath()): Promise<void> {
    if (path == undefined) {
      debug('No configuration file passed, using defaults')
      this.writeConfiguration(structuredClone(Config.newConfig))
      return
    }
    try {
      const src = await fs.promises.readFile(path, { encoding: 'utf8' })
      this.writeConfiguration(Config.fromFile(parse(src)))
      debug('read configuration from ' + path)
    } catch (e: unknown) {
      if (isObject(e) && e['code'] == 'ENOENT') {
        log.log(LogLevelEnum.info, 'configuration file not found ' + path)
        this.writeConfiguration(structuredClone(Config.newConfig))
        return
      }
      log.log(LogLevelEnum.error, 'readYaml failed: ' + errorMessage(e))
      throw e
    }
  }

  writeConfiguration(config: Iconfiguration) {
    Config.config = config
    Logger.setLevel(config.logLevel)
    if (config.debugComponents && config.debugComponents.length) Debug.enable(config.debugComponents)
  }

  static resetForTest(): void {
    Config.config = undefined
    Logger.setLevel(Config.newConfig.logLevel)
  }
}
