import { fileURLToPath } from 'url'
import { afterEach, describe, expect, it } from 'vitest'
import { createConsoleEnvironment } from '../src/backends/console/index.js'
import { MotorBoard } from '../src/boards/motorBoard.js'
import { Config } from '../src/config.js'
import { LogLevelEnum, Logger } from '../src/log.js'
import { RecordingConsole } from './testhelper.js'

const fixture = fileURLToPath(new URL('./fixtures/boardlink.yaml', import.meta.url))

describe('Config', () => {
  afterEach(() => {
    delete process.env['BOARDLINK_CONFIG']
  })

  it('fills missing and invalid entries with defaults', () => {
    const defaults = Config.getConfiguration()
    expect(Config.fromFile(undefined)).toEqual(defaults)
    const cfg = Config.fromFile({
      logLevel: 'loud',
      serial: { timeoutMs: -5 },
      usb: { timeoutMs: 50 },
      console: { serialNumber: 'ROBOT' },
      motorBoard: { baudRate: 'fast' },
    })
    expect(cfg.logLevel).toBe(LogLevelEnum.info)
    expect(cfg.serial.timeoutMs).toBe(250)
    expect(cfg.usb.timeoutMs).toBe(50)
    expect(cfg.console.serialNumber).toBe('ROBOT')
    expect(cfg.motorBoard.baudRate).toBe(1000000)
  })

  it('hands out copies', () => {
    const cfg = Config.getConfiguration()
    cfg.usb.timeoutMs = 1
    expect(Config.getConfiguration().usb.timeoutMs).toBe(1000)
  })

  it('reads a yaml file', async () => {
    await new Config().readYamlAsync(fixture)
    const cfg = Config.getConfiguration()
    expect(cfg.usb.timeoutMs).toBe(500)
    expect(cfg.console.serialNumber).toBe('TEST1')
    expect(cfg.ruggeduino).toEqual({ baudRate: 57600, timeoutMs: 1250 })
    expect(cfg.motorBoard).toEqual({ baudRate: 1000000 })
    expect(Logger.getLevel()).toBe(LogLevelEnum.warn)
  })

  it('takes the file from the environment', async () => {
    process.env['BOARDLINK_CONFIG'] = fixture
    await new Config().readYamlAsync()
    const rec = new RecordingConsole()
    const group = await createConsoleEnvironment({ console: rec.factory }).getBoardGroup(MotorBoard)
    expect(group.has('TEST1')).toBeTruthy()
  })

  it('uses the defaults if the file does not exist', async () => {
    await new Config().readYamlAsync(fileURLToPath(new URL('./fixtures/missing.yaml', import.meta.url)))
    expect(Config.getConfiguration().usb.timeoutMs).toBe(1000)
    expect(Logger.getLevel()).toBe(LogLevelEnum.info)
  })
})
