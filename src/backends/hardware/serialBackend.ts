import { CommunicationError, errorMessage } from '../../errors.js'
import { LogLevelEnum, Logger } from '../../log.js'
import { DeviceQueue } from '../../transport/deviceQueue.js'
import { runDiscoveryExclusive } from '../../transport/discoveryLock.js'
import { RequestTasks } from '../../transport/requestQueue.js'
import { SerialHandle, SerialPortInfo, SerialTransport } from '../../transport/serial.js'
import { Backend } from '../backend.js'
import { collectBackends } from '../discovery.js'

const log = new Logger('serialbackend')

export interface SerialDiscoveryOptions {
  transport: SerialTransport
  /** Defaults to the board's baudRate in the configuration. */
  baudRate?: number
  /** Read timeout. Defaults to the board's timeoutMs, then serial.timeoutMs of the configuration. */
  timeoutMs?: number
}

export interface IserialConnection {
  transport: SerialTransport
  handle: SerialHandle
  timeoutMs: number
}

/**
 * Base of backends talking to a board over a serial port. Every exchange with the board runs
 * on the port's DeviceQueue.
 */
export abstract class SerialBackend extends Backend {
  protected readonly queue: DeviceQueue

  constructor(
    protected readonly connection: IserialConnection,
    readonly serialNumber: string
  ) {
    super()
    this.queue = new DeviceQueue(connection.handle.path)
  }

  protected request<T>(label: string, task: RequestTasks, fn: () => Promise<T>): Promise<T> {
    return this.queue.run(label, task, fn)
  }

  // The helpers below must only be called from inside request()
  protected async writeBytes(data: Buffer): Promise<void> {
    const { transport, handle } = this.connection
    const written = await transport.write(handle, data)
    if (written != data.length) throw new CommunicationError('Mismatch in command bytes written to serial interface.')
  }

  protected readLine(): Promise<string> {
    const { transport, handle, timeoutMs } = this.connection
    return transport.readLine(handle, timeoutMs)
  }

  /** Last commands before the port is closed. */
  protected async beforeClose(): Promise<void> {}

  async close(): Promise<void> {
    if (this.queue.isClosed()) return
    try {
      await this.beforeClose()
    } catch (e: unknown) {
      log.log(LogLevelEnum.warn, '%s: %s', this.connection.handle.path, errorMessage(e))
    }
    const { transport, handle } = this.connection
    await this.queue.close(() => transport.close(handle))
  }
}

/**
 * Lists the serial ports, opens every port accepted by `accept` and lets `create` validate it.
 * A port whose validation fails is closed again.
 */
export function discoverSerialBackends<B extends SerialBackend>(
  boardName: string,
  options: SerialDiscoveryOptions,
  defaults: { baudRate: number; timeoutMs: number },
  accept: (port: SerialPortInfo) => boolean,
  create: (connection: IserialConnection, port: SerialPortInfo) => Promise<B>
): Promise<B[]> {
  const { transport } = options
  const baudRate = options.baudRate ?? defaults.baudRate
  const timeoutMs = options.timeoutMs ?? defaults.timeoutMs
  return runDiscoveryExclusive(transport, 'discover ' + boardName, async () => {
    const ports = (await transport.list()).filter(accept)
    return collectBackends(
      boardName,
      ports,
      (port) => port.path,
      async (port) => {
        const handle = await transport.open(port.path, baudRate)
        try {
          return await create({ transport: transport, handle: handle, timeoutMs: timeoutMs }, port)
        } catch (e: unknown) {
          await transport.close(handle)
          throw e
        }
      }
    )
  })
}
