import { CommunicationError } from '../../errors.js'
import { DeviceQueue } from '../../transport/deviceQueue.js'
import { runDiscoveryExclusive } from '../../transport/discoveryLock.js'
import { RequestTasks } from '../../transport/requestQueue.js'
import { UsbDeviceDescriptor, UsbHandle, UsbIdentity, UsbRequestType, UsbTransport, formatUsbId, getUsbDeviceKey } from '../../transport/usb.js'
import { Backend } from '../backend.js'
import { collectBackends } from '../discovery.js'

export interface UsbDiscoveryOptions {
  transport: UsbTransport
  /** Control transfer timeout. Defaults to usb.timeoutMs of the configuration. */
  timeoutMs?: number
}

/** A controlRead: code selects what is read, length is the size of the answer in bytes. */
export interface ReadCommand {
  code: number
  length: number
}

export interface WriteCommand {
  code: number
}

// Every command of these boards is a vendor request with this number
const VENDOR_REQUEST = 64

/**
 * Base of backends for boards that are driven by control transfers on endpoint 0.
 */
export abstract class RawUsbBackend extends Backend {
  private readonly queue: DeviceQueue

  constructor(
    protected readonly transport: UsbTransport,
    protected readonly handle: UsbHandle,
    protected readonly timeoutMs: number
  ) {
    super()
    this.queue = new DeviceQueue('usb ' + getUsbDeviceKey(handle.descriptor))
  }

  get serialNumber(): string {
    return this.handle.serialNumber
  }

  protected read(command: ReadCommand): Promise<Buffer> {
    return this.queue.run('read ' + command.code, RequestTasks.read, async () => {
      const data = await this.transport.controlTransfer(
        this.handle,
        UsbRequestType.deviceToHost,
        VENDOR_REQUEST,
        0,
        command.code,
        command.length,
        this.timeoutMs
      )
      if (data.length < command.length)
        throw new CommunicationError(`Read command ${command.code} returned ${data.length} bytes, expected ${command.length}`)
      return data
    })
  }

  /**
   * A number is sent as wValue, a buffer as the data stage.
   */
  protected async write(command: WriteCommand, param: number | Buffer): Promise<void> {
    const value = typeof param === 'number' ? param & 0xffff : 0
    const data = typeof param === 'number' ? Buffer.alloc(0) : param
    await this.queue.run('write ' + command.code, RequestTasks.write, () =>
      this.transport.controlTransfer(this.handle, UsbRequestType.hostToDevice, VENDOR_REQUEST, value, command.code, data, this.timeoutMs)
    )
  }

  async close(): Promise<void> {
    await this.queue.close(() => this.transport.close(this.handle))
  }
}

/**
 * Enumerates the devices with the given identity, opens every device accepted by `accept`
 * and lets `create` validate it. A device whose validation fails is closed again.
 */
export function discoverUsbBackends<B extends RawUsbBackend>(
  boardName: string,
  identity: UsbIdentity,
  options: UsbDiscoveryOptions,
  defaultTimeoutMs: number,
  accept: (descriptor: UsbDeviceDescriptor) => boolean,
  create: (transport: UsbTransport, handle: UsbHandle, timeoutMs: number) => Promise<B>
): Promise<B[]> {
  const { transport } = options
  const timeoutMs = options.timeoutMs ?? defaultTimeoutMs
  return runDiscoveryExclusive(transport, 'discover ' + boardName, async () => {
    const devices = (await transport.enumerate(identity)).filter(accept)
    return collectBackends(
      boardName,
      devices,
      (d) => formatUsbId(d.vendorId) + ':' + formatUsbId(d.productId) + ' at ' + getUsbDeviceKey(d),
      async (descriptor) => {
        const handle = await transport.open(descriptor)
        try {
          return await create(transport, handle, timeoutMs)
        } catch (e: unknown) {
          await transport.close(handle)
          throw e
        }
      }
    )
  })
}
