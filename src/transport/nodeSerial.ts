import Debug from 'debug'
import { SerialPort } from 'serialport'
import { CommunicationError, DeviceClaimedError, TransportFailureError, TransportTimeoutError, errorMessage } from '../errors.js'
import { SerialHandle, SerialPortInfo, SerialTransport } from './serial.js'

const debug = Debug('nodeserial')
// Bytes kept for readers. Older bytes are dropped when more arrive.
export const MAX_BUFFERED_BYTES = 4096

type IportInfo = Awaited<ReturnType<typeof SerialPort.list>>[number]

function parseHexId(id: string | undefined): number | undefined {
  if (id == undefined || id.length == 0) return undefined
  const n = Number.parseInt(id, 16)
  return Number.isNaN(n) ? undefined : n
}

/*
 * Linux names ports by udev id, e.g. usb-Student_Robotics_MCV4B_SR0AB1-if00-port0: vendor,
 * product and serial number joined by underscores. Other platforms give no product.
 */
export function productFromPnpId(pnpId: string | undefined, manufacturer?: string, serialNumber?: string): string | undefined {
  const match = /^usb-(.+)-if\d+/.exec(pnpId ?? '')
  if (!match) return undefined
  let id = match[1]
  const vendor = manufacturer?.replace(/ /g, '_')
  if (vendor && id.startsWith(vendor + '_')) id = id.substring(vendor.length + 1)
  if (serialNumber && id.endsWith('_' + serialNumber)) id = id.substring(0, id.length - serialNumber.length - 1)
  return id.length > 0 ? id.replace(/_/g, ' ') : undefined
}

export function toSerialPortInfo(port: IportInfo): SerialPortInfo {
  return {
    path: port.path,
    manufacturer: port.manufacturer,
    serialNumber: port.serialNumber,
    product: productFromPnpId(port.pnpId, port.manufacturer, port.serialNumber),
    vendorId: parseHexId(port.vendorId),
    productId: parseHexId(port.productId),
  }
}

export function translateOpenError(path: string, e: unknown): CommunicationError {
  const msg = errorMessage(e)
  if (/access denied|permission denied|resource busy|resource temporarily unavailable|cannot lock port/i.test(msg))
    return new DeviceClaimedError('open ' + path + ': ' + msg, { cause: e })
  return new TransportFailureError('open ' + path + ': ' + msg, { cause: e })
}

class NodeSerialHandle implements SerialHandle {
  private buffer = Buffer.alloc(0)
  private waiter: (() => void) | undefined
  private failure: CommunicationError | undefined
  constructor(
    readonly path: string,
    readonly baudRate: number,
    readonly port: SerialPort
  ) {
    port.on('data', (chunk: Buffer) => {
      this.buffer = Buffer.concat([this.buffer, chunk])
      if (this.buffer.length > MAX_BUFFERED_BYTES) {
        debug('%s: dropping %d unread bytes', path, this.buffer.length - MAX_BUFFERED_BYTES)
        this.buffer = this.buffer.subarray(this.buffer.length - MAX_BUFFERED_BYTES)
      }
      this.notify()
    })
    port.on('error', (e: Error) => {
      this.failure = new TransportFailureError('serial port ' + path + ': ' + e.message, { cause: e })
      this.notify()
    })
    port.on('close', () => {
      if (!this.failure) this.failure = new TransportFailureError('serial port ' + path + ' was closed')
      this.notify()
    })
  }

  private notify() {
    const w = this.waiter
    if (w) w()
  }

  // Input nobody asked for, e.g. a reply that came after its read timed out
  discard(): void {
    if (this.buffer.length > 0) debug('%s: discarding %d stale bytes', this.path, this.buffer.length)
    this.buffer = Buffer.alloc(0)
  }

  take(size: number): Buffer | undefined {
    if (this.buffer.length < size) return undefined
    const rc = this.buffer.subarray(0, size)
    this.buffer = this.buffer.subarray(size)
    return rc
  }

  takeLine(): string | undefined {
    const idx = this.buffer.indexOf(0x0a)
    if (idx < 0) return undefined
    const line = this.buffer.subarray(0, idx).toString('utf-8')
    this.buffer = this.buffer.subarray(idx + 1)
    return line.replace(/\r$/, '')
  }

  waitFor<T>(extract: () => T | undefined, operation: string, timeoutMs: number): Promise<T> {
    return new Promise<T>((resolve, reject) => {
      const timer = setTimeout(() => {
        this.waiter = undefined
        reject(new TransportTimeoutError(operation + ' on ' + this.path, timeoutMs))
      }, timeoutMs)
      const check = () => {
        const value = extract()
        if (value !== undefined) {
          clearTimeout(timer)
          this.waiter = undefined
          resolve(value)
        } else if (this.failure) {
          clearTimeout(timer)
          this.waiter = undefined
          reject(this.failure)
        } else this.waiter = check
      }
      check()
    })
  }
}

/**
 * SerialTransport on top of the `serialport` package.
 */
export class NodeSerialTransport implements SerialTransport {
  private claimed = new Set<string>()

  async list(): Promise<SerialPortInfo[]> {
    try {
      const portInfo = await SerialPort.list()
      return portInfo.map(toSerialPortInfo)
    } catch (e: unknown) {
      throw new TransportFailureError('list serial ports: ' + errorMessage(e), { cause: e })
    }
  }

  open(path: string, baudRate: number): Promise<SerialHandle> {
    if (this.claimed.has(path)) return Promise.reject(new DeviceClaimedError('serial port ' + path + ' is already open'))
    const port = new SerialPort({ path: path, baudRate: baudRate, autoOpen: false })
    return new Promise<SerialHandle>((resolve, reject) => {
      port.open((err) => {
        if (err) reject(translateOpenError(path, err))
        else {
          this.claimed.add(path)
          debug('opened ' + path + ' at ' + baudRate)
          resolve(new NodeSerialHandle(path, baudRate, port))
        }
      })
    })
  }

  read(handle: SerialHandle, size: number, timeoutMs: number): Promise<Buffer> {
    const h = this.getHandle(handle)
    return h.waitFor(() => h.take(size), 'read(' + size + ')', timeoutMs)
  }

  readLine(handle: SerialHandle, timeoutMs: number): Promise<string> {
    const h = this.getHandle(handle)
    return h.waitFor(() => h.takeLine(), 'readLine', timeoutMs)
  }

  /** Drops unread input first, so that the next read sees the reply to this write. */
  write(handle: SerialHandle, data: Buffer): Promise<number> {
    const h = this.getHandle(handle)
    h.discard()
    const port = h.port
    return new Promise<number>((resolve, reject) => {
      port.write(data, (err) => {
        if (err) {
          reject(new TransportFailureError('write ' + handle.path + ': ' + err.message, { cause: err }))
          return
        }
        port.drain((drainErr) => {
          if (drainErr) reject(new TransportFailureError('drain ' + handle.path + ': ' + drainErr.message, { cause: drainErr }))
          else resolve(data.length)
        })
      })
    })
  }

  close(handle: SerialHandle): Promise<void> {
    const port = this.getHandle(handle).port
    this.claimed.delete(handle.path)
    return new Promise<void>((resolve) => {
      if (!port.isOpen) {
        resolve()
        return
      }
      port.close((err) => {
        if (err) debug('close ' + handle.path + ' failed: ' + err.message)
        resolve()
      })
    })
  }

  private getHandle(handle: SerialHandle): NodeSerialHandle {
    if (!(handle instanceof NodeSerialHandle)) throw new TypeError('Serial handle was not opened by NodeSerialTransport')
    return handle
  }
}
