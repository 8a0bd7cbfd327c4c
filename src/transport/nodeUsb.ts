import Debug from 'debug'
import { getDeviceList } from 'usb'
import { CommunicationError, DeviceClaimedError, TransportFailureError, TransportTimeoutError, errorMessage } from '../errors.js'
import { UsbDeviceDescriptor, UsbHandle, UsbIdentity, UsbRequestType, UsbTransport, getUsbDeviceKey } from './usb.js'

const debug = Debug('nodeusb')

type LibUsbDevice = ReturnType<typeof getDeviceList>[number]

// libusb error codes
const LIBUSB_ERROR_ACCESS = -3
const LIBUSB_ERROR_NO_DEVICE = -4
const LIBUSB_ERROR_BUSY = -6
const LIBUSB_ERROR_TIMEOUT = -7

function libusbErrno(e: unknown): number | undefined {
  if (typeof e === 'object' && e !== null && 'errno' in e && typeof e.errno === 'number') return e.errno
  return undefined
}

export function translateUsbError(e: unknown, operation: string, timeoutMs?: number): CommunicationError {
  if (e instanceof CommunicationError) return e
  switch (libusbErrno(e)) {
    case LIBUSB_ERROR_TIMEOUT:
      return new TransportTimeoutError(operation, timeoutMs ?? 0)
    case LIBUSB_ERROR_ACCESS:
    case LIBUSB_ERROR_BUSY:
      return new DeviceClaimedError(operation + ': ' + errorMessage(e), { cause: e })
    case LIBUSB_ERROR_NO_DEVICE:
      return new TransportFailureError(operation + ': device disconnected', { cause: e })
    default:
      return new TransportFailureError(operation + ': ' + errorMessage(e), { cause: e })
  }
}

function countInterfaces(device: LibUsbDevice): number {
  try {
    return device.configDescriptor ? device.configDescriptor.interfaces.length : 0
  } catch (e: unknown) {
    // some platforms refuse the config descriptor of a device that is not open
    debug('no config descriptor: ' + errorMessage(e))
    return 0
  }
}

function describe(device: LibUsbDevice): UsbDeviceDescriptor {
  return {
    vendorId: device.deviceDescriptor.idVendor,
    productId: device.deviceDescriptor.idProduct,
    busNumber: device.busNumber,
    deviceAddress: device.deviceAddress,
    interfaceCount: countInterfaces(device),
  }
}

class NodeUsbHandle implements UsbHandle {
  constructor(
    readonly descriptor: UsbDeviceDescriptor,
    readonly serialNumber: string,
    readonly device: LibUsbDevice
  ) {}
}

/**
 * UsbTransport on top of the `usb` package (libusb).
 */
export class NodeUsbTransport implements UsbTransport {
  private claimed = new Set<string>()

  async enumerate(filter?: UsbIdentity): Promise<UsbDeviceDescriptor[]> {
    let devices: LibUsbDevice[]
    try {
      devices = getDeviceList()
    } catch (e: unknown) {
      throw translateUsbError(e, 'enumerate')
    }
    return devices
      .filter(
        (d) => filter == undefined || (d.deviceDescriptor.idVendor == filter.vendorId && d.deviceDescriptor.idProduct == filter.productId)
      )
      .map(describe)
  }

  async open(descriptor: UsbDeviceDescriptor): Promise<UsbHandle> {
    const key = getUsbDeviceKey(descriptor)
    if (this.claimed.has(key)) throw new DeviceClaimedError('USB device ' + key + ' is already open')
    const device = getDeviceList().find((d) => getUsbDeviceKey(describe(d)) == key)
    if (!device) throw new TransportFailureError('USB device ' + key + ' is no longer connected')
    try {
      device.open()
    } catch (e: unknown) {
      throw translateUsbError(e, 'open ' + key)
    }
    this.claimed.add(key)
    try {
      const serialNumber = await this.readStringDescriptor(device, device.deviceDescriptor.iSerialNumber)
      debug('opened ' + key + ' serial: ' + serialNumber)
      return new NodeUsbHandle(descriptor, serialNumber, device)
    } catch (e: unknown) {
      this.release(key, device)
      throw translateUsbError(e, 'read serial number of ' + key)
    }
  }

  private readStringDescriptor(device: LibUsbDevice, index: number): Promise<string> {
    return new Promise<string>((resolve, reject) => {
      if (index == 0) {
        resolve('')
        return
      }
      device.getStringDescriptor(index, (error, value) => {
        if (error) reject(error)
        else resolve(value ?? '')
      })
    })
  }

  controlTransfer(
    handle: UsbHandle,
    requestType: UsbRequestType,
    request: number,
    value: number,
    index: number,
    dataOrLength: Buffer | number,
    timeoutMs: number
  ): Promise<Buffer> {
    const device = this.getDevice(handle)
    const operation = 'controlTransfer(' + requestType + ',' + request + ',' + value + ',' + index + ')'
    return new Promise<Buffer>((resolve, reject) => {
      try {
        device.timeout = timeoutMs
        device.controlTransfer(requestType, request, value, index, dataOrLength, (error, data) => {
          if (error) reject(translateUsbError(error, operation, timeoutMs))
          else resolve(Buffer.isBuffer(data) ? data : Buffer.alloc(0))
        })
      } catch (e: unknown) {
        reject(translateUsbError(e, operation, timeoutMs))
      }
    })
  }

  async close(handle: UsbHandle): Promise<void> {
    this.release(getUsbDeviceKey(handle.descriptor), this.getDevice(handle))
  }

  private release(key: string, device: LibUsbDevice) {
    this.claimed.delete(key)
    try {
      device.close()
    } catch (e: unknown) {
      debug('close ' + key + ' failed: ' + errorMessage(e))
    }
  }

  private getDevice(handle: UsbHandle): LibUsbDevice {
    if (!(handle instanceof NodeUsbHandle)) throw new TypeError('USB handle was not opened by NodeUsbTransport')
    return handle.device
  }
}
