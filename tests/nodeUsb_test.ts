import { beforeEach, describe, expect, it, vi } from 'vitest'
import { CommunicationError, DeviceClaimedError, TransportFailureError, TransportTimeoutError } from '../src/errors.js'
import { NodeUsbTransport, translateUsbError } from '../src/transport/nodeUsb.js'
import { UsbRequestType } from '../src/transport/usb.js'

type TransferCallback = (error: LibUsbError | undefined, data?: Buffer) => void

class LibUsbError extends Error {
  constructor(readonly errno: number) {
    super('LIBUSB_ERROR ' + errno)
  }
}

// The parts of a usb Device the transport touches
class FakeLibUsbDevice {
  timeout = 0
  isOpen = false
  openError: LibUsbError | undefined
  transferError: LibUsbError | undefined
  readonly busNumber = 1
  readonly deviceDescriptor = { idVendor: 0x1bda, idProduct: 0x0011, iSerialNumber: 3 }
  readonly configDescriptor = { interfaces: [[]] }
  constructor(
    readonly deviceAddress: number,
    readonly serialNumber: string
  ) {}
  open(): void {
    if (this.openError) throw this.openError
    this.isOpen = true
  }
  close(): void {
    this.isOpen = false
  }
  getStringDescriptor(_index: number, callback: (error: LibUsbError | undefined, value?: string) => void): void {
    callback(undefined, this.serialNumber)
  }
  controlTransfer(_type: number, _request: number, _value: number, _index: number, data: Buffer | number, callback: TransferCallback): void {
    if (this.transferError) callback(this.transferError)
    else callback(undefined, typeof data === 'number' ? Buffer.alloc(data, 7) : undefined)
  }
}

const { devices } = vi.hoisted(() => {
  const devices: FakeLibUsbDevice[] = []
  return { devices }
})

vi.mock('usb', () => ({
  getDeviceList: () => devices,
}))

describe('translateUsbError', () => {
  it('maps libusb error numbers', () => {
    const busy = translateUsbError(new LibUsbError(-6), 'open 1-2')
    expect(busy).toBeInstanceOf(DeviceClaimedError)
    expect(busy.message).toBe('open 1-2: LIBUSB_ERROR -6')
    expect(translateUsbError(new LibUsbError(-3), 'open 1-2')).toBeInstanceOf(DeviceClaimedError)
    const timeout = translateUsbError(new LibUsbError(-7), 'controlTransfer', 250)
    expect(timeout).toBeInstanceOf(TransportTimeoutError)
    expect(timeout.message).toBe('controlTransfer timed out after 250ms')
    expect(translateUsbError(new LibUsbError(-4), 'open 1-2').message).toBe('open 1-2: device disconnected')
    expect(translateUsbError(new Error('odd'), 'enumerate')).toBeInstanceOf(TransportFailureError)
  })

  it('passes library errors through', () => {
    const e = new CommunicationError('already translated')
    expect(translateUsbError(e, 'open')).toBe(e)
  })
})

describe('NodeUsbTransport', () => {
  beforeEach(() => {
    devices.length = 0
  })

  it('enumerates matching devices', async () => {
    devices.push(new FakeLibUsbDevice(2, 'PB1'), new FakeLibUsbDevice(3, 'PB2'))
    const transport = new NodeUsbTransport()
    expect(await transport.enumerate({ vendorId: 0x1bda, productId: 0x0011 })).toEqual([
      { vendorId: 0x1bda, productId: 0x0011, busNumber: 1, deviceAddress: 2, interfaceCount: 1 },
      { vendorId: 0x1bda, productId: 0x0011, busNumber: 1, deviceAddress: 3, interfaceCount: 1 },
    ])
    expect(await transport.enumerate({ vendorId: 0x1bda, productId: 0x0010 })).toEqual([])
  })

  it('claims a device until it is closed', async () => {
    const device = new FakeLibUsbDevice(2, 'PB1')
    devices.push(device)
    const transport = new NodeUsbTransport()
    const [descriptor] = await transport.enumerate()
    const handle = await transport.open(descriptor)
    expect(handle.serialNumber).toBe('PB1')
    expect(device.isOpen).toBeTruthy()
    await expect(transport.open(descriptor)).rejects.toThrow(DeviceClaimedError)
    await transport.close(handle)
    expect(device.isOpen).toBeFalsy()
    await transport.close(await transport.open(descriptor))
  })

  it('reports a device another process holds as claimed', async () => {
    const device = new FakeLibUsbDevice(2, 'PB1')
    device.openError = new LibUsbError(-6)
    devices.push(device)
    const transport = new NodeUsbTransport()
    const [descriptor] = await transport.enumerate()
    await expect(transport.open(descriptor)).rejects.toThrow(DeviceClaimedError)
    device.openError = undefined
    await transport.close(await transport.open(descriptor))
  })

  it('translates transfer errors', async () => {
    const device = new FakeLibUsbDevice(2, 'PB1')
    devices.push(device)
    const transport = new NodeUsbTransport()
    const handle = await transport.open((await transport.enumerate())[0])
    expect([...(await transport.controlTransfer(handle, UsbRequestType.deviceToHost, 64, 0, 9, 4, 100))]).toEqual([7, 7, 7, 7])
    expect(await transport.controlTransfer(handle, UsbRequestType.hostToDevice, 64, 1, 6, Buffer.alloc(0), 100)).toEqual(Buffer.alloc(0))
    device.transferError = new LibUsbError(-7)
    await expect(transport.controlTransfer(handle, UsbRequestType.deviceToHost, 64, 0, 9, 4, 100)).rejects.toThrow(TransportTimeoutError)
    expect(device.timeout).toBe(100)
    await transport.close(handle)
  })
})
