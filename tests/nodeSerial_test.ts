import { setTimeout as sleep } from 'timers/promises'
import { SerialPortMock } from 'serialport'
import { beforeEach, describe, expect, it, vi } from 'vitest'
import { DeviceClaimedError, TransportFailureError, TransportTimeoutError } from '../src/errors.js'
import { MAX_BUFFERED_BYTES, NodeSerialTransport, productFromPnpId, toSerialPortInfo, translateOpenError } from '../src/transport/nodeSerial.js'

// Runs the transport on serialport's in-process mock binding
vi.mock('serialport', async () => {
  const actual = await vi.importActual<typeof import('serialport')>('serialport')
  return {
    ...actual,
    SerialPort: actual.SerialPortMock,
  }
})

const path = '/dev/ROBOT'

function createPort(echo: boolean): void {
  SerialPortMock.binding.createPort(path, { echo: echo, record: true, readyData: Buffer.alloc(0) })
}

describe('NodeSerialTransport', () => {
  beforeEach(() => {
    SerialPortMock.binding.reset()
  })

  it('reads lines without their terminator', async () => {
    createPort(true)
    const transport = new NodeSerialTransport()
    const handle = await transport.open(path, 115200)
    expect(handle.baudRate).toBe(115200)
    expect(await transport.write(handle, Buffer.from('SRduino:1\r\nh\n'))).toBe(13)
    expect(await transport.readLine(handle, 1000)).toBe('SRduino:1')
    expect(await transport.readLine(handle, 1000)).toBe('h')
    await transport.close(handle)
  })

  it('reads exact byte counts', async () => {
    createPort(true)
    const transport = new NodeSerialTransport()
    const handle = await transport.open(path, 1000000)
    await transport.write(handle, Buffer.from([1, 2, 3, 4, 5]))
    expect([...(await transport.read(handle, 3, 1000))]).toEqual([1, 2, 3])
    expect([...(await transport.read(handle, 2, 1000))]).toEqual([4, 5])
    await transport.close(handle)
  })

  it('times out when nothing arrives', async () => {
    createPort(false)
    const transport = new NodeSerialTransport()
    const handle = await transport.open(path, 115200)
    await transport.write(handle, Buffer.from('r'))
    await expect(transport.readLine(handle, 30)).rejects.toThrow(TransportTimeoutError)
    await expect(transport.read(handle, 4, 30)).rejects.toThrow('read(4) on /dev/ROBOT timed out after 30ms')
    await transport.close(handle)
  })

  it('drops unread input before a write', async () => {
    createPort(true)
    const transport = new NodeSerialTransport()
    const handle = await transport.open(path, 115200)
    await transport.write(handle, Buffer.from('late reply\n'))
    await sleep(50)
    await transport.write(handle, Buffer.from('l\n'))
    expect(await transport.readLine(handle, 1000)).toBe('l')
    await transport.close(handle)
  })

  it('keeps only the newest bytes of a long unread stream', async () => {
    createPort(true)
    const transport = new NodeSerialTransport()
    const handle = await transport.open(path, 115200)
    await transport.write(handle, Buffer.from('x'.repeat(MAX_BUFFERED_BYTES + 1000) + '\n'))
    const line = await transport.readLine(handle, 1000)
    expect(line.length).toBe(MAX_BUFFERED_BYTES - 1)
    await transport.close(handle)
  })

  it('holds each port for one opener', async () => {
    createPort(false)
    const transport = new NodeSerialTransport()
    const handle = await transport.open(path, 115200)
    await expect(transport.open(path, 115200)).rejects.toThrow(DeviceClaimedError)
    await transport.close(handle)
    await expect(transport.readLine(handle, 30)).rejects.toThrow(TransportFailureError)
    const again = await transport.open(path, 115200)
    await transport.close(again)
  })

  it('fails to open ports that do not exist', async () => {
    const transport = new NodeSerialTransport()
    await expect(transport.open('/dev/missing', 115200)).rejects.toThrow(TransportFailureError)
  })

  it('lists ports with hexadecimal ids', async () => {
    SerialPortMock.binding.createPort(path, { manufacturer: 'Student Robotics', vendorId: '0403', productId: '6001' })
    const ports = await new NodeSerialTransport().list()
    expect(ports.length).toBe(1)
    expect(ports[0].path).toBe(path)
    expect(ports[0].manufacturer).toBe('Student Robotics')
    expect(ports[0].vendorId).toBe(0x0403)
    expect(ports[0].productId).toBe(0x6001)
    expect(ports[0].product).toBeUndefined()
  })
})

describe('port information', () => {
  it('takes the product from a udev id', () => {
    expect(productFromPnpId('usb-Student_Robotics_MCV4B_SR0AB1-if00-port0', 'Student Robotics', 'SR0AB1')).toBe('MCV4B')
    expect(productFromPnpId('usb-FTDI_FT232R_USB_UART_A10K-if00-port0', 'FTDI', 'A10K')).toBe('FT232R USB UART')
    expect(productFromPnpId('FTDIBUS\\VID_0403+PID_6001+SR0AB1A\\0000', 'Student Robotics', 'SR0AB1')).toBeUndefined()
    expect(productFromPnpId(undefined)).toBeUndefined()
  })

  it('maps serialport port info', () => {
    expect(
      toSerialPortInfo({
        path: '/dev/ttyUSB0',
        manufacturer: 'Student Robotics',
        serialNumber: 'SR0AB1',
        pnpId: 'usb-Student_Robotics_MCV4B_SR0AB1-if00-port0',
        locationId: undefined,
        vendorId: '0403',
        productId: '6001',
      })
    ).toEqual({
      path: '/dev/ttyUSB0',
      manufacturer: 'Student Robotics',
      serialNumber: 'SR0AB1',
      product: 'MCV4B',
      vendorId: 0x0403,
      productId: 0x6001,
    })
  })

  it('translates open errors', () => {
    expect(translateOpenError('/dev/ttyACM0', new Error('Error Resource temporarily unavailable Cannot lock port'))).toBeInstanceOf(
      DeviceClaimedError
    )
    expect(translateOpenError('/dev/ttyACM0', new Error('Error: Permission denied, cannot open /dev/ttyACM0'))).toBeInstanceOf(
      DeviceClaimedError
    )
    const failure = translateOpenError('/dev/ttyACM0', new Error('No such file or directory'))
    expect(failure).toBeInstanceOf(TransportFailureError)
    expect(failure.message).toBe('open /dev/ttyACM0: No such file or directory')
  })
})
