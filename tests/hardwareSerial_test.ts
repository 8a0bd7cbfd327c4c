import { describe, expect, it } from 'vitest'
import { HardwareMotorBoardBackend, encodeMotorState, isMotorBoardPort } from '../src/backends/hardware/motorBoard.js'
import { HardwareRuggeduinoBackend, encodePin } from '../src/backends/hardware/ruggeduino.js'
import { BoardGroup } from '../src/boards/boardgroup.js'
import { MotorBoard } from '../src/boards/motorBoard.js'
import { AnaloguePin, Ruggeduino } from '../src/boards/ruggeduino.js'
import { GPIOPinMode } from '../src/components/gpioPin.js'
import { MotorSpecialState } from '../src/components/motor.js'
import {
  CommunicationError,
  InvalidArgumentError,
  NotSupportedByHardwareError,
  TransportFailureError,
  TransportTimeoutError,
} from '../src/errors.js'
import { FakeSerialPort, FakeSerialTransport, SerialResponder } from './testhelper.js'

function motorBoardPort(path: string, serialNumber: string | undefined, versionLine = 'MCV4B:3'): FakeSerialPort {
  return new FakeSerialPort(
    { path: path, manufacturer: 'Student Robotics', serialNumber: serialNumber, product: 'MCV4B', vendorId: 0x0403, productId: 0x6001 },
    (written) => (written == '\x01' ? [versionLine] : [])
  )
}

function bytes(port: FakeSerialPort): number[][] {
  return port.written.map((b) => [...b])
}

describe('motor board encoding', () => {
  it('maps powers and special states to one byte', () => {
    expect(encodeMotorState(MotorSpecialState.COAST)).toBe(1)
    expect(encodeMotorState(MotorSpecialState.BRAKE)).toBe(2)
    expect(encodeMotorState(0)).toBe(128)
    expect(encodeMotorState(0.4)).toBe(178)
    expect(encodeMotorState(-1)).toBe(3)
    expect(encodeMotorState(1)).toBe(253)
    expect(() => encodeMotorState(1.5)).toThrow(InvalidArgumentError)
  })
})

describe('motor board over serial', () => {
  it('checks the firmware and brakes both motors', async () => {
    const port = motorBoardPort('/dev/ttyUSB0', 'MB1')
    const serial = new FakeSerialTransport().add(port)
    const board = (await BoardGroup.discover(MotorBoard, HardwareMotorBoardBackend, { transport: serial })).singular()
    expect(board.serialNumber).toBe('MB1')
    expect(board.firmwareVersion).toBe('3')
    expect(serial.baudRates).toEqual([1000000])
    expect(bytes(port)).toEqual([[1], [2, 2], [3, 2]])
  })

  it('writes powers and brakes on close', async () => {
    const port = motorBoardPort('/dev/ttyUSB0', 'MB1')
    const serial = new FakeSerialTransport().add(port)
    const board = (await BoardGroup.discover(MotorBoard, HardwareMotorBoardBackend, { transport: serial, baudRate: 9600 })).singular()
    port.written.length = 0
    await board.motors[0].setPower(0.4)
    await board.motors[1].setPower(MotorSpecialState.COAST)
    expect(await board.motors[0].getPower()).toBe(0.4)
    await board.close()
    expect(bytes(port)).toEqual([
      [2, 178],
      [3, 1],
      [2, 2],
      [3, 2],
    ])
    expect(serial.baudRates).toEqual([9600])
    expect(serial.closeCount).toBe(1)
    await expect(board.motors[0].setPower(1)).rejects.toThrow(TransportFailureError)
  })

  it('skips ports that are not motor boards', async () => {
    const serial = new FakeSerialTransport().add(
      motorBoardPort('/dev/ttyUSB0', 'MB1', 'MCV4B:2'),
      motorBoardPort('/dev/ttyUSB1', 'MB2', 'XXXXX:3'),
      motorBoardPort('/dev/ttyUSB2', undefined),
      new FakeSerialPort({ path: '/dev/ttyUSB3', manufacturer: 'Someone else', vendorId: 0x0403, productId: 0x6001 }, () => []),
      motorBoardPort('/dev/ttyUSB4', 'MB5'),
      new FakeSerialPort(
        { path: '/dev/ttyUSB5', manufacturer: 'Student Robotics', product: 'FT232R USB UART', vendorId: 0x0403, productId: 0x6001 },
        () => ['MCV4B:3']
      )
    )
    const group = await BoardGroup.discover(MotorBoard, HardwareMotorBoardBackend, { transport: serial })
    expect(group.boards.map((b) => b.serialNumber)).toEqual(['MB5'])
    expect(serial.baudRates.length).toBe(4)
    expect(serial.closeCount).toBe(3)
  })

  it('leaves ports without a product string to the firmware check', () => {
    const port = { path: '/dev/cu.usbserial', manufacturer: 'Student Robotics', vendorId: 0x0403, productId: 0x6001 }
    expect(isMotorBoardPort(port)).toBeTruthy()
    expect(isMotorBoardPort({ ...port, product: 'MCV4B' })).toBeTruthy()
    expect(isMotorBoardPort({ ...port, product: 'MCV3B' })).toBeFalsy()
  })
})

// Answers like the board firmware: mode and write commands get no reply
function ruggeduinoResponder(versionLine: string, digital = 'h', analogue = '512'): SerialResponder {
  return (written) => {
    switch (written.charAt(0)) {
      case 'v':
        return [versionLine]
      case 'r':
        return [digital]
      case 'a':
        return [analogue]
      default:
        return []
    }
  }
}

function ruggeduinoPort(path: string, serialNumber: string | undefined, respond: SerialResponder): FakeSerialPort {
  return new FakeSerialPort({ path: path, serialNumber: serialNumber, vendorId: 0x2341, productId: 0x0043 }, respond)
}

const initialisation = ['v', 'ic', 'id', 'ie', 'if', 'ig', 'ih', 'ii', 'ij', 'ik', 'il', 'im', 'in']

describe('ruggeduino over serial', () => {
  it('encodes pins as letters', () => {
    expect(encodePin(0)).toBe('a')
    expect(encodePin(13)).toBe('n')
  })

  it('checks the firmware and sets every digital pin to input', async () => {
    const port = ruggeduinoPort('/dev/ttyACM0', 'RD1', ruggeduinoResponder('SRduino:1'))
    const serial = new FakeSerialTransport().add(port)
    const board = (await BoardGroup.discover(Ruggeduino, HardwareRuggeduinoBackend, { transport: serial })).singular()
    expect(board.serialNumber).toBe('RD1')
    expect(board.firmwareVersion).toBe('1')
    expect(serial.baudRates).toEqual([115200])
    expect(port.writtenText()).toEqual(initialisation)
  })

  it('asks for the version until the board has booted', async () => {
    let silent = 2
    const respond = ruggeduinoResponder('SRduino:1')
    const port = ruggeduinoPort('/dev/ttyACM0', 'RD1', (written) => {
      if (written == 'v' && silent > 0) {
        silent--
        return []
      }
      return respond(written)
    })
    const serial = new FakeSerialTransport().add(port)
    const group = await BoardGroup.discover(Ruggeduino, HardwareRuggeduinoBackend, { transport: serial })
    expect(group.count).toBe(1)
    expect(port.writtenText()).toEqual(['v', 'v', ...initialisation])
  })

  it('skips boards that never answer or run other firmware', async () => {
    const silent = ruggeduinoPort('/dev/ttyACM0', 'RD1', () => [])
    const custom = ruggeduinoPort('/dev/ttyACM1', 'RD2', ruggeduinoResponder('SRcustom:2'))
    const serial = new FakeSerialTransport().add(silent, custom)
    const group = await BoardGroup.discover(Ruggeduino, HardwareRuggeduinoBackend, { transport: serial })
    expect(group.count).toBe(0)
    expect(silent.writtenText().length).toBe(26)
    expect(custom.writtenText()).toEqual(['v'])
    expect(serial.closeCount).toBe(2)
  })

  it('falls back to the port path without a serial number', async () => {
    const serial = new FakeSerialTransport().add(ruggeduinoPort('/dev/ttyACM3', undefined, ruggeduinoResponder('SRduino:1')))
    const group = await BoardGroup.discover(Ruggeduino, HardwareRuggeduinoBackend, { transport: serial })
    expect(group.has('/dev/ttyACM3')).toBeTruthy()
  })

  it('drives pins and the LED', async () => {
    const port = ruggeduinoPort('/dev/ttyACM0', 'RD1', ruggeduinoResponder('SRduino:1'))
    const serial = new FakeSerialTransport().add(port)
    const board = (await BoardGroup.discover(Ruggeduino, HardwareRuggeduinoBackend, { transport: serial })).singular()
    port.written.length = 0

    await board.pin(3).setMode(GPIOPinMode.DIGITAL_OUTPUT)
    await board.pin(3).setDigitalState(true)
    expect(await board.pin(3).getDigitalState()).toBe(true)
    expect(await board.pin(4).getDigitalState()).toBe(true)
    expect(await board.pin(AnaloguePin.A2).readAnalogueValue()).toBe(2.5)
    await board.led.setState(true)
    expect(await board.led.getState()).toBe(true)
    expect(await board.pin(13).getMode()).toBe(GPIOPinMode.DIGITAL_OUTPUT)
    expect(port.writtenText()).toEqual(['od', 'ld', 'od', 'hd', 're', 'ac', 'on', 'hn'])
  })

  it('rejects unexpected replies', async () => {
    const serial = new FakeSerialTransport().add(ruggeduinoPort('/dev/ttyACM0', 'RD1', ruggeduinoResponder('SRduino:1', 'x', 'abc')))
    const board = (await BoardGroup.discover(Ruggeduino, HardwareRuggeduinoBackend, { transport: serial })).singular()
    await expect(board.pin(5).getDigitalState()).rejects.toThrow("Invalid response from Ruggeduino: 'x'")
    await expect(board.pin(AnaloguePin.A0).readAnalogueValue()).rejects.toThrow(CommunicationError)
  })

  it('reports reads the board does not answer as timeouts', async () => {
    const port = ruggeduinoPort('/dev/ttyACM0', 'RD1', (written) => (written == 'v' ? ['SRduino:1'] : []))
    const serial = new FakeSerialTransport().add(port)
    const board = (await BoardGroup.discover(Ruggeduino, HardwareRuggeduinoBackend, { transport: serial, timeoutMs: 40 })).singular()
    await expect(board.pin(5).getDigitalState()).rejects.toThrow(TransportTimeoutError)
    await expect(board.pin(AnaloguePin.A0).readAnalogueValue()).rejects.toThrow('readLine on /dev/ttyACM0 timed out after 40ms')
    // the board still takes commands afterwards
    await board.pin(5).setMode(GPIOPinMode.DIGITAL_OUTPUT)
    expect(await board.pin(5).getMode()).toBe(GPIOPinMode.DIGITAL_OUTPUT)
  })

  it('keeps the cached pin settings when a write fails', async () => {
    const port = ruggeduinoPort('/dev/ttyACM0', 'RD1', ruggeduinoResponder('SRduino:1'))
    const serial = new FakeSerialTransport().add(port)
    const board = (await BoardGroup.discover(Ruggeduino, HardwareRuggeduinoBackend, { transport: serial })).singular()
    await board.pin(3).setMode(GPIOPinMode.DIGITAL_OUTPUT)
    port.failWrites = true
    await expect(board.pin(3).setDigitalState(true)).rejects.toThrow(TransportFailureError)
    await expect(board.pin(4).setMode(GPIOPinMode.DIGITAL_OUTPUT)).rejects.toThrow(TransportFailureError)
    await expect(board.led.setState(true)).rejects.toThrow(TransportFailureError)
    port.failWrites = false
    expect(await board.pin(3).getDigitalState()).toBe(false)
    expect(await board.pin(4).getMode()).toBe(GPIOPinMode.DIGITAL_INPUT)
    expect(await board.pin(13).getMode()).toBe(GPIOPinMode.DIGITAL_INPUT)
    expect(await board.led.getState()).toBe(false)
  })

  it('refuses string commands on the official firmware', async () => {
    const port = ruggeduinoPort('/dev/ttyACM0', 'RD1', ruggeduinoResponder('SRduino:1'))
    const serial = new FakeSerialTransport().add(port)
    const board = (await BoardGroup.discover(Ruggeduino, HardwareRuggeduinoBackend, { transport: serial })).singular()
    port.written.length = 0
    await expect(board.command.execute('led on')).rejects.toThrow(NotSupportedByHardwareError)
    expect(port.written).toEqual([])
  })

  it('passes string commands to custom firmware', async () => {
    const respond = ruggeduinoResponder('MyDuino:1')
    const port = ruggeduinoPort('/dev/ttyACM0', 'RD1', (written) => (written == 'ping' ? ['pong\r'] : respond(written)))
    const serial = new FakeSerialTransport().add(port)
    const board = (await BoardGroup.discover(Ruggeduino, HardwareRuggeduinoBackend, { transport: serial })).singular()
    expect(board.firmwareVersion).toBe('1')
    port.written.length = 0
    expect(await board.command.execute('ping')).toBe('pong')
    expect(await board.command.execute('quiet')).toBe('')
    expect(port.writtenText()).toEqual(['ping', 'quiet'])
  })
})
