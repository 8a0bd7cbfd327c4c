import { SerialTransport } from '../../transport/serial.js'
import { UsbTransport } from '../../transport/usb.js'
import { Environment } from '../environment.js'
import { HardwareMotorBoardBackend } from './motorBoard.js'
import { HardwarePowerBoardBackend } from './powerBoard.js'
import { HardwareRuggeduinoBackend } from './ruggeduino.js'
import { HardwareServoBoardBackend } from './servoBoard.js'

export * from './rawUsbBackend.js'
export * from './serialBackend.js'
export * from './motorBoard.js'
export * from './servoBoard.js'
export * from './powerBoard.js'
export * from './ruggeduino.js'

export interface IhardwareTransports {
  usb?: UsbTransport
  serial?: SerialTransport
}

/**
 * Every board on real hardware. Transports that are not passed in are created on the `usb`
 * and `serialport` packages, which are only loaded here.
 */
export async function createHardwareEnvironment(transports: IhardwareTransports = {}): Promise<Environment> {
  const usb = transports.usb ?? new (await import('../../transport/nodeUsb.js')).NodeUsbTransport()
  const serial = transports.serial ?? new (await import('../../transport/nodeSerial.js')).NodeSerialTransport()
  return new Environment('HardwareEnvironment')
    .registerBackend(HardwareMotorBoardBackend, { transport: serial })
    .registerBackend(HardwareServoBoardBackend, { transport: usb })
    .registerBackend(HardwarePowerBoardBackend, { transport: usb })
    .registerBackend(HardwareRuggeduinoBackend, { transport: serial })
}
