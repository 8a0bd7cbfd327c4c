export interface UsbDeviceDescriptor {
  vendorId: number
  productId: number
  busNumber: number
  deviceAddress: number
  /** Number of interfaces of the first configuration, 0 when unknown. */
  interfaceCount: number
}

export interface UsbIdentity {
  vendorId: number
  productId: number
}

export interface UsbHandle {
  readonly descriptor: UsbDeviceDescriptor
  readonly serialNumber: string
}

export enum UsbRequestType {
  hostToDevice = 0x00,
  deviceToHost = 0x80,
}

/**
 * The part of a USB stack boardlink consumes: enumeration, opening a device and control transfers
 * on endpoint 0.
 *
 * Implementations translate their own failures into TransportTimeoutError, TransportFailureError
 * or DeviceClaimedError.
 */
export interface UsbTransport {
  enumerate(filter?: UsbIdentity): Promise<UsbDeviceDescriptor[]>
  open(descriptor: UsbDeviceDescriptor): Promise<UsbHandle>
  /**
   * For device to host transfers dataOrLength is the number of bytes to read,
   * for host to device transfers the payload. Resolves with the bytes read (empty for writes).
   */
  controlTransfer(
    handle: UsbHandle,
    requestType: UsbRequestType,
    request: number,
    value: number,
    index: number,
    dataOrLength: Buffer | number,
    timeoutMs: number
  ): Promise<Buffer>
  close(handle: UsbHandle): Promise<void>
}

export function getUsbDeviceKey(descriptor: UsbDeviceDescriptor): string {
  return descriptor.busNumber + '-' + descriptor.deviceAddress
}

export function formatUsbId(id: number): string {
  return '0x' + id.toString(16).padStart(4, '0')
}
