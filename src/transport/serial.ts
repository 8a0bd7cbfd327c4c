export interface SerialPortInfo {
  path: string
  manufacturer?: string
  serialNumber?: string
  /** USB product string, where the platform reports one. */
  product?: string
  vendorId?: number
  productId?: number
}

export interface SerialHandle {
  readonly path: string
  readonly baudRate: number
}

/**
 * The part of a serial stack boardlink consumes.
 *
 * Reads wait for data up to timeoutMs and then fail with TransportTimeoutError.
 */
export interface SerialTransport {
  list(): Promise<SerialPortInfo[]>
  open(path: string, baudRate: number): Promise<SerialHandle>
  /** Resolves with exactly size bytes. */
  read(handle: SerialHandle, size: number, timeoutMs: number): Promise<Buffer>
  /** Resolves with the next line, without its line terminator. */
  readLine(handle: SerialHandle, timeoutMs: number): Promise<string>
  /** Drops input nobody has read yet, then writes. Resolves with the number of bytes written. */
  write(handle: SerialHandle, data: Buffer): Promise<number>
  close(handle: SerialHandle): Promise<void>
}
