/**
 * Error taxonomy of boardlink.
 *
 * Everything thrown by the library derives from BoardlinkError, so an application
 * can tell library failures apart from its own with a single instanceof check.
 */
export class BoardlinkError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = new.target.name
  }
}

/**
 * A caller passed an out-of-range or malformed value to a component.
 * Raised before the backend is touched.
 */
export class InvalidArgumentError extends BoardlinkError {}

/** The request is valid, but the board cannot do it. */
export class NotSupportedByHardwareError extends BoardlinkError {}

export class BadGPIOPinModeError extends BoardlinkError {}

export class BoardNotFoundError extends BoardlinkError {
  constructor(readonly serialNumber: string) {
    super('Could not find a board with the serial number ' + serialNumber)
  }
}

export type BoardCountReason = 'none' | 'multiple'

export class BoardCountError extends BoardlinkError {
  readonly expected = 1
  readonly reason: BoardCountReason
  constructor(
    readonly boardName: string,
    readonly found: number
  ) {
    super(`expected exactly one ${boardName} to be connected, but found ${found}`)
    this.reason = found == 0 ? 'none' : 'multiple'
  }
}

/** Base of all errors raised while talking to a device. */
export class CommunicationError extends BoardlinkError {}

/** A transport call exceeded its timeout. The caller may retry. */
export class TransportTimeoutError extends CommunicationError {
  constructor(
    operation: string,
    readonly timeoutMs: number
  ) {
    super(`${operation} timed out after ${timeoutMs}ms`)
  }
}

/** The device is gone or broken. The board must be discovered again. */
export class TransportFailureError extends CommunicationError {}

/** Another backend in this process, or another process, holds the device. */
export class DeviceClaimedError extends CommunicationError {}

export class DiscoveryAmbiguityError extends BoardlinkError {
  constructor(
    readonly boardName: string,
    readonly serialNumber: string
  ) {
    super(`Found more than one ${boardName} with the serial number ${serialNumber}`)
  }
}

export function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e)
}
