import type { Board, BoardClass } from '../boards/board.js'
import type { InterfaceDescriptor } from '../components/component.js'

/**
 * Drives one board over one transport. Concrete backends implement the interfaces of their
 * board's components and declare them in the static `interfaces` list.
 */
export abstract class Backend {
  abstract readonly serialNumber: string
  /** undefined when the board reports none, e.g. console backends. */
  abstract readonly firmwareVersion: string | undefined
  /** Releases the device handle. Calling it again does nothing. */
  abstract close(): Promise<void>
}

/**
 * The static side of a backend class.
 */
export interface BackendClass<T extends Board = Board, O = never> {
  readonly name: string
  readonly board: BoardClass<T>
  readonly interfaces: readonly InterfaceDescriptor[]
  readonly prototype: Backend
  discover(options: O): Promise<T[]>
}
