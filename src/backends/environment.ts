import Debug from 'debug'
import { Board, BoardClass, MakeSafeReport } from '../boards/board.js'
import { BoardGroup } from '../boards/boardgroup.js'
import { BackendClass } from './backend.js'

const debug = Debug('environment')

interface IregisteredBackend {
  backendClass: BackendClass<Board, never>
  discover: () => Promise<Board[]>
}

/**
 * Throws a TypeError unless backendClass declares every interface its board's components
 * require and its prototype provides every operation of those interfaces.
 */
export function checkBackendClass(backendClass: BackendClass<Board, never>): void {
  for (const component of backendClass.board.supportedComponents()) {
    const required = component.requiredInterface
    if (!backendClass.interfaces.includes(required))
      throw new TypeError(`${backendClass.name} does not implement ${required.name}, required by ${component.name}`)
    for (const operation of required.operations) {
      if (typeof Reflect.get(backendClass.prototype, operation) !== 'function')
        throw new TypeError(`${backendClass.name} is missing ${required.name}.${operation}`)
    }
  }
}

/**
 * Which backend drives which board class in one setting (hardware, console, a test).
 * Created by the application and handed to whatever needs boards. It keeps every group it
 * has discovered, so that all boards can be made safe or closed in one call.
 */
export class Environment {
  private backends = new Map<BoardClass, IregisteredBackend>()
  private groups: BoardGroup<Board>[] = []

  constructor(readonly name: string) {}

  /**
   * Registers backendClass for its board class. The options are passed to every discovery.
   */
  registerBackend<T extends Board, O>(backendClass: BackendClass<T, O>, options: O): this {
    checkBackendClass(backendClass)
    if (this.backends.has(backendClass.board))
      throw new TypeError(`${this.name} already has a backend for ${backendClass.board.name}`)
    this.backends.set(backendClass.board, { backendClass: backendClass, discover: () => backendClass.discover(options) })
    debug('%s: %s drives %s', this.name, backendClass.name, backendClass.board.name)
    return this
  }

  get supportedBoards(): BoardClass[] {
    return [...this.backends.keys()]
  }

  getBackend(boardClass: BoardClass): BackendClass<Board, never> {
    return this.getRegistration(boardClass).backendClass
  }

  async getBoardGroup<T extends Board>(boardClass: BoardClass<T>): Promise<BoardGroup<T>> {
    const registration = this.getRegistration(boardClass)
    const group = await BoardGroup.create(boardClass, await registration.discover())
    this.groups.push(group)
    return group
  }

  /** Groups returned by getBoardGroup, oldest first, until close(). */
  get boardGroups(): BoardGroup<Board>[] {
    return [...this.groups]
  }

  /** One report per board of every discovered group. Never throws for a failing step. */
  async makeSafe(): Promise<MakeSafeReport[]> {
    const reports: MakeSafeReport[] = []
    for (const group of this.groups) reports.push(...(await group.makeSafe()))
    return reports
  }

  async close(): Promise<void> {
    const groups = this.groups
    this.groups = []
    for (const group of groups) await group.close()
  }

  /**
   * A new environment with the backends of both. Fails if both drive the same board class.
   * Groups discovered so far stay with their environment.
   */
  merge(other: Environment, name = this.name + '+' + other.name): Environment {
    const rc = new Environment(name)
    for (const env of [this, other]) {
      for (const [boardClass, registration] of env.backends) {
        if (rc.backends.has(boardClass)) throw new TypeError(`${this.name} and ${other.name} both drive ${boardClass.name}`)
        rc.backends.set(boardClass, registration)
      }
    }
    return rc
  }

  private getRegistration(boardClass: BoardClass): IregisteredBackend {
    const registration = this.backends.get(boardClass)
    if (registration == undefined) throw new TypeError(`${this.name} has no backend for ${boardClass.name}`)
    return registration
  }

  toString(): string {
    return this.name
  }
}
