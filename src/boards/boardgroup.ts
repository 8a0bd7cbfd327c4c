import Debug from 'debug'
import type { BackendClass } from '../backends/backend.js'
import { BoardCountError, BoardNotFoundError, DiscoveryAmbiguityError, errorMessage } from '../errors.js'
import { LogLevelEnum, Logger } from '../log.js'
import { Board, BoardClass, MakeSafeReport } from './board.js'

const debug = Debug('boardgroup')
const log = new Logger('boardgroup')

/**
 * The boards of one class found by one discovery, keyed by serial number in discovery order.
 * A group never changes; discover again to pick up boards plugged in later.
 */
export class BoardGroup<T extends Board> implements Iterable<T> {
  private readonly boardMap = new Map<string, T>()

  /**
   * Throws on a duplicate serial number or a board of another class. The caller still owns the
   * boards then; use `create` to have them closed.
   */
  constructor(
    readonly boardClass: BoardClass<T>,
    boards: Iterable<Board>
  ) {
    for (const board of boards) {
      if (!(board instanceof boardClass)) throw new TypeError(board.toString() + ' is not a ' + boardClass.name)
      if (this.boardMap.has(board.serialNumber)) throw new DiscoveryAmbiguityError(boardClass.name, board.serialNumber)
      this.boardMap.set(board.serialNumber, board)
    }
  }

  static async discover<T extends Board, O>(boardClass: BoardClass<T>, backendClass: BackendClass<T, O>, options: O): Promise<BoardGroup<T>> {
    if (backendClass.board !== boardClass) throw new TypeError(backendClass.name + ' does not drive ' + boardClass.name)
    const boards = await backendClass.discover(options)
    debug('%s: discovered %d board(s) with %s', boardClass.name, boards.length, backendClass.name)
    return BoardGroup.create(boardClass, boards)
  }

  /** Like the constructor, but closes every board before a validation error is rethrown. */
  static async create<T extends Board>(boardClass: BoardClass<T>, boards: Board[]): Promise<BoardGroup<T>> {
    try {
      return new BoardGroup(boardClass, boards)
    } catch (e: unknown) {
      for (const board of boards) {
        try {
          await board.close()
        } catch (closeError: unknown) {
          log.log(LogLevelEnum.warn, '%s: close failed: %s', board.toString(), errorMessage(closeError))
        }
      }
      throw e
    }
  }

  get count(): number {
    return this.boardMap.size
  }

  get boards(): T[] {
    return [...this.boardMap.values()]
  }

  has(serialNumber: string): boolean {
    return this.boardMap.has(serialNumber)
  }

  get(serialNumber: string): T {
    const board = this.boardMap.get(serialNumber)
    if (board == undefined) throw new BoardNotFoundError(serialNumber)
    return board
  }

  singular(): T {
    if (this.boardMap.size != 1) throw new BoardCountError(this.boardClass.name, this.boardMap.size)
    return this.boards[0]
  }

  async makeSafe(): Promise<MakeSafeReport[]> {
    const reports: MakeSafeReport[] = []
    for (const board of this.boardMap.values()) reports.push(await board.makeSafe())
    return reports
  }

  async close(): Promise<void> {
    for (const board of this.boardMap.values()) await board.close()
  }

  [Symbol.iterator](): Iterator<T> {
    return this.boardMap.values()
  }

  toString(): string {
    return 'BoardGroup(' + this.boardClass.name + ': ' + [...this.boardMap.keys()].join(', ') + ')'
  }
}
