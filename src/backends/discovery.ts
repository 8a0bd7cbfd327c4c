import { BoardlinkError, DiscoveryAmbiguityError, errorMessage } from '../errors.js'
import { LogLevelEnum, Logger } from '../log.js'
import { Backend } from './backend.js'

const log = new Logger('discovery')

/**
 * Validates every candidate and returns one backend per board that passed.
 *
 * A candidate that fails with a library error (unreachable, wrong firmware, claimed by someone
 * else) is logged and skipped. Two backends reporting the same serial number make the whole
 * call fail after every opened backend has been closed.
 */
export async function collectBackends<C, B extends Backend>(
  boardName: string,
  candidates: readonly C[],
  describe: (candidate: C) => string,
  validate: (candidate: C) => Promise<B>
): Promise<B[]> {
  const backends: B[] = []
  for (const candidate of candidates) {
    try {
      backends.push(await validate(candidate))
    } catch (e: unknown) {
      if (!(e instanceof BoardlinkError)) {
        await closeAll(backends)
        throw e
      }
      log.log(LogLevelEnum.warn, '%s: skipping %s: %s', boardName, describe(candidate), errorMessage(e))
    }
  }
  const seen = new Set<string>()
  for (const backend of backends) {
    if (seen.has(backend.serialNumber)) {
      await closeAll(backends)
      throw new DiscoveryAmbiguityError(boardName, backend.serialNumber)
    }
    seen.add(backend.serialNumber)
  }
  return backends
}

async function closeAll(backends: readonly Backend[]): Promise<void> {
  for (const backend of backends) {
    try {
      await backend.close()
    } catch (e: unknown) {
      log.log(LogLevelEnum.warn, 'closing %s failed: %s', backend.serialNumber, errorMessage(e))
    }
  }
}
