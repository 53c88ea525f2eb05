/**
 * In-memory prior-trust ledger for testing.
 */

import { formatPackage, signingEntitiesEqual } from 'sigwarden'
import type { ReconcileRequest, SigningEntity, SigningEntityLedger } from 'sigwarden'

/**
 * How a reconciled signing entity compares with what the ledger saw first
 * for the same package.
 * @public
 */
export type LedgerVerdict = 'unsigned' | 'firstUse' | 'match' | 'mismatch'

/**
 * A trust-on-first-use ledger that keeps the first signing entity seen per
 * `registry + package` in a `Map` and records every call.
 *
 * @public
 */
export class InMemoryLedger implements SigningEntityLedger {
  readonly #firstSeen = new Map<string, SigningEntity>()
  readonly #calls: ReconcileRequest[] = []
  #failure: Error | undefined

  /** @public */
  reconcile(request: ReconcileRequest): Promise<LedgerVerdict> {
    this.#calls.push(request)
    if (this.#failure !== undefined) {
      return Promise.reject(this.#failure)
    }

    const entity = request.signingEntity
    if (entity === null) {
      return Promise.resolve('unsigned')
    }

    const key = `${request.registry.url}|${formatPackage(request.package)}`
    const previous = this.#firstSeen.get(key)
    if (previous === undefined) {
      this.#firstSeen.set(key, entity)
      return Promise.resolve('firstUse')
    }
    return Promise.resolve(signingEntitiesEqual(previous, entity) ? 'match' : 'mismatch')
  }

  /**
   * Make every subsequent `reconcile` call reject with `error`.
   * @public
   */
  failWith(error: Error): void {
    this.#failure = error
  }

  /**
   * Every request received, in call order.
   * @public
   */
  get calls(): readonly ReconcileRequest[] {
    return this.#calls
  }

  /**
   * Forget all recorded entities and calls. Useful for test teardown.
   * @public
   */
  clear(): void {
    this.#firstSeen.clear()
    this.#calls.length = 0
    this.#failure = undefined
  }
}
