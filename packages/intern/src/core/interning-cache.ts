import { type Lock, MemoryLock, withLock } from "@actiongraph/lock"
import { createNullLogger, type Logger } from "@actiongraph/logger"

import type { IdentityTable } from "../ports/identity-table"
import type { Interner, InternStrategy } from "../ports/interner"
import { InternError } from "./errors/intern-error"
import { MapIdentityTable } from "./identity-table/map-identity-table"
import { ConstructionScope } from "./reentrancy/construction-scope"

export type InterningCacheDeps = {
  /**
   * Serializes lookups on this cache. Defaults to a lock owned by the
   * instance; a shared lock works as long as sections are unique on it.
   */
  lock?: Lock
  logger?: Logger
}

export type InterningCacheOptions = {
  section: string
  /** First id assigned. Default: 1 */
  idBase?: number
}

/**
 * Generic get-or-construct interner.
 *
 * The first lookup of a key reserves the next id, constructs the value with
 * that id and publishes it; later lookups of an equal key return the same
 * id without side effects. If construction or publication fails the id is
 * released again, so a failed key leaves no trace and the next first-seen
 * key receives the same id.
 *
 * Lookups on one instance run one at a time. A `construct` may look up
 * keys in other caches, which take their own locks.
 */
export class InterningCache<K, V> implements Interner<K> {
  private readonly table: IdentityTable<K>
  private readonly lock: Lock
  private readonly logger: Logger
  private readonly scope = new ConstructionScope()

  public constructor(
    private readonly strategy: InternStrategy<K, V>,
    deps: InterningCacheDeps,
    private readonly opts: InterningCacheOptions,
  ) {
    this.table = new MapIdentityTable(strategy.keyOf, { base: opts.idBase })
    this.lock = deps.lock ?? new MemoryLock()
    this.logger = (deps.logger ?? createNullLogger()).child({ section: opts.section })
  }

  public get section(): string {
    return this.opts.section
  }

  public get size(): number {
    return this.table.size
  }

  public async dataToId(key: K): Promise<number> {
    // Waiting on our own lock from inside our own construct never returns.
    if (this.scope.active) {
      throw InternError.reentrantLookup({ section: this.section })
    }

    return withLock(this.lock, this.section, () => this.getOrConstruct(key))
  }

  private async getOrConstruct(key: K): Promise<number> {
    const { id, isNew } = this.table.getOrAssign(key)
    if (!isNew) return id

    let value: V
    try {
      value = await this.scope.run(() => this.strategy.construct(key, id))
    } catch (err) {
      this.discard(key, id, "construct")
      throw InternError.constructionFailed({ section: this.section, id }, err)
    }

    try {
      await this.strategy.publish(value)
    } catch (err) {
      this.discard(key, id, "publish")
      throw InternError.publishFailed({ section: this.section, id }, err)
    }

    this.logger.trace("Interned node", { id })
    return id
  }

  private discard(key: K, id: number, stage: "construct" | "publish"): void {
    this.table.rollback(key, id)
    this.logger.warn("Rolled back id", { id, stage })
  }
}
