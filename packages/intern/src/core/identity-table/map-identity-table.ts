import type { Assignment, IdentityKey, IdentityTable, KeyOf } from "../../ports/identity-table"
import { InternError } from "../errors/intern-error"

export type MapIdentityTableOptions = {
  /** First id assigned. Default: 1, leaving 0 free to mean "unset". */
  base?: number
}

export class MapIdentityTable<K> implements IdentityTable<K> {
  public readonly base: number
  private readonly ids = new Map<IdentityKey, number>()

  public constructor(
    private readonly keyOf: KeyOf<K>,
    opts: MapIdentityTableOptions = {},
  ) {
    const base = opts.base ?? 1

    if (!Number.isSafeInteger(base) || base < 0) {
      throw new RangeError(`Identity base must be a non-negative integer, got: ${base}`)
    }

    this.base = base
  }

  public get size(): number {
    return this.ids.size
  }

  public getOrAssign(key: K): Assignment {
    const identity = this.keyOf(key)
    const existing = this.ids.get(identity)

    if (existing !== undefined) return { id: existing, isNew: false }

    const id = this.base + this.ids.size
    this.ids.set(identity, id)

    return { id, isNew: true }
  }

  public has(key: K): boolean {
    return this.ids.has(this.keyOf(key))
  }

  public lookup(key: K): number | undefined {
    return this.ids.get(this.keyOf(key))
  }

  public rollback(key: K, id: number): void {
    const identity = this.keyOf(key)
    const latest = this.ids.size > 0 ? this.base + this.ids.size - 1 : undefined

    if (id !== latest || this.ids.get(identity) !== id) {
      throw InternError.invalidRollback({ id, latest })
    }

    this.ids.delete(identity)
  }
}
