/**
 * The value a key is reduced to for lookup.
 *
 * Primitive identity keys compare by value. An object identity key compares
 * by reference, which a domain may choose on purpose when its objects are
 * already canonical (one instance per distinct value).
 */
export type IdentityKey = string | number | bigint | boolean | object

/**
 * Reduces a domain key to its {@link IdentityKey}.
 *
 * Must return equal identity keys for semantically equal domain keys, and
 * must keep returning the same identity key for a key once it has been
 * inserted. Mutating a key after insertion breaks lookup; this is a caller
 * error and is not detected.
 */
export type KeyOf<K> = (key: K) => IdentityKey

export type Assignment = {
  readonly id: number
  /** `true` if the id was assigned by this call */
  readonly isNew: boolean
}

/**
 * Maps keys to dense sequential ids: `base`, `base + 1`, ...
 */
export interface IdentityTable<K> {
  /** First id this table assigns. */
  readonly base: number

  /** Number of keys currently recorded. */
  readonly size: number

  /**
   * Return the recorded id for `key`, or record `key` under the next id.
   */
  getOrAssign(key: K): Assignment

  has(key: K): boolean

  lookup(key: K): number | undefined

  /**
   * Undo the most recent assignment so its id is handed out again.
   *
   * @throws if `id` is not the most recent assignment for `key`
   */
  rollback(key: K, id: number): void
}
