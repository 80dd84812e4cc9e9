import type { KeyOf } from "./identity-table"

/**
 * Maps domain objects to stable integer ids, materializing each distinct
 * object exactly once.
 */
export interface Interner<K> {
  /** Output section this interner writes to; also its log scope. */
  readonly section: string

  /** Number of distinct keys materialized so far. */
  readonly size: number

  /**
   * Return the id of `key`, building and publishing its serialized form the
   * first time an equal key is seen.
   *
   * @remarks
   * Ids are only meaningful within this interner. Two interners may hand
   * out the same number for unrelated keys.
   */
  dataToId(key: K): Promise<number>
}

/**
 * How one domain type is interned.
 */
export type InternStrategy<K, V> = {
  keyOf: KeyOf<K>

  /**
   * Build the serialized value for a first-seen key, using `id` as its
   * self-identifier.
   *
   * May call `dataToId` on *other* interners to embed their ids. Must not
   * call back into the interner that is constructing; that is reported as
   * a reentrant lookup.
   */
  construct: (key: K, id: number) => V | Promise<V>

  /**
   * Append a freshly constructed value to its sink. Called once per
   * distinct key, right after `construct`.
   */
  publish: (value: V) => void | Promise<void>
}
