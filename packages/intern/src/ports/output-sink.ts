/**
 * Append-only destination for materialized values of one output section.
 *
 * Values are kept in append order. `count()` only includes appends that
 * completed; a rejected `append` leaves it unchanged.
 */
export interface OutputSink<V> {
  append(value: V): void | Promise<void>

  count(): number
}
