/**
 * Bidirectional transformation between a typed value and bytes.
 *
 * Codecs are pure. Encoding equal values built in the same order yields
 * identical bytes.
 */
export interface Codec<T> {
  encode(value: T): Uint8Array

  /**
   * @throws if `bytes` do not hold a valid `T`
   */
  decode(bytes: Uint8Array): T
}
