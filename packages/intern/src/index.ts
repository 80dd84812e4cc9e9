export { ArraySink } from "./adapters/memory/array-sink"
export {
  StreamSink,
  type StreamSinkDeps,
  type StreamSinkOptions,
} from "./adapters/stream/stream-sink"
export { InternError, type InternErrorCode } from "./core/errors/intern-error"
export {
  MapIdentityTable,
  type MapIdentityTableOptions,
} from "./core/identity-table/map-identity-table"
export {
  InterningCache,
  type InterningCacheDeps,
  type InterningCacheOptions,
} from "./core/interning-cache"
export { type KeyPart, stableKey } from "./core/keys/stable-key"
export type { Assignment, IdentityKey, IdentityTable, KeyOf } from "./ports/identity-table"
export type { Interner, InternStrategy } from "./ports/interner"
export type { OutputSink } from "./ports/output-sink"
