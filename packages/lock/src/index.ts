export { MemoryLock } from "./adapters/memory/memory-lock"
export { withLock } from "./core/with-lock"
export type { Lock, LockKey } from "./ports/lock"
export type { LockLease } from "./ports/lock-lease"
