import type { LockLease } from "./lock-lease"

export type LockKey = string

/**
 * Mutual exclusion over named keys within one process.
 *
 * @remarks
 * Waiters for the same key are served in arrival order. Locks on different
 * keys are independent. There is no timeout: a lease is held until it is
 * released.
 */
export interface Lock {
  /**
   * Acquire the lock for `key`, waiting while another lease holds it.
   */
  acquire(key: LockKey): Promise<LockLease>
}
