import type { Lock, LockKey } from "../../ports/lock"
import type { LockLease } from "../../ports/lock-lease"
import { MemoryLease } from "./memory-lock-lease"

type HeldLock = {
  lease: MemoryLease
  waiters: ((lease: MemoryLease) => void)[]
}

export class MemoryLock implements Lock {
  private readonly locks = new Map<LockKey, HeldLock>()

  public async acquire(key: LockKey): Promise<LockLease> {
    const held = this.locks.get(key)

    if (!held) return this.grant(key)

    return new Promise<LockLease>((resolve) => {
      held.waiters.push(resolve)
    })
  }

  private grant(key: LockKey): MemoryLease {
    const lease = this.createLease(key)

    this.locks.set(key, { lease, waiters: [] })
    return lease
  }

  private createLease(key: LockKey): MemoryLease {
    const lease: MemoryLease = new MemoryLease(key, {
      onRelease: () => this.handOff(key, lease),
    })

    return lease
  }

  private handOff(key: LockKey, released: MemoryLease): void {
    const held = this.locks.get(key)
    if (held?.lease !== released) return

    const next = held.waiters.shift()

    if (!next) {
      this.locks.delete(key)
      return
    }

    held.lease = this.createLease(key)
    next(held.lease)
  }
}
