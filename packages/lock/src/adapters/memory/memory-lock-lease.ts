import type { LockKey } from "../../ports/lock"
import type { LockLease } from "../../ports/lock-lease"

export type MemoryLeaseDeps = {
  onRelease: () => void
}

export class MemoryLease implements LockLease {
  public readonly key: LockKey
  private released = false

  public constructor(
    key: LockKey,
    private readonly deps: MemoryLeaseDeps,
  ) {
    this.key = key
  }

  public get isReleased(): boolean {
    return this.released
  }

  public async release(): Promise<void> {
    if (this.released) return

    this.released = true
    this.deps.onRelease()
  }
}
