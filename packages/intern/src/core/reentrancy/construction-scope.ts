import { AsyncLocalStorage } from "node:async_hooks"

/**
 * Marks the asynchronous call chain that is running one interner's
 * `construct`, so a lookup from inside that chain can be told apart from an
 * unrelated concurrent caller.
 */
export class ConstructionScope {
  private readonly storage = new AsyncLocalStorage<true>()

  /** `true` when called from within `run` on this scope. */
  public get active(): boolean {
    return this.storage.getStore() === true
  }

  public run<T>(fn: () => T): T {
    return this.storage.run(true, fn)
  }
}
