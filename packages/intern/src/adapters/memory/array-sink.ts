import type { OutputSink } from "../../ports/output-sink"

export class ArraySink<V> implements OutputSink<V> {
  private readonly items: V[] = []

  public append(value: V): void {
    this.items.push(value)
  }

  public count(): number {
    return this.items.length
  }

  /** Snapshot of the values appended so far, in append order. */
  public values(): readonly V[] {
    return [...this.items]
  }
}
