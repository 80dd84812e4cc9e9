import type { ConfigSource } from "../../ports/source"

/**
 * Values supplied in code, such as the overrides an embedding caller
 * passes to a run. Keys left `undefined` are dropped so they do not mask
 * earlier sources in provenance.
 */
export class ObjectSource implements ConfigSource {
  readonly name: string

  constructor(
    private readonly values: Readonly<Record<string, unknown>>,
    label = "overrides",
  ) {
    this.name = `object:${label}`
  }

  async load(): Promise<Record<string, unknown>> {
    return Object.fromEntries(Object.entries(this.values).filter(([, value]) => value !== undefined))
  }
}
