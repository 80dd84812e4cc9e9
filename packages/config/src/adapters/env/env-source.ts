import type { ConfigSource } from "../../ports/source"

export type EnvSourceOptions = {
  /** Only variables starting with `prefix` are read; the prefix is stripped from the key. */
  prefix?: string
  env?: Record<string, string | undefined>
}

/**
 * Environment variables as a config source. A variable set to the empty
 * string counts as unset, so the schema default applies.
 */
export class EnvSource implements ConfigSource {
  readonly name: string
  private readonly prefix: string
  private readonly env: Record<string, string | undefined>

  constructor(options: EnvSourceOptions = {}) {
    this.prefix = options.prefix ?? ""
    this.name = this.prefix ? `env:${this.prefix}` : "env"
    this.env = options.env ?? process.env
  }

  async load(): Promise<Record<string, unknown>> {
    const values: Record<string, string> = {}

    for (const [key, value] of Object.entries(this.env)) {
      if (!key.startsWith(this.prefix) || key.length === this.prefix.length) continue
      if (value === undefined || value === "") continue

      values[key.slice(this.prefix.length)] = value
    }

    return values
  }
}
