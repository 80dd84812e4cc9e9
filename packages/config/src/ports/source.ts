/**
 * A source of raw configuration values.
 *
 * Sources only load; validation and coercion happen in `loadConfig`.
 * Sources are applied in order and later sources override earlier ones.
 */
export interface ConfigSource {
  /** e.g. "env", "object:overrides" */
  readonly name: string

  /**
   * Load values. A key mapped to `undefined` counts as not provided.
   */
  load(): Promise<Record<string, unknown>>
}
