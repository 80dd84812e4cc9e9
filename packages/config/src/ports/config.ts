/**
 * Validated configuration with provenance.
 *
 * @typeParam T - The shape of the configuration object, inferred from a Zod schema.
 *
 * @example
 * ```typescript
 * const config = await loadConfig({
 *   schema: z.object({
 *     ACTION_GRAPH_ID_BASE: z.coerce.number().int().nonnegative().default(1),
 *     LOG_LEVEL: z.enum(logLevelNames).default("info"),
 *   }),
 *   sources: [new EnvSource(), new ObjectSource({ LOG_LEVEL: "debug" })],
 * })
 *
 * config.get("ACTION_GRAPH_ID_BASE") // 1
 * config.explain("LOG_LEVEL")        // "object:overrides"
 * ```
 */
export interface IConfig<T extends Record<string, unknown>> {
  /** Full validated config object */
  readonly value: T

  get<K extends keyof T & string>(key: K): T[K]

  keys(): (keyof T & string)[]

  /**
   * Name of the source that provided the final value for `key`, or
   * "default" when the schema default was used.
   */
  explain<K extends keyof T & string>(key: K): string

  /** Names of the sources that contributed at least one value. */
  sourcesUsed(): string[]

  /** Keys present in sources but not defined by the schema. */
  unknownKeys(): string[]
}
