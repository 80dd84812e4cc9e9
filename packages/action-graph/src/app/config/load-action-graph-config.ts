import { type ConfigSource, EnvSource, type IConfig, loadConfig, ObjectSource } from "@actiongraph/config"

import { type ActionGraphConfig, type EnvConfig, envPrefix, envSchema } from "./schema"

export type LoadedActionGraphConfig = {
  config: ActionGraphConfig
  /** The validated variables with their provenance. */
  source: IConfig<EnvConfig>
}

export function mapEnvToConfig(env: IConfig<EnvConfig>): ActionGraphConfig {
  return {
    logging: {
      level: env.get("LOG_LEVEL"),
      prettify: env.get("LOG_PRETTY"),
      serviceName: env.get("SERVICE_NAME"),
    },
    idBase: env.get("ID_BASE"),
  }
}

export async function loadActionGraphConfig(
  env: Record<string, string | undefined>,
  overrides?: Partial<EnvConfig>,
): Promise<LoadedActionGraphConfig> {
  const sources: ConfigSource[] = [new EnvSource({ env, prefix: envPrefix })]
  if (overrides) sources.push(new ObjectSource(overrides))

  const source = await loadConfig({ schema: envSchema, sources })

  return { config: mapEnvToConfig(source), source }
}
