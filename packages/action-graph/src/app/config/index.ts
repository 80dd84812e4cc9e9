export { type LoadedActionGraphConfig, loadActionGraphConfig, mapEnvToConfig } from "./load-action-graph-config"
export { type ActionGraphConfig, type EnvConfig, envPrefix, envSchema } from "./schema"
