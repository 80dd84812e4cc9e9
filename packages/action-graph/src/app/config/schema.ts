import { type LogLevelName, logLevelNames } from "@actiongraph/logger"
import { z } from "zod"

const flag = z.union([z.boolean(), z.stringbool()])

/** Variable prefix; `ACTION_GRAPH_LOG_LEVEL` is read as `LOG_LEVEL`. */
export const envPrefix = "ACTION_GRAPH_"

export const envSchema = z.object({
  SERVICE_NAME: z.string().default("actiongraph"),

  LOG_LEVEL: z.enum(logLevelNames).default("info"),
  LOG_PRETTY: flag.default(false),

  ID_BASE: z.coerce.number().int().nonnegative().default(1),
})

export type EnvConfig = z.infer<typeof envSchema>

export type ActionGraphConfig = {
  logging: {
    level: LogLevelName
    prettify: boolean
    serviceName: string
  }

  /** First id every cache assigns; 1 keeps 0 free to mean "unset". */
  idBase: number
}
