import { type Lock, MemoryLock } from "@actiongraph/lock"
import { createPinoLogger, type Logger, type PinoLoggerDeps } from "@actiongraph/logger"
import { nanoid } from "nanoid"

import { createKnownCaches, type KnownCaches } from "../core/caches/known-caches"
import { ActionGraphContainerBuilder } from "../core/container/action-graph-container-builder"
import { ActionGraphDump } from "../core/dump/action-graph-dump"
import type { ActionGraphContainer } from "../ports/action-graph"
import { type ActionGraphConfig, type EnvConfig, envPrefix, loadActionGraphConfig } from "./config"

export type ActionGraphContextOptions = {
  env?: Record<string, string | undefined>
  configOverrides?: Partial<EnvConfig>
  /** Correlates the run's log entries. Generated when omitted. */
  runId?: string
  /** Replaces the pino logger built from configuration. */
  logger?: Logger
  logDestination?: PinoLoggerDeps["destination"]
}

export type ActionGraphContext = {
  runId: string
  config: ActionGraphConfig
  logger: Logger
  lock: Lock
  container: ActionGraphContainerBuilder
  caches: KnownCaches
  dump: ActionGraphDump
  /** Finish the dump and return the assembled container. */
  finish(): ActionGraphContainer
}

/**
 * Everything one serialization run needs. Nothing is shared between
 * contexts, so concurrent runs do not see each other's ids.
 */
export async function createActionGraphContext(
  options: ActionGraphContextOptions = {},
): Promise<ActionGraphContext> {
  const { config, source } = await loadActionGraphConfig(
    options.env ?? process.env,
    options.configOverrides,
  )
  const runId = options.runId ?? nanoid()

  const baseLogger =
    options.logger ??
    createPinoLogger(
      { destination: options.logDestination },
      { level: config.logging.level, prettify: config.logging.prettify },
    )
  const logger = baseLogger.child({ service: config.logging.serviceName, runId })

  logger.debug("Configuration loaded", {
    sources: source.sourcesUsed(),
    idBase: source.explain("ID_BASE"),
  })
  const unknownKeys = source.unknownKeys()
  if (unknownKeys.length > 0) {
    logger.warn("Ignoring unknown configuration variables", {
      keys: unknownKeys.map((key) => `${envPrefix}${key}`),
    })
  }

  const lock = new MemoryLock()
  const container = new ActionGraphContainerBuilder()
  const caches = createKnownCaches(container.sinks, { lock, logger }, { idBase: config.idBase })
  const dump = new ActionGraphDump({ caches, sinks: container.sinks, logger })

  return {
    runId,
    config,
    logger,
    lock,
    container,
    caches,
    dump,
    finish: () => {
      dump.finish()
      return container.build()
    },
  }
}
