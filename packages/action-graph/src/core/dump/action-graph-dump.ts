import { createNullLogger, type Logger } from "@actiongraph/logger"

import type { ActionGraphSinks, ActionGraphSummary } from "../../ports/action-graph"
import type { ActionInput, RuleConfiguredTarget } from "../../ports/inputs"
import type { KnownCaches } from "../caches/known-caches"
import { ActionGraphError } from "../errors/action-graph-error"

export type ActionGraphDumpDeps = {
  caches: KnownCaches
  sinks: ActionGraphSinks
  logger?: Logger
}

type DumpState = { status: "open" } | { status: "aborted"; cause: unknown }

/**
 * Entry point for the producer walking the build graph.
 *
 * The first failure aborts the dump: sections may then hold nodes whose
 * referrers were never written, so every later call is refused.
 */
export class ActionGraphDump {
  private readonly logger: Logger
  private state: DumpState = { status: "open" }

  public constructor(private readonly deps: ActionGraphDumpDeps) {
    this.logger = (deps.logger ?? createNullLogger()).child({ module: "action-graph-dump" })
  }

  /** Intern `action` and everything it references; returns the action id. */
  public async dumpAction(action: ActionInput): Promise<number> {
    return this.guard(() => this.deps.caches.actions.dataToId(action))
  }

  /** Intern a target that owns no action; returns the target id. */
  public async dumpTarget(target: RuleConfiguredTarget): Promise<number> {
    return this.guard(() => this.deps.caches.targets.dataToId(target))
  }

  public finish(): ActionGraphSummary {
    this.assertOpen()

    const { sinks } = this.deps
    const summary: ActionGraphSummary = {
      artifacts: sinks.artifacts.count(),
      actions: sinks.actions.count(),
      targets: sinks.targets.count(),
      depSetOfFiles: sinks.depSetOfFiles.count(),
      configuration: sinks.configuration.count(),
      ruleClasses: sinks.ruleClasses.count(),
      pathFragments: sinks.pathFragments.count(),
    }

    this.logger.info("Action graph dump finished", { ...summary })
    return summary
  }

  private async guard(fn: () => Promise<number>): Promise<number> {
    this.assertOpen()

    try {
      return await fn()
    } catch (err) {
      if (this.state.status === "open") {
        this.state = { status: "aborted", cause: err }
        this.logger.error("Action graph dump failed", { err })
      }
      throw err
    }
  }

  private assertOpen(): void {
    if (this.state.status === "aborted") throw ActionGraphError.dumpAborted(this.state.cause)
  }
}
