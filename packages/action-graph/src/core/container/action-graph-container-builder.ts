import { ArraySink } from "@actiongraph/intern"

import type {
  Action,
  ActionGraphContainer,
  ActionGraphSinks,
  Artifact,
  Configuration,
  DepSetOfFiles,
  PathFragment,
  RuleClass,
  Target,
} from "../../ports/action-graph"

/**
 * Collects every section of one run in memory and assembles the container.
 */
export class ActionGraphContainerBuilder {
  public readonly sinks = {
    artifacts: new ArraySink<Artifact>(),
    actions: new ArraySink<Action>(),
    targets: new ArraySink<Target>(),
    depSetOfFiles: new ArraySink<DepSetOfFiles>(),
    configuration: new ArraySink<Configuration>(),
    ruleClasses: new ArraySink<RuleClass>(),
    pathFragments: new ArraySink<PathFragment>(),
  } satisfies ActionGraphSinks

  public build(): ActionGraphContainer {
    return {
      artifacts: [...this.sinks.artifacts.values()],
      actions: [...this.sinks.actions.values()],
      targets: [...this.sinks.targets.values()],
      depSetOfFiles: [...this.sinks.depSetOfFiles.values()],
      configuration: [...this.sinks.configuration.values()],
      ruleClasses: [...this.sinks.ruleClasses.values()],
      pathFragments: [...this.sinks.pathFragments.values()],
    }
  }
}
