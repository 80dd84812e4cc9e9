import {
  type Interner,
  InterningCache,
  type InterningCacheDeps,
  type OutputSink,
} from "@actiongraph/intern"

import type { Target } from "../../ports/action-graph"
import type { RuleConfiguredTarget } from "../../ports/inputs"
import type { KnownCacheOptions } from "./known-cache-options"

export type KnownRuleConfiguredTargetsRefs = {
  ruleClasses: Interner<string>
}

/**
 * Targets keyed by canonical label. The rule class is interned separately
 * and referenced by id; a target without one has no `ruleClassId`.
 */
export class KnownRuleConfiguredTargets extends InterningCache<RuleConfiguredTarget, Target> {
  public constructor(
    sink: OutputSink<Target>,
    refs: KnownRuleConfiguredTargetsRefs,
    deps: InterningCacheDeps = {},
    opts: KnownCacheOptions = {},
  ) {
    super(
      {
        keyOf: (target) => target.label.toString(),
        construct: async (target, id) => {
          const label = target.label.toString()
          if (!target.ruleClass) return { id, label }

          return { id, label, ruleClassId: await refs.ruleClasses.dataToId(target.ruleClass) }
        },
        publish: (node) => sink.append(node),
      },
      deps,
      { section: "targets", idBase: opts.idBase },
    )
  }
}
