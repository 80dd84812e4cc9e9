import { InterningCache, type InterningCacheDeps, type OutputSink } from "@actiongraph/intern"

import type { RuleClass } from "../../ports/action-graph"
import type { KnownCacheOptions } from "./known-cache-options"

/** Rule class names such as "java_library", one node per distinct name. */
export class KnownRuleClassStrings extends InterningCache<string, RuleClass> {
  public constructor(
    sink: OutputSink<RuleClass>,
    deps: InterningCacheDeps = {},
    opts: KnownCacheOptions = {},
  ) {
    super(
      {
        keyOf: (name) => name,
        construct: (name, id) => ({ id, name }),
        publish: (node) => sink.append(node),
      },
      deps,
      { section: "ruleClasses", idBase: opts.idBase },
    )
  }
}
