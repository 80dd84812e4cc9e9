import type { InterningCacheDeps } from "@actiongraph/intern"

import type { ActionGraphSinks } from "../../ports/action-graph"
import { KnownActions } from "./known-actions"
import { KnownArtifacts } from "./known-artifacts"
import type { KnownCacheOptions } from "./known-cache-options"
import { KnownConfigurations } from "./known-configurations"
import { KnownNestedSets } from "./known-nested-sets"
import { KnownPathFragments } from "./known-path-fragments"
import { KnownRuleClassStrings } from "./known-rule-class-strings"
import { KnownRuleConfiguredTargets } from "./known-rule-configured-targets"

export type KnownCaches = {
  ruleClasses: KnownRuleClassStrings
  targets: KnownRuleConfiguredTargets
  configurations: KnownConfigurations
  pathFragments: KnownPathFragments
  artifacts: KnownArtifacts
  nestedSets: KnownNestedSets
  actions: KnownActions
}

/**
 * Wire one cache per section to `sinks`, each resolving its references
 * through its siblings. A shared `deps.lock` is keyed by section, so each
 * cache still locks independently.
 */
export function createKnownCaches(
  sinks: ActionGraphSinks,
  deps: InterningCacheDeps = {},
  opts: KnownCacheOptions = {},
): KnownCaches {
  const ruleClasses = new KnownRuleClassStrings(sinks.ruleClasses, deps, opts)
  const targets = new KnownRuleConfiguredTargets(sinks.targets, { ruleClasses }, deps, opts)
  const configurations = new KnownConfigurations(sinks.configuration, deps, opts)
  const pathFragments = new KnownPathFragments(sinks.pathFragments, deps, opts)
  const artifacts = new KnownArtifacts(sinks.artifacts, { pathFragments }, deps, opts)
  const nestedSets = new KnownNestedSets(sinks.depSetOfFiles, { artifacts }, deps, opts)
  const actions = new KnownActions(
    sinks.actions,
    { targets, configurations, nestedSets, artifacts },
    deps,
    opts,
  )

  return { ruleClasses, targets, configurations, pathFragments, artifacts, nestedSets, actions }
}
