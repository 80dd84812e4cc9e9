import {
  type Interner,
  InterningCache,
  type InterningCacheDeps,
  type OutputSink,
} from "@actiongraph/intern"

import type { Action, KeyValuePair } from "../../ports/action-graph"
import type {
  ActionInput,
  ArtifactInput,
  BuildConfiguration,
  RuleConfiguredTarget,
} from "../../ports/inputs"
import type { KnownCacheOptions } from "./known-cache-options"
import type { KnownNestedSets } from "./known-nested-sets"

export type KnownActionsRefs = {
  targets: Interner<RuleConfiguredTarget>
  configurations: Interner<BuildConfiguration>
  nestedSets: Pick<KnownNestedSets, "internSet">
  artifacts: Interner<ArtifactInput>
}

/**
 * Actions keyed by action key. Everything an action points at is interned
 * in its own section first.
 */
export class KnownActions extends InterningCache<ActionInput, Action> {
  public constructor(
    sink: OutputSink<Action>,
    refs: KnownActionsRefs,
    deps: InterningCacheDeps = {},
    opts: KnownCacheOptions = {},
  ) {
    super(
      {
        keyOf: (action) => action.actionKey,
        construct: async (action, id) => {
          const targetId = await refs.targets.dataToId(action.owner)
          const configurationId = await refs.configurations.dataToId(action.configuration)
          const inputDepSetId = await refs.nestedSets.internSet(action.inputs)

          const outputIds: number[] = []
          for (const output of action.outputs) {
            outputIds.push(await refs.artifacts.dataToId(output))
          }

          const primaryOutputId = action.primaryOutput
            ? await refs.artifacts.dataToId(action.primaryOutput)
            : undefined

          return {
            id,
            targetId,
            actionKey: action.actionKey,
            mnemonic: action.mnemonic,
            configurationId,
            arguments: [...action.arguments],
            environmentVariables: toPairs(action.environment),
            inputDepSetIds: [inputDepSetId],
            outputIds,
            ...(primaryOutputId !== undefined && { primaryOutputId }),
            discoversInputs: action.discoversInputs ?? false,
            executionInfo: toPairs(action.executionInfo),
            ...(action.executionPlatform ? { executionPlatform: action.executionPlatform } : {}),
          }
        },
        publish: (node) => sink.append(node),
      },
      deps,
      { section: "actions", idBase: opts.idBase },
    )
  }
}

/** Sorted by key, so equal maps serialize identically. */
function toPairs(record: Readonly<Record<string, string>> = {}): KeyValuePair[] {
  return Object.keys(record)
    .sort()
    .map((key) => ({ key, value: record[key] ?? "" }))
}
