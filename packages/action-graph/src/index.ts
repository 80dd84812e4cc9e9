export { createStreamSinks } from "./adapters/stream/stream-sinks"
export {
  type ActionGraphConfig,
  type EnvConfig,
  envPrefix,
  envSchema,
  type LoadedActionGraphConfig,
  loadActionGraphConfig,
  mapEnvToConfig,
} from "./app/config"
export {
  type ActionGraphContext,
  type ActionGraphContextOptions,
  createActionGraphContext,
} from "./app/create-context"
export { KnownActions, type KnownActionsRefs } from "./core/caches/known-actions"
export { KnownArtifacts, type KnownArtifactsRefs } from "./core/caches/known-artifacts"
export type { KnownCacheOptions } from "./core/caches/known-cache-options"
export { createKnownCaches, type KnownCaches } from "./core/caches/known-caches"
export { KnownConfigurations } from "./core/caches/known-configurations"
export {
  KnownNestedSets,
  type KnownNestedSetsRefs,
  type ResolvedNestedSet,
} from "./core/caches/known-nested-sets"
export { KnownPathFragments, type PathFragmentKey } from "./core/caches/known-path-fragments"
export { KnownRuleClassStrings } from "./core/caches/known-rule-class-strings"
export {
  KnownRuleConfiguredTargets,
  type KnownRuleConfiguredTargetsRefs,
} from "./core/caches/known-rule-configured-targets"
export { decodeActionGraph, encodeActionGraph } from "./core/codec/action-graph-codec"
export { actionGraphContainerSchema } from "./core/codec/container-schema"
export { createJsonCodec } from "./core/codec/json-codec"
export { ActionGraphContainerBuilder } from "./core/container/action-graph-container-builder"
export { ActionGraphDump, type ActionGraphDumpDeps } from "./core/dump/action-graph-dump"
export { ActionGraphError, type ActionGraphErrorCode } from "./core/errors/action-graph-error"
export { Label, parseLabel } from "./core/labels/label"
export {
  type Action,
  type ActionGraphContainer,
  type ActionGraphNode,
  type ActionGraphSection,
  type ActionGraphSinks,
  type ActionGraphSummary,
  type Artifact,
  actionGraphSections,
  type Configuration,
  type DepSetOfFiles,
  type KeyValuePair,
  type PathFragment,
  type RuleClass,
  type Target,
} from "./ports/action-graph"
export type { Codec } from "./ports/codec"
export type {
  ActionInput,
  ArtifactInput,
  BuildConfiguration,
  NestedSetInput,
  RuleConfiguredTarget,
} from "./ports/inputs"
