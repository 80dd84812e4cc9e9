import type { OutputSink } from "@actiongraph/intern"

/*
 * Serialized nodes. Every `...Id` field refers to the `id` of a node in the
 * section of that type; ids of different sections are unrelated numbers.
 * An optional reference that is absent is left out, never written as 0.
 */

export type KeyValuePair = {
  key: string
  value: string
}

export type RuleClass = {
  id: number
  name: string
}

export type Target = {
  id: number
  label: string
  ruleClassId?: number
}

export type Configuration = {
  id: number
  checksum: string
  mnemonic: string
  platformName: string
  isTool: boolean
}

/** One segment of a path; the full path is found by following `parentId`. */
export type PathFragment = {
  id: number
  label: string
  parentId?: number
}

export type Artifact = {
  id: number
  pathFragmentId: number
  isTreeArtifact: boolean
}

export type DepSetOfFiles = {
  id: number
  directArtifactIds: number[]
  transitiveDepSetIds: number[]
}

export type Action = {
  id: number
  targetId: number
  actionKey: string
  mnemonic: string
  configurationId: number
  arguments: string[]
  environmentVariables: KeyValuePair[]
  inputDepSetIds: number[]
  outputIds: number[]
  primaryOutputId?: number
  discoversInputs: boolean
  executionInfo: KeyValuePair[]
  executionPlatform?: string
}

/**
 * The composite output of one run: each section lists its nodes in the
 * order they were first seen.
 */
export type ActionGraphContainer = {
  artifacts: Artifact[]
  actions: Action[]
  targets: Target[]
  depSetOfFiles: DepSetOfFiles[]
  configuration: Configuration[]
  ruleClasses: RuleClass[]
  pathFragments: PathFragment[]
}

export type ActionGraphSection = keyof ActionGraphContainer

export const actionGraphSections = [
  "artifacts",
  "actions",
  "targets",
  "depSetOfFiles",
  "configuration",
  "ruleClasses",
  "pathFragments",
] as const satisfies readonly ActionGraphSection[]

export type ActionGraphNode<S extends ActionGraphSection> = ActionGraphContainer[S][number]

/** One sink per section. */
export type ActionGraphSinks = {
  [S in ActionGraphSection]: OutputSink<ActionGraphNode<S>>
}

/** Number of nodes written per section. */
export type ActionGraphSummary = Record<ActionGraphSection, number>
