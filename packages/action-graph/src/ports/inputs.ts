import type { Label } from "../core/labels/label"

/*
 * Domain objects handed to the caches by the producer walking the build
 * graph. Only the fields needed to build the serialized nodes are modeled.
 */

/**
 * A configured target. Interned by label alone: the first target seen
 * for a label fixes its rule class, and later ones with the same label
 * reuse that node.
 */
export type RuleConfiguredTarget = {
  label: Label
  /** e.g. "java_library"; absent or empty for targets without a rule class. */
  ruleClass?: string
}

export type BuildConfiguration = {
  checksum: string
  mnemonic: string
  platformName: string
  isTool: boolean
}

/**
 * An artifact, interned by `execPath`. The first input seen for a path
 * fixes `isTreeArtifact` in the written node.
 */
export type ArtifactInput = {
  /** Path relative to the execution root, e.g. "bazel-out/k8-fastbuild/bin/lib.jar". */
  execPath: string
  isTreeArtifact?: boolean
}

/**
 * A set of artifacts shared between actions. Two inputs are the same set
 * only if they are the same object.
 */
export type NestedSetInput = {
  directs: readonly ArtifactInput[]
  transitives: readonly NestedSetInput[]
}

export type ActionInput = {
  actionKey: string
  mnemonic: string
  owner: RuleConfiguredTarget
  configuration: BuildConfiguration
  arguments: readonly string[]
  environment?: Readonly<Record<string, string>>
  inputs: NestedSetInput
  outputs: readonly ArtifactInput[]
  primaryOutput?: ArtifactInput
  discoversInputs?: boolean
  executionInfo?: Readonly<Record<string, string>>
  executionPlatform?: string
}
