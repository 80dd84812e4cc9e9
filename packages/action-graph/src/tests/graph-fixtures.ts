import { parseLabel } from "../core/labels/label"
import type { ActionGraphContainer } from "../ports/action-graph"
import type {
  ActionInput,
  ArtifactInput,
  BuildConfiguration,
  NestedSetInput,
  RuleConfiguredTarget,
} from "../ports/inputs"

export const fastbuild: BuildConfiguration = {
  checksum: "cfg-fastbuild",
  mnemonic: "k8-fastbuild",
  platformName: "k8",
  isTool: false,
}

export function target(label: string, ruleClass?: string): RuleConfiguredTarget {
  return { label: parseLabel(label), ...(ruleClass !== undefined && { ruleClass }) }
}

export function artifact(execPath: string): ArtifactInput {
  return { execPath }
}

export function nestedSet(
  directs: readonly ArtifactInput[],
  transitives: readonly NestedSetInput[] = [],
): NestedSetInput {
  return { directs, transitives }
}

export function action(
  input: Pick<ActionInput, "actionKey" | "owner"> & Partial<ActionInput>,
): ActionInput {
  return {
    mnemonic: "Javac",
    configuration: fastbuild,
    arguments: [],
    inputs: nestedSet([]),
    outputs: [],
    ...input,
  }
}

/** Every id reference in `container` that points at no node. */
export function danglingReferences(container: ActionGraphContainer): string[] {
  const ids = (nodes: { id: number }[]) => new Set(nodes.map((node) => node.id))
  const ruleClasses = ids(container.ruleClasses)
  const targets = ids(container.targets)
  const configurations = ids(container.configuration)
  const fragments = ids(container.pathFragments)
  const artifacts = ids(container.artifacts)
  const depSets = ids(container.depSetOfFiles)

  const dangling: string[] = []
  const check = (where: string, set: Set<number>, id: number | undefined) => {
    if (id !== undefined && !set.has(id)) dangling.push(`${where} -> ${id}`)
  }

  for (const t of container.targets) check(`target ${t.id}`, ruleClasses, t.ruleClassId)
  for (const f of container.pathFragments) check(`fragment ${f.id}`, fragments, f.parentId)
  for (const a of container.artifacts) check(`artifact ${a.id}`, fragments, a.pathFragmentId)
  for (const d of container.depSetOfFiles) {
    for (const id of d.directArtifactIds) check(`depSet ${d.id}`, artifacts, id)
    for (const id of d.transitiveDepSetIds) check(`depSet ${d.id}`, depSets, id)
  }
  for (const a of container.actions) {
    check(`action ${a.id}`, targets, a.targetId)
    check(`action ${a.id}`, configurations, a.configurationId)
    check(`action ${a.id}`, artifacts, a.primaryOutputId)
    for (const id of a.inputDepSetIds) check(`action ${a.id}`, depSets, id)
    for (const id of a.outputIds) check(`action ${a.id}`, artifacts, id)
  }

  return dangling
}

/** Rebuild the exec path a path fragment stands for. */
export function pathOf(container: ActionGraphContainer, fragmentId: number): string {
  const byId = new Map(container.pathFragments.map((fragment) => [fragment.id, fragment] as const))
  const segments: string[] = []

  let next: number | undefined = fragmentId
  while (next !== undefined) {
    const fragment = byId.get(next)
    if (!fragment) throw new Error(`no path fragment ${next}`)
    segments.unshift(fragment.label)
    next = fragment.parentId
  }

  return segments.join("/")
}
