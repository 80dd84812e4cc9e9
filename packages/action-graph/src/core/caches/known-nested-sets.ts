import {
  type Interner,
  InterningCache,
  type InterningCacheDeps,
  type OutputSink,
} from "@actiongraph/intern"

import type { DepSetOfFiles } from "../../ports/action-graph"
import type { ArtifactInput, NestedSetInput } from "../../ports/inputs"
import type { KnownCacheOptions } from "./known-cache-options"

/** A nested set whose transitive members already have ids. */
export type ResolvedNestedSet = {
  set: NestedSetInput
  transitiveDepSetIds: readonly number[]
}

type Frame = {
  set: NestedSetInput
  next: number
  transitiveDepSetIds: number[]
}

export type KnownNestedSetsRefs = {
  artifacts: Interner<ArtifactInput>
}

/**
 * Nested sets of artifacts, keyed by object identity.
 *
 * Use {@link KnownNestedSets.internSet}: it interns the transitive sets
 * before the set that contains them, which `construct` cannot do because
 * they live in this same cache.
 */
export class KnownNestedSets extends InterningCache<ResolvedNestedSet, DepSetOfFiles> {
  private readonly resolved = new WeakMap<NestedSetInput, number>()

  public constructor(
    sink: OutputSink<DepSetOfFiles>,
    refs: KnownNestedSetsRefs,
    deps: InterningCacheDeps = {},
    opts: KnownCacheOptions = {},
  ) {
    super(
      {
        keyOf: (resolved) => resolved.set,
        construct: async (resolved, id) => {
          const directArtifactIds: number[] = []
          for (const artifact of resolved.set.directs) {
            directArtifactIds.push(await refs.artifacts.dataToId(artifact))
          }

          return { id, directArtifactIds, transitiveDepSetIds: [...resolved.transitiveDepSetIds] }
        },
        publish: (node) => sink.append(node),
      },
      deps,
      { section: "depSetOfFiles", idBase: opts.idBase },
    )
  }

  public async internSet(set: NestedSetInput): Promise<number> {
    const known = this.resolved.get(set)
    if (known !== undefined) return known

    // Post-order walk on an explicit stack; chains can be deeper than the call stack.
    const stack: Frame[] = [{ set, next: 0, transitiveDepSetIds: [] }]
    let id = 0

    for (let frame = stack[0]; frame !== undefined; frame = stack[stack.length - 1]) {
      const child = frame.set.transitives[frame.next]
      if (child !== undefined) {
        frame.next++
        const childId = this.resolved.get(child)
        if (childId === undefined) {
          stack.push({ set: child, next: 0, transitiveDepSetIds: [] })
        } else {
          frame.transitiveDepSetIds.push(childId)
        }
        continue
      }

      stack.pop()
      id = await this.dataToId({ set: frame.set, transitiveDepSetIds: frame.transitiveDepSetIds })
      this.resolved.set(frame.set, id)
      stack[stack.length - 1]?.transitiveDepSetIds.push(id)
    }

    return id
  }
}
