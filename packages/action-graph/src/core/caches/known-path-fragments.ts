import {
  InterningCache,
  type InterningCacheDeps,
  type OutputSink,
  stableKey,
} from "@actiongraph/intern"

import type { PathFragment } from "../../ports/action-graph"
import { ActionGraphError } from "../errors/action-graph-error"
import type { KnownCacheOptions } from "./known-cache-options"

export type PathFragmentKey = {
  label: string
  parentId?: number
}

/**
 * Paths stored as a tree of segments, so shared prefixes such as
 * "bazel-out/k8-fastbuild/bin" are written once.
 */
export class KnownPathFragments extends InterningCache<PathFragmentKey, PathFragment> {
  public constructor(
    sink: OutputSink<PathFragment>,
    deps: InterningCacheDeps = {},
    opts: KnownCacheOptions = {},
  ) {
    super(
      {
        keyOf: (key) => stableKey({ label: key.label, parentId: key.parentId }),
        construct: (key, id) => ({
          id,
          label: key.label,
          ...(key.parentId !== undefined && { parentId: key.parentId }),
        }),
        publish: (node) => sink.append(node),
      },
      deps,
      { section: "pathFragments", idBase: opts.idBase },
    )
  }

  /**
   * Intern every segment of `path`, root first, and return the id of the
   * last one. Empty segments are ignored.
   *
   * @throws ActionGraphError `action_graph_invalid_path` if `path` has no segments
   */
  public async internPath(path: string): Promise<number> {
    const segments = path.split("/").filter((segment) => segment !== "")
    if (segments.length === 0) throw ActionGraphError.invalidPath({ path })

    let id: number | undefined
    for (const label of segments) {
      id = await this.dataToId(id === undefined ? { label } : { label, parentId: id })
    }

    if (id === undefined) throw ActionGraphError.invalidPath({ path })
    return id
  }
}
