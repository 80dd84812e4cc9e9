import { InterningCache, type InterningCacheDeps, type OutputSink } from "@actiongraph/intern"

import type { Artifact } from "../../ports/action-graph"
import type { ArtifactInput } from "../../ports/inputs"
import type { KnownCacheOptions } from "./known-cache-options"
import type { KnownPathFragments } from "./known-path-fragments"

export type KnownArtifactsRefs = {
  pathFragments: Pick<KnownPathFragments, "internPath">
}

/** Artifacts keyed by exec path. */
export class KnownArtifacts extends InterningCache<ArtifactInput, Artifact> {
  public constructor(
    sink: OutputSink<Artifact>,
    refs: KnownArtifactsRefs,
    deps: InterningCacheDeps = {},
    opts: KnownCacheOptions = {},
  ) {
    super(
      {
        keyOf: (artifact) => artifact.execPath,
        construct: async (artifact, id) => ({
          id,
          pathFragmentId: await refs.pathFragments.internPath(artifact.execPath),
          isTreeArtifact: artifact.isTreeArtifact ?? false,
        }),
        publish: (node) => sink.append(node),
      },
      deps,
      { section: "artifacts", idBase: opts.idBase },
    )
  }
}
