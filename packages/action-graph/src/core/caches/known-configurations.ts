import { InterningCache, type InterningCacheDeps, type OutputSink } from "@actiongraph/intern"

import type { Configuration } from "../../ports/action-graph"
import type { BuildConfiguration } from "../../ports/inputs"
import type { KnownCacheOptions } from "./known-cache-options"

/** Build configurations, keyed by checksum. */
export class KnownConfigurations extends InterningCache<BuildConfiguration, Configuration> {
  public constructor(
    sink: OutputSink<Configuration>,
    deps: InterningCacheDeps = {},
    opts: KnownCacheOptions = {},
  ) {
    super(
      {
        keyOf: (config) => config.checksum,
        construct: (config, id) => ({
          id,
          checksum: config.checksum,
          mnemonic: config.mnemonic,
          platformName: config.platformName,
          isTool: config.isTool,
        }),
        publish: (node) => sink.append(node),
      },
      deps,
      { section: "configuration", idBase: opts.idBase },
    )
  }
}
