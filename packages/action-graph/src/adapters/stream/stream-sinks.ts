import type { Writable } from "node:stream"

import { type OutputSink, StreamSink } from "@actiongraph/intern"

import type {
  ActionGraphNode,
  ActionGraphSection,
  ActionGraphSinks,
} from "../../ports/action-graph"

/**
 * Sinks that stream every section into `stream` as JSON lines of the form
 * `{"<section>": node}`, interleaved in the order nodes are produced.
 */
export function createStreamSinks(stream: Writable): ActionGraphSinks {
  return {
    artifacts: sectionSink(stream, "artifacts"),
    actions: sectionSink(stream, "actions"),
    targets: sectionSink(stream, "targets"),
    depSetOfFiles: sectionSink(stream, "depSetOfFiles"),
    configuration: sectionSink(stream, "configuration"),
    ruleClasses: sectionSink(stream, "ruleClasses"),
    pathFragments: sectionSink(stream, "pathFragments"),
  }
}

function sectionSink<S extends ActionGraphSection>(
  stream: Writable,
  section: S,
): OutputSink<ActionGraphNode<S>> {
  return new StreamSink<ActionGraphNode<S>>(
    { stream },
    { format: (node) => JSON.stringify({ [section]: node }) },
  )
}
