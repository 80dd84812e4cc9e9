import { z } from "zod"

import type { ActionGraphContainer } from "../../ports/action-graph"
import { ActionGraphError } from "../errors/action-graph-error"
import { actionGraphContainerSchema } from "./container-schema"
import { createJsonCodec } from "./json-codec"

const codec = createJsonCodec<ActionGraphContainer>(actionGraphContainerSchema)

export function encodeActionGraph(container: ActionGraphContainer): Uint8Array {
  return codec.encode(container)
}

/**
 * @throws ActionGraphError `action_graph_invalid_container` for bytes that
 * are not JSON or do not describe a container
 */
export function decodeActionGraph(bytes: Uint8Array): ActionGraphContainer {
  try {
    return codec.decode(bytes)
  } catch (err) {
    const issues = err instanceof z.ZodError ? z.prettifyError(err) : String(err)
    throw ActionGraphError.invalidContainer({ issues }, err)
  }
}
