import { BaseError } from "@actiongraph/errors"

export type ActionGraphErrorCode =
  | "action_graph_invalid_label"
  | "action_graph_invalid_path"
  | "action_graph_invalid_container"
  | "action_graph_dump_aborted"

export class ActionGraphError extends BaseError<ActionGraphErrorCode> {
  static invalidLabel(input: { text: string; reason: string }): ActionGraphError {
    return new ActionGraphError(`Invalid label "${input.text}": ${input.reason}`, {
      code: "action_graph_invalid_label",
      context: { text: input.text, reason: input.reason },
    })
  }

  static invalidPath(input: { path: string }): ActionGraphError {
    return new ActionGraphError(`Invalid path "${input.path}": no segments`, {
      code: "action_graph_invalid_path",
      context: { path: input.path },
    })
  }

  static invalidContainer(input: { issues: string }, cause: unknown): ActionGraphError {
    return new ActionGraphError(`Invalid action graph container:\n${input.issues}`, {
      code: "action_graph_invalid_container",
      cause,
    })
  }

  static dumpAborted(cause: unknown): ActionGraphError {
    return new ActionGraphError("Action graph dump aborted after an earlier failure", {
      code: "action_graph_dump_aborted",
      cause,
    })
  }
}
