import { BaseError } from "@actiongraph/errors"

export type InternErrorCode =
  | "intern_construct_failed"
  | "intern_publish_failed"
  | "intern_reentrant_lookup"
  | "intern_invalid_rollback"

type SectionInput = {
  section: string
}

type AssignedInput = SectionInput & {
  id: number
}

export class InternError extends BaseError<InternErrorCode> {
  static constructionFailed(input: AssignedInput, cause: unknown): InternError {
    return new InternError(`Failed to construct ${input.section} node ${input.id}`, {
      code: "intern_construct_failed",
      context: { section: input.section, id: input.id },
      cause,
    })
  }

  static publishFailed(input: AssignedInput, cause: unknown): InternError {
    return new InternError(`Failed to publish ${input.section} node ${input.id}`, {
      code: "intern_publish_failed",
      context: { section: input.section, id: input.id },
      cause,
    })
  }

  static reentrantLookup(input: SectionInput): InternError {
    return new InternError(
      `Lookup on ${input.section} while one of its own nodes is being constructed`,
      {
        code: "intern_reentrant_lookup",
        context: { section: input.section },
        isOperational: false,
      },
    )
  }

  static invalidRollback(input: { id: number; latest: number | undefined }): InternError {
    return new InternError(`Cannot roll back id ${input.id}: not the latest assignment`, {
      code: "intern_invalid_rollback",
      context: { id: input.id, latest: input.latest },
      isOperational: false,
    })
  }
}
