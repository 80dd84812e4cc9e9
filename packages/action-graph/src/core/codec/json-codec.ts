import superjson from "superjson"
import type { ZodType } from "zod"

import type { Codec } from "../../ports/codec"

const decoder = new TextDecoder()

/**
 * JSON codec that validates decoded values against `schema`.
 */
export function createJsonCodec<T>(schema: ZodType<T>): Codec<T> {
  return {
    encode: (value: T) => Buffer.from(superjson.stringify(value), "utf8"),
    decode: (data: Uint8Array) => schema.parse(superjson.parse<unknown>(decoder.decode(data))),
  }
}
