import { Writable } from "node:stream"

import { InternError } from "@actiongraph/intern"

import { target } from "../../../tests/graph-fixtures"
import { createKnownCaches } from "../../../core/caches/known-caches"
import { ActionGraphDump } from "../../../core/dump/action-graph-dump"
import { createStreamSinks } from "../stream-sinks"

function capture(opts: { fail?: Error } = {}) {
  const chunks: string[] = []
  const stream = new Writable({
    write(chunk: unknown, _encoding, callback) {
      if (opts.fail) return callback(opts.fail)
      chunks.push(String(chunk))
      callback()
    },
  })
  return { stream, lines: () => chunks.join("").split("\n").filter((line) => line !== "") }
}

describe("createStreamSinks", () => {
  it("streams nodes as section-tagged JSON lines in production order", async () => {
    const out = capture()
    const sinks = createStreamSinks(out.stream)
    const dump = new ActionGraphDump({ caches: createKnownCaches(sinks), sinks })

    await dump.dumpTarget(target("//java/a:a", "java_library"))
    await dump.dumpTarget(target("//java/b:b", "java_library"))

    expect(out.lines()).toEqual([
      '{"ruleClasses":{"id":1,"name":"java_library"}}',
      '{"targets":{"id":1,"label":"//java/a:a","ruleClassId":1}}',
      '{"targets":{"id":2,"label":"//java/b:b","ruleClassId":1}}',
    ])
    expect(dump.finish()).toMatchObject({ targets: 2, ruleClasses: 1 })
  })

  it("fails the lookup when the stream cannot be written", async () => {
    const sinks = createStreamSinks(capture({ fail: new Error("disk full") }).stream)
    const caches = createKnownCaches(sinks)

    const err = await caches.targets.dataToId(target("//a:a", "genrule")).catch((e: unknown) => e)

    expect(err).toBeInstanceOf(InternError)
    if (!(err instanceof InternError)) return
    expect(err.code).toBe("intern_construct_failed")
    expect(err.cause).toBeInstanceOf(InternError)
    if (!(err.cause instanceof InternError)) return
    expect(err.cause.code).toBe("intern_publish_failed")
    expect(sinks.ruleClasses.count()).toBe(0)
    expect(caches.ruleClasses.size).toBe(0)
    expect(caches.targets.size).toBe(0)
  })
})
