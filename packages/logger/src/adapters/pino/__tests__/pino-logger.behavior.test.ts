import { Writable } from "node:stream"

import { BaseError } from "@actiongraph/errors"
import { PinoLogger } from "../pino-logger"

function makeLineDestination() {
  const lines: string[] = []

  const destination = new Writable({
    write(chunk, _encoding, callback) {
      const line = chunk.toString("utf8").trim()
      if (line) lines.push(line)
      callback()
    },
  })

  const payload = (index: number): Record<string, unknown> => {
    const line = lines[index]
    if (line === undefined) throw new Error(`no log line at ${index}`)
    return JSON.parse(line)
  }

  return { lines, destination, payload }
}

describe("PinoLogger behavior", () => {
  it("emits JSON with bindings and meta to the provided destination", () => {
    const { lines, destination, payload } = makeLineDestination()

    const logger = new PinoLogger(
      { destination },
      { level: "trace", prettify: false },
      { runId: "run-1" },
    )

    logger.info("section finished", { section: "targets", count: 2 })

    expect(lines).toHaveLength(1)
    expect(payload(0)).toMatchObject({
      msg: "section finished",
      runId: "run-1",
      section: "targets",
      count: 2,
      level: 30,
    })
    expect(typeof payload(0).time).toBe("number")
  })

  it("child() inherits the base destination and level", () => {
    const { lines, destination, payload } = makeLineDestination()

    const base = new PinoLogger(
      { destination },
      { level: "warn", prettify: false },
      { runId: "run-1" },
    )
    const child = base.child({ section: "artifacts" })

    child.info("ignored")
    child.warn("logged")

    expect(lines).toHaveLength(1)
    expect(payload(0)).toMatchObject({ msg: "logged", runId: "run-1", section: "artifacts" })
  })

  it("serializes err with its cause chain", () => {
    const { destination, payload } = makeLineDestination()
    const logger = new PinoLogger({ destination }, { level: "info" })

    const err = new BaseError("publish failed", {
      code: "intern_publish_failed",
      cause: new Error("stream destroyed"),
    })

    logger.error("run aborted", { err })

    const logged = payload(0).err
    expect(logged).toMatchObject({
      type: "BaseError",
      message: "publish failed",
      code: "intern_publish_failed",
    })
    expect(logged).toHaveProperty("cause.message", "stream destroyed")
  })
})
