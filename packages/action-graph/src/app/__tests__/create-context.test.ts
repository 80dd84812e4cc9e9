import { Writable } from "node:stream"

import { createNullLogger } from "@actiongraph/logger"

import { action, artifact, target } from "../../tests/graph-fixtures"
import { createActionGraphContext } from "../create-context"

describe("createActionGraphContext", () => {
  it("wires a run from configuration", async () => {
    const ctx = await createActionGraphContext({
      env: { ACTION_GRAPH_ID_BASE: "0" },
      logger: createNullLogger(),
      runId: "run-1",
    })

    expect(ctx.runId).toBe("run-1")
    expect(ctx.config.idBase).toBe(0)

    await ctx.dump.dumpTarget(target("//java/a:a", "java_library"))

    expect(ctx.finish().targets).toEqual([{ id: 0, label: "//java/a:a", ruleClassId: 0 }])
  })

  it("generates a run id when none is given", async () => {
    const ctx = await createActionGraphContext({ env: {}, logger: createNullLogger() })

    expect(ctx.runId).toMatch(/^[\w-]{21}$/)
  })

  it("keeps runs isolated", async () => {
    const first = await createActionGraphContext({ env: {}, logger: createNullLogger() })
    const second = await createActionGraphContext({ env: {}, logger: createNullLogger() })

    await first.dump.dumpTarget(target("//a:a"))
    await first.dump.dumpTarget(target("//b:b"))
    const id = await second.dump.dumpTarget(target("//b:b"))

    expect(id).toBe(1)
    expect(first.finish().targets).toHaveLength(2)
    expect(second.finish().targets).toHaveLength(1)
  })

  it("logs the run summary through pino", async () => {
    const lines: Record<string, unknown>[] = []
    const logDestination = new Writable({
      write(chunk: unknown, _encoding, callback) {
        lines.push(JSON.parse(String(chunk)))
        callback()
      },
    })

    const ctx = await createActionGraphContext({
      env: { ACTION_GRAPH_SERVICE_NAME: "graph-test" },
      runId: "run-42",
      logDestination,
    })

    await ctx.dump.dumpAction(
      action({
        actionKey: "gen",
        owner: target("//tools:gen", "genrule"),
        outputs: [artifact("bazel-out/bin/tools/gen.out")],
      }),
    )
    ctx.finish()

    expect(lines).toHaveLength(1)
    expect(lines[0]).toMatchObject({
      level: 30,
      msg: "Action graph dump finished",
      service: "graph-test",
      runId: "run-42",
      module: "action-graph-dump",
      actions: 1,
      targets: 1,
      pathFragments: 4,
    })
  })

  it("warns about unknown ACTION_GRAPH_ variables", async () => {
    const lines: Record<string, unknown>[] = []
    const logDestination = new Writable({
      write(chunk: unknown, _encoding, callback) {
        lines.push(JSON.parse(String(chunk)))
        callback()
      },
    })

    await createActionGraphContext({
      env: { ACTION_GRAPH_ID_BAS: "2", ACTION_GRAPH_LOG_LEVEL: "warn" },
      runId: "run-7",
      logDestination,
    })

    expect(lines).toHaveLength(1)
    expect(lines[0]).toMatchObject({
      level: 40,
      msg: "Ignoring unknown configuration variables",
      runId: "run-7",
      keys: ["ACTION_GRAPH_ID_BAS"],
    })
  })
})
