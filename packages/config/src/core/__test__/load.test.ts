import { z } from "zod"
import { EnvSource } from "../../adapters/env/env-source"
import { ObjectSource } from "../../adapters/object/object-source"
import { loadConfig } from "../load"

const schema = z.object({
  ACTION_GRAPH_ID_BASE: z.coerce.number().int().nonnegative().default(1),
  LOG_LEVEL: z.enum(["debug", "info", "warn"]).default("info"),
})

describe("loadConfig", () => {
  it("coerces values from the environment", async () => {
    const config = await loadConfig({
      schema,
      sources: [new EnvSource({ env: { ACTION_GRAPH_ID_BASE: "0", LOG_LEVEL: "warn" } })],
    })

    expect(config.value).toEqual({ ACTION_GRAPH_ID_BASE: 0, LOG_LEVEL: "warn" })
    expect(config.explain("ACTION_GRAPH_ID_BASE")).toBe("env")
  })

  it("lets later sources override earlier ones", async () => {
    const config = await loadConfig({
      schema,
      sources: [
        new EnvSource({ env: { LOG_LEVEL: "warn" } }),
        new ObjectSource({ LOG_LEVEL: "debug" }),
      ],
    })

    expect(config.get("LOG_LEVEL")).toBe("debug")
    expect(config.explain("LOG_LEVEL")).toBe("object:overrides")
  })

  it("ignores undefined values", async () => {
    const config = await loadConfig({
      schema,
      sources: [
        new ObjectSource({ LOG_LEVEL: "warn" }),
        new EnvSource({ env: { LOG_LEVEL: undefined } }),
      ],
    })

    expect(config.get("LOG_LEVEL")).toBe("warn")
  })

  it("falls back to schema defaults", async () => {
    const config = await loadConfig({ schema, sources: [new EnvSource({ env: {} })] })

    expect(config.value).toEqual({ ACTION_GRAPH_ID_BASE: 1, LOG_LEVEL: "info" })
    expect(config.explain("ACTION_GRAPH_ID_BASE")).toBe("default")
    expect(config.sourcesUsed()).toEqual(["default"])
  })

  it("reports keys outside the schema", async () => {
    const config = await loadConfig({
      schema,
      sources: [new EnvSource({ env: { ACTION_GRAPH_ID_BAS: "2" } })],
    })

    expect(config.unknownKeys()).toEqual(["ACTION_GRAPH_ID_BAS"])
    expect(config.sourcesUsed()).toEqual(["default"])
  })

  it("throws with the validation problems", async () => {
    await expect(
      loadConfig({
        schema,
        sources: [new EnvSource({ env: { ACTION_GRAPH_ID_BASE: "-3" } })],
      }),
    ).rejects.toThrow(/Configuration validation failed:[\s\S]*ACTION_GRAPH_ID_BASE/)
  })
})
