import { ActionGraphError } from "../../errors/action-graph-error"
import { Label, parseLabel } from "../label"

describe("Label", () => {
  it("prints main repository labels without a repository prefix", () => {
    expect(new Label("", "java/com/example", "lib").toString()).toBe("//java/com/example:lib")
  })

  it("prints external repository labels with an @ prefix", () => {
    expect(new Label("maven", "", "guava").toString()).toBe("@maven//:guava")
  })
})

describe("parseLabel", () => {
  it.each([
    ["//java/a:a", "", "java/a", "a"],
    ["//java/a", "", "java/a", "a"],
    ["@maven//:guava", "maven", "", "guava"],
    ["@rules_cc//cc/toolchains:all", "rules_cc", "cc/toolchains", "all"],
    ["//:root", "", "", "root"],
  ])("parses %s", (text, repository, packageName, name) => {
    const label = parseLabel(text)

    expect(label.repository).toBe(repository)
    expect(label.packageName).toBe(packageName)
    expect(label.name).toBe(name)
  })

  it("round-trips canonical labels", () => {
    expect(parseLabel("@maven//com/google:guava").toString()).toBe("@maven//com/google:guava")
  })

  it("expands the shorthand form", () => {
    expect(parseLabel("//tools/gen").toString()).toBe("//tools/gen:gen")
  })

  it.each([
    ["java/a:a", "malformed"],
    ["//a:b:c", "malformed"],
    ["//a//b:c", "bad package name"],
    ["//a/:c", "bad package name"],
    ["//", "missing target name"],
  ])("rejects %s", (text, reason) => {
    try {
      parseLabel(text)
      expect.unreachable()
    } catch (err) {
      expect(err).toBeInstanceOf(ActionGraphError)
      if (!(err instanceof ActionGraphError)) return
      expect(err.code).toBe("action_graph_invalid_label")
      expect(err.context).toEqual({ text, reason })
    }
  })
})
