import { ActionGraphError } from "../errors/action-graph-error"

/**
 * A build target name: `@repository//package:name`.
 *
 * The main repository has an empty `repository` and prints without the `@`
 * prefix.
 */
export class Label {
  public constructor(
    public readonly repository: string,
    public readonly packageName: string,
    public readonly name: string,
  ) {}

  public toString(): string {
    const repo = this.repository === "" ? "" : `@${this.repository}`
    return `${repo}//${this.packageName}:${this.name}`
  }
}

const LABEL_PATTERN = /^(?:@([\w.+~-]*))?\/\/([^:]*)(?::([^:]+))?$/

/**
 * Parse a label in canonical or shorthand form.
 *
 * `//foo/bar` is shorthand for `//foo/bar:bar`.
 *
 * @throws ActionGraphError `action_graph_invalid_label`
 */
export function parseLabel(text: string): Label {
  const match = LABEL_PATTERN.exec(text)
  if (!match) throw ActionGraphError.invalidLabel({ text, reason: "malformed" })

  const [, repository = "", packageName = "", explicitName] = match

  if (packageName.startsWith("/") || packageName.endsWith("/") || packageName.includes("//")) {
    throw ActionGraphError.invalidLabel({ text, reason: "bad package name" })
  }

  const name = explicitName ?? packageName.split("/").at(-1) ?? ""
  if (name === "") throw ActionGraphError.invalidLabel({ text, reason: "missing target name" })

  return new Label(repository, packageName, name)
}
