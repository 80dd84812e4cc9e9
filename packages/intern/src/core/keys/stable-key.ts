/**
 * Plain data accepted by {@link stableKey}.
 */
export type KeyPart =
  | string
  | number
  | boolean
  | null
  | undefined
  | readonly KeyPart[]
  | { readonly [field: string]: KeyPart }

/**
 * Canonical string for plain data: object fields are sorted, arrays keep
 * their order, `undefined` fields are dropped. Equal data gives equal keys.
 *
 * @example
 * ```ts
 * stableKey({ parentId: 3, label: "bin" }) === stableKey({ label: "bin", parentId: 3 })
 * ```
 */
export function stableKey(value: KeyPart): string {
  return JSON.stringify(normalize(value)) ?? "undefined"
}

function normalize(value: KeyPart): KeyPart {
  if (value === null || typeof value !== "object") return value

  if (isKeyPartArray(value)) return value.map(normalize)

  const out: Record<string, KeyPart> = {}

  for (const field of Object.keys(value).sort()) {
    const part = value[field]
    if (part !== undefined) out[field] = normalize(part)
  }

  return out
}

function isKeyPartArray(value: object): value is readonly KeyPart[] {
  return Array.isArray(value)
}
