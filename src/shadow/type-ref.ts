import type { TypeRef } from "@/shadow/types"

/**
 * Generate indentation spaces
 */
const space = (depth: number) => " ".repeat(depth)

const IDENTIFIER = /^[A-Za-z_$][A-Za-z0-9_$]*$/

/**
 * Render an object property key, quoting it when it is not a valid identifier
 */
export const propertyKey = (name: string): string => (IDENTIFIER.test(name) ? name : JSON.stringify(name))

/**
 * Render a property access on `object`
 */
export const propertyAccess = (object: string, name: string): string => (IDENTIFIER.test(name) ? `${object}.${name}` : `${object}[${JSON.stringify(name)}]`)

const renderLiteral = (value: string | number | boolean | bigint | null): string => {
  if (typeof value === "string") return JSON.stringify(value)
  if (typeof value === "bigint") return `${value}n`
  return String(value)
}

const PRIMITIVES = {
  string: "string",
  number: "number",
  boolean: "boolean",
  bigint: "bigint",
  date: "Date",
  null: "null",
  undefined: "undefined",
} as const

/**
 * Convert a type reference to a TypeScript type expression.
 * Objects are rendered over multiple lines at `depth`, unless `inline` is set.
 */
export function typeRefToTs(type: TypeRef, depth: number = 0, inline: boolean = false): string {
  switch (type.kind) {
    case "primitive":
      return PRIMITIVES[type.name]
    case "literal":
      return renderLiteral(type.value)
    case "enum":
      return type.values.map((v) => (typeof v === "string" ? JSON.stringify(v) : String(v))).join(" | ")
    case "named":
      return type.name
    case "optional":
      return `${typeRefToTs(type.inner, depth, inline)} | undefined`
    case "nullable":
      return `${typeRefToTs(type.inner, depth, inline)} | null`
    case "array": {
      const items = typeRefToTs(type.element, depth, inline)
      // Only wrap in parentheses if it's a compound type
      const needsParens = items.includes(" | ") || items.includes(" & ")
      return needsParens ? `(${items})[]` : `${items}[]`
    }
    case "tuple":
      return `[${type.items.map((i) => typeRefToTs(i, depth, inline)).join(", ")}]`
    case "record":
      return `Record<string, ${typeRefToTs(type.value, depth, inline)}>`
    case "union":
      return type.options.map((o) => typeRefToTs(o, depth, inline)).join(" | ")
    case "object": {
      if (type.fields.length === 0) {
        return "{}"
      }
      if (inline) {
        return `{ ${type.fields.map((f) => `${propertyKey(f.name)}${f.type.kind === "optional" ? "?" : ""}: ${typeRefToTs(f.type, depth, true)}`).join("; ")} }`
      }
      const newDepth = depth + 2
      const properties = type.fields
        .map((f) => `${space(newDepth)}${propertyKey(f.name)}${f.type.kind === "optional" ? "?" : ""}: ${typeRefToTs(f.type, newDepth)}`)
        .join("\n")
      return `{\n${properties}\n${space(depth)}}`
    }
  }
}

/**
 * Single-line rendering of a type reference, used in diagnostics
 */
export const describeTypeRef = (type: TypeRef): string => typeRefToTs(type, 0, true)
