import * as z from "zod"
import { propertyAccess, propertyKey, typeRefToTs } from "@/shadow/type-ref"
import type { ShadowSet } from "@/shadow/generate"
import type { MergePlan, MergeStep, ShadowField, ShadowTypeDefinition, StructSchema, TypeRef } from "@/shadow/types"

/**
 * Options for TypeScript emission
 */
export const TypescriptOptionsSchema = z.object({
  /** Emit the original struct types as well (default: true) */
  includeOriginals: z.boolean().default(true),
  /** Prefix declarations with `export` (default: true) */
  exportTypes: z.boolean().default(true),
  /** Prefix of the generated merge function names (default: "apply") */
  functionPrefix: z.string().min(1).default("apply"),
})

export type TypescriptOptions = z.input<typeof TypescriptOptionsSchema>

type ResolvedOptions = z.output<typeof TypescriptOptionsSchema>

const INDENT = "  "

/**
 * Format a JSDoc comment from its lines
 */
function formatJsDoc(lines: string[]): string {
  if (lines.length === 0) {
    return ""
  }

  let result = "/**\n"
  for (const line of lines) {
    result += ` * ${line.split("\n").join("\n * ")}\n`
  }
  result += " */\n"
  return result
}

const exported = (options: ResolvedOptions) => (options.exportTypes ? "export " : "")

/**
 * Render a property declaration. Optional types become optional properties.
 */
const property = (name: string, type: TypeRef | string, optional: boolean, description: string | undefined): string => {
  const rendered = typeof type === "string" ? type : typeRefToTs(type, INDENT.length)
  const needsUndefined = optional && (typeof type === "string" || type.kind !== "optional")
  return `${INDENT}${propertyKey(name)}${optional ? "?" : ""}: ${rendered}${needsUndefined ? " | undefined" : ""}${description ? ` // ${description}` : ""}`
}

/**
 * Render the original struct as a type alias
 */
export function structToTypescript(schema: StructSchema, options: TypescriptOptions = {}): string {
  const resolved = TypescriptOptionsSchema.parse(options)
  const jsDoc = formatJsDoc(schema.description ? [schema.description] : [])
  const properties = schema.fields.map((f) => property(f.name, f.type, f.type.kind === "optional", f.description))
  const body = properties.length > 0 ? `{\n${properties.join("\n")}\n}` : "{}"

  return `${jsDoc}${exported(resolved)}type ${schema.name} = ${body}`
}

const shadowProperty = (field: ShadowField): string => {
  const representation = field.representation

  switch (representation.kind) {
    case "raw":
      return property(field.name, representation.type, representation.type.kind === "optional", field.description)
    case "wrapped":
      return property(field.name, representation.type, true, field.description)
    case "nested":
      return property(field.name, representation.shadow, false, field.description)
    case "wrapped-nested":
      return property(field.name, representation.shadow, true, field.description)
  }
}

/**
 * Render a shadow type definition as a type alias
 */
export function shadowTypeToTypescript(definition: ShadowTypeDefinition, options: TypescriptOptions = {}): string {
  const resolved = TypescriptOptionsSchema.parse(options)
  const lines = [`Optional overlay of ${definition.original}.`]
  if (definition.description) {
    lines.push(definition.description)
  }
  lines.push(`@capabilities ${definition.capabilities.join(", ")}`)

  const properties = definition.fields.map(shadowProperty)
  const body = properties.length > 0 ? `{\n${properties.join("\n")}\n}` : "{}"

  return `${formatJsDoc(lines)}${exported(resolved)}type ${definition.name} = ${body}`
}

/**
 * Render a block guarded by a condition
 */
const guarded = (condition: string | undefined, statement: string): string[] => {
  if (condition === undefined) {
    return [`${INDENT}${statement}`]
  }
  return [`${INDENT}if (${condition}) {`, `${INDENT}${INDENT}${statement}`, `${INDENT}}`]
}

const renderStep = (step: MergeStep, functionPrefix: string): string[] => {
  const source = propertyAccess("shadow", step.field)
  const target = propertyAccess("target", step.field)

  switch (step.kind) {
    case "assign":
      return guarded(undefined, `${target} = ${source}`)
    case "assign-present":
      return guarded(step.presence === "key" ? `Object.hasOwn(shadow, ${JSON.stringify(step.field)})` : `${source} !== undefined`, `${target} = ${source}`)
    case "recurse":
    case "recurse-present": {
      const conditions: string[] = []
      if (step.kind === "recurse-present") conditions.push(`${source} !== undefined`)
      if (step.optionalTarget) conditions.push(`${target} !== undefined`)
      const call = `${functionPrefix}${step.shadow}(${source}, ${target})`
      return guarded(conditions.length > 0 ? conditions.join(" && ") : undefined, call)
    }
  }
}

/**
 * Render the merge operation of a shadow type as a function
 */
export function mergeToTypescript(plan: MergePlan, options: TypescriptOptions = {}): string {
  const resolved = TypescriptOptionsSchema.parse(options)
  const signature = `${exported(resolved)}function ${resolved.functionPrefix}${plan.shadow}(shadow: ${plan.shadow}, target: ${plan.original}): void`
  const body = plan.steps.flatMap((step) => renderStep(step, resolved.functionPrefix))

  if (body.length === 0) {
    return `${signature} {}`
  }
  return `${signature} {\n${body.join("\n")}\n}`
}

/**
 * Convert every shadow of a set to TypeScript: original types, shadow types,
 * then merge functions, each in registration order.
 * Section headers are only added when original types are included.
 */
export function shadowSetToTypescript(set: ShadowSet, options: TypescriptOptions = {}): string {
  const resolved = TypescriptOptionsSchema.parse(options)
  const shadows = Array.from(set.values())

  const sections: [string, string[]][] = []
  if (resolved.includeOriginals) {
    sections.push(["Original Types", shadows.map((s) => structToTypescript(s.schema, resolved))])
  }
  sections.push(["Shadow Types", shadows.map((s) => shadowTypeToTypescript(s.definition, resolved))])
  sections.push(["Merge Functions", shadows.map((s) => mergeToTypescript(s.plan, resolved))])

  let result = ""
  for (const [title, definitions] of sections) {
    if (definitions.length === 0) continue
    if (resolved.includeOriginals) {
      result += `// --- ${title} ---\n\n`
    }
    for (const definition of definitions) {
      result += `${definition}\n\n`
    }
  }

  return result.trimEnd()
}
