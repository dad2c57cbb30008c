import { z, collectShadowMeta } from "@/schema/meta"
import { ConflictingDirectivesError, UnsupportedTypeError } from "@/errors"
import { shadowName } from "@/shadow/generate"
import type { Directive, Field, ShadowLogger, StructSchema, TypeRef } from "@/shadow/types"

/**
 * Identity of a schema that survives clones from .meta()/.describe()/.rename().
 * Zod clones share their definition object.
 */
export const schemaKey = (schema: z.core.$ZodType): object => schema._zod.def

/**
 * Any Zod object schema, whatever its unknown-key handling
 */
export type ObjectSchema = z.ZodObject<z.core.$ZodShape, z.core.$ZodObjectConfig>

/**
 * Struct-level options for extracting a Zod object schema
 */
export interface StructMeta {
  /** Struct type name */
  name: string
  /** Shadow type name (default: `Optional<Name>`) */
  target?: string
  /** Wrap fields without a directive unless already optional (default: true) */
  defaultWrap?: boolean
  /** Capability annotations copied onto the shadow type */
  capabilities?: string[]
  description?: string
}

interface ExtractContext {
  struct: string
  field: string
  /** Registered struct names keyed by schemaKey() */
  names: ReadonlyMap<object, string>
  logger?: ShadowLogger
}

const unsupported = (ctx: ExtractContext, type: string): never => {
  const error = new UnsupportedTypeError(ctx.struct, ctx.field, type)
  ctx.logger?.error("[Shadow] Cannot determine the shape of field type:", error.message)
  throw error
}

/**
 * Extract description from a schema, unwrapping optional/nullable/default if needed
 */
function getSchemaDescription(schema: z.core.$ZodType): string | undefined {
  const description = z.globalRegistry.get(schema)?.description
  if (description) {
    return description
  }
  if (schema instanceof z.ZodOptional || schema instanceof z.ZodNullable || schema instanceof z.ZodDefault) {
    return getSchemaDescription(schema.unwrap())
  }
  return undefined
}

/**
 * Convert a Zod schema to a normalized type reference.
 * Registered object schemas become named references.
 */
function toTypeRef(schema: z.core.$ZodType, ctx: ExtractContext, seen: Set<object>): TypeRef {
  const key = schemaKey(schema)
  const named = ctx.names.get(key)
  if (named !== undefined) {
    return { kind: "named", name: named }
  }

  if (seen.has(key)) {
    return unsupported(ctx, "recursive anonymous type")
  }
  seen.add(key)

  try {
    return convert(schema, ctx, seen)
  } finally {
    seen.delete(key)
  }
}

function convert(s: z.core.$ZodType, ctx: ExtractContext, seen: Set<object>): TypeRef {
  if (s instanceof z.ZodString) return { kind: "primitive", name: "string" }
  if (s instanceof z.ZodNumber) return { kind: "primitive", name: "number" }
  if (s instanceof z.ZodBoolean) return { kind: "primitive", name: "boolean" }
  if (s instanceof z.ZodBigInt) return { kind: "primitive", name: "bigint" }
  if (s instanceof z.ZodDate) return { kind: "primitive", name: "date" }
  if (s instanceof z.ZodNull) return { kind: "primitive", name: "null" }
  if (s instanceof z.ZodUndefined) return { kind: "primitive", name: "undefined" }

  if (s instanceof z.ZodLiteral) {
    const options = Array.from(s.values, (value): TypeRef => (value === undefined ? { kind: "primitive", name: "undefined" } : { kind: "literal", value }))
    if (options.length === 1) return options[0]
    return { kind: "union", options }
  }

  if (s instanceof z.ZodEnum) {
    return { kind: "enum", values: [...s.options] }
  }

  if (s instanceof z.ZodOptional) {
    return { kind: "optional", inner: toTypeRef(s.unwrap(), ctx, seen) }
  }
  if (s instanceof z.ZodNullable) {
    return { kind: "nullable", inner: toTypeRef(s.unwrap(), ctx, seen) }
  }
  if (s instanceof z.ZodDefault || s instanceof z.ZodPrefault || s instanceof z.ZodReadonly) {
    return toTypeRef(s.unwrap(), ctx, seen)
  }
  if (s instanceof z.ZodLazy) {
    return toTypeRef(s.unwrap(), ctx, seen)
  }

  if (s instanceof z.ZodArray) {
    return { kind: "array", element: toTypeRef(s.element, ctx, seen) }
  }
  if (s instanceof z.ZodTuple) {
    if (s.def.rest) {
      return unsupported(ctx, "tuple with rest element")
    }
    return { kind: "tuple", items: s.def.items.map((item) => toTypeRef(item, ctx, seen)) }
  }
  if (s instanceof z.ZodRecord) {
    return { kind: "record", value: toTypeRef(s.valueType, ctx, seen) }
  }
  if (s instanceof z.ZodUnion || s instanceof z.ZodDiscriminatedUnion) {
    return { kind: "union", options: s.options.map((option) => toTypeRef(option, ctx, seen)) }
  }
  if (s instanceof z.ZodObject) {
    return {
      kind: "object",
      fields: Object.entries(s.shape).map(([name, value]) => ({ name, type: toTypeRef(value, ctx, seen) })),
    }
  }

  return unsupported(ctx, s._zod.def.type)
}

/**
 * Resolve the directives of a field from every wrapper layer
 */
function extractDirectives(schema: z.core.$ZodType, ctx: ExtractContext): { directive: Directive; rename?: string } {
  const layers = collectShadowMeta(schema)
  const skipWrap = layers.some((l) => l.skipWrap)
  const wrap = layers.some((l) => l.wrap)

  if (skipWrap && wrap) {
    const error = new ConflictingDirectivesError(ctx.struct, ctx.field)
    ctx.logger?.error("[Shadow] Conflicting field directives:", error.message)
    throw error
  }

  const rename = layers.find((l) => l.rename !== undefined)?.rename
  const directive: Directive = skipWrap ? "force-raw" : wrap ? "force-wrapped" : "none"

  return rename !== undefined ? { directive, rename } : { directive }
}

/**
 * Normalize a single object property into a field
 */
export function extractField(
  struct: string,
  name: string,
  schema: z.core.$ZodType,
  names: ReadonlyMap<object, string>,
  logger?: ShadowLogger,
): Field {
  const ctx: ExtractContext = { struct, field: name, names, logger }
  const description = getSchemaDescription(schema)

  return {
    name,
    type: toTypeRef(schema, ctx, new Set<object>()),
    ...extractDirectives(schema, ctx),
    ...(description !== undefined ? { description } : {}),
  }
}

/**
 * Normalize a Zod object schema into a struct schema.
 *
 * @param schema - The object schema
 * @param meta - Struct name and configuration
 * @param names - Names of every registered struct, keyed by schemaKey()
 * @param logger - Receives a diagnostic before a fatal error is thrown
 */
export function extractStruct(
  schema: ObjectSchema,
  meta: StructMeta,
  names: ReadonlyMap<object, string> = new Map(),
  logger?: ShadowLogger,
): StructSchema {
  const fields = Object.entries(schema.shape).map(([name, value]) => extractField(meta.name, name, value, names, logger))
  const description = meta.description ?? z.globalRegistry.get(schema)?.description

  return {
    name: meta.name,
    fields,
    config: {
      target: meta.target ?? shadowName(meta.name),
      defaultWrap: meta.defaultWrap ?? true,
      capabilities: meta.capabilities ?? [],
    },
    ...(description !== undefined ? { description } : {}),
  }
}
