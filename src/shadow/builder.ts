import { UnsupportedTypeError } from "@/errors"
import { resolveWrap } from "@/shadow/wrap"
import { resolveNested, type TypeRegistry } from "@/shadow/type-registry"
import { describeTypeRef } from "@/shadow/type-ref"
import type { Field, Representation, ShadowField, ShadowLogger, ShadowTypeDefinition, StructSchema, TypeRef, WrapDecision } from "@/shadow/types"

/**
 * Capabilities every shadow type carries
 */
export const BASELINE_CAPABILITIES = ["equals", "clone", "debug"] as const

/**
 * Check whether a type reference may hold `undefined` somewhere other than an optional wrapper.
 * Such shapes make optional-ness ambiguous.
 */
const hasHiddenUndefined = (type: TypeRef): boolean => {
  if (type.kind === "primitive") return type.name === "undefined"
  if (type.kind === "optional") return true
  if (type.kind === "nullable") return hasHiddenUndefined(type.inner)
  if (type.kind === "union") return type.options.some(hasHiddenUndefined)
  return false
}

/**
 * Reject declared types whose optional-ness cannot be determined structurally
 */
export function assertSupportedType(struct: string, field: Field): void {
  const check = (type: TypeRef, top: boolean): void => {
    switch (type.kind) {
      case "optional":
        if (hasHiddenUndefined(type.inner)) {
          throw new UnsupportedTypeError(struct, field.name, describeTypeRef(field.type))
        }
        check(type.inner, false)
        return
      case "primitive":
        if (top && type.name === "undefined") {
          throw new UnsupportedTypeError(struct, field.name, describeTypeRef(field.type))
        }
        return
      case "union":
        if (type.options.length === 0 || type.options.some(hasHiddenUndefined)) {
          throw new UnsupportedTypeError(struct, field.name, describeTypeRef(field.type))
        }
        type.options.forEach((o) => check(o, false))
        return
      case "nullable":
        if (hasHiddenUndefined(type.inner)) {
          throw new UnsupportedTypeError(struct, field.name, describeTypeRef(field.type))
        }
        check(type.inner, false)
        return
      case "array":
        check(type.element, false)
        return
      case "record":
        check(type.value, false)
        return
      case "tuple":
        type.items.forEach((i) => check(i, false))
        return
      case "object":
        type.fields.forEach((f) => check(f.type, true))
        return
      default:
        return
    }
  }

  check(field.type, true)
}

/**
 * Combine a wrap decision with the nested lookup result
 */
export function toRepresentation(decision: WrapDecision, type: TypeRef, nested: string | undefined): Representation {
  if (nested !== undefined) {
    return decision === "wrapped" ? { kind: "wrapped-nested", shadow: nested } : { kind: "nested", shadow: nested }
  }
  return decision === "wrapped" ? { kind: "wrapped", type } : { kind: "raw", type }
}

/**
 * Produce the field list and capability set of a struct's shadow type.
 *
 * @param schema - The normalized struct schema
 * @param registry - Frozen registry of all shadow types in scope
 * @param options.baseline - Capabilities carried before caller-declared ones
 */
export function buildShadowType(
  schema: StructSchema,
  registry: TypeRegistry,
  options: { baseline?: readonly string[]; logger?: ShadowLogger } = {},
): ShadowTypeDefinition {
  const fields: ShadowField[] = []

  for (const field of schema.fields) {
    assertSupportedType(schema.name, field)

    const decision = resolveWrap(field, schema.config)
    const nested = resolveNested(field, registry, schema.name)

    if (nested !== undefined && field.rename !== undefined) {
      const declared = field.type.kind === "optional" ? field.type.inner : field.type
      if (declared.kind !== "named" && declared.kind !== "object") {
        const error = new UnsupportedTypeError(schema.name, field.name, describeTypeRef(field.type))
        options.logger?.error("[Shadow] Renamed field is not a struct:", error.message)
        throw error
      }

      const target = registry.get(field.rename)
      if (declared.kind === "named" && target && target.original !== declared.name) {
        options.logger?.warn(`[Shadow] ${schema.name}.${field.name}: rename target "${field.rename}" shadows "${target.original}", declared type is "${declared.name}"`)
      }
    }

    fields.push({
      name: field.name,
      representation: toRepresentation(decision, field.type, nested),
      ...(field.description !== undefined ? { description: field.description } : {}),
    })
  }

  const capabilities = [...(options.baseline ?? BASELINE_CAPABILITIES)]
  for (const capability of schema.config.capabilities) {
    if (!capabilities.includes(capability)) {
      capabilities.push(capability)
    }
  }

  return {
    name: schema.config.target,
    original: schema.name,
    fields,
    capabilities,
    ...(schema.description !== undefined ? { description: schema.description } : {}),
  }
}
