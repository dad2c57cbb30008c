import { z } from "@/schema/meta"
import { ShadowError } from "@/errors"
import type { ShadowSet } from "@/shadow/generate"
import type { ObjectSchema } from "@/schema/extract"

/**
 * Remove default layers so a missing slot stays absent instead of being filled in
 */
const stripDefaults = (schema: z.core.$ZodType): z.core.$ZodType => {
  if (schema instanceof z.ZodDefault || schema instanceof z.ZodPrefault) {
    return stripDefaults(schema.unwrap())
  }
  if (schema instanceof z.ZodOptional) {
    return z.optional(stripDefaults(schema.unwrap()))
  }
  return schema
}

/**
 * Build Zod schemas validating values of every shadow type in a set.
 *
 * Wrapped fields accept a missing value, nested fields validate against the
 * nested shadow schema (resolved lazily so self-referential structs work).
 * Unknown keys are rejected.
 *
 * @param set - The generated shadow set
 * @param sources - Original object schemas keyed by struct name
 * @returns Shadow schemas keyed by shadow type name
 */
export function buildShadowSchemas(set: ShadowSet, sources: ReadonlyMap<string, ObjectSchema>): Map<string, z.ZodType> {
  const schemas = new Map<string, z.ZodType>()

  const nested = (shadow: string) =>
    z.lazy(() => {
      const schema = schemas.get(shadow)
      if (!schema) {
        throw new ShadowError({ message: `no shadow schema for "${shadow}"`, code: "unknown" })
      }
      return schema
    })

  for (const generated of set.values()) {
    const source = sources.get(generated.definition.original)
    if (!source) {
      throw new ShadowError({ message: "no source schema registered", code: "unknown", struct: generated.definition.original })
    }

    const shape: Record<string, z.core.$ZodType> = {}
    for (const field of generated.definition.fields) {
      const original = source.shape[field.name]
      const representation = field.representation

      switch (representation.kind) {
        case "raw":
          shape[field.name] = original
          break
        case "wrapped":
          shape[field.name] = z.optional(stripDefaults(original))
          break
        case "nested":
          shape[field.name] = nested(representation.shadow)
          break
        case "wrapped-nested":
          shape[field.name] = z.optional(nested(representation.shadow))
          break
      }
    }

    schemas.set(generated.name, z.strictObject(shape))
  }

  return schemas
}
