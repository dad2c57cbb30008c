import * as z from "zod"

/**
 * Field directives stored on Zod schemas for shadow generation
 */
export interface ShadowMeta {
  /** Never wrap this field in an optional container */
  skipWrap?: boolean
  /** Always wrap this field in an optional container */
  wrap?: boolean
  /** Type name used to look up this field's nested shadow type */
  rename?: string
}

/**
 * Key used to identify shadow metadata in Zod's meta
 */
const SHADOW_META_KEY = "__shadow" as const

const ShadowMetaSchema = z.object({
  skipWrap: z.boolean().optional(),
  wrap: z.boolean().optional(),
  rename: z.string().min(1).optional(),
})

// Module augmentation to add skipWrap(), wrap(), and rename() methods to all Zod types
declare module "zod" {
  interface ZodType<out Output, out Input, out Internals> {
    /**
     * Keep this field unwrapped on the shadow type: it is always overwritten on merge.
     * @example z.number().skipWrap()
     */
    skipWrap(): this

    /**
     * Wrap this field in an optional container on the shadow type, even when
     * the struct does not wrap by default or the field is already optional.
     * @example z.string().wrap()
     */
    wrap(): this

    /**
     * Merge this field through the shadow type registered under `typeName`.
     * @param typeName - Original struct name or shadow type name
     * @example z.object({ port: z.number() }).rename('Server')
     */
    rename(typeName: string): this
  }
}

/**
 * Read the shadow metadata of a single schema layer
 */
function getCurrentShadowMeta(schema: z.core.$ZodType): ShadowMeta {
  const meta = z.globalRegistry.get(schema)
  const result = ShadowMetaSchema.safeParse(meta?.[SHADOW_META_KEY] ?? {})
  return result.success ? result.data : {}
}

/**
 * Create a new schema with updated shadow metadata
 */
function withShadowMeta<T extends z.ZodType>(schema: T, update: ShadowMeta): T {
  const current = getCurrentShadowMeta(schema)
  const existingMeta = schema.meta() ?? {}
  return schema.meta({
    ...existingMeta,
    [SHADOW_META_KEY]: { ...current, ...update },
  })
}

// Add the methods to Zod's prototype
const ZodTypeProto = z.ZodType.prototype as z.ZodType & {
  skipWrap(): z.ZodType
  wrap(): z.ZodType
  rename(typeName: string): z.ZodType
}

ZodTypeProto.skipWrap = function () {
  return withShadowMeta(this, { skipWrap: true })
}

ZodTypeProto.wrap = function () {
  return withShadowMeta(this, { wrap: true })
}

ZodTypeProto.rename = function (typeName: string) {
  return withShadowMeta(this, { rename: typeName })
}

/**
 * Get the shadow metadata of a schema layer
 * @param schema - The Zod schema to read
 */
export function getShadowMeta(schema: z.core.$ZodType): ShadowMeta {
  return getCurrentShadowMeta(schema)
}

/**
 * Collect directives from all wrapper layers of a schema.
 * This handles cases like z.string().wrap().optional().default('x')
 * where the directive sits on an inner layer.
 * @returns The directives of every layer, outermost first
 */
export function collectShadowMeta(schema: z.core.$ZodType): ShadowMeta[] {
  const layers: ShadowMeta[] = [getShadowMeta(schema)]

  if (schema instanceof z.ZodOptional || schema instanceof z.ZodNullable || schema instanceof z.ZodReadonly) {
    layers.push(...collectShadowMeta(schema.unwrap()))
  } else if (schema instanceof z.ZodDefault || schema instanceof z.ZodPrefault || schema instanceof z.ZodLazy) {
    layers.push(...collectShadowMeta(schema.unwrap()))
  }

  return layers
}

export { z }
