/**
 * Schema module - re-exports Zod with shadow directive extensions
 *
 * - `.skipWrap()` - Keep a field unwrapped; it is always overwritten on merge
 * - `.wrap()` - Always wrap a field in an optional container
 * - `.rename('Type')` - Merge a field through another registered shadow type
 */

// Import meta.ts to apply prototype extensions and re-export z
export { z } from "@/schema/meta"

export { getShadowMeta, collectShadowMeta, type ShadowMeta } from "@/schema/meta"
export { extractStruct, extractField, schemaKey, type ObjectSchema, type StructMeta } from "@/schema/extract"
export { buildShadowSchemas } from "@/schema/shadow-schema"
