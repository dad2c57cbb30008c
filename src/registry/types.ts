import type { ObjectSchema, StructMeta } from "@/schema/extract"

/**
 * Entry stored in the registry
 */
export interface RegistryEntry {
  schema: ObjectSchema
  meta: StructMeta
}
