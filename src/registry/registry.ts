import { extractStruct, schemaKey, type ObjectSchema, type StructMeta } from "@/schema/extract"
import { buildShadowSchemas } from "@/schema/shadow-schema"
import { GenerateOptionsSchema, generateShadows, type GenerateOptions, type ShadowSet } from "@/shadow/generate"
import { shadowSetToTypescript, type TypescriptOptions } from "@/codegen/typescript"
import { ShadowError } from "@/errors"
import { toTypeName } from "@/utils"
import type { RegistryEntry } from "@/registry/types"
import type { StructSchema } from "@/shadow/types"

/**
 * Registry of the object schemas that get shadow types.
 * Names are normalized to PascalCase type names.
 */
export class ShadowRegistry {
  private _structs: Map<string, RegistryEntry> = new Map()
  private _schemaToName: Map<object, string> = new Map()

  /**
   * Register an object schema with its struct configuration
   * @param schema - The Zod object schema
   * @param meta - Struct name, shadow name, and wrapping defaults
   * @returns this for method chaining
   */
  add(schema: ObjectSchema, meta: StructMeta): this {
    if (!meta.name) {
      throw new Error("Struct metadata must include a name")
    }

    const name = toTypeName(meta.name)
    const normalized: StructMeta = { ...meta, name, ...(meta.target !== undefined ? { target: toTypeName(meta.target) } : {}) }

    const previous = this._structs.get(name)
    if (previous) {
      this._schemaToName.delete(schemaKey(previous.schema))
    }

    this._structs.set(name, { schema, meta: normalized })
    this._schemaToName.set(schemaKey(schema), name)

    return this
  }

  /**
   * Get an entry by struct name
   */
  get(name: string): RegistryEntry | undefined {
    return this._structs.get(toTypeName(name))
  }

  getSchema(name: string): ObjectSchema | undefined {
    return this.get(name)?.schema
  }

  getMeta(name: string): StructMeta | undefined {
    return this.get(name)?.meta
  }

  has(name: string): boolean {
    return this._structs.has(toTypeName(name))
  }

  /**
   * Check if a schema (or a clone of it) is registered
   */
  hasSchema(schema: ObjectSchema): boolean {
    return this._schemaToName.has(schemaKey(schema))
  }

  getNameForSchema(schema: ObjectSchema): string | undefined {
    return this._schemaToName.get(schemaKey(schema))
  }

  /**
   * Remove a struct by name
   * @returns true if the struct was removed
   */
  remove(name: string): boolean {
    const key = toTypeName(name)
    const entry = this._structs.get(key)
    if (!entry) return false

    this._structs.delete(key)
    this._schemaToName.delete(schemaKey(entry.schema))
    return true
  }

  *values(): IterableIterator<RegistryEntry> {
    yield* this._structs.values()
  }

  *entries(): IterableIterator<[string, RegistryEntry]> {
    yield* this._structs.entries()
  }

  *names(): IterableIterator<string> {
    yield* this._structs.keys()
  }

  get size(): number {
    return this._structs.size
  }

  clear(): void {
    this._structs.clear()
    this._schemaToName.clear()
  }

  /**
   * Normalize every registered schema, in registration order
   */
  toStructSchemas(options: GenerateOptions = {}): StructSchema[] {
    const logger = GenerateOptionsSchema.parse(options).logger ?? console

    return Array.from(this._structs.values(), ({ schema, meta }) => {
      try {
        return extractStruct(schema, meta, this._schemaToName, logger)
      } catch (err) {
        throw ShadowError.from(err, meta.name)
      }
    })
  }

  /**
   * Generate the shadow set of every registered schema.
   * Shadows validate parsed input against their generated Zod schema.
   */
  generate(options: GenerateOptions = {}): ShadowSet {
    const set = generateShadows(this.toStructSchemas(options), options)
    const sources = new Map(Array.from(this._structs.values(), ({ schema, meta }) => [meta.name, schema] as const))
    return set.withValidators(buildShadowSchemas(set, sources))
  }

  /**
   * Generate and render every shadow as TypeScript source
   */
  toTypescript(options: TypescriptOptions & GenerateOptions = {}): string {
    return shadowSetToTypescript(this.generate(options), options)
  }
}
