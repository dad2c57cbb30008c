import { DuplicateShadowError, FrozenRegistryError, UnresolvedRenameError } from "@/errors"
import type { Field, StructSchema } from "@/shadow/types"

/**
 * Entry stored in the type registry
 */
export interface TypeRegistryEntry {
  /** Generated shadow type name */
  shadow: string
  /** Original struct name */
  original: string
}

/**
 * Maps type names to their generated shadow type.
 *
 * Every struct registers under its original name and its shadow name. The
 * registry is filled by one complete pass over all schemas and frozen before
 * any per-struct generation reads it.
 */
export class TypeRegistry {
  private _entries: Map<string, TypeRegistryEntry> = new Map()
  private _frozen = false

  /**
   * Register a key for a shadow type
   * @returns this for method chaining
   */
  register(key: string, entry: TypeRegistryEntry): this {
    if (this._frozen) {
      throw new FrozenRegistryError(key)
    }

    const existing = this._entries.get(key)
    if (existing && (existing.shadow !== entry.shadow || existing.original !== entry.original)) {
      throw new DuplicateShadowError(entry.original, key, existing.shadow)
    }

    this._entries.set(key, entry)
    return this
  }

  get(key: string): TypeRegistryEntry | undefined {
    return this._entries.get(key)
  }

  has(key: string): boolean {
    return this._entries.has(key)
  }

  /**
   * Make the registry read-only
   */
  freeze(): this {
    this._frozen = true
    return this
  }

  get frozen(): boolean {
    return this._frozen
  }

  get size(): number {
    return this._entries.size
  }

  *keys(): IterableIterator<string> {
    yield* this._entries.keys()
  }
}

/**
 * Build and freeze the registry from every in-scope schema.
 * Must run before generation so lookups resolve regardless of declaration order.
 */
export function buildTypeRegistry(schemas: Iterable<StructSchema>): TypeRegistry {
  const registry = new TypeRegistry()

  for (const schema of schemas) {
    const entry = { shadow: schema.config.target, original: schema.name }
    registry.register(schema.name, entry)
    registry.register(schema.config.target, entry)
  }

  return registry.freeze()
}

/**
 * Key used to look up a field's shadow counterpart.
 * The rename target wins; otherwise only a plain named type has a key.
 */
export function nestedLookupKey(field: Field): string | undefined {
  if (field.rename !== undefined) {
    return field.rename
  }
  if (field.type.kind === "named") {
    return field.type.name
  }
  return undefined
}

/**
 * Resolve the shadow type a field merges into recursively.
 * @param struct - Name of the struct owning the field, for diagnostics
 * @returns The shadow type name, or undefined when the field is scalar
 */
export function resolveNested(field: Field, registry: TypeRegistry, struct: string): string | undefined {
  const key = nestedLookupKey(field)
  if (key === undefined) {
    return undefined
  }

  const entry = registry.get(key)
  if (!entry) {
    if (field.rename !== undefined) {
      throw new UnresolvedRenameError(struct, field.name, field.rename)
    }
    return undefined
  }

  return entry.shadow
}
