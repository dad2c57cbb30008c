import { isDeepStrictEqual, inspect } from "node:util"
import * as z from "zod"
import { ShadowError } from "@/errors"
import { BASELINE_CAPABILITIES, buildShadowType } from "@/shadow/builder"
import { applyTo, generateMergePlan, isRecord } from "@/shadow/merge"
import { buildTypeRegistry, type TypeRegistry } from "@/shadow/type-registry"
import type { Field, MergePlan, ShadowLogger, ShadowTypeDefinition, ShadowValue, StructConfig, StructSchema } from "@/shadow/types"

/**
 * Prefix of the default shadow type name
 */
export const DEFAULT_SHADOW_PREFIX = "Optional"

/**
 * Default shadow type name for a struct
 */
export const shadowName = (name: string, prefix: string = DEFAULT_SHADOW_PREFIX): string => `${prefix}${name}`

const LoggerSchema = z.custom<ShadowLogger>((value) => isRecord(value) && typeof value.warn === "function" && typeof value.error === "function", {
  message: "logger must provide warn() and error()",
})

/**
 * Options accepted by generateShadows
 */
export const GenerateOptionsSchema = z.object({
  /** Capabilities carried by every shadow type before caller-declared ones */
  baseline: z.array(z.string()).optional(),
  /** Receives generation and merge warnings (default: console) */
  logger: LoggerSchema.optional(),
})

export type GenerateOptions = z.input<typeof GenerateOptionsSchema>

/**
 * Loose struct description accepted by defineStruct
 */
export interface StructInput {
  name: string
  fields: (Pick<Field, "name" | "type"> & Partial<Omit<Field, "name" | "type">>)[]
  target?: string
  defaultWrap?: boolean
  capabilities?: string[]
  description?: string
}

/**
 * Build a normalized struct schema, applying configuration defaults
 */
export function defineStruct(input: StructInput): StructSchema {
  const config: StructConfig = {
    target: input.target ?? shadowName(input.name),
    defaultWrap: input.defaultWrap ?? true,
    capabilities: input.capabilities ?? [],
  }

  return {
    name: input.name,
    fields: input.fields.map((f) => ({ ...f, directive: f.directive ?? "none" })),
    config,
    ...(input.description !== undefined ? { description: input.description } : {}),
  }
}

/**
 * A generated shadow type with its merge operation and baseline capabilities
 */
export class GeneratedShadow {
  constructor(
    public readonly definition: ShadowTypeDefinition,
    public readonly plan: MergePlan,
    public readonly schema: StructSchema,
    private readonly set: ShadowSet,
    private readonly validator?: z.ZodType,
  ) {}

  get name(): string {
    return this.definition.name
  }

  /**
   * Overlay the present values of `shadow` onto `target`
   */
  applyTo<T extends Record<string, unknown>>(shadow: ShadowValue, target: T): void {
    applyTo(this.plan, shadow, target, this.set.plans, this.set.logger)
  }

  /**
   * Apply shadows in order; a later shadow wins wherever its slot is present
   * @returns the target, for chaining
   */
  layer<T extends Record<string, unknown>>(target: T, ...shadows: ShadowValue[]): T {
    for (const shadow of shadows) {
      this.applyTo(shadow, target)
    }
    return target
  }

  /**
   * Validate an unknown input as a value of this shadow type
   */
  parse(input: unknown): ShadowValue {
    const output = this.validator ? this.validator.parse(input) : input
    if (!isRecord(output)) {
      throw new ShadowError({ message: `expected an object for shadow type ${this.name}`, code: "unknown", struct: this.schema.name })
    }
    return output
  }

  /**
   * Structural equality of two shadow values
   */
  equals(a: ShadowValue, b: ShadowValue): boolean {
    return this.definition.fields.every((field) => {
      const representation = field.representation
      if (Object.hasOwn(a, field.name) !== Object.hasOwn(b, field.name) && representation.kind === "wrapped" && representation.type.kind === "optional") {
        return false
      }

      const left = a[field.name]
      const right = b[field.name]

      if (representation.kind === "nested" || representation.kind === "wrapped-nested") {
        if (isRecord(left) && isRecord(right)) {
          return this.set.require(representation.shadow).equals(left, right)
        }
      }

      return isDeepStrictEqual(left, right)
    })
  }

  clone(value: ShadowValue): ShadowValue {
    return structuredClone(value)
  }

  /**
   * Debug formatting, e.g. `OptionalFoo { meow: 10, woof: undefined }`
   */
  debug(value: ShadowValue): string {
    const parts = this.definition.fields.map((field) => {
      const representation = field.representation
      const inner = value[field.name]

      if ((representation.kind === "nested" || representation.kind === "wrapped-nested") && isRecord(inner)) {
        return `${field.name}: ${this.set.require(representation.shadow).debug(inner)}`
      }
      return `${field.name}: ${inspect(inner, { depth: 4, breakLength: Infinity })}`
    })

    return parts.length > 0 ? `${this.name} { ${parts.join(", ")} }` : `${this.name} {}`
  }
}

/**
 * All shadow types generated from one schema set
 */
export class ShadowSet {
  private _shadows: Map<string, GeneratedShadow> = new Map()
  private _plans: Map<string, MergePlan> = new Map()

  constructor(
    public readonly registry: TypeRegistry,
    generated: { definition: ShadowTypeDefinition; plan: MergePlan; schema: StructSchema }[],
    public readonly logger: ShadowLogger,
    validators: ReadonlyMap<string, z.ZodType> = new Map(),
  ) {
    for (const { definition, plan, schema } of generated) {
      this._shadows.set(definition.name, new GeneratedShadow(definition, plan, schema, this, validators.get(definition.name)))
      this._plans.set(definition.name, plan)
    }
  }

  get plans(): ReadonlyMap<string, MergePlan> {
    return this._plans
  }

  /**
   * Get a shadow by original struct name or shadow type name
   */
  get(name: string): GeneratedShadow | undefined {
    const entry = this.registry.get(name)
    return entry ? this._shadows.get(entry.shadow) : undefined
  }

  has(name: string): boolean {
    return this.get(name) !== undefined
  }

  /**
   * Like get(), but throws for an unknown name
   */
  require(name: string): GeneratedShadow {
    const shadow = this.get(name)
    if (!shadow) {
      throw new ShadowError({ message: `no shadow type registered for "${name}"`, code: "unknown" })
    }
    return shadow
  }

  apply<T extends Record<string, unknown>>(name: string, shadow: ShadowValue, target: T): void {
    this.require(name).applyTo(shadow, target)
  }

  layer<T extends Record<string, unknown>>(name: string, target: T, ...shadows: ShadowValue[]): T {
    return this.require(name).layer(target, ...shadows)
  }

  /**
   * Copy of this set whose shadows validate parsed input with the given schemas
   * @param validators - Zod schemas keyed by shadow type name
   */
  withValidators(validators: ReadonlyMap<string, z.ZodType>): ShadowSet {
    const generated = Array.from(this.values(), ({ definition, plan, schema }) => ({ definition, plan, schema }))
    return new ShadowSet(this.registry, generated, this.logger, validators)
  }

  *values(): IterableIterator<GeneratedShadow> {
    yield* this._shadows.values()
  }

  get size(): number {
    return this._shadows.size
  }
}

/**
 * Generate shadow types and merge plans for a complete schema set.
 *
 * The type registry is built from every schema first, then each struct is
 * generated against the frozen registry. The first fatal error aborts the run.
 */
export function generateShadows(schemas: StructSchema[], options: GenerateOptions = {}): ShadowSet {
  const parsed = GenerateOptionsSchema.parse(options)
  const logger: ShadowLogger = parsed.logger ?? console
  const baseline = parsed.baseline ?? BASELINE_CAPABILITIES

  const registry = buildTypeRegistry(schemas)

  const generated = schemas.map((schema) => {
    try {
      const definition = buildShadowType(schema, registry, { baseline, logger })
      return { definition, plan: generateMergePlan(definition, schema), schema }
    } catch (err) {
      throw ShadowError.from(err, schema.name)
    }
  })

  return new ShadowSet(registry, generated, logger)
}
