/**
 * Primitive names a declared type can resolve to
 */
export type PrimitiveName = "string" | "number" | "boolean" | "bigint" | "date" | "null" | "undefined"

/**
 * Normalized declared type of a field.
 * Produced by a schema extractor, consumed by the resolvers and the emitter.
 */
export type TypeRef =
  | { kind: "primitive"; name: PrimitiveName }
  | { kind: "literal"; value: string | number | boolean | bigint | null }
  | { kind: "enum"; values: (string | number)[] }
  | { kind: "named"; name: string }
  | { kind: "object"; fields: { name: string; type: TypeRef }[] }
  | { kind: "optional"; inner: TypeRef }
  | { kind: "nullable"; inner: TypeRef }
  | { kind: "array"; element: TypeRef }
  | { kind: "tuple"; items: TypeRef[] }
  | { kind: "record"; value: TypeRef }
  | { kind: "union"; options: TypeRef[] }

/**
 * Wrap directive of a field
 */
export type Directive = "none" | "force-raw" | "force-wrapped"

export interface Field {
  name: string
  type: TypeRef
  directive: Directive
  /** Overrides the nested shadow lookup key */
  rename?: string
  description?: string
}

/**
 * Struct-level configuration
 */
export interface StructConfig {
  /** Name of the generated shadow type */
  target: string
  /** Wrap fields without a directive unless already optional */
  defaultWrap: boolean
  /** Caller-declared capability annotations, copied verbatim onto the shadow */
  capabilities: string[]
}

/**
 * Normalized record schema handed to the generator
 */
export interface StructSchema {
  name: string
  fields: Field[]
  config: StructConfig
  description?: string
}

export type WrapDecision = "raw" | "wrapped"

/**
 * Shape a field takes on the shadow type
 */
export type Representation =
  | { kind: "raw"; type: TypeRef }
  | { kind: "wrapped"; type: TypeRef }
  | { kind: "nested"; shadow: string }
  | { kind: "wrapped-nested"; shadow: string }

export interface ShadowField {
  name: string
  representation: Representation
  description?: string
}

/**
 * Structural description of a generated shadow type
 */
export interface ShadowTypeDefinition {
  /** Shadow type name */
  name: string
  /** Name of the original struct */
  original: string
  fields: ShadowField[]
  capabilities: string[]
  description?: string
}

/**
 * A single per-field instruction of the merge operation
 */
export type MergeStep =
  | { kind: "assign"; field: string }
  | { kind: "assign-present"; field: string; presence: "defined" | "key" }
  | { kind: "recurse"; field: string; shadow: string; optionalTarget: boolean }
  | { kind: "recurse-present"; field: string; shadow: string; optionalTarget: boolean }

export interface MergePlan {
  shadow: string
  original: string
  steps: MergeStep[]
}

/**
 * A value of a shadow type
 */
export type ShadowValue = Record<string, unknown>

/**
 * Minimal logger used for generation and merge warnings
 */
export interface ShadowLogger {
  warn(...args: unknown[]): void
  error(...args: unknown[]): void
}
