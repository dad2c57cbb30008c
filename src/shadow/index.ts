export type * from "./types"

export { resolveWrap } from "./wrap"
export { TypeRegistry, buildTypeRegistry, resolveNested, nestedLookupKey, type TypeRegistryEntry } from "./type-registry"
export { buildShadowType, assertSupportedType, toRepresentation, BASELINE_CAPABILITIES } from "./builder"
export { generateMergePlan, applyTo, isRecord } from "./merge"
export {
  generateShadows,
  defineStruct,
  shadowName,
  ShadowSet,
  GeneratedShadow,
  GenerateOptionsSchema,
  DEFAULT_SHADOW_PREFIX,
  type GenerateOptions,
  type StructInput,
} from "./generate"
export { typeRefToTs, describeTypeRef } from "./type-ref"
