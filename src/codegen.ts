/**
 * shadow-struct/codegen
 *
 * TypeScript source generation for shadow types and their merge functions.
 * Use this entry point for build-time tooling.
 *
 * @example
 * ```ts
 * import { ShadowRegistry, z } from 'shadow-struct'
 * import { shadowSetToTypescript } from 'shadow-struct/codegen'
 *
 * const registry = new ShadowRegistry().add(z.object({ port: z.number() }), { name: 'server' })
 * const source = shadowSetToTypescript(registry.generate())
 * ```
 */

export {
  shadowSetToTypescript,
  shadowTypeToTypescript,
  mergeToTypescript,
  structToTypescript,
  TypescriptOptionsSchema,
  type TypescriptOptions,
} from "@/codegen/typescript"
