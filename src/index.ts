/**
 * shadow-struct
 *
 * Generates optional "shadow" types from record schemas, plus a deterministic
 * merge that overlays the values present in a shadow onto an instance of the
 * original type. Layering several shadows (defaults, file, environment, flags)
 * lets later sources override earlier ones field by field.
 *
 * @example
 * ```ts
 * import { z, ShadowRegistry } from 'shadow-struct'
 *
 * const Server = z.object({
 *   host: z.string(),
 *   port: z.number(),
 * })
 *
 * const Config = z.object({
 *   name: z.string().skipWrap(), // always overwritten
 *   server: Server, // merged recursively
 *   token: z.string().optional(), // already optional, kept as is
 * })
 *
 * const shadows = new ShadowRegistry()
 *   .add(Server, { name: 'Server' })
 *   .add(Config, { name: 'Config' })
 *   .generate()
 *
 * const config = { name: 'api', server: { host: 'localhost', port: 80 }, token: undefined }
 * shadows.layer('Config', config,
 *   { name: 'api', server: { port: 8080 } },
 *   { name: 'api-dev', server: { host: '0.0.0.0' }, token: 'test-secret' },
 * )
 * // config: { name: 'api-dev', server: { host: '0.0.0.0', port: 8080 }, token: 'test-secret' }
 * ```
 */

// Schema - re-export Zod with skipWrap/wrap/rename extensions
export * from "./schema"

// Registry
export * from "./registry"

// Generation
export * from "./shadow"

// Errors
export * from "./errors"
