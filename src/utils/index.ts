/**
 * Capitalize a string
 */
export const capitalize = (s: string) => s.charAt(0).toUpperCase() + s.slice(1)

/**
 * Convert a struct name to a TypeScript type name (PascalCase)
 * @example toTypeName("server-config") // "ServerConfig"
 */
export const toTypeName = (name: string) => capitalize(name).replace(/[-_](.)/g, (_, char: string) => char.toUpperCase())
