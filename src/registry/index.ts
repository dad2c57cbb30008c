// Types
export type { RegistryEntry } from "./types"

// Registry
export { ShadowRegistry } from "./registry"
