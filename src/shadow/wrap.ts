import type { Field, StructConfig, WrapDecision } from "@/shadow/types"

/**
 * Decide whether a field is wrapped in an optional container on the shadow type.
 *
 * Precedence, highest first:
 * 1. `force-raw` directive
 * 2. `force-wrapped` directive
 * 3. declared type already optional (never double-wrapped by default)
 * 4. the struct's `defaultWrap`
 */
export function resolveWrap(field: Field, config: Pick<StructConfig, "defaultWrap">): WrapDecision {
  if (field.directive === "force-raw") {
    return "raw"
  }
  if (field.directive === "force-wrapped") {
    return "wrapped"
  }
  if (field.type.kind === "optional") {
    return "raw"
  }
  return config.defaultWrap ? "wrapped" : "raw"
}
