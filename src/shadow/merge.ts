import { ShadowError } from "@/errors"
import type { MergePlan, MergeStep, ShadowLogger, ShadowTypeDefinition, ShadowValue, StructSchema } from "@/shadow/types"

/**
 * Type guard: checks if a value is a plain record (not null, not array)
 */
export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value)
}

/**
 * Derive the merge steps of a shadow type, one per field in schema order.
 *
 * A wrapped field whose declared type is itself optional tests presence by own key,
 * so an explicitly present `undefined` still overwrites the target.
 */
export function generateMergePlan(definition: ShadowTypeDefinition, schema: StructSchema): MergePlan {
  const declared = new Map(schema.fields.map((f) => [f.name, f.type]))

  const steps = definition.fields.map((field): MergeStep => {
    const optionalTarget = declared.get(field.name)?.kind === "optional"
    const representation = field.representation

    switch (representation.kind) {
      case "raw":
        return { kind: "assign", field: field.name }
      case "wrapped":
        return { kind: "assign-present", field: field.name, presence: representation.type.kind === "optional" ? "key" : "defined" }
      case "nested":
        return { kind: "recurse", field: field.name, shadow: representation.shadow, optionalTarget }
      case "wrapped-nested":
        return { kind: "recurse-present", field: field.name, shadow: representation.shadow, optionalTarget }
    }
  })

  return { shadow: definition.name, original: definition.original, steps }
}

/**
 * Overlay a shadow value onto a target.
 *
 * Every step is an overwrite or a skip, so applying the same shadow twice
 * leaves the target as a single application did.
 *
 * @param plan - Merge plan of the shadow's type
 * @param shadow - The shadow value
 * @param target - Instance of the original type, mutated in place
 * @param plans - Merge plans of every shadow type, for nested recursion
 */
export function applyTo(
  plan: MergePlan,
  shadow: ShadowValue,
  target: Record<string, unknown>,
  plans: ReadonlyMap<string, MergePlan>,
  logger?: ShadowLogger,
): void {
  for (const step of plan.steps) {
    const value = shadow[step.field]

    switch (step.kind) {
      case "assign":
        target[step.field] = value
        break
      case "assign-present":
        if (step.presence === "key" ? Object.hasOwn(shadow, step.field) : value !== undefined) {
          target[step.field] = value
        }
        break
      case "recurse":
      case "recurse-present": {
        if (value === undefined && step.kind === "recurse-present") {
          break
        }

        const subtree = target[step.field]
        if (subtree === undefined && step.optionalTarget) {
          logger?.warn(`[Shadow] ${plan.original}.${step.field} is absent on the target; nested ${step.shadow} not applied`)
          break
        }

        if (!isRecord(value) || !isRecord(subtree)) {
          logger?.warn(`[Shadow] ${plan.original}.${step.field} is not an object on both sides; nested ${step.shadow} not applied`)
          break
        }

        applyTo(lookupPlan(plans, step.shadow), value, subtree, plans, logger)
        break
      }
    }
  }
}

const lookupPlan = (plans: ReadonlyMap<string, MergePlan>, shadow: string): MergePlan => {
  const plan = plans.get(shadow)
  if (!plan) {
    throw new ShadowError({ message: `no merge plan for shadow type "${shadow}"`, code: "unknown" })
  }
  return plan
}
