/**
 * Error codes for generation failures
 */
export type ShadowErrorCode = "conflicting-directives" | "unresolved-rename" | "unsupported-type" | "duplicate-shadow" | "frozen-registry" | "unknown"

/**
 * Error thrown when shadow generation fails.
 *
 * Every failure is detected at generation time and aborts the whole schema set,
 * so no partial merge code is ever produced. Merging itself never throws.
 */
export class ShadowError extends Error {
  /** The name of the error class */
  override name: string = "ShadowError"

  /** The original error, if any */
  public override readonly cause: unknown

  public readonly code: ShadowErrorCode

  /** Struct the failure was detected in */
  public readonly struct?: string

  /** Field the failure was detected on */
  public readonly field?: string

  constructor(options: { message: string; code: ShadowErrorCode; struct?: string; field?: string; cause?: unknown }) {
    super(`${location(options.struct, options.field)}${options.message}`)
    this.code = options.code
    this.struct = options.struct
    this.field = options.field
    this.cause = options.cause

    // Maintain proper stack trace in V8 environments
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target)
    }
  }

  /**
   * Create a ShadowError from an unknown error value
   */
  static from(err: unknown, struct?: string): ShadowError {
    if (err instanceof ShadowError) {
      return err
    }

    if (err instanceof Error) {
      return new ShadowError({ message: err.message, code: "unknown", struct, cause: err })
    }

    return new ShadowError({ message: String(err), code: "unknown", struct, cause: err })
  }
}

const location = (struct: string | undefined, field: string | undefined): string => {
  if (struct && field) return `${struct}.${field}: `
  if (struct) return `${struct}: `
  return ""
}

/**
 * Both `skipWrap` and `wrap` were declared on the same field
 */
export class ConflictingDirectivesError extends ShadowError {
  override name = "ConflictingDirectivesError"

  constructor(struct: string, field: string) {
    super({ message: "skipWrap and wrap cannot both be set on a field", code: "conflicting-directives", struct, field })
  }
}

/**
 * A rename directive names a type with no registered shadow
 */
export class UnresolvedRenameError extends ShadowError {
  override name = "UnresolvedRenameError"

  public readonly target: string

  constructor(struct: string, field: string, target: string) {
    super({ message: `rename target "${target}" has no registered shadow type`, code: "unresolved-rename", struct, field })
    this.target = target
  }
}

/**
 * A declared type whose optional-ness cannot be determined structurally
 */
export class UnsupportedTypeError extends ShadowError {
  override name = "UnsupportedTypeError"

  public readonly type: string

  constructor(struct: string, field: string, type: string) {
    super({ message: `unsupported declared type "${type}"`, code: "unsupported-type", struct, field })
    this.type = type
  }
}

/**
 * Two structs claim the same registry key for different shadow types
 */
export class DuplicateShadowError extends ShadowError {
  override name = "DuplicateShadowError"

  constructor(struct: string, key: string, existing: string) {
    super({ message: `"${key}" is already registered for shadow type "${existing}"`, code: "duplicate-shadow", struct })
  }
}

export class FrozenRegistryError extends ShadowError {
  override name = "FrozenRegistryError"

  constructor(key: string) {
    super({ message: `cannot register "${key}": type registry is frozen`, code: "frozen-registry" })
  }
}
