import type { GenerationLogEntry } from "./ai/ai.types";

export type ValidationIssue = {
  /** Offending entity key, e.g. `sales.orders.id` or `staging_models.stg_orders`. */
  entity: string;
  rule: ValidationRule;
  message: string;
};

export type ValidationRule =
  | "required"
  | "invalid_value"
  | "duplicate"
  | "primary_key"
  | "range"
  | "pattern"
  | "dangling_reference";

/**
 * Input catalogs are inconsistent. Carries every issue found, never just the first.
 */
export class ValidationFailure extends Error {
  public readonly code = "VALIDATION_FAILURE";

  constructor(public readonly issues: readonly ValidationIssue[]) {
    super(
      `Catalog validation failed with ${issues.length} issue(s):\n` +
        issues.map((i) => `  - [${i.rule}] ${i.entity}: ${i.message}`).join("\n")
    );
    this.name = "ValidationFailure";
    Object.setPrototypeOf(this, ValidationFailure.prototype);
  }
}

export type CompositionFailureKind = "MissingVariable" | "UnknownTemplate";

export class CompositionFailure extends Error {
  public readonly code = "COMPOSITION_FAILURE";

  constructor(
    public readonly kind: CompositionFailureKind,
    public readonly templateName: string,
    public readonly missing: readonly string[] = []
  ) {
    super(
      kind === "MissingVariable"
        ? `Template "${templateName}" is missing variable(s): ${missing.join(", ")}`
        : `Unknown prompt template "${templateName}"`
    );
    this.name = "CompositionFailure";
    Object.setPrototypeOf(this, CompositionFailure.prototype);
  }
}

export type GenerationFailureKind = "TransportError" | "ServiceError";

export class GenerationFailure extends Error {
  public readonly code = "GENERATION_FAILURE";

  constructor(
    public readonly kind: GenerationFailureKind,
    public readonly detail: string,
    public readonly log: readonly GenerationLogEntry[]
  ) {
    super(`${kind}: ${detail}`);
    this.name = "GenerationFailure";
    Object.setPrototypeOf(this, GenerationFailure.prototype);
  }
}

/**
 * Thrown by a transport when the service answered with an application-level error.
 * Never retried.
 */
export class ServiceResponseError extends Error {
  constructor(
    public readonly status: number,
    public readonly detail: string
  ) {
    super(`Service responded with ${status}: ${detail}`);
    this.name = "ServiceResponseError";
    Object.setPrototypeOf(this, ServiceResponseError.prototype);
  }
}

/** Internal consistency check failed. Always fatal. */
export class TransformInvariantViolation extends Error {
  public readonly code = "TRANSFORM_INVARIANT_VIOLATION";

  constructor(message: string) {
    super(message);
    this.name = "TransformInvariantViolation";
    Object.setPrototypeOf(this, TransformInvariantViolation.prototype);
  }
}

export class RunCancelled extends Error {
  public readonly code = "RUN_CANCELLED";

  constructor(message = "Run cancelled") {
    super(message);
    this.name = "RunCancelled";
    Object.setPrototypeOf(this, RunCancelled.prototype);
  }
}

export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}
