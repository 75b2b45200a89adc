import type { FatalErrorKind } from "../../types/engine.types";

/**
 * Whole-run failure: a font that cannot be opened or a location/instance that
 * cannot be resolved. Converted to a failed ComparisonOutcome at the boundary.
 */
export class FatalComparisonError extends Error {
  readonly kind: FatalErrorKind;

  constructor(kind: FatalErrorKind, message: string) {
    super(message);
    this.name = "FatalComparisonError";
    this.kind = kind;
  }
}

export function fontOpenError(label: string, cause: unknown): FatalComparisonError {
  const detail = cause instanceof Error ? cause.message : String(cause);
  return new FatalComparisonError("font-open", `Cannot open ${label}: ${detail}`);
}
