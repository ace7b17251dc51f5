export type LabelComplianceErrorKind =
  | "INPUT_ERROR"
  | "CONFIG_ERROR"
  | "PERSISTENCE_ERROR"
  | "CONFLICT_ERROR";

export class LabelComplianceError extends Error {
  public readonly kind: LabelComplianceErrorKind;
  public readonly details?: unknown;

  constructor(kind: LabelComplianceErrorKind, message: string, details?: unknown) {
    super(message);
    this.name = new.target.name;
    this.kind = kind;
    this.details = details;
  }
}

/** Malformed candidate field. Absorbed by the merge engine as a diagnostic. */
export class InputError extends LabelComplianceError {
  constructor(message: string, details?: unknown) {
    super("INPUT_ERROR", message, details);
  }
}

/** Missing, empty or unversioned rule catalogue. Fatal. */
export class ConfigError extends LabelComplianceError {
  constructor(message: string, details?: unknown) {
    super("CONFIG_ERROR", message, details);
  }
}

/** The history store could not be read or written. */
export class PersistenceError extends LabelComplianceError {
  constructor(message: string, details?: unknown) {
    super("PERSISTENCE_ERROR", message, details);
  }
}

/** Duplicate (manufacturer, product, timestamp) append. */
export class ConflictError extends LabelComplianceError {
  constructor(message: string, details?: unknown) {
    super("CONFLICT_ERROR", message, details);
  }
}

export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
