/**
 * Evaluation error kinds. One class with a stable code, plus a subclass per kind
 * so callers can branch with instanceof or on `code`.
 */

export type EvaluationErrorCode =
  | "INVALID_INPUT"
  | "INVALID_OVERRIDE"
  | "INVARIANT_VIOLATION"
  | "INVALID_POLICY";

export type EvaluationErrorDetails = Record<string, unknown>;

export class EvaluationError extends Error {
  readonly code: EvaluationErrorCode;
  readonly details?: EvaluationErrorDetails;

  constructor(args: { code: EvaluationErrorCode; message: string; details?: EvaluationErrorDetails }) {
    super(args.message);
    this.name = "EvaluationError";
    this.code = args.code;
    this.details = args.details;
  }
}

/** Raw rating, confidence or input structure rejected before scoring. */
export class InvalidInputError extends EvaluationError {
  constructor(message: string, details?: EvaluationErrorDetails) {
    super({ code: "INVALID_INPUT", message, details });
    this.name = "InvalidInputError";
  }
}

/** Override supplied without a usable justification, owner or decision. */
export class InvalidOverrideError extends EvaluationError {
  constructor(message: string, details?: EvaluationErrorDetails) {
    super({ code: "INVALID_OVERRIDE", message, details });
    this.name = "InvalidOverrideError";
  }
}

/** An engine stage received or produced an out-of-range value. Signals a defect. */
export class InvariantViolationError extends EvaluationError {
  constructor(message: string, details?: EvaluationErrorDetails) {
    super({ code: "INVARIANT_VIOLATION", message, details });
    this.name = "InvariantViolationError";
  }
}

export class InvalidPolicyError extends EvaluationError {
  constructor(message: string, details?: EvaluationErrorDetails) {
    super({ code: "INVALID_POLICY", message, details });
    this.name = "InvalidPolicyError";
  }
}

export const isEvaluationError = (err: unknown): err is EvaluationError => err instanceof EvaluationError;
