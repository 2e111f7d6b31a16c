/**
 * █ [DOMAIN] :: SCORING_ERRORS
 * =====================================================================
 * DESC:   Rechazos de reglas de negocio del motor. Síncronos y no
 *         reintentables; la capa HTTP los traduce por `code`.
 * STATUS: STABLE
 * =====================================================================
 */

export type ScoringErrorCode =
  | "INVALID_DELIVERY"
  | "ILLEGAL_STATE_TRANSITION"
  | "NOT_FOUND"
  | "NOTHING_TO_UNDO"
  | "INVALID_INPUT";

export class ScoringError extends Error {
  readonly code: ScoringErrorCode;

  constructor(code: ScoringErrorCode, message: string) {
    super(message);
    this.name = "ScoringError";
    this.code = code;
  }
}

export class InvalidDeliveryError extends ScoringError {
  constructor(message: string) {
    super("INVALID_DELIVERY", message);
    this.name = "InvalidDeliveryError";
  }
}

export class IllegalStateTransitionError extends ScoringError {
  constructor(message: string) {
    super("ILLEGAL_STATE_TRANSITION", message);
    this.name = "IllegalStateTransitionError";
  }
}

export class NotFoundError extends ScoringError {
  constructor(message: string) {
    super("NOT_FOUND", message);
    this.name = "NotFoundError";
  }
}

export class NothingToUndoError extends ScoringError {
  constructor(message = "No balls to undo.") {
    super("NOTHING_TO_UNDO", message);
    this.name = "NothingToUndoError";
  }
}

export class InvalidInputError extends ScoringError {
  constructor(message: string) {
    super("INVALID_INPUT", message);
    this.name = "InvalidInputError";
  }
}

export function isScoringError(error: unknown): error is ScoringError {
  return error instanceof ScoringError;
}
