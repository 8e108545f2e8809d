/**
 * Error taxonomy for engine operations.
 *
 * Every failure an engine command can produce is one of four kinds. All of
 * them are local and recoverable: the caller reports them and may re-issue
 * the command once the input is fixed.
 */

// ============================================================================
// Kinds and Codes
// ============================================================================

export type ErrorKind =
  | 'NotFound'
  | 'InvalidInput'
  | 'StateViolation'
  | 'ConcurrencyConflict';

/**
 * ErrorCode: Stable machine-readable reason, safe to send to a client.
 */
export type ErrorCode =
  | 'mission_not_found'
  | 'skill_not_found'
  | 'reward_not_found'
  | 'capsule_not_found'
  | 'invalid_difficulty'
  | 'invalid_energy'
  | 'invalid_level'
  | 'invalid_skill_count'
  | 'invalid_cadence'
  | 'invalid_name'
  | 'invalid_price'
  | 'invalid_settings'
  | 'invalid_capsule_condition'
  | 'invalid_request'
  | 'invalid_stored_state'
  | 'payload_too_large'
  | 'mission_archived'
  | 'skill_archived'
  | 'reward_archived'
  | 'skill_not_ready'
  | 'insufficient_coins'
  | 'revision_conflict';

// ============================================================================
// Error Classes
// ============================================================================

export class EngineError extends Error {
  readonly kind: ErrorKind;
  readonly code: ErrorCode;

  constructor(kind: ErrorKind, code: ErrorCode, message: string) {
    super(message);
    this.name = 'EngineError';
    this.kind = kind;
    this.code = code;
  }
}

export class NotFoundError extends EngineError {
  constructor(code: ErrorCode, message: string) {
    super('NotFound', code, message);
    this.name = 'NotFoundError';
  }
}

export class InvalidInputError extends EngineError {
  constructor(code: ErrorCode, message: string) {
    super('InvalidInput', code, message);
    this.name = 'InvalidInputError';
  }
}

export class StateViolationError extends EngineError {
  constructor(code: ErrorCode, message: string) {
    super('StateViolation', code, message);
    this.name = 'StateViolationError';
  }
}

/**
 * Raised by the persistence adapter when another writer committed first.
 */
export class ConcurrencyConflictError extends EngineError {
  constructor(message: string) {
    super('ConcurrencyConflict', 'revision_conflict', message);
    this.name = 'ConcurrencyConflictError';
  }
}

export function isEngineError(error: unknown): error is EngineError {
  return error instanceof EngineError;
}
