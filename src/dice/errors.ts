/**
 * Dice Engine Errors
 *
 * Every failure the parser, validator, or evaluator can raise is a
 * DiceError with a stable `kind`. Callers turn these into structured,
 * recoverable results; none of them is fatal.
 */

export type DiceErrorKind =
  | 'SyntaxError'
  | 'RerollLimitExceeded'
  | 'DivisionByZero'
  | 'InvalidModifierParameter'
  | 'TooManyRolls';

/**
 * JSON shape of a dice error as returned to tool callers
 */
export type DiceErrorPayload = {
  error: string;
  kind: DiceErrorKind;
  position?: number;
};

// =============================================================================
// Base Dice Error Class
// =============================================================================

export class DiceError extends Error {
  constructor(
    public readonly kind: DiceErrorKind,
    message: string,
    public readonly position?: number
  ) {
    super(position !== undefined ? `${message} at position ${position}` : message);
    this.name = 'DiceError';
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  toJSON(): DiceErrorPayload {
    const result: DiceErrorPayload = {
      error: this.message,
      kind: this.kind,
    };
    if (this.position !== undefined) {
      result.position = this.position;
    }
    return result;
  }
}

// =============================================================================
// Specific Error Classes
// =============================================================================

/**
 * Malformed notation. `token` holds the offending text when there is one.
 */
export class DiceSyntaxError extends DiceError {
  constructor(
    message: string,
    position: number,
    public readonly token?: string
  ) {
    super('SyntaxError', message, position);
    this.name = 'DiceSyntaxError';
  }
}

export class RerollLimitExceededError extends DiceError {
  constructor(message: string, position?: number) {
    super('RerollLimitExceeded', message, position);
    this.name = 'RerollLimitExceededError';
  }
}

export class DivisionByZeroError extends DiceError {
  constructor(position?: number) {
    super('DivisionByZero', 'Division by zero', position);
    this.name = 'DivisionByZeroError';
  }
}

export class InvalidModifierParameterError extends DiceError {
  constructor(message: string, position?: number) {
    super('InvalidModifierParameter', message, position);
    this.name = 'InvalidModifierParameterError';
  }
}

export class TooManyRollsError extends DiceError {
  constructor(message: string, position?: number) {
    super('TooManyRolls', message, position);
    this.name = 'TooManyRollsError';
  }
}

// =============================================================================
// Type Guards
// =============================================================================

export function isDiceError(error: unknown): error is DiceError {
  return error instanceof DiceError;
}

export function isDiceSyntaxError(error: unknown): error is DiceSyntaxError {
  return error instanceof DiceSyntaxError;
}
