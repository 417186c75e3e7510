/**
 * Base class for every expected failure in clearledger.
 *
 * Domain code never throws these: they travel inside neverthrow `Result`s and the
 * caller decides whether to skip the offending record or abort.
 */
export abstract class DomainError extends Error {
  abstract readonly code: string;

  readonly details: Record<string, unknown> | undefined;

  constructor(message: string, details?: Record<string, unknown>) {
    super(message);
    this.name = this.constructor.name;
    this.details = details;
  }

  toJSON() {
    return {
      code: this.code,
      details: this.details,
      message: this.message,
      name: this.name,
    };
  }
}

/**
 * Thrown (not returned) when an internal invariant no longer holds.
 * Reaching one of these means a bug, not bad input.
 */
export class InvariantViolationError extends Error {
  constructor(
    invariant: string,
    public readonly details?: Record<string, unknown>
  ) {
    super(`Invariant violation: ${invariant}`);
    this.name = 'InvariantViolationError';
  }
}
