/**
 * Base error class for Signoff module contract violations.
 *
 * Validation failures are results, not errors: only a caller breaking the
 * input contract ends up here.
 */
export class SignoffError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'SignoffError';
    Object.setPrototypeOf(this, SignoffError.prototype);
  }
}

/**
 * Thrown when the commit list does not fit the validation mode
 * (an empty pull request, or a hook invocation with other than one message).
 */
export class InvalidInputError extends SignoffError {
  public readonly mode: string;
  public readonly commitCount: number;

  constructor(message: string, mode: string, commitCount: number) {
    super(message);
    this.name = 'InvalidInputError';
    this.mode = mode;
    this.commitCount = commitCount;
    Object.setPrototypeOf(this, InvalidInputError.prototype);
  }
}
