export type ErrorKind = 'validation_error' | 'generation_error' | 'internal_error';

export abstract class DomainError extends Error {
  abstract readonly kind: ErrorKind;

  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/** Malformed or out-of-range input. Reported to the caller as a 400. */
export class ValidationError extends DomainError {
  readonly kind = 'validation_error' as const;

  constructor(
    message: string,
    readonly details: string[] = [],
  ) {
    super(message);
  }
}

/**
 * The generation adapter failed or is not reachable. Never leaves the draft
 * composer.
 */
export class GenerationError extends DomainError {
  readonly kind = 'generation_error' as const;

  constructor(
    message: string,
    readonly cause?: unknown,
  ) {
    super(message);
  }
}

export class InternalError extends DomainError {
  readonly kind = 'internal_error' as const;
}
