/**
 * Error taxonomy for the evaluation pipeline and the Result type that carries it
 */

export type ValidationField =
  | 'submission.type'
  | 'responses.type'
  | 'responses.length'
  | 'age.type'
  | 'age.range'
  | 'sex.enum'
  | 'consent.type'
  | 'consent.required'
  | 'limit.range'
  | 'offset.range';

export type PipelineErrorKind =
  | 'ValidationError'
  | 'ModelUnavailable'
  | 'ModelIncompatible'
  | 'PersistenceError'
  | 'NotFound';

export abstract class PipelineError extends Error {
  abstract readonly kind: PipelineErrorKind;
}

/**
 * Caller-supplied data violates an invariant; resubmitting corrected data recovers
 */
export class ValidationError extends PipelineError {
  readonly kind = 'ValidationError' as const;

  constructor(public readonly field: ValidationField, message: string) {
    super(message);
    this.name = 'ValidationError';
  }
}

/**
 * The classifier artifact is missing, unreadable or malformed
 */
export class ModelUnavailableError extends PipelineError {
  readonly kind = 'ModelUnavailable' as const;

  constructor(message: string, public readonly modelPath?: string) {
    super(message);
    this.name = 'ModelUnavailableError';
  }
}

/**
 * The feature vector width does not match what the loaded artifact expects
 */
export class ModelIncompatibleError extends PipelineError {
  readonly kind = 'ModelIncompatible' as const;

  constructor(public readonly expected: number, public readonly received: number) {
    super(`Model expects ${expected} features, received ${received}`);
    this.name = 'ModelIncompatibleError';
  }
}

export class PersistenceError extends PipelineError {
  readonly kind = 'PersistenceError' as const;

  constructor(message: string, cause?: unknown) {
    super(message, { cause });
    this.name = 'PersistenceError';
  }
}

export class NotFoundError extends PipelineError {
  readonly kind = 'NotFound' as const;

  constructor(public readonly id: number) {
    super(`Evaluation with ID ${id} not found`);
    this.name = 'NotFoundError';
  }
}

export interface Ok<T> {
  readonly ok: true;
  readonly value: T;
}

export interface Err<E> {
  readonly ok: false;
  readonly error: E;
}

export type Result<T, E = PipelineError> = Ok<T> | Err<E>;

export function ok<T>(value: T): Ok<T> {
  return { ok: true, value };
}

export function err<E>(error: E): Err<E> {
  return { ok: false, error };
}

export type PipelineFailure =
  | ValidationError
  | ModelUnavailableError
  | ModelIncompatibleError
  | PersistenceError
  | NotFoundError;
