/**
 * Error taxonomy for the prediction engine and the surfaces around it
 */

export type RoomsenseErrorCode =
  | 'LOAD_FAILED'
  | 'NOT_READY'
  | 'COMPUTATION_FAILED'
  | 'INVALID_INPUT';

export class RoomsenseError extends Error {
  public readonly code: RoomsenseErrorCode;

  constructor(code: RoomsenseErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'RoomsenseError';
    this.code = code;
  }
}

/**
 * An artifact could not be read, parsed or reconciled with the others.
 * `artifact` is 'bundle' when each file was fine on its own but they disagree.
 */
export class LoadError extends RoomsenseError {
  public readonly artifact: string;

  constructor(artifact: string, message: string, options?: { cause?: unknown }) {
    super('LOAD_FAILED', message, options);
    this.name = 'LoadError';
    this.artifact = artifact;
  }
}

export class NotReadyError extends RoomsenseError {
  constructor(message: string = 'Model not loaded') {
    super('NOT_READY', message);
    this.name = 'NotReadyError';
  }
}

export class ComputationError extends RoomsenseError {
  public readonly field?: string;

  constructor(message: string, field?: string) {
    super('COMPUTATION_FAILED', message);
    this.name = 'ComputationError';
    this.field = field;
  }
}

/** Raised by the surfaces when an input file cannot be understood at all */
export class InputError extends RoomsenseError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('INVALID_INPUT', message, options);
    this.name = 'InputError';
  }
}

export interface ErrorResponse {
  status: 'unavailable' | 'error';
  code: RoomsenseErrorCode | 'UNKNOWN';
  message: string;
}

/**
 * Translate an error into the response a boundary hands back to its caller.
 * NotReadyError means "service unavailable"; everything else is a generic failure.
 */
export function toErrorResponse(err: unknown): ErrorResponse {
  if (err instanceof NotReadyError) {
    return { status: 'unavailable', code: err.code, message: err.message };
  }
  if (err instanceof RoomsenseError) {
    return { status: 'error', code: err.code, message: err.message };
  }
  if (err instanceof Error) {
    return { status: 'error', code: 'UNKNOWN', message: err.message || 'unknown_error' };
  }
  return { status: 'error', code: 'UNKNOWN', message: String(err) };
}
