export const LOCI_ERROR_CODES = [
  'NOT_FOUND',
  'ALREADY_EXISTS',
  'VALIDATION',
  'NO_DATA',
  'COMPUTATION',
  'TIMEOUT',
  'EMBEDDING',
] as const;

export type LociErrorCode = (typeof LOCI_ERROR_CODES)[number];

export class LociError extends Error {
  readonly code: LociErrorCode;

  constructor(code: LociErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

// Unknown collection on a mutating or existence-checked call
export class NotFoundError extends LociError {
  constructor(message: string) {
    super('NOT_FOUND', message);
  }
}

export class AlreadyExistsError extends LociError {
  constructor(message: string) {
    super('ALREADY_EXISTS', message);
  }
}

export class ValidationError extends LociError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('VALIDATION', message, options);
  }
}

// Clustering was asked to run on a collection with zero records
export class NoDataError extends LociError {
  constructor(message: string) {
    super('NO_DATA', message);
  }
}

export class ComputationError extends LociError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('COMPUTATION', message, options);
  }
}

export class TimeoutError extends LociError {
  readonly timeoutMs: number;

  constructor(label: string, timeoutMs: number) {
    super('TIMEOUT', `${label} timed out after ${timeoutMs}ms`);
    this.timeoutMs = timeoutMs;
  }
}

// The embedding provider failed or answered with something unusable
export class EmbeddingError extends LociError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('EMBEDDING', message, options);
  }
}

export function isLociError(error: unknown): error is LociError {
  return error instanceof LociError;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
