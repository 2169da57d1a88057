import type { JobErrorKind } from './index.js';

export class OrchestratorError extends Error {
  readonly kind: JobErrorKind;

  constructor(kind: JobErrorKind, message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = this.constructor.name;
    this.kind = kind;
  }
}

/** Caller error; surfaced to the submitter and never retried. */
export class InvalidRequestError extends OrchestratorError {
  readonly code: string;

  constructor(message: string, code = 'invalid_request', options?: ErrorOptions) {
    super('invalid_request', message, options);
    this.code = code;
  }
}

export class NotFoundError extends OrchestratorError {
  readonly jobId: string;

  constructor(jobId: string, options?: ErrorOptions) {
    super('not_found', `Job not found: ${jobId}`, options);
    this.jobId = jobId;
  }
}

/** Network timeout, rate limit, upstream 5xx. Retried inside a stage. */
export class TransientError extends OrchestratorError {
  readonly status?: number;

  constructor(message: string, options?: ErrorOptions & { status?: number }) {
    super('transient', message, options);
    this.status = options?.status;
  }
}

/** Authorization failure, malformed upstream response. Aborts the job. */
export class PermanentError extends OrchestratorError {
  readonly status?: number;

  constructor(message: string, options?: ErrorOptions & { status?: number }) {
    super('permanent', message, options);
    this.status = options?.status;
  }
}

export class CancelledError extends OrchestratorError {
  constructor(message = 'Job cancelled', options?: ErrorOptions) {
    super('cancelled', message, options);
  }
}

export class ConfigurationError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = this.constructor.name;
  }
}

export function isOrchestratorError(error: unknown): error is OrchestratorError {
  return error instanceof OrchestratorError;
}
