/**
 * Shared error envelope and error taxonomy for provisioning runs.
 *
 * Unit failures never escape the unit boundary as exceptions; they are
 * captured, converted into an envelope and recorded in the run report.
 * Only configuration and internal errors reach the CLI as an exit.
 */

import { redactString } from './redact.js';

// ---- Exit codes ------------------------------------------------------
export const EXIT_SUCCESS = 0;
export const EXIT_UNITS_FAILED = 1;
export const EXIT_VALIDATION = 2;
export const EXIT_DEPENDENCY = 3;
export const EXIT_BUG = 4;

// ---- Error envelope --------------------------------------------------

export interface RunnerErrorEnvelope {
  code: ErrorCode;
  message: string;
  userMessage: string;
  retryable: boolean;
  cause?: string;
  context?: Record<string, unknown>;
}

export type ErrorCode =
  | 'VALIDATION_ERROR'
  | 'NOT_FOUND'
  | 'IO_ERROR'
  | 'ACTION_FAILED'
  | 'TRANSFER_FAILED'
  | 'INTERNAL_ERROR';

const CODE_TO_EXIT: Record<ErrorCode, number> = {
  VALIDATION_ERROR: EXIT_VALIDATION,
  NOT_FOUND: EXIT_VALIDATION,
  IO_ERROR: EXIT_DEPENDENCY,
  ACTION_FAILED: EXIT_UNITS_FAILED,
  TRANSFER_FAILED: EXIT_UNITS_FAILED,
  INTERNAL_ERROR: EXIT_BUG,
};

const NON_RETRYABLE = new Set<ErrorCode>([
  'VALIDATION_ERROR',
  'NOT_FOUND',
]);

// ---- Error classes ---------------------------------------------------

/**
 * Base class for failures raised by provisioning code.  The code maps
 * onto the envelope taxonomy above.
 */
export class ProvisionError extends Error {
  readonly code: ErrorCode;
  readonly context?: Record<string, unknown>;

  constructor(code: ErrorCode, message: string, opts: { cause?: unknown; context?: Record<string, unknown> } = {}) {
    super(message, opts.cause !== undefined ? { cause: opts.cause } : undefined);
    this.name = 'ProvisionError';
    this.code = code;
    this.context = opts.context;
  }
}

/** A unit's install or update step exited non-zero or threw. */
export class ActionFailure extends ProvisionError {
  constructor(message: string, opts: { cause?: unknown; context?: Record<string, unknown> } = {}) {
    super('ACTION_FAILED', message, opts);
    this.name = 'ActionFailure';
  }
}

/** A download did not complete (HTTP status, short body, transfer tool exit). */
export class TransferFailure extends ProvisionError {
  readonly status?: number;

  constructor(message: string, opts: { status?: number; cause?: unknown; context?: Record<string, unknown> } = {}) {
    super('TRANSFER_FAILED', message, opts);
    this.name = 'TransferFailure';
    this.status = opts.status;
  }
}

/** Profile or CLI configuration is invalid. */
export class ConfigError extends ProvisionError {
  constructor(message: string, opts: { cause?: unknown; context?: Record<string, unknown> } = {}) {
    super('VALIDATION_ERROR', message, opts);
    this.name = 'ConfigError';
  }
}

export function exitCodeFor(code: ErrorCode): number {
  return CODE_TO_EXIT[code] ?? EXIT_BUG;
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export function createErrorEnvelope(
  code: ErrorCode,
  message: string,
  opts: { cause?: unknown; context?: Record<string, unknown> } = {},
): RunnerErrorEnvelope {
  const causeMsg = opts.cause instanceof Error
    ? opts.cause.message
    : opts.cause != null
      ? String(opts.cause)
      : undefined;

  return {
    code,
    message,
    userMessage: redactString(message),
    retryable: !NON_RETRYABLE.has(code),
    cause: causeMsg ? redactString(causeMsg) : undefined,
    context: opts.context,
  };
}

/**
 * Wrap an unknown thrown value into a RunnerErrorEnvelope.  Provision
 * errors keep their code; anything else is an internal error.
 */
export function wrapError(err: unknown): RunnerErrorEnvelope {
  if (err instanceof ProvisionError) {
    return createErrorEnvelope(err.code, err.message, { cause: err.cause, context: err.context });
  }
  if (err instanceof Error) {
    return createErrorEnvelope('INTERNAL_ERROR', err.message, { cause: err });
  }
  return createErrorEnvelope('INTERNAL_ERROR', String(err));
}
