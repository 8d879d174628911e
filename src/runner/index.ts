/**
 * Runner infrastructure, shared across all CLI commands.
 *
 * Re-exports the standard building blocks every command needs:
 * structured logging, artifact layout, error envelopes, redaction
 * and the retry executor.
 */

// Artifacts
export {
  createArtifactWriter,
  generateRunId,
  pruneRuns,
  DEFAULT_KEEP_RUNS,
  type ArtifactWriter,
  type ArtifactSummary,
  type FinalizeOptions,
} from './artifacts.js';

// Logger
export {
  createLogger,
  formatTextLine,
  type StructuredLogger,
  type LoggerOptions,
  type LogEntry,
  type LogLevel,
  type LogEcho,
} from './logger.js';

// Errors
export {
  createErrorEnvelope,
  wrapError,
  exitCodeFor,
  errorMessage,
  ProvisionError,
  ActionFailure,
  TransferFailure,
  ConfigError,
  EXIT_SUCCESS,
  EXIT_UNITS_FAILED,
  EXIT_VALIDATION,
  EXIT_DEPENDENCY,
  EXIT_BUG,
  type RunnerErrorEnvelope,
  type ErrorCode,
} from './errors.js';

// Redaction
export {
  redact,
  redactString,
  redactUrl,
  REDACT_DENYLIST_KEYS,
} from './redact.js';

// Retry
export {
  withRetry,
  resolvePolicy,
  sleep,
  DEFAULT_RETRY_POLICY,
  type RetryPolicy,
  type RetryResult,
  type RetryPrompt,
  type RetryOptions,
} from './retry.js';
