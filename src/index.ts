/**
 * Provisioner
 *
 * Declarative, idempotent provisioning of a machine from a JSON profile:
 * an ordered list of command, git and download units, each installed
 * only when its presence check fails and retried with back-off when it
 * does not succeed at once.
 *
 * Boundary Statement:
 * - Which tools get installed is profile data, never engine logic
 * - Package manager output is never parsed beyond a substring match
 * - No GPU or driver configuration
 * - Secrets come from the environment only and never reach logs
 */

// Contracts
export {
  ProfileSchema,
  UnitConfigSchema,
  CommandUnitSchema,
  GitUnitSchema,
  DownloadUnitSchema,
  FileSpecSchema,
  CredentialRuleSchema,
  PresenceCheckSchema,
  StepSchema,
  RetryPolicyInputSchema,
  TransferBackendSchema,
  RunOutcomeSchema,
  RunReportSummarySchema,
} from './contracts/index.js';

export type {
  Profile,
  ProfileInput,
  UnitConfig,
  CommandUnitConfig,
  GitUnitConfig,
  DownloadUnitConfig,
  UnitKind,
  FileSpec,
  Step,
  PresenceCheck,
  CredentialRule,
  DownloadVariants,
  TextRewrite,
  TransferBackend,
  RunOutcome,
  OutcomeStatus,
  OutcomeKind,
  RunReportSummary,
} from './contracts/index.js';

// Configuration
export { loadConfig, parseFlag, resolvePath, DEFAULT_CONCURRENCY, DEFAULT_SEGMENTS } from './config/index.js';
export type { ProvisionConfig, ConfigOverrides, Env } from './config/index.js';

// Profiles
export {
  getProfile,
  listProfiles,
  loadProfileFile,
  parseProfile,
  validateProfile,
  serializeProfile,
} from './profiles/index.js';

// Idempotency gate
export { shouldInstall, checkPresence, extractVersion, compareVersions } from './gate/index.js';

// Credentials
export {
  createCredentialResolver,
  hasValidToken,
  selectVariant,
  bearerHeader,
  hostMatches,
  DEFAULT_CREDENTIAL_RULES,
} from './credentials/index.js';
export type { CredentialResolver, ResolvedCredential, VariantChoice } from './credentials/index.js';

// Transfers & downloads
export { createTransfer, createHttpTransfer, createAria2Transfer, planSegments, partPathFor } from './transfer/index.js';
export type { Transfer, TransferRequest, TransferStats } from './transfer/index.js';
export { fetchAll, deriveFilename, mapWithConcurrency } from './downloads/index.js';

// Units, report & runner
export { buildRegistry, buildUnit } from './units/index.js';
export type { Unit, InstallUnit, DownloadUnit, DownloadSpec, UnitContext } from './units/index.js';
export { createRunReport, formatOutcome } from './report/index.js';
export type { RunReport } from './report/index.js';
export { runProvisioning, planProvisioning, selectUnits } from './provision/index.js';
export type { ProvisionOptions, ProvisionPlan, PlanEntry } from './provision/index.js';
export { createCommandRunner, commandExists } from './process/index.js';
export type { CommandRunner, CommandSpec, CommandResult } from './process/index.js';

// Runner infrastructure
export {
  createLogger,
  createArtifactWriter,
  withRetry,
  resolvePolicy,
  redact,
  redactUrl,
  wrapError,
  ProvisionError,
  ActionFailure,
  TransferFailure,
  ConfigError,
  DEFAULT_RETRY_POLICY,
} from './runner/index.js';
export type { RetryPolicy, RetryResult, RetryPrompt, StructuredLogger } from './runner/index.js';
