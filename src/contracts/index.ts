/**
 * Core contracts and Zod schemas for the provisioner.
 *
 * A profile is plain JSON data: the ordered unit list, the credential
 * rules and the preflight requirements for one target environment.
 * Everything the engine does is driven from a validated profile.
 */

import { z } from 'zod';

// ============================================================================
// Primitive Types
// ============================================================================

export const UnitNameSchema = z.string().min(1).regex(/^[a-z0-9][a-z0-9._-]*$/);
export const EnvVarNameSchema = z.string().regex(/^[A-Za-z_][A-Za-z0-9_]*$/);
export const HostSchema = z.string().min(1).regex(/^[a-z0-9.-]+$/i);
export const FileNameSchema = z.string().min(1).regex(/^[^/\\]+$/).refine((name) => name !== '.' && name !== '..', {
  message: 'filename must not be . or ..',
});
export const VersionSchema = z.string().regex(/^\d+(\.\d+)*$/);
export const TransferBackendSchema = z.enum(['http', 'aria2c']);

export type TransferBackend = z.infer<typeof TransferBackendSchema>;

// ============================================================================
// Retry policy (profile form, snake_case)
// ============================================================================

export const RetryPolicyInputSchema = z.object({
  max_attempts: z.number().int().min(1).max(50).optional(),
  initial_delay_ms: z.number().int().min(0).optional(),
  max_delay_ms: z.number().int().min(0).optional(),
  backoff_factor: z.number().min(1).optional(),
  allow_interactive: z.boolean().optional(),
}).strict();

export type RetryPolicyInput = z.infer<typeof RetryPolicyInputSchema>;

// ============================================================================
// Presence checks
// ============================================================================

export const PathCheckSchema = z.object({
  path: z.string().min(1),
  type: z.enum(['file', 'dir', 'any']).default('any'),
}).strict();

export const CommandCheckSchema = z.object({
  command: z.string().min(1),
  args: z.array(z.string()).default([]),
  contains: z.string().min(1).optional(),
  min_version: VersionSchema.optional(),
}).strict();

export const PresenceCheckSchema = z.union([PathCheckSchema, CommandCheckSchema]);

export type PathCheck = z.infer<typeof PathCheckSchema>;
export type CommandCheck = z.infer<typeof CommandCheckSchema>;
export type PresenceCheck = z.infer<typeof PresenceCheckSchema>;

// ============================================================================
// Steps (external collaborator invocations)
// ============================================================================

const StepBaseShape = {
  cwd: z.string().min(1).optional(),
  env: z.record(z.string()).optional(),
};

export const RunStepSchema = z.object({
  run: z.array(z.string()).min(1),
  ...StepBaseShape,
}).strict();

export const ShellStepSchema = z.object({
  shell: z.string().min(1),
  ...StepBaseShape,
}).strict();

export const StepSchema = z.union([RunStepSchema, ShellStepSchema]);

export type RunStep = z.infer<typeof RunStepSchema>;
export type ShellStep = z.infer<typeof ShellStepSchema>;
export type Step = z.infer<typeof StepSchema>;

// ============================================================================
// Downloads
// ============================================================================

export const FileSpecSchema = z.object({
  url: z.string().url(),
  filename: FileNameSchema.optional(),
  executable: z.boolean().default(false),
}).strict();

export type FileSpec = z.infer<typeof FileSpecSchema>;

export const TextRewriteSchema = z.object({
  path: z.string().min(1),
  search: z.string().min(1),
  replace: z.string(),
}).strict();

export type TextRewrite = z.infer<typeof TextRewriteSchema>;

export const DownloadVariantsSchema = z.object({
  token_env: EnvVarNameSchema,
  probe_url: z.string().url(),
  licensed: z.array(FileSpecSchema).min(1),
  fallback: z.array(FileSpecSchema).min(1),
  fallback_rewrites: z.array(TextRewriteSchema).default([]),
}).strict();

export type DownloadVariants = z.infer<typeof DownloadVariantsSchema>;

// ============================================================================
// Units
// ============================================================================

const UnitBaseShape = {
  name: UnitNameSchema,
  description: z.string().optional(),
  retry: RetryPolicyInputSchema.optional(),
};

export const CommandUnitSchema = z.object({
  kind: z.literal('command'),
  ...UnitBaseShape,
  check: PresenceCheckSchema.optional(),
  steps: z.array(StepSchema).min(1),
}).strict();

export const GitUnitSchema = z.object({
  kind: z.literal('git'),
  ...UnitBaseShape,
  repo: z.string().min(1),
  dest: z.string().min(1),
  branch: z.string().min(1).optional(),
  recursive: z.boolean().default(false),
  post_install: z.array(StepSchema).default([]),
}).strict();

export const DownloadUnitSchema = z.object({
  kind: z.literal('download'),
  ...UnitBaseShape,
  destination: z.string().min(1),
  files: z.array(FileSpecSchema).default([]),
  variants: DownloadVariantsSchema.optional(),
  concurrency: z.number().int().min(1).max(64).optional(),
}).strict().refine((unit) => unit.files.length > 0 || unit.variants !== undefined, {
  message: 'download unit needs files or variants',
});

export const UnitConfigSchema = z.union([CommandUnitSchema, GitUnitSchema, DownloadUnitSchema]);

export type CommandUnitConfig = z.infer<typeof CommandUnitSchema>;
export type GitUnitConfig = z.infer<typeof GitUnitSchema>;
export type DownloadUnitConfig = z.infer<typeof DownloadUnitSchema>;
export type UnitConfig = z.infer<typeof UnitConfigSchema>;
export type UnitKind = UnitConfig['kind'];

// ============================================================================
// Credentials
// ============================================================================

export const CredentialRuleSchema = z.object({
  host: HostSchema,
  env: EnvVarNameSchema,
  include_subdomains: z.boolean().default(true),
}).strict();

export type CredentialRule = z.infer<typeof CredentialRuleSchema>;

// ============================================================================
// Profile
// ============================================================================

export const ProfileSchema = z.object({
  profile_id: z.string().min(1).regex(/^[a-z0-9-]+$/),
  name: z.string().min(1),
  description: z.string().optional(),
  workspace: z.string().min(1).optional(),
  skip_marker: z.string().min(1).optional(),
  transfer: TransferBackendSchema.optional(),
  requires: z.array(z.string().min(1)).default([]),
  credentials: z.array(CredentialRuleSchema).default([]),
  units: z.array(UnitConfigSchema).min(1),
  version: z.string().default('1.0.0'),
}).strict().superRefine((profile, ctx) => {
  const seen = new Set<string>();
  profile.units.forEach((unit, index) => {
    if (seen.has(unit.name)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `duplicate unit name: ${unit.name}`,
        path: ['units', index, 'name'],
      });
    }
    seen.add(unit.name);
  });
});

export type Profile = z.infer<typeof ProfileSchema>;
export type ProfileInput = z.input<typeof ProfileSchema>;

// ============================================================================
// Run outcomes
// ============================================================================

export const OutcomeStatusSchema = z.enum(['skipped', 'succeeded', 'failed']);
export const OutcomeKindSchema = z.enum(['command', 'git', 'download', 'requires']);

export const RunOutcomeSchema = z.object({
  name: z.string().min(1),
  unit: z.string().min(1),
  kind: OutcomeKindSchema,
  status: OutcomeStatusSchema,
  attempts: z.number().int().min(0),
  detail: z.string().optional(),
  error: z.string().optional(),
  abandoned_by_operator: z.boolean().optional(),
  duration_ms: z.number().min(0),
});

export type OutcomeStatus = z.infer<typeof OutcomeStatusSchema>;
export type OutcomeKind = z.infer<typeof OutcomeKindSchema>;
export type RunOutcome = z.infer<typeof RunOutcomeSchema>;

export const RunReportSummarySchema = z.object({
  total: z.number().int().min(0),
  skipped: z.number().int().min(0),
  succeeded: z.number().int().min(0),
  failed: z.number().int().min(0),
  failed_units: z.array(z.string()),
  abandoned_units: z.array(z.string()),
  exit_code: z.number().int(),
  outcomes: z.array(RunOutcomeSchema),
});

export type RunReportSummary = z.infer<typeof RunReportSummarySchema>;
