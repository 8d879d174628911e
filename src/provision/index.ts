/**
 * Provision runner.
 *
 * Walks the registry in order.  Install units go through the gate and
 * then the retry executor; download units fan out to one outcome per
 * file.  Every unit gets its turn no matter how earlier units ended.
 */

import { mkdir, stat } from 'fs/promises';
import { join } from 'path';
import { resolvePath } from '../config/index.js';
import type { Env, ProvisionConfig } from '../config/index.js';
import type { FileSpec, OutcomeKind, Profile, RunOutcome } from '../contracts/index.js';
import { createCredentialResolver, DEFAULT_CREDENTIAL_RULES } from '../credentials/index.js';
import type { CredentialResolver } from '../credentials/index.js';
import { deriveFilename, fetchAll } from '../downloads/index.js';
import { shouldInstall } from '../gate/index.js';
import { commandExists } from '../process/index.js';
import type { CommandRunner } from '../process/index.js';
import { createRunReport } from '../report/index.js';
import type { RunReport } from '../report/index.js';
import { ProvisionError, errorMessage, withRetry } from '../runner/index.js';
import type { RetryPrompt, StructuredLogger } from '../runner/index.js';
import type { Fetch, Transfer } from '../transfer/index.js';
import { buildRegistry } from '../units/index.js';
import type { DownloadUnit, InstallUnit, Unit, UnitContext } from '../units/index.js';

export interface ProvisionOptions {
  profile: Profile;
  config: ProvisionConfig;
  env: Env;
  exec: CommandRunner;
  fetch: Fetch;
  transfer: Transfer;
  logger: StructuredLogger;
  /** Operator prompt; only consulted when `config.interactive` is set. */
  prompt?: RetryPrompt;
  sleep?: (ms: number) => Promise<void>;
  /** Pre-built registry; defaults to the one built from `profile`. */
  units?: Unit[];
}

/** Apply the `only` / `skip` name lists, keeping registry order. */
export function selectUnits<T extends { name: string }>(units: readonly T[], config: Pick<ProvisionConfig, 'only' | 'skip'>): T[] {
  return units.filter((unit) =>
    (config.only.length === 0 || config.only.includes(unit.name)) && !config.skip.includes(unit.name),
  );
}

export async function skipMarkerPresent(profile: Profile, config: ProvisionConfig): Promise<string | null> {
  if (!profile.skip_marker) return null;
  const marker = resolvePath(profile.skip_marker, config);
  return (await stat(marker).then(() => true, () => false)) ? marker : null;
}

/**
 * Each missing required command becomes a failed `requires:<cmd>`
 * outcome.  The run continues so independent units still get a turn.
 */
export async function checkRequirements(commands: readonly string[], env: Env, logger: StructuredLogger): Promise<RunOutcome[]> {
  const outcomes: RunOutcome[] = [];
  for (const command of commands) {
    if (await commandExists(command, env)) continue;
    logger.error('provision.requires', `Required command not found: ${command}`, { command });
    outcomes.push({
      name: `requires:${command}`,
      unit: `requires:${command}`,
      kind: 'requires',
      status: 'failed',
      attempts: 0,
      error: `${command} is not on PATH`,
      duration_ms: 0,
    });
  }
  return outcomes;
}

interface RunDeps {
  ctx: UnitContext;
  transfer: Transfer;
  credentials: CredentialResolver;
  prompt?: RetryPrompt;
  sleep?: (ms: number) => Promise<void>;
}

async function runInstallUnit(unit: InstallUnit, deps: RunDeps): Promise<RunOutcome> {
  const { ctx } = deps;
  const started = Date.now();
  const base = { name: unit.name, unit: unit.name, kind: unit.kind };
  const retryOpts = { logger: ctx.logger, prompt: deps.prompt, sleep: deps.sleep };

  if (!(await shouldInstall(unit, ctx))) {
    if (!unit.update || !ctx.config.autoUpdate) {
      ctx.logger.info('unit.skip', `${unit.name} already present, skipping.`, { unit: unit.name });
      return { ...base, status: 'skipped', attempts: 0, detail: 'already present', duration_ms: Date.now() - started };
    }

    const updated = await withRetry(() => unit.update?.(ctx), unit.retry, { ...retryOpts, description: `update ${unit.name}` });
    return updated.success
      ? { ...base, status: 'succeeded', attempts: updated.attempts, detail: 'updated', duration_ms: Date.now() - started }
      : {
          ...base,
          status: 'failed',
          attempts: updated.attempts,
          error: errorMessage(updated.lastError),
          ...(updated.abandonedByOperator && { abandoned_by_operator: true }),
          duration_ms: Date.now() - started,
        };
  }

  const result = await withRetry(() => unit.install(ctx), unit.retry, { ...retryOpts, description: `install ${unit.name}` });
  if (result.success) {
    return { ...base, status: 'succeeded', attempts: result.attempts, detail: 'installed', duration_ms: Date.now() - started };
  }
  return {
    ...base,
    status: 'failed',
    attempts: result.attempts,
    error: errorMessage(result.lastError),
    ...(result.abandonedByOperator && { abandoned_by_operator: true }),
    duration_ms: Date.now() - started,
  };
}

async function runDownloadUnit(unit: DownloadUnit, deps: RunDeps): Promise<RunOutcome[]> {
  const { ctx } = deps;
  const specs = await unit.resolveSpecs(ctx);
  return fetchAll(unit.destination, specs, {
    transfer: deps.transfer,
    credentials: deps.credentials,
    logger: ctx.logger,
    retry: unit.retry,
    concurrency: unit.concurrency ?? ctx.config.concurrency,
    unit: unit.name,
    prompt: deps.prompt,
    sleep: deps.sleep,
  });
}

export async function runProvisioning(opts: ProvisionOptions): Promise<RunReport> {
  const { profile, config, logger } = opts;
  const report = createRunReport();

  const marker = await skipMarkerPresent(profile, config);
  if (marker) {
    logger.info('provision.skip_marker', `${marker} exists, skipping provisioning`, { marker });
    return report;
  }

  try {
    await mkdir(config.workspace, { recursive: true });
  } catch (err) {
    throw new ProvisionError('IO_ERROR', `Cannot create workspace ${config.workspace}: ${errorMessage(err)}`, { cause: err });
  }

  logger.info('provision.start', `Provisioning ${profile.name} into ${config.workspace}`, {
    profile: profile.profile_id,
    workspace: config.workspace,
    transfer: opts.transfer.name,
    concurrency: config.concurrency,
    interactive: config.interactive,
  });

  for (const outcome of await checkRequirements(profile.requires, opts.env, logger)) {
    report.record(outcome);
  }

  const registry = opts.units ?? buildRegistry(profile, config);
  const selected = selectUnits(registry, config);
  if (selected.length < registry.length) {
    logger.debug('provision.filter', `Running ${selected.length} of ${registry.length} units`, {
      units: selected.map((u) => u.name),
    });
  }

  const deps: RunDeps = {
    ctx: { config, env: opts.env, exec: opts.exec, fetch: opts.fetch, logger },
    transfer: opts.transfer,
    credentials: createCredentialResolver(
      profile.credentials.length > 0 ? profile.credentials : DEFAULT_CREDENTIAL_RULES,
      opts.env,
    ),
    prompt: config.interactive ? opts.prompt : undefined,
    sleep: opts.sleep,
  };

  for (const unit of selected) {
    const started = Date.now();
    logger.info('unit.start', `${unit.name}: ${unit.description}`, { unit: unit.name, kind: unit.kind });
    try {
      if (unit.kind === 'download') {
        for (const outcome of await runDownloadUnit(unit, deps)) report.record(outcome);
      } else {
        report.record(await runInstallUnit(unit, deps));
      }
    } catch (err) {
      logger.error('unit.error', `${unit.name} failed: ${errorMessage(err)}`, { unit: unit.name });
      report.record({
        name: unit.name,
        unit: unit.name,
        kind: unit.kind,
        status: 'failed',
        attempts: 0,
        error: errorMessage(err),
        duration_ms: Date.now() - started,
      });
    }
  }

  const summary = report.summary();
  const counts = { total: summary.total, succeeded: summary.succeeded, skipped: summary.skipped, failed: summary.failed };
  if (summary.failed_units.length > 0) {
    logger.error('provision.summary', `Failed units: ${summary.failed_units.join(', ')}`, {
      ...counts,
      failed_units: summary.failed_units,
      abandoned_units: summary.abandoned_units,
    });
  } else {
    logger.info('provision.summary', `Provisioning complete: ${summary.succeeded} succeeded, ${summary.skipped} skipped`, counts);
  }

  return report;
}

export type PlanAction = 'install' | 'update' | 'skip' | 'download' | 'missing';

export interface PlanEntry {
  unit: string;
  kind: OutcomeKind;
  action: PlanAction;
  target?: string;
  detail?: string;
}

export interface ProvisionPlan {
  /** Set when the skip marker exists; `entries` is then empty. */
  skipMarker: string | null;
  entries: PlanEntry[];
}

export type PlanOptions = Pick<ProvisionOptions, 'profile' | 'config' | 'env' | 'exec' | 'fetch' | 'logger'>;

async function planFiles(unit: string, destination: string, files: readonly FileSpec[], detail?: string): Promise<PlanEntry[]> {
  const entries: PlanEntry[] = [];
  for (const file of files) {
    const target = join(destination, deriveFilename(file));
    const present = await stat(target).then(() => true, () => false);
    entries.push({
      unit,
      kind: 'download',
      action: present ? 'skip' : 'download',
      target,
      ...(detail !== undefined && { detail }),
    });
  }
  return entries;
}

/**
 * Evaluate presence checks and file targets without running anything
 * that changes the machine.  Variant file sets are listed side by side
 * since the token probe decides between them only at run time.
 */
export async function planProvisioning(opts: PlanOptions): Promise<ProvisionPlan> {
  const { profile, config, logger } = opts;

  const marker = await skipMarkerPresent(profile, config);
  if (marker) {
    logger.info('plan.skip_marker', `${marker} exists, a run would do nothing`, { marker });
    return { skipMarker: marker, entries: [] };
  }

  const entries: PlanEntry[] = [];
  for (const missing of await checkRequirements(profile.requires, opts.env, logger)) {
    entries.push({ unit: missing.unit, kind: 'requires', action: 'missing', detail: missing.error });
  }

  const ctx: UnitContext = { config, env: opts.env, exec: opts.exec, fetch: opts.fetch, logger };
  const configs = new Map(profile.units.map((cfg) => [cfg.name, cfg]));

  for (const unit of selectUnits(buildRegistry(profile, config), config)) {
    const cfg = configs.get(unit.name);
    if (unit.kind === 'download') {
      if (cfg?.kind !== 'download') continue;
      entries.push(...await planFiles(unit.name, unit.destination, cfg.files));
      if (cfg.variants) {
        entries.push(...await planFiles(unit.name, unit.destination, cfg.variants.licensed, `licensed, needs ${cfg.variants.token_env}`));
        entries.push(...await planFiles(unit.name, unit.destination, cfg.variants.fallback, 'fallback'));
      }
      continue;
    }

    const install = await shouldInstall(unit, ctx);
    const action: PlanAction = install ? 'install' : unit.update && config.autoUpdate ? 'update' : 'skip';
    entries.push({ unit: unit.name, kind: unit.kind, action, ...(cfg?.description && { detail: cfg.description }) });
  }

  logger.info('plan.done', `Planned ${entries.length} action(s)`, {
    install: entries.filter((e) => e.action === 'install').length,
    download: entries.filter((e) => e.action === 'download').length,
  });
  return { skipMarker: null, entries };
}
