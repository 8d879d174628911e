/**
 * Unit registry.
 *
 * Turns the units of a validated profile into runnable units.  The
 * registry is built once per run and never mutated; the engine only
 * sees the `Unit` interfaces, so which tools get installed is entirely
 * a matter of profile data.
 */

import { readFile, stat, writeFile } from 'fs/promises';
import { resolvePath } from '../config/index.js';
import type { ProvisionConfig } from '../config/index.js';
import type {
  CommandUnitConfig,
  DownloadUnitConfig,
  GitUnitConfig,
  Profile,
  RetryPolicyInput,
  Step,
  TextRewrite,
  UnitConfig,
} from '../contracts/index.js';
import { checkPresence } from '../gate/index.js';
import { selectVariant } from '../credentials/index.js';
import { ActionFailure, ConfigError, errorMessage, resolvePolicy } from '../runner/index.js';
import type { RetryPolicy } from '../runner/index.js';
import type { DownloadSpec, DownloadUnit, InstallUnit, Unit, UnitContext } from './types.js';

export type { DownloadSpec, DownloadUnit, InstallUnit, Unit, UnitContext } from './types.js';

export function policyFrom(input: RetryPolicyInput | undefined): RetryPolicy {
  return resolvePolicy({
    ...(input?.max_attempts !== undefined && { maxAttempts: input.max_attempts }),
    ...(input?.initial_delay_ms !== undefined && { initialDelayMs: input.initial_delay_ms }),
    ...(input?.max_delay_ms !== undefined && { maxDelayMs: input.max_delay_ms }),
    ...(input?.backoff_factor !== undefined && { backoffFactor: input.backoff_factor }),
    ...(input?.allow_interactive !== undefined && { allowInteractive: input.allow_interactive }),
  });
}

function describeStep(step: Step): string {
  return 'run' in step ? step.run.join(' ') : step.shell;
}

/**
 * Run one step and fail on a non-zero exit.  Relative `cwd` values
 * resolve under the workspace; `defaultCwd` applies when the step has none.
 */
export async function runStep(step: Step, ctx: UnitContext, defaultCwd?: string): Promise<void> {
  const cwd = step.cwd !== undefined ? resolvePath(step.cwd, ctx.config) : defaultCwd;
  const label = describeStep(step);
  ctx.logger.debug('unit.step', `Running: ${label}`, { cwd });

  let exitCode: number;
  try {
    const result = 'run' in step
      ? await ctx.exec({ command: step.run[0] ?? '', args: step.run.slice(1), cwd, env: step.env })
      : await ctx.exec({ command: step.shell, args: [], shell: true, cwd, env: step.env });
    exitCode = result.exitCode;
  } catch (err) {
    throw new ActionFailure(`Could not start "${label}": ${errorMessage(err)}`, { cause: err });
  }

  if (exitCode !== 0) {
    throw new ActionFailure(`"${label}" exited with code ${exitCode}`, { context: { exit_code: exitCode } });
  }
}

async function runSteps(steps: readonly Step[], ctx: UnitContext, defaultCwd?: string): Promise<void> {
  for (const step of steps) {
    await runStep(step, ctx, defaultCwd);
  }
}

function commandUnit(cfg: CommandUnitConfig): InstallUnit {
  return {
    kind: 'command',
    name: cfg.name,
    description: cfg.description ?? cfg.name,
    retry: policyFrom(cfg.retry),

    async isPresent(ctx) {
      if (!cfg.check) return false;
      return checkPresence(cfg.check, { workspace: ctx.config.workspace, home: ctx.config.home, exec: ctx.exec });
    },

    async install(ctx) {
      await runSteps(cfg.steps, ctx, ctx.config.workspace);
    },
  };
}

function gitUnit(cfg: GitUnitConfig, config: ProvisionConfig): InstallUnit {
  const dest = resolvePath(cfg.dest, config);

  return {
    kind: 'git',
    name: cfg.name,
    description: cfg.description ?? `${cfg.repo} -> ${cfg.dest}`,
    retry: policyFrom(cfg.retry),

    async isPresent() {
      const info = await stat(dest).catch(() => null);
      return info?.isDirectory() ?? false;
    },

    async install(ctx) {
      const args = ['clone'];
      if (cfg.recursive) args.push('--recursive');
      if (cfg.branch) args.push('--branch', cfg.branch);
      args.push(cfg.repo, dest);
      await runStep({ run: ['git', ...args] }, ctx);
      await runSteps(cfg.post_install, ctx, dest);
    },

    async update(ctx) {
      const pull = cfg.recursive ? ['git', 'pull', '--recurse-submodules'] : ['git', 'pull'];
      await runStep({ run: pull }, ctx, dest);
      await runSteps(cfg.post_install, ctx, dest);
    },
  };
}

/**
 * Apply literal search/replace rewrites.  A missing file is logged and
 * left alone; the selected file set still downloads.
 */
export async function applyRewrites(rewrites: readonly TextRewrite[], ctx: UnitContext): Promise<void> {
  for (const rewrite of rewrites) {
    const path = resolvePath(rewrite.path, ctx.config);
    let text: string;
    try {
      text = await readFile(path, 'utf-8');
    } catch (err) {
      ctx.logger.warn('unit.rewrite', `Cannot rewrite ${path}: ${errorMessage(err)}`);
      continue;
    }
    const next = text.split(rewrite.search).join(rewrite.replace);
    if (next !== text) {
      await writeFile(path, next, 'utf-8');
      ctx.logger.info('unit.rewrite', `Rewrote ${rewrite.search} -> ${rewrite.replace} in ${path}`);
    }
  }
}

function toSpec(file: DownloadUnitConfig['files'][number]): DownloadSpec {
  return {
    url: file.url,
    ...(file.filename !== undefined && { filename: file.filename }),
    ...(file.executable && { executable: true }),
  };
}

function downloadUnit(cfg: DownloadUnitConfig, config: ProvisionConfig): DownloadUnit {
  return {
    kind: 'download',
    name: cfg.name,
    description: cfg.description ?? `files -> ${cfg.destination}`,
    retry: policyFrom(cfg.retry),
    destination: resolvePath(cfg.destination, config),
    ...(cfg.concurrency !== undefined && { concurrency: cfg.concurrency }),

    async resolveSpecs(ctx) {
      const specs = cfg.files.map(toSpec);
      const variants = cfg.variants;
      if (!variants) return specs;

      const choice = await selectVariant(variants.token_env, ctx.env, { endpoint: variants.probe_url, fetch: ctx.fetch });
      ctx.logger.info('unit.variant', `${cfg.name}: using the ${choice} file set`, {
        unit: cfg.name,
        variant: choice,
        probe_env: variants.token_env,
      });

      if (choice === 'licensed') {
        return [...specs, ...variants.licensed.map(toSpec)];
      }
      await applyRewrites(variants.fallback_rewrites, ctx);
      return [...specs, ...variants.fallback.map(toSpec)];
    },
  };
}

export function buildUnit(cfg: UnitConfig, config: ProvisionConfig): Unit {
  switch (cfg.kind) {
    case 'command':
      return commandUnit(cfg);
    case 'git':
      return gitUnit(cfg, config);
    case 'download':
      return downloadUnit(cfg, config);
  }
}

/**
 * Build the ordered registry for a profile.  Names must be unique within
 * a run.
 */
export function buildRegistry(profile: Profile, config: ProvisionConfig): Unit[] {
  const seen = new Set<string>();
  return profile.units.map((cfg) => {
    if (seen.has(cfg.name)) {
      throw new ConfigError(`Duplicate unit name in profile ${profile.profile_id}: ${cfg.name}`);
    }
    seen.add(cfg.name);
    return buildUnit(cfg, config);
  });
}
