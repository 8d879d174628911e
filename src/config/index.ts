/**
 * Run configuration.
 *
 * CLI flags, environment variables and profile defaults are merged once,
 * validated, and passed explicitly to every component.  Nothing below the
 * CLI reads `process.env` directly.
 */

import { homedir } from 'os';
import { isAbsolute, join, resolve } from 'path';
import { z } from 'zod';
import { ConfigError } from '../runner/index.js';
import { TransferBackendSchema } from '../contracts/index.js';
import type { Profile } from '../contracts/index.js';

export type Env = Readonly<Record<string, string | undefined>>;

export { TransferBackendSchema, type TransferBackend } from '../contracts/index.js';

export const ProvisionConfigSchema = z.object({
  workspace: z.string().min(1),
  home: z.string().min(1),
  autoUpdate: z.boolean(),
  concurrency: z.number().int().min(1).max(64),
  segments: z.number().int().min(1).max(32),
  interactive: z.boolean(),
  transfer: TransferBackendSchema,
  only: z.array(z.string()),
  skip: z.array(z.string()),
});

export type ProvisionConfig = z.infer<typeof ProvisionConfigSchema>;

export const DEFAULT_CONCURRENCY = 4;
export const DEFAULT_SEGMENTS = 8;

/** Options as they arrive from the command line (all optional). */
export interface ConfigOverrides {
  workspace?: string;
  autoUpdate?: boolean;
  concurrency?: number | string;
  segments?: number | string;
  interactive?: boolean;
  transfer?: string;
  only?: string[];
  skip?: string[];
}

export interface LoadConfigOptions {
  env: Env;
  /** Whether stdin is attached to a terminal. */
  isTTY: boolean;
  home?: string;
}

/**
 * Parse a boolean-ish environment value.  Unset or empty yields
 * `undefined`; anything other than a recognised false value is true.
 */
export function parseFlag(value: string | undefined): boolean | undefined {
  if (value === undefined || value.trim() === '') return undefined;
  return !['false', '0', 'no', 'off'].includes(value.trim().toLowerCase());
}

function parseCount(value: number | string | undefined, name: string): number | undefined {
  if (value === undefined || value === '') return undefined;
  const n = typeof value === 'number' ? value : Number(value);
  if (!Number.isInteger(n) || n < 1) {
    throw new ConfigError(`${name} must be a positive integer, got "${value}"`);
  }
  return n;
}

/**
 * Expand `~` and resolve relative paths against the workspace root.
 */
export function resolvePath(path: string, roots: { workspace: string; home: string }): string {
  if (path === '~') return roots.home;
  if (path.startsWith('~/')) return join(roots.home, path.slice(2));
  if (isAbsolute(path)) return path;
  return resolve(roots.workspace, path);
}

export function loadConfig(profile: Profile, overrides: ConfigOverrides, opts: LoadConfigOptions): ProvisionConfig {
  const home = opts.home ?? homedir();
  const rawWorkspace = overrides.workspace ?? opts.env.WORKSPACE ?? profile.workspace ?? home;
  const workspace = rawWorkspace === '~' || rawWorkspace.startsWith('~/')
    ? resolvePath(rawWorkspace, { workspace: home, home })
    : resolve(rawWorkspace);

  const candidate = {
    workspace,
    home,
    autoUpdate: overrides.autoUpdate ?? parseFlag(opts.env.AUTO_UPDATE) ?? true,
    concurrency: parseCount(overrides.concurrency, 'concurrency')
      ?? parseCount(opts.env.PROVISION_CONCURRENCY, 'PROVISION_CONCURRENCY')
      ?? DEFAULT_CONCURRENCY,
    segments: parseCount(overrides.segments, 'segments') ?? DEFAULT_SEGMENTS,
    interactive: (overrides.interactive ?? true) && opts.isTTY,
    transfer: overrides.transfer ?? opts.env.PROVISION_TRANSFER ?? profile.transfer ?? 'http',
    only: overrides.only ?? [],
    skip: overrides.skip ?? [],
  };

  const parsed = ProvisionConfigSchema.safeParse(candidate);
  if (!parsed.success) {
    throw new ConfigError(parsed.error.errors.map((e) => `${e.path.join('.')}: ${e.message}`).join('; '));
  }

  const known = new Set(profile.units.map((u) => u.name));
  const unknown = [...parsed.data.only, ...parsed.data.skip].filter((name) => !known.has(name));
  if (unknown.length > 0) {
    throw new ConfigError(`Unknown unit(s) for profile ${profile.profile_id}: ${unknown.join(', ')}`);
  }

  return parsed.data;
}
