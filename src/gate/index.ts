/**
 * Idempotency gate.
 *
 * Decides, per unit, whether its install action needs to run.  Presence
 * checks are side-effect free; a check that cannot be evaluated (missing
 * command, permission error) counts as "not present" and never fails
 * the run.
 */

import { stat } from 'fs/promises';
import { resolvePath } from '../config/index.js';
import { errorMessage } from '../runner/index.js';
import type { PresenceCheck } from '../contracts/index.js';
import type { CommandRunner } from '../process/index.js';
import type { InstallUnit, UnitContext } from '../units/types.js';

const CHECK_TIMEOUT_MS = 15_000;

export interface CheckContext {
  workspace: string;
  home: string;
  exec: CommandRunner;
}

/**
 * Extract the first dotted version number from command output
 * (`v22.3.0`, `Python 3.11.6`, `git version 2.43.0`).
 */
export function extractVersion(output: string): number[] | null {
  const match = /(\d+(?:\.\d+)*)/.exec(output);
  if (!match?.[1]) return null;
  return match[1].split('.').map((part) => Number(part));
}

/** Compare dotted versions numerically; missing parts count as 0. */
export function compareVersions(a: readonly number[], b: readonly number[]): number {
  const len = Math.max(a.length, b.length);
  for (let i = 0; i < len; i++) {
    const diff = (a[i] ?? 0) - (b[i] ?? 0);
    if (diff !== 0) return diff < 0 ? -1 : 1;
  }
  return 0;
}

/**
 * Evaluate a presence check.  May throw when the check itself cannot run
 * (e.g. the queried command does not exist); callers go through
 * `shouldInstall`, which maps that to "absent".
 */
export async function checkPresence(check: PresenceCheck, ctx: CheckContext): Promise<boolean> {
  if ('path' in check) {
    const target = resolvePath(check.path, ctx);
    const info = await stat(target).catch(() => null);
    if (!info) return false;
    if (check.type === 'file') return info.isFile();
    if (check.type === 'dir') return info.isDirectory();
    return true;
  }

  const result = await ctx.exec({
    command: check.command,
    args: check.args,
    capture: true,
    timeoutMs: CHECK_TIMEOUT_MS,
  });
  if (result.exitCode !== 0) return false;
  if (check.contains !== undefined && !result.output.includes(check.contains)) return false;
  if (check.min_version !== undefined) {
    const found = extractVersion(result.output);
    if (!found) return false;
    return compareVersions(found, extractVersion(check.min_version) ?? [0]) >= 0;
  }
  return true;
}

/**
 * `true` when the unit's install action must run.
 */
export async function shouldInstall(unit: InstallUnit, ctx: UnitContext): Promise<boolean> {
  try {
    return !(await unit.isPresent(ctx));
  } catch (err) {
    ctx.logger.debug('gate.check_failed', `Presence check for ${unit.name} failed, treating as absent`, {
      unit: unit.name,
      error: errorMessage(err),
    });
    return true;
  }
}
