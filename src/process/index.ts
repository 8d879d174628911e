/**
 * External collaborator invocation.
 *
 * Units delegate real work to package managers, git, shells and transfer
 * tools.  The contract with them is exit status only: output is captured
 * for presence checks, streamed to the terminal for install steps, and
 * never parsed beyond a substring or version match.
 */

import { spawn } from 'child_process';
import { access } from 'fs/promises';
import { constants } from 'fs';
import { delimiter, join } from 'path';
import type { Env } from '../config/index.js';

export interface CommandSpec {
  command: string;
  args: string[];
  cwd?: string;
  env?: Record<string, string>;
  /** Run `command` through /bin/sh (args are then ignored). */
  shell?: boolean;
  /** Capture output instead of streaming it to the terminal. */
  capture?: boolean;
  timeoutMs?: number;
}

export interface CommandResult {
  exitCode: number;
  /** Combined stdout + stderr when captured, empty otherwise. */
  output: string;
}

export type CommandRunner = (spec: CommandSpec) => Promise<CommandResult>;

/**
 * Create a runner that spawns processes with `baseEnv` as their
 * environment.  Rejects only when the process cannot be started
 * (e.g. ENOENT); a non-zero exit resolves with its code.
 */
export function createCommandRunner(baseEnv: Env): CommandRunner {
  return (spec) => new Promise<CommandResult>((resolve, reject) => {
    const env: Record<string, string> = {};
    for (const [key, value] of Object.entries(baseEnv)) {
      if (value !== undefined) env[key] = value;
    }
    Object.assign(env, spec.env);

    const child = spawn(spec.command, spec.shell ? [] : spec.args, {
      cwd: spec.cwd,
      env,
      shell: spec.shell ?? false,
      stdio: spec.capture ? ['ignore', 'pipe', 'pipe'] : ['ignore', 'inherit', 'inherit'],
      timeout: spec.timeoutMs,
    });

    let output = '';
    const collect = (chunk: Buffer): void => {
      output += chunk.toString('utf-8');
    };
    child.stdout?.on('data', collect);
    child.stderr?.on('data', collect);

    child.once('error', reject);
    child.once('close', (code, signal) => {
      resolve({ exitCode: code ?? (signal ? 128 : 1), output });
    });
  });
}

/**
 * Look `name` up on the PATH of `env` without spawning anything.
 */
export async function commandExists(name: string, env: Env): Promise<boolean> {
  if (name.includes('/')) {
    return isExecutable(name);
  }
  const dirs = (env.PATH ?? '').split(delimiter).filter((d) => d.length > 0);
  for (const dir of dirs) {
    if (await isExecutable(join(dir, name))) return true;
  }
  return false;
}

async function isExecutable(path: string): Promise<boolean> {
  try {
    await access(path, constants.X_OK);
    return true;
  } catch {
    return false;
  }
}
