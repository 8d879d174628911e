/**
 * Run artifacts.
 *
 * Each command invocation writes under `<out>/artifacts/<runId>/`:
 *   logs.jsonl          structured log lines
 *   evidence/<name>.json  run report or plan
 *   summary.json        exit code, stats, error envelope
 *
 * Provisioning typically runs on every container start, so old run
 * directories are pruned down to a fixed count.
 */

import { existsSync, mkdirSync, readdirSync, rmSync, writeFileSync } from 'fs';
import { join, resolve } from 'path';
import { randomUUID } from 'crypto';
import { redact } from './redact.js';
import type { RunnerErrorEnvelope } from './errors.js';

/** Run IDs produced by `generateRunId`; anything else is left alone by `pruneRuns`. */
const RUN_ID_PATTERN = /^\d{8}-\d{6}-[0-9a-f]{8}$/;

export const DEFAULT_KEEP_RUNS = 20;

export interface ArtifactSummary {
  run_id: string;
  command: string;
  profile?: string;
  workspace?: string;
  started_at: string;
  finished_at: string;
  exit_code: number;
  artifact_dir: string;
  files: string[];
  error?: RunnerErrorEnvelope;
  stats?: Record<string, unknown>;
}

export interface FinalizeOptions {
  command: string;
  profile?: string;
  workspace?: string;
  startedAt: string;
  exitCode: number;
  error?: RunnerErrorEnvelope;
  stats?: Record<string, unknown>;
}

export interface ArtifactWriter {
  readonly dir: string;
  readonly runId: string;
  readonly logsPath: string;

  /** Write `evidence/<name>.json` (redacted); a repeated name overwrites. */
  writeEvidence(name: string, data: unknown): string;

  /** Write summary.json and return it. */
  finalize(opts: FinalizeOptions): ArtifactSummary;
}

/**
 * Format: YYYYMMDD-HHmmss-<8 hex>, so lexical order is start order.
 */
export function generateRunId(): string {
  const now = new Date();
  const pad = (n: number, w = 2): string => String(n).padStart(w, '0');
  const date = `${now.getFullYear()}${pad(now.getMonth() + 1)}${pad(now.getDate())}`;
  const time = `${pad(now.getHours())}${pad(now.getMinutes())}${pad(now.getSeconds())}`;
  return `${date}-${time}-${randomUUID().slice(0, 8)}`;
}

export function createArtifactWriter(base: string, runId?: string): ArtifactWriter {
  const id = runId ?? generateRunId();
  const dir = resolve(base, 'artifacts', id);
  const evidenceDir = join(dir, 'evidence');
  const logsPath = join(dir, 'logs.jsonl');
  const evidence = new Set<string>();

  mkdirSync(evidenceDir, { recursive: true });

  return {
    dir,
    runId: id,
    logsPath,

    writeEvidence(name, data) {
      const file = `${name.replace(/[^a-zA-Z0-9_-]/g, '_')}.json`;
      const path = join(evidenceDir, file);
      writeFileSync(path, JSON.stringify(redact(data), null, 2), 'utf-8');
      evidence.add(`evidence/${file}`);
      return path;
    },

    finalize(opts) {
      const summary: ArtifactSummary = {
        run_id: id,
        command: opts.command,
        ...(opts.profile && { profile: opts.profile }),
        ...(opts.workspace && { workspace: opts.workspace }),
        started_at: opts.startedAt,
        finished_at: new Date().toISOString(),
        exit_code: opts.exitCode,
        artifact_dir: dir,
        files: ['logs.jsonl', ...evidence, 'summary.json'],
        ...(opts.error && { error: opts.error }),
        ...(opts.stats && { stats: opts.stats }),
      };
      writeFileSync(join(dir, 'summary.json'), JSON.stringify(redact(summary), null, 2), 'utf-8');
      return summary;
    },
  };
}

/**
 * Delete all but the newest `keep` run directories under
 * `<base>/artifacts`.  `current` always survives and counts towards
 * `keep`.  Returns the removed run IDs, newest first.
 */
export function pruneRuns(base: string, keep: number, current?: string): string[] {
  const root = resolve(base, 'artifacts');
  if (!existsSync(root)) return [];

  const runs = readdirSync(root, { withFileTypes: true })
    .filter((entry) => entry.isDirectory() && RUN_ID_PATTERN.test(entry.name))
    .map((entry) => entry.name)
    .sort()
    .reverse();

  const kept = new Set<string>(current ? [current] : []);
  for (const run of runs) {
    if (kept.size >= keep) break;
    kept.add(run);
  }

  const removed = runs.filter((run) => !kept.has(run));
  for (const run of removed) {
    rmSync(join(root, run), { recursive: true, force: true });
  }
  return removed;
}
