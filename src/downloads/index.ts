/**
 * Download orchestrator.
 *
 * Fetches a batch of files into one directory.  A file whose target
 * name already exists is skipped without touching the network; every
 * other file gets its credential resolved from its URL and is fetched
 * through the retry executor.  Independent files run concurrently up to
 * the configured limit; outcomes come back in batch order.
 */

import { chmod, mkdir, stat } from 'fs/promises';
import { join } from 'path';
import { bearerHeader } from '../credentials/index.js';
import type { CredentialResolver } from '../credentials/index.js';
import type { RunOutcome } from '../contracts/index.js';
import {
  ConfigError,
  errorMessage,
  redactUrl,
  withRetry,
} from '../runner/index.js';
import type { RetryPolicy, RetryPrompt, StructuredLogger } from '../runner/index.js';
import type { Transfer } from '../transfer/index.js';
import type { DownloadSpec } from '../units/types.js';

export interface FetchAllDeps {
  transfer: Transfer;
  credentials: CredentialResolver;
  logger: StructuredLogger;
  retry: RetryPolicy;
  concurrency: number;
  /** Unit name used as the prefix of each outcome name. */
  unit: string;
  prompt?: RetryPrompt;
  sleep?: (ms: number) => Promise<void>;
}

/**
 * Target filename for a spec: the explicit name, or the last segment of
 * the URL path (query string and fragment excluded), percent-decoded.
 */
export function deriveFilename(spec: DownloadSpec): string {
  if (spec.filename) return spec.filename;

  let url: URL;
  try {
    url = new URL(spec.url);
  } catch (err) {
    throw new ConfigError(`Invalid download URL: ${redactUrl(spec.url)}`, { cause: err });
  }

  const last = url.pathname.split('/').filter((part) => part.length > 0).pop();
  const name = last ? safeDecode(last) : '';
  if (name === '' || name === '.' || name === '..' || /[/\\]/.test(name)) {
    throw new ConfigError(`Cannot derive a filename from ${redactUrl(spec.url)}; set "filename" explicitly`);
  }
  return name;
}

function safeDecode(part: string): string {
  try {
    return decodeURIComponent(part);
  } catch {
    return part;
  }
}

/**
 * Run `fn` over `items` with at most `limit` calls in flight.  Results
 * keep the input order.  `fn` is expected to settle its own errors.
 */
export async function mapWithConcurrency<T, R>(
  items: readonly T[],
  limit: number,
  fn: (item: T, index: number) => Promise<R>,
): Promise<R[]> {
  const results: R[] = new Array<R>(items.length);
  const queue = [...items.entries()];

  async function worker(): Promise<void> {
    for (let entry = queue.shift(); entry !== undefined; entry = queue.shift()) {
      const [index, item] = entry;
      results[index] = await fn(item, index);
    }
  }

  const workers = Math.max(1, Math.min(limit, items.length));
  await Promise.all(Array.from({ length: workers }, () => worker()));
  return results;
}

/**
 * Wrap a prompt so concurrent transfers ask the operator one at a time.
 */
export function serializePrompt(prompt: RetryPrompt): RetryPrompt {
  let tail: Promise<unknown> = Promise.resolve();
  return (question) => {
    const answer = tail.then(() => prompt(question));
    tail = answer.catch(() => false);
    return answer;
  };
}

async function exists(path: string): Promise<boolean> {
  return stat(path).then(() => true, () => false);
}

export async function fetchAll(
  destinationDir: string,
  specs: readonly DownloadSpec[],
  deps: FetchAllDeps,
): Promise<RunOutcome[]> {
  const { logger, unit } = deps;
  const prompt = deps.prompt ? serializePrompt(deps.prompt) : undefined;

  try {
    await mkdir(destinationDir, { recursive: true });
  } catch (err) {
    logger.error('download.mkdir', `Cannot create ${destinationDir}`, { error: errorMessage(err) });
    return specs.map((spec) => ({
      name: `${unit}/${spec.filename ?? redactUrl(spec.url)}`,
      unit,
      kind: 'download' as const,
      status: 'failed' as const,
      attempts: 0,
      error: errorMessage(err),
      duration_ms: 0,
    }));
  }

  logger.info('download.batch', `Downloading ${specs.length} file(s) to ${destinationDir}`, {
    unit,
    count: specs.length,
  });

  const claimed = new Set<string>();

  return mapWithConcurrency(specs, deps.concurrency, async (spec): Promise<RunOutcome> => {
    const started = Date.now();
    const outcome = (fields: Pick<RunOutcome, 'name' | 'status' | 'attempts'> & Partial<RunOutcome>): RunOutcome => ({
      unit,
      kind: 'download',
      duration_ms: Date.now() - started,
      ...fields,
    });

    let filename: string;
    try {
      filename = deriveFilename(spec);
    } catch (err) {
      logger.error('download.invalid', errorMessage(err), { unit });
      return outcome({ name: `${unit}/${redactUrl(spec.url)}`, status: 'failed', attempts: 0, error: errorMessage(err) });
    }

    const name = `${unit}/${filename}`;
    if (claimed.has(filename)) {
      logger.warn('download.duplicate', `${filename} is listed more than once, skipping the repeat`, { unit });
      return outcome({ name, status: 'skipped', attempts: 0, detail: 'duplicate entry' });
    }
    claimed.add(filename);

    const target = join(destinationDir, filename);
    if (await exists(target)) {
      logger.info('download.skip', `${filename} already exists.`, { unit, target });
      return outcome({ name, status: 'skipped', attempts: 0, detail: 'already present' });
    }

    const credential = deps.credentials.resolve(spec.url);
    logger.info('download.start', `Downloading ${filename}`, {
      unit,
      url: spec.url,
      authenticated: credential !== null,
      ...(credential && { auth_from: credential.env }),
    });

    const result = await withRetry(
      async () => {
        const stats = await deps.transfer.fetchFile({ url: spec.url, target, headers: bearerHeader(credential) });
        if (spec.executable) await chmod(target, 0o755);
        return stats;
      },
      deps.retry,
      { description: `download ${filename}`, logger, prompt, sleep: deps.sleep },
    );

    if (result.success) {
      const resumed = result.value.resumedFrom > 0 ? `, resumed from ${result.value.resumedFrom}` : '';
      return outcome({
        name,
        status: 'succeeded',
        attempts: result.attempts,
        detail: `${result.value.bytes} bytes${resumed}`,
      });
    }

    return outcome({
      name,
      status: 'failed',
      attempts: result.attempts,
      error: errorMessage(result.lastError),
      ...(result.abandonedByOperator && { abandoned_by_operator: true }),
    });
  });
}
