/**
 * Resumable, optionally segmented HTTP transfer over `fetch`.
 *
 * Single stream: `<target>.part` grows across attempts; a retry sends
 * `Range: bytes=<size>-` and appends on 206, restarts on 200, and treats
 * a 416 whose total matches the part size as complete.
 *
 * Segmented: when a HEAD reports `Accept-Ranges: bytes` and a
 * `Content-Length` of at least two segments, the body is split into
 * ranges fetched concurrently into `<target>.part.<start>-<end>`, each
 * resumable on its own, then joined into `<target>.part`.  A segment file
 * is only resumed by a plan with the same bounds; segment files left by
 * any other plan are deleted before a transfer starts.
 */

import { createReadStream, createWriteStream } from 'fs';
import { open, readdir, rename, rm, stat } from 'fs/promises';
import { basename, dirname, join } from 'path';
import { pipeline } from 'stream/promises';
import { TransferFailure, errorMessage, redactUrl } from '../runner/index.js';
import type { StructuredLogger } from '../runner/index.js';
import { partPathFor } from './types.js';
import type { Fetch, Transfer, TransferRequest, TransferStats } from './types.js';

export const DEFAULT_MIN_SEGMENT_BYTES = 64 * 1024 * 1024;

export interface HttpTransferOptions {
  fetch?: Fetch;
  /** Upper bound on concurrent range requests per file. */
  segments?: number;
  minSegmentBytes?: number;
  logger?: StructuredLogger;
}

export interface Segment {
  index: number;
  start: number;
  /** Inclusive. */
  end: number;
}

interface ProbeResult {
  size: number | null;
  acceptRanges: boolean;
}

/**
 * Split `size` bytes into at most `maxSegments` contiguous ranges of at
 * least `minSegmentBytes` each (the last range absorbs the remainder).
 */
export function planSegments(size: number, maxSegments: number, minSegmentBytes: number): Segment[] {
  const count = Math.max(1, Math.min(maxSegments, Math.floor(size / Math.max(1, minSegmentBytes))));
  const base = Math.floor(size / count);
  const segments: Segment[] = [];
  for (let index = 0; index < count; index++) {
    const start = index * base;
    const end = index === count - 1 ? size - 1 : start + base - 1;
    segments.push({ index, start, end });
  }
  return segments;
}

export function segmentPath(partPath: string, segment: Segment): string {
  return `${partPath}.${segment.start}-${segment.end}`;
}

/**
 * Delete `<partPath>.<suffix>` segment files that are not in `keep`.
 * Returns the removed file names.
 */
async function removeStaleSegments(partPath: string, keep: ReadonlySet<string>): Promise<string[]> {
  const dir = dirname(partPath);
  const prefix = `${basename(partPath)}.`;
  const names = await readdir(dir).catch(() => []);
  const stale = names.filter((name) => {
    if (!name.startsWith(prefix)) return false;
    const suffix = name.slice(prefix.length);
    return /^\d+(-\d+)?$/.test(suffix) && !keep.has(join(dir, name));
  });
  await Promise.all(stale.map((name) => rm(join(dir, name), { force: true })));
  return stale;
}

async function sizeOf(path: string): Promise<number> {
  const info = await stat(path).catch(() => null);
  return info?.isFile() ? info.size : 0;
}

function parseContentRangeTotal(header: string | null): number | null {
  const match = header ? /\/(\d+)\s*$/.exec(header) : null;
  return match?.[1] ? Number(match[1]) : null;
}

function parseContentRangeStart(header: string | null): number | null {
  const match = header ? /^bytes\s+(\d+)-/.exec(header) : null;
  return match?.[1] ? Number(match[1]) : null;
}

function parseLength(header: string | null): number | null {
  if (header === null || !/^\d+$/.test(header.trim())) return null;
  return Number(header.trim());
}

async function discard(response: Response): Promise<void> {
  if (response.body && !response.bodyUsed) {
    await response.body.cancel();
  }
}

/**
 * Stream a response body into `path`, returning the number of bytes
 * written.  `flags` is `'w'` to start over or `'a'` to append.
 */
async function writeBody(response: Response, path: string, flags: 'w' | 'a'): Promise<number> {
  const handle = await open(path, flags);
  let written = 0;
  try {
    if (!response.body) return 0;
    const reader = response.body.getReader();
    for (;;) {
      const { done, value } = await reader.read();
      if (done) break;
      const chunk: Uint8Array | undefined = value;
      if (!chunk || chunk.byteLength === 0) continue;
      await handle.write(chunk);
      written += chunk.byteLength;
    }
  } finally {
    await handle.close();
  }
  return written;
}

export function createHttpTransfer(opts: HttpTransferOptions = {}): Transfer {
  const doFetch = opts.fetch ?? fetch;
  const maxSegments = Math.max(1, opts.segments ?? 1);
  const minSegmentBytes = opts.minSegmentBytes ?? DEFAULT_MIN_SEGMENT_BYTES;
  const logger = opts.logger;

  async function request(url: string, init: RequestInit): Promise<Response> {
    try {
      return await doFetch(url, { redirect: 'follow', ...init });
    } catch (err) {
      throw new TransferFailure(`Request to ${redactUrl(url)} failed: ${errorMessage(err)}`, { cause: err });
    }
  }

  async function probe(req: TransferRequest): Promise<ProbeResult | null> {
    let response: Response;
    try {
      response = await doFetch(req.url, { method: 'HEAD', headers: req.headers, redirect: 'follow' });
    } catch (err) {
      logger?.debug('transfer.probe', `HEAD failed for ${redactUrl(req.url)}, using a single stream`, {
        error: errorMessage(err),
      });
      return null;
    }
    if (!response.ok) return null;
    return {
      size: parseLength(response.headers.get('content-length')),
      acceptRanges: (response.headers.get('accept-ranges') ?? '').toLowerCase().includes('bytes'),
    };
  }

  async function discardStale(req: TransferRequest, partPath: string, keep: ReadonlySet<string>): Promise<void> {
    const removed = await removeStaleSegments(partPath, keep);
    if (removed.length > 0) {
      logger?.debug('transfer.stale', `Discarded segments from an earlier plan for ${redactUrl(req.url)}`, {
        files: removed,
      });
    }
  }

  async function fetchSingle(req: TransferRequest, partPath: string): Promise<TransferStats> {
    await discardStale(req, partPath, new Set());
    const existing = await sizeOf(partPath);
    const headers: Record<string, string> = { ...req.headers };
    if (existing > 0) headers.Range = `bytes=${existing}-`;

    const response = await request(req.url, { headers });

    if (response.status === 416 && existing > 0) {
      const total = parseContentRangeTotal(response.headers.get('content-range'));
      await discard(response);
      if (total === existing) {
        return { bytes: existing, resumedFrom: existing, segments: 1 };
      }
      await rm(partPath, { force: true });
      throw new TransferFailure(`Partial file for ${redactUrl(req.url)} does not match the remote size, restarting`, {
        status: 416,
      });
    }

    if (response.status !== 200 && response.status !== 206) {
      await discard(response);
      throw new TransferFailure(`HTTP ${response.status} for ${redactUrl(req.url)}`, { status: response.status });
    }

    let offset = 0;
    if (response.status === 206 && existing > 0) {
      const start = parseContentRangeStart(response.headers.get('content-range'));
      if (start !== existing) {
        await discard(response);
        await rm(partPath, { force: true });
        throw new TransferFailure(`Server resumed ${redactUrl(req.url)} at the wrong offset, restarting`, {
          status: 206,
        });
      }
      offset = existing;
    }

    const expected = response.status === 206
      ? parseContentRangeTotal(response.headers.get('content-range'))
      : parseLength(response.headers.get('content-length'));

    const written = await writeBody(response, partPath, offset > 0 ? 'a' : 'w');
    const total = offset + written;
    if (expected !== null && total !== expected) {
      throw new TransferFailure(`Incomplete body for ${redactUrl(req.url)}: ${total} of ${expected} bytes`);
    }
    return { bytes: total, resumedFrom: offset, segments: 1 };
  }

  async function fetchSegment(req: TransferRequest, segment: Segment, path: string): Promise<number> {
    const length = segment.end - segment.start + 1;
    let have = await sizeOf(path);
    if (have === length) return have;
    if (have > length) {
      await rm(path, { force: true });
      have = 0;
    }

    const from = segment.start + have;
    const response = await request(req.url, {
      headers: { ...req.headers, Range: `bytes=${from}-${segment.end}` },
    });
    if (response.status !== 206) {
      await discard(response);
      throw new TransferFailure(
        `Expected 206 for segment ${segment.index} of ${redactUrl(req.url)}, got ${response.status}`,
        { status: response.status },
      );
    }

    const written = await writeBody(response, path, have > 0 ? 'a' : 'w');
    if (have + written !== length) {
      throw new TransferFailure(
        `Segment ${segment.index} of ${redactUrl(req.url)} incomplete: ${have + written} of ${length} bytes`,
      );
    }
    return have;
  }

  async function fetchSegmented(req: TransferRequest, partPath: string, size: number): Promise<TransferStats> {
    const plan = planSegments(size, maxSegments, minSegmentBytes).map((segment) => ({
      segment,
      path: segmentPath(partPath, segment),
    }));
    const paths = plan.map((entry) => entry.path);
    await discardStale(req, partPath, new Set(paths));

    const settled = await Promise.allSettled(plan.map((entry) => fetchSegment(req, entry.segment, entry.path)));
    let resumedFrom = 0;
    for (const result of settled) {
      if (result.status === 'rejected') throw result.reason;
      resumedFrom += result.value;
    }

    for (const [i, path] of paths.entries()) {
      await pipeline(createReadStream(path), createWriteStream(partPath, { flags: i === 0 ? 'w' : 'a' }));
    }
    const joined = await sizeOf(partPath);
    if (joined !== size) {
      throw new TransferFailure(`Joined segments of ${redactUrl(req.url)} are ${joined} of ${size} bytes`);
    }
    await Promise.all(paths.map((path) => rm(path, { force: true })));
    return { bytes: size, resumedFrom, segments: plan.length };
  }

  return {
    name: 'http',

    async fetchFile(req: TransferRequest): Promise<TransferStats> {
      const partPath = partPathFor(req.target);
      const info = maxSegments > 1 ? await probe(req) : null;

      const stats = info?.acceptRanges && info.size !== null && info.size >= 2 * minSegmentBytes
        ? await fetchSegmented(req, partPath, info.size)
        : await fetchSingle(req, partPath);

      await rename(partPath, req.target);
      logger?.debug('transfer.done', `Fetched ${redactUrl(req.url)}`, { ...stats });
      return stats;
    },
  };
}
