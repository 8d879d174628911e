/**
 * Transfer backends.
 *
 * A transfer moves one URL to one target path.  Both backends write to
 * `<target>.part` (plus per-segment files for the HTTP backend) and only
 * rename onto `target` once the body is complete, so an interrupted run
 * leaves nothing that a later presence check would mistake for a
 * finished file.
 */

import type { TransferBackend } from '../config/index.js';
import type { CommandRunner } from '../process/index.js';
import type { StructuredLogger } from '../runner/index.js';
import { createAria2Transfer } from './aria2.js';
import { createHttpTransfer } from './http.js';
import type { Fetch, Transfer } from './types.js';

export interface TransferFactoryOptions {
  fetch: Fetch;
  exec: CommandRunner;
  segments: number;
  logger?: StructuredLogger;
}

export function createTransfer(backend: TransferBackend, opts: TransferFactoryOptions): Transfer {
  switch (backend) {
    case 'http':
      return createHttpTransfer({ fetch: opts.fetch, segments: opts.segments, logger: opts.logger });
    case 'aria2c':
      return createAria2Transfer({ exec: opts.exec, connections: opts.segments });
  }
}

export { partPathFor, type Fetch, type Transfer, type TransferRequest, type TransferStats } from './types.js';
export { createHttpTransfer, planSegments, segmentPath, type HttpTransferOptions, type Segment } from './http.js';
export { createAria2Transfer, type Aria2TransferOptions } from './aria2.js';
