/**
 * Transfer through `aria2c`: multi-connection, resumable via its own
 * control file next to `<target>.part`.
 */

import { rename, stat } from 'fs/promises';
import { basename, dirname } from 'path';
import { TransferFailure, redactUrl } from '../runner/index.js';
import type { CommandRunner } from '../process/index.js';
import { partPathFor } from './types.js';
import type { Transfer, TransferRequest, TransferStats } from './types.js';

/** aria2c refuses more than 16 connections per server. */
const MAX_CONNECTIONS = 16;

export interface Aria2TransferOptions {
  exec: CommandRunner;
  connections?: number;
  binary?: string;
}

export function aria2Args(req: TransferRequest, connections: number): string[] {
  const n = String(Math.min(MAX_CONNECTIONS, Math.max(1, connections)));
  const args = [
    '--continue=true',
    '--auto-file-renaming=false',
    '--allow-overwrite=true',
    '--console-log-level=warn',
    '-x', n,
    '-s', n,
    '-d', dirname(req.target),
    '-o', basename(partPathFor(req.target)),
  ];
  for (const [name, value] of Object.entries(req.headers)) {
    args.push(`--header=${name}: ${value}`);
  }
  args.push(req.url);
  return args;
}

export function createAria2Transfer(opts: Aria2TransferOptions): Transfer {
  const binary = opts.binary ?? 'aria2c';
  const connections = opts.connections ?? MAX_CONNECTIONS;

  return {
    name: 'aria2c',

    async fetchFile(req: TransferRequest): Promise<TransferStats> {
      const partPath = partPathFor(req.target);
      const before = await stat(partPath).then((info) => info.size, () => 0);

      const result = await opts.exec({ command: binary, args: aria2Args(req, connections) });
      if (result.exitCode !== 0) {
        throw new TransferFailure(`${binary} exited with code ${result.exitCode} for ${redactUrl(req.url)}`);
      }

      await rename(partPath, req.target);
      const info = await stat(req.target);
      return { bytes: info.size, resumedFrom: before, segments: Math.min(MAX_CONNECTIONS, Math.max(1, connections)) };
    },
  };
}
