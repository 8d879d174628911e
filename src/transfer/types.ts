import type { TransferBackend } from '../config/index.js';

export type Fetch = typeof fetch;

export interface TransferRequest {
  url: string;
  /** Absolute path of the finished file. */
  target: string;
  headers: Record<string, string>;
}

export interface TransferStats {
  bytes: number;
  /** Bytes already on disk from an earlier, interrupted attempt. */
  resumedFrom: number;
  segments: number;
}

export interface Transfer {
  readonly name: TransferBackend;
  fetchFile(request: TransferRequest): Promise<TransferStats>;
}

export function partPathFor(target: string): string {
  return `${target}.part`;
}
