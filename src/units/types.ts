import type { ProvisionConfig, Env } from '../config/index.js';
import type { CommandRunner } from '../process/index.js';
import type { RetryPolicy, StructuredLogger } from '../runner/index.js';
import type { Fetch } from '../transfer/index.js';

export interface UnitContext {
  config: ProvisionConfig;
  env: Env;
  exec: CommandRunner;
  fetch: Fetch;
  logger: StructuredLogger;
}

interface UnitBase {
  readonly name: string;
  readonly description: string;
  readonly retry: RetryPolicy;
}

/**
 * A unit installed by running an action once its presence check reports
 * it missing.  `update` runs instead when the unit is present and
 * auto-update is enabled.
 */
export interface InstallUnit extends UnitBase {
  readonly kind: 'command' | 'git';
  isPresent(ctx: UnitContext): Promise<boolean>;
  install(ctx: UnitContext): Promise<void>;
  update?(ctx: UnitContext): Promise<void>;
}

export interface DownloadSpec {
  url: string;
  /** Explicit target name; otherwise derived from the URL path. */
  filename?: string;
  executable?: boolean;
}

/**
 * A batch of files fetched into one directory.  Each file is its own
 * idempotency check (does the target name exist?) and its own outcome.
 */
export interface DownloadUnit extends UnitBase {
  readonly kind: 'download';
  readonly destination: string;
  readonly concurrency?: number;
  resolveSpecs(ctx: UnitContext): Promise<DownloadSpec[]>;
}

export type Unit = InstallUnit | DownloadUnit;
