import { mkdtempSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import type { ProvisionConfig } from '../config/index.js';
import type { CommandRunner, CommandSpec } from '../process/index.js';
import { createLogger } from '../runner/index.js';
import type { StructuredLogger } from '../runner/index.js';
import type { Fetch } from '../transfer/index.js';
import type { UnitContext } from '../units/index.js';

export function tempDir(prefix = 'provision-test-'): string {
  return mkdtempSync(join(tmpdir(), prefix));
}

export function makeConfig(overrides: Partial<ProvisionConfig> = {}): ProvisionConfig {
  return {
    workspace: '/tmp/provision-workspace',
    home: '/tmp/provision-home',
    autoUpdate: true,
    concurrency: 4,
    segments: 1,
    interactive: false,
    transfer: 'http',
    only: [],
    skip: [],
    ...overrides,
  };
}

/** A command runner that records every call and answers from `respond`. */
export function fakeExec(
  respond: (spec: CommandSpec) => { exitCode: number; output?: string } = () => ({ exitCode: 0 }),
): CommandRunner & { calls: CommandSpec[] } {
  const calls: CommandSpec[] = [];
  const runner = async (spec: CommandSpec) => {
    calls.push(spec);
    const { exitCode, output = '' } = respond(spec);
    return { exitCode, output };
  };
  return Object.assign(runner, { calls });
}

export const unreachableFetch: Fetch = async () => {
  throw new Error('network access in test');
};

export function makeContext(overrides: Partial<UnitContext> = {}): UnitContext & { logger: StructuredLogger } {
  return {
    config: makeConfig(),
    env: {},
    exec: fakeExec(),
    fetch: unreachableFetch,
    logger: createLogger({ module: 'test', minLevel: 'debug' }),
    ...overrides,
  };
}

/** Build a `fetch` stand-in that answers every request with `status`. */
export function statusFetch(status: number, seen: Array<{ url: string; init?: RequestInit }> = []): Fetch {
  return async (input, init) => {
    seen.push({ url: String(input), init });
    return new Response(null, { status });
  };
}
