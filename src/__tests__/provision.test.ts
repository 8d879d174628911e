import { describe, expect, it, afterEach, vi } from 'vitest';
import { mkdirSync, readFileSync, rmSync, writeFileSync } from 'fs';
import { join } from 'path';
import { ProfileSchema } from '../contracts/index.js';
import type { Profile, ProfileInput } from '../contracts/index.js';
import { planProvisioning, runProvisioning, selectUnits } from '../provision/index.js';
import type { ProvisionOptions } from '../provision/index.js';
import { createLogger, DEFAULT_RETRY_POLICY, EXIT_SUCCESS, EXIT_UNITS_FAILED } from '../runner/index.js';
import type { RetryPolicy, StructuredLogger } from '../runner/index.js';
import type { Transfer } from '../transfer/index.js';
import type { DownloadUnit, InstallUnit } from '../units/index.js';
import { fakeExec, makeConfig, tempDir, unreachableFetch } from './helpers.js';

const fast: RetryPolicy = { ...DEFAULT_RETRY_POLICY, maxAttempts: 3, initialDelayMs: 0, allowInteractive: false };

function profileOf(input: Partial<ProfileInput> = {}): Profile {
  return ProfileSchema.parse({
    profile_id: 'test',
    name: 'Test machine',
    units: [{ kind: 'command', name: 'placeholder', steps: [{ run: ['true'] }] }],
    ...input,
  });
}

interface FakeUnit extends InstallUnit {
  installs: number;
  updates: number;
}

function fakeUnit(
  name: string,
  opts: { present?: boolean; failTimes?: number; updatable?: boolean; retry?: RetryPolicy } = {},
): FakeUnit {
  let failures = 0;
  const unit: FakeUnit = {
    kind: 'command',
    name,
    description: `install ${name}`,
    retry: opts.retry ?? fast,
    installs: 0,
    updates: 0,
    isPresent: async () => opts.present ?? false,
    install: async () => {
      unit.installs++;
      if (failures < (opts.failTimes ?? 0)) {
        failures++;
        throw new Error(`${name} broke (${failures})`);
      }
    },
    ...(opts.updatable && {
      update: async () => {
        unit.updates++;
      },
    }),
  };
  return unit;
}

const noTransfer: Transfer = {
  name: 'http',
  async fetchFile() {
    throw new Error('unexpected transfer');
  },
};

describe('runProvisioning', () => {
  let workspace = '';
  let logger: StructuredLogger;

  afterEach(() => {
    if (workspace) rmSync(workspace, { recursive: true, force: true });
  });

  function options(overrides: Partial<ProvisionOptions> = {}): ProvisionOptions {
    workspace = tempDir();
    logger = createLogger({ module: 'test' });
    return {
      profile: profileOf(),
      config: makeConfig({ workspace, home: workspace }),
      env: { PATH: '' },
      exec: fakeExec(),
      fetch: unreachableFetch,
      transfer: noTransfer,
      logger,
      sleep: async () => {},
      ...overrides,
    };
  }

  it('runs every unit and recovers a unit that fails twice before succeeding', async () => {
    const units = [fakeUnit('one'), fakeUnit('two', { failTimes: 2 }), fakeUnit('three')];

    const report = await runProvisioning(options({ units }));

    expect(report.outcomes().map((o) => [o.name, o.status, o.attempts])).toEqual([
      ['one', 'succeeded', 1],
      ['two', 'succeeded', 3],
      ['three', 'succeeded', 1],
    ]);
    expect(report.exitCode()).toBe(EXIT_SUCCESS);
    expect(logger.entries().filter((e) => e.level === 'warn').map((e) => e.message)).toEqual([
      'Attempt #1 failed: install two',
      'Attempt #2 failed: install two',
    ]);
    expect(logger.entries().at(-1)?.message).toBe('Provisioning complete: 3 succeeded, 0 skipped');
  });

  it('never runs the action of a unit that is already present', async () => {
    const present = fakeUnit('node', { present: true });

    const report = await runProvisioning(options({ units: [present] }));

    expect(present.installs).toBe(0);
    expect(report.outcomes()[0]).toMatchObject({ status: 'skipped', attempts: 0, detail: 'already present' });
  });

  it('updates a present unit only when auto-update is on', async () => {
    const repo = fakeUnit('sillytavern', { present: true, updatable: true });

    const opts = options({ units: [repo] });
    const first = await runProvisioning(opts);
    expect(first.outcomes()[0]).toMatchObject({ status: 'succeeded', detail: 'updated' });

    await runProvisioning({ ...opts, config: { ...opts.config, autoUpdate: false } });
    expect(repo.updates).toBe(1);
    expect(repo.installs).toBe(0);
  });

  it('keeps going after a unit exhausts its attempts', async () => {
    const units = [fakeUnit('one', { failTimes: 10 }), fakeUnit('two')];

    const report = await runProvisioning(options({ units }));

    expect(report.outcomes().map((o) => o.status)).toEqual(['failed', 'succeeded']);
    expect(report.outcomes()[0]).toMatchObject({ attempts: 3, error: 'one broke (3)' });
    expect(report.exitCode()).toBe(EXIT_UNITS_FAILED);
    expect(report.summary().failed_units).toEqual(['one']);
    expect(logger.entries().at(-1)).toMatchObject({ level: 'error', message: 'Failed units: one' });
  });

  it('does not fail the run for a unit the operator abandoned', async () => {
    const prompt = vi.fn(async (_question: string) => false);
    const unit = fakeUnit('comfyui', { failTimes: 10, retry: { ...fast, maxAttempts: 1, allowInteractive: true } });
    const opts = options({ units: [unit], prompt });

    const report = await runProvisioning({ ...opts, config: { ...opts.config, interactive: true } });

    expect(prompt).toHaveBeenCalledWith('Failed: install comfyui. Retry?');
    expect(report.outcomes()[0]).toMatchObject({ status: 'failed', abandoned_by_operator: true });
    expect(report.exitCode()).toBe(EXIT_SUCCESS);
    expect(report.summary().abandoned_units).toEqual(['comfyui']);
  });

  it('fails the run when the retry prompt is closed without an answer', async () => {
    const prompt = vi.fn(async (_question: string): Promise<boolean> => {
      throw new Error('User force closed the prompt');
    });
    const unit = fakeUnit('comfyui', { failTimes: 10, retry: { ...fast, maxAttempts: 1, allowInteractive: true } });
    const opts = options({ units: [unit], prompt });

    const report = await runProvisioning({ ...opts, config: { ...opts.config, interactive: true } });

    expect(prompt).toHaveBeenCalledTimes(1);
    expect(report.outcomes()[0]).toMatchObject({ status: 'failed', attempts: 1, error: 'comfyui broke (1)' });
    expect(report.outcomes()[0]?.abandoned_by_operator).not.toBe(true);
    expect(report.exitCode()).toBe(EXIT_UNITS_FAILED);
  });

  it('never prompts outside an interactive run', async () => {
    const prompt = vi.fn(async (_question: string) => true);
    const unit = fakeUnit('comfyui', { failTimes: 10, retry: { ...fast, maxAttempts: 1, allowInteractive: true } });

    const report = await runProvisioning(options({ units: [unit], prompt }));

    expect(prompt).not.toHaveBeenCalled();
    expect(report.exitCode()).toBe(EXIT_UNITS_FAILED);
  });

  it('does nothing when the skip marker exists', async () => {
    const unit = fakeUnit('one');
    const opts = options({ units: [unit] });
    writeFileSync(join(workspace, '.noprovisioning'), '');

    const report = await runProvisioning({ ...opts, profile: profileOf({ skip_marker: '.noprovisioning' }) });

    expect(report.outcomes()).toEqual([]);
    expect(unit.installs).toBe(0);
    expect(report.exitCode()).toBe(EXIT_SUCCESS);
  });

  it('records missing required commands and still runs the units', async () => {
    const unit = fakeUnit('one');
    const opts = options({ units: [unit] });

    const report = await runProvisioning({ ...opts, profile: profileOf({ requires: ['provision-test-missing-tool'] }) });

    expect(report.outcomes()[0]).toMatchObject({
      name: 'requires:provision-test-missing-tool',
      kind: 'requires',
      status: 'failed',
      error: 'provision-test-missing-tool is not on PATH',
    });
    expect(unit.installs).toBe(1);
    expect(report.exitCode()).toBe(EXIT_UNITS_FAILED);
  });

  it('honours only and skip', async () => {
    const units = [fakeUnit('a'), fakeUnit('b'), fakeUnit('c')];
    const opts = options({ units });

    const report = await runProvisioning({ ...opts, config: { ...opts.config, only: ['a', 'c'], skip: ['c'] } });

    expect(report.outcomes().map((o) => o.name)).toEqual(['a']);
    expect(units.map((u) => u.installs)).toEqual([1, 0, 0]);
  });

  it('turns an unexpected unit error into a failed outcome', async () => {
    const opts = options();
    const broken: DownloadUnit = {
      kind: 'download',
      name: 'models',
      description: 'models',
      retry: fast,
      destination: join(workspace, 'models'),
      resolveSpecs: async () => {
        throw new Error('probe exploded');
      },
    };

    const report = await runProvisioning({ ...opts, units: [broken, fakeUnit('next')] });

    expect(report.outcomes().map((o) => [o.name, o.status])).toEqual([
      ['models', 'failed'],
      ['next', 'succeeded'],
    ]);
    expect(report.outcomes()[0]).toMatchObject({ kind: 'download', attempts: 0, error: 'probe exploded' });
  });

  it('downloads the files of a profile download unit with credentials for known hosts', async () => {
    const requests: Array<{ url: string; headers: Record<string, string> }> = [];
    const transfer: Transfer = {
      name: 'http',
      async fetchFile(req) {
        requests.push({ url: req.url, headers: req.headers });
        writeFileSync(req.target, 'weights');
        return { bytes: 7, resumedFrom: 0, segments: 1 };
      },
    };
    const opts = options({ transfer, env: { PATH: '', HF_TOKEN: 'test-secret' } });
    const profile = profileOf({
      units: [
        {
          kind: 'download',
          name: 'base-models',
          destination: 'PresetModels',
          concurrency: 1,
          files: [
            { url: 'https://huggingface.co/org/repo/resolve/main/model.gguf?download=true' },
            { url: 'https://example.com/files/extra.bin' },
          ],
        },
      ],
    });

    const report = await runProvisioning({ ...opts, profile });

    expect(report.outcomes().map((o) => [o.name, o.status, o.detail])).toEqual([
      ['base-models/model.gguf', 'succeeded', '7 bytes'],
      ['base-models/extra.bin', 'succeeded', '7 bytes'],
    ]);
    expect(requests.map((r) => r.headers)).toEqual([{ Authorization: 'Bearer test-secret' }, {}]);
    expect(readFileSync(join(workspace, 'PresetModels', 'model.gguf'), 'utf-8')).toBe('weights');
  });
});

describe('selectUnits', () => {
  it('keeps registry order', () => {
    const units = [{ name: 'c' }, { name: 'a' }, { name: 'b' }];
    expect(selectUnits(units, { only: ['b', 'c'], skip: [] }).map((u) => u.name)).toEqual(['c', 'b']);
    expect(selectUnits(units, { only: [], skip: ['a'] }).map((u) => u.name)).toEqual(['c', 'b']);
  });
});

describe('planProvisioning', () => {
  let root = '';

  afterEach(() => {
    if (root) rmSync(root, { recursive: true, force: true });
  });

  it('lists what a run would do without changing anything', async () => {
    root = tempDir();
    mkdirSync(join(root, 'venv'));
    mkdirSync(join(root, 'models'));
    writeFileSync(join(root, 'models', 'a.bin'), 'present');
    const exec = fakeExec();
    const profile = profileOf({
      units: [
        { kind: 'command', name: 'venv', check: { path: 'venv', type: 'dir' }, steps: [{ run: ['python3', '-m', 'venv', 'venv'] }] },
        { kind: 'git', name: 'repo', repo: 'https://example.com/repo.git', dest: 'repo', description: 'Example repo' },
        {
          kind: 'download',
          name: 'models',
          destination: 'models',
          files: [{ url: 'https://example.com/a.bin' }, { url: 'https://example.com/b.bin' }],
          variants: {
            token_env: 'HF_TOKEN',
            probe_url: 'https://huggingface.co/api/whoami-v2',
            licensed: [{ url: 'https://huggingface.co/x/resolve/main/dev.bin' }],
            fallback: [{ url: 'https://huggingface.co/x/resolve/main/schnell.bin' }],
          },
        },
      ],
    });

    const plan = await planProvisioning({
      profile,
      config: makeConfig({ workspace: root, home: root, autoUpdate: false }),
      env: { PATH: '' },
      exec,
      fetch: unreachableFetch,
      logger: createLogger({ module: 'test' }),
    });

    expect(plan.skipMarker).toBeNull();
    expect(plan.entries).toEqual([
      { unit: 'venv', kind: 'command', action: 'skip' },
      { unit: 'repo', kind: 'git', action: 'install', detail: 'Example repo' },
      { unit: 'models', kind: 'download', action: 'skip', target: join(root, 'models', 'a.bin') },
      { unit: 'models', kind: 'download', action: 'download', target: join(root, 'models', 'b.bin') },
      {
        unit: 'models',
        kind: 'download',
        action: 'download',
        target: join(root, 'models', 'dev.bin'),
        detail: 'licensed, needs HF_TOKEN',
      },
      { unit: 'models', kind: 'download', action: 'download', target: join(root, 'models', 'schnell.bin'), detail: 'fallback' },
    ]);
    expect(exec.calls).toHaveLength(0);
  });

  it('plans an update for a present git unit when auto-update is on', async () => {
    root = tempDir();
    mkdirSync(join(root, 'repo'));
    const profile = profileOf({
      units: [{ kind: 'git', name: 'repo', repo: 'https://example.com/repo.git', dest: 'repo' }],
    });

    const plan = await planProvisioning({
      profile,
      config: makeConfig({ workspace: root, home: root }),
      env: { PATH: '' },
      exec: fakeExec(),
      fetch: unreachableFetch,
      logger: createLogger({ module: 'test' }),
    });

    expect(plan.entries).toEqual([{ unit: 'repo', kind: 'git', action: 'update' }]);
  });

  it('reports the skip marker and plans nothing', async () => {
    root = tempDir();
    writeFileSync(join(root, 'done'), '');

    const plan = await planProvisioning({
      profile: profileOf({ skip_marker: 'done' }),
      config: makeConfig({ workspace: root, home: root }),
      env: {},
      exec: fakeExec(),
      fetch: unreachableFetch,
      logger: createLogger({ module: 'test' }),
    });

    expect(plan).toEqual({ skipMarker: join(root, 'done'), entries: [] });
  });
});
