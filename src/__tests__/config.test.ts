import { describe, expect, it } from 'vitest';
import { loadConfig, parseFlag, resolvePath, DEFAULT_CONCURRENCY, DEFAULT_SEGMENTS } from '../config/index.js';
import { ProfileSchema } from '../contracts/index.js';
import type { Profile, ProfileInput } from '../contracts/index.js';
import { ConfigError } from '../runner/index.js';

function profileOf(input: Partial<ProfileInput> = {}): Profile {
  return ProfileSchema.parse({
    profile_id: 'test',
    name: 'Test',
    workspace: '/srv/workspace',
    units: [
      { kind: 'command', name: 'node', steps: [{ run: ['true'] }] },
      { kind: 'command', name: 'comfyui', steps: [{ run: ['true'] }] },
    ],
    ...input,
  });
}

const base = { env: {}, isTTY: true, home: '/home/test' };

describe('parseFlag', () => {
  it('treats unset and empty as undefined', () => {
    expect(parseFlag(undefined)).toBeUndefined();
    expect(parseFlag('  ')).toBeUndefined();
  });

  it('recognises false values case-insensitively', () => {
    expect(['false', '0', 'No', 'OFF'].map(parseFlag)).toEqual([false, false, false, false]);
    expect(['true', '1', 'yes'].map(parseFlag)).toEqual([true, true, true]);
  });
});

describe('resolvePath', () => {
  const roots = { workspace: '/ws', home: '/home/test' };

  it('expands ~ and resolves relative paths under the workspace', () => {
    expect(resolvePath('~', roots)).toBe('/home/test');
    expect(resolvePath('~/.pyenv', roots)).toBe('/home/test/.pyenv');
    expect(resolvePath('ComfyUI/models', roots)).toBe('/ws/ComfyUI/models');
    expect(resolvePath('/opt/tools', roots)).toBe('/opt/tools');
  });
});

describe('loadConfig', () => {
  it('applies defaults', () => {
    expect(loadConfig(profileOf(), {}, base)).toEqual({
      workspace: '/srv/workspace',
      home: '/home/test',
      autoUpdate: true,
      concurrency: DEFAULT_CONCURRENCY,
      segments: DEFAULT_SEGMENTS,
      interactive: true,
      transfer: 'http',
      only: [],
      skip: [],
    });
  });

  it('takes the workspace from flags, then WORKSPACE, then the profile, then home', () => {
    const env = { WORKSPACE: '/env/ws' };
    expect(loadConfig(profileOf(), { workspace: '/flag/ws' }, { ...base, env }).workspace).toBe('/flag/ws');
    expect(loadConfig(profileOf(), {}, { ...base, env }).workspace).toBe('/env/ws');
    expect(loadConfig(profileOf({ workspace: undefined }), {}, base).workspace).toBe('/home/test');
  });

  it('expands a workspace under home', () => {
    expect(loadConfig(profileOf({ workspace: '~' }), {}, base).workspace).toBe('/home/test');
    expect(loadConfig(profileOf({ workspace: '~/ai' }), {}, base).workspace).toBe('/home/test/ai');
  });

  it('reads AUTO_UPDATE unless a flag overrides it', () => {
    const env = { AUTO_UPDATE: 'false' };
    expect(loadConfig(profileOf(), {}, { ...base, env }).autoUpdate).toBe(false);
    expect(loadConfig(profileOf(), { autoUpdate: true }, { ...base, env }).autoUpdate).toBe(true);
  });

  it('is interactive only on a terminal', () => {
    expect(loadConfig(profileOf(), { interactive: true }, { ...base, isTTY: false }).interactive).toBe(false);
    expect(loadConfig(profileOf(), { interactive: false }, base).interactive).toBe(false);
  });

  it('parses counts from flags and the environment', () => {
    const env = { PROVISION_CONCURRENCY: '6' };
    expect(loadConfig(profileOf(), {}, { ...base, env }).concurrency).toBe(6);
    expect(loadConfig(profileOf(), { concurrency: '2', segments: '16' }, { ...base, env })).toMatchObject({
      concurrency: 2,
      segments: 16,
    });
  });

  it('rejects counts that are not positive integers or are out of range', () => {
    expect(() => loadConfig(profileOf(), { concurrency: 'many' }, base)).toThrow(
      'concurrency must be a positive integer, got "many"',
    );
    expect(() => loadConfig(profileOf(), { segments: 0 }, base)).toThrow(ConfigError);
    expect(() => loadConfig(profileOf(), { concurrency: 100 }, base)).toThrow(ConfigError);
  });

  it('takes the transfer backend from flags, then the environment, then the profile', () => {
    const profile = profileOf({ transfer: 'aria2c' });
    expect(loadConfig(profile, {}, base).transfer).toBe('aria2c');
    expect(loadConfig(profile, {}, { ...base, env: { PROVISION_TRANSFER: 'http' } }).transfer).toBe('http');
    expect(loadConfig(profile, { transfer: 'http' }, base).transfer).toBe('http');
    expect(() => loadConfig(profile, { transfer: 'curl' }, base)).toThrow(ConfigError);
  });

  it('rejects unit names the profile does not define', () => {
    expect(loadConfig(profileOf(), { only: ['node'], skip: ['comfyui'] }, base)).toMatchObject({
      only: ['node'],
      skip: ['comfyui'],
    });
    expect(() => loadConfig(profileOf(), { only: ['node', 'nope'] }, base)).toThrow(
      'Unknown unit(s) for profile test: nope',
    );
  });
});
