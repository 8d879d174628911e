import { describe, expect, it } from 'vitest';
import {
  bearerHeader,
  createCredentialResolver,
  hasValidToken,
  hostMatches,
  selectVariant,
  DEFAULT_CREDENTIAL_RULES,
} from '../credentials/index.js';
import type { Fetch } from '../transfer/index.js';
import { statusFetch } from './helpers.js';

const env = { HF_TOKEN: 'test-hf-secret', CIVITAI_TOKEN: 'test-civitai-secret' };
const PROBE = 'https://huggingface.co/api/whoami-v2';

describe('hostMatches', () => {
  const rule = { host: 'huggingface.co', env: 'HF_TOKEN', include_subdomains: true };

  it('matches the exact host and dot-separated subdomains', () => {
    expect(hostMatches('huggingface.co', rule)).toBe(true);
    expect(hostMatches('cdn-lfs.huggingface.co', rule)).toBe(true);
    expect(hostMatches('HuggingFace.co', rule)).toBe(true);
  });

  it('does not match lookalike hosts', () => {
    expect(hostMatches('evilhuggingface.co', rule)).toBe(false);
    expect(hostMatches('huggingface.co.example.com', rule)).toBe(false);
  });

  it('honours include_subdomains = false', () => {
    expect(hostMatches('cdn-lfs.huggingface.co', { ...rule, include_subdomains: false })).toBe(false);
  });
});

describe('createCredentialResolver', () => {
  const resolver = createCredentialResolver(DEFAULT_CREDENTIAL_RULES, env);

  it('resolves the secret of the first matching rule', () => {
    expect(resolver.resolve('https://huggingface.co/org/repo/resolve/main/model.gguf')).toEqual({
      host: 'huggingface.co',
      env: 'HF_TOKEN',
      secret: 'test-hf-secret',
    });
    expect(resolver.resolve('https://civitai.com/api/download/models/1?type=Model')?.env).toBe('CIVITAI_TOKEN');
  });

  it('ignores hosts that only contain a registry name in the path or query', () => {
    expect(resolver.resolve('https://example.com/huggingface.co/model.gguf')).toBeNull();
    expect(resolver.resolve('https://example.com/x?mirror=civitai.com')).toBeNull();
  });

  it('never sends credentials over plain http', () => {
    expect(resolver.resolve('http://huggingface.co/org/repo/resolve/main/model.gguf')).toBeNull();
  });

  it('resolves malformed URLs to none', () => {
    expect(resolver.resolve('not a url')).toBeNull();
  });

  it('treats an unset or blank variable as no credential', () => {
    const blank = createCredentialResolver(DEFAULT_CREDENTIAL_RULES, { HF_TOKEN: '   ' });
    expect(blank.resolve('https://huggingface.co/a/b')).toBeNull();
    expect(blank.resolve('https://civitai.com/a/b')).toBeNull();
  });

  it('is a pure function of URL and environment', () => {
    const url = 'https://cdn-lfs.huggingface.co/repos/x/y';
    expect(resolver.resolve(url)).toEqual(resolver.resolve(url));
  });

  it('tries rules in declaration order', () => {
    const ordered = createCredentialResolver(
      [
        { host: 'hf.example.com', env: 'FIRST', include_subdomains: true },
        { host: 'example.com', env: 'SECOND', include_subdomains: true },
      ],
      { FIRST: 'test-first', SECOND: 'test-second' },
    );
    expect(ordered.resolve('https://hf.example.com/x')?.env).toBe('FIRST');
    expect(ordered.resolve('https://www.example.com/x')?.env).toBe('SECOND');
  });

  it('falls through to a later rule when the first match has no secret', () => {
    const overlapping = createCredentialResolver(
      [
        { host: 'hf.example.com', env: 'FIRST', include_subdomains: true },
        { host: 'example.com', env: 'SECOND', include_subdomains: true },
      ],
      { FIRST: '', SECOND: 'test-second' },
    );
    expect(overlapping.resolve('https://hf.example.com/x')).toEqual({
      host: 'example.com',
      env: 'SECOND',
      secret: 'test-second',
    });
  });
});

describe('bearerHeader', () => {
  it('builds an Authorization header only for a resolved credential', () => {
    expect(bearerHeader({ host: 'huggingface.co', env: 'HF_TOKEN', secret: 'test-secret' })).toEqual({
      Authorization: 'Bearer test-secret',
    });
    expect(bearerHeader(null)).toEqual({});
  });
});

describe('hasValidToken', () => {
  it('is true only for HTTP 200', async () => {
    expect(await hasValidToken('test-secret', { endpoint: PROBE, fetch: statusFetch(200) })).toBe(true);
    expect(await hasValidToken('test-secret', { endpoint: PROBE, fetch: statusFetch(401) })).toBe(false);
    expect(await hasValidToken('test-secret', { endpoint: PROBE, fetch: statusFetch(500) })).toBe(false);
  });

  it('sends the token as a bearer header to the fixed endpoint', async () => {
    const seen: Array<{ url: string; init?: RequestInit }> = [];
    await hasValidToken('test-secret', { endpoint: PROBE, fetch: statusFetch(200, seen) });

    expect(seen).toHaveLength(1);
    expect(seen[0]?.url).toBe(PROBE);
    expect(seen[0]?.init?.method).toBe('GET');
    expect(seen[0]?.init?.headers).toEqual({
      Authorization: 'Bearer test-secret',
      'Content-Type': 'application/json',
    });
  });

  it('is false on a network error and never throws', async () => {
    const broken: Fetch = async () => {
      throw new TypeError('fetch failed');
    };
    expect(await hasValidToken('test-secret', { endpoint: PROBE, fetch: broken })).toBe(false);
  });

  it('does not make a request for an empty secret', async () => {
    const seen: Array<{ url: string; init?: RequestInit }> = [];
    expect(await hasValidToken('', { endpoint: PROBE, fetch: statusFetch(200, seen) })).toBe(false);
    expect(await hasValidToken(undefined, { endpoint: PROBE, fetch: statusFetch(200, seen) })).toBe(false);
    expect(seen).toHaveLength(0);
  });
});

describe('selectVariant', () => {
  it('selects the licensed set when the probe answers 200', async () => {
    expect(await selectVariant('HF_TOKEN', env, { endpoint: PROBE, fetch: statusFetch(200) })).toBe('licensed');
  });

  it('selects the fallback set for any other status or a network error', async () => {
    expect(await selectVariant('HF_TOKEN', env, { endpoint: PROBE, fetch: statusFetch(403) })).toBe('fallback');
    const broken: Fetch = async () => {
      throw new Error('ECONNRESET');
    };
    expect(await selectVariant('HF_TOKEN', env, { endpoint: PROBE, fetch: broken })).toBe('fallback');
  });

  it('selects the fallback set when the variable is unset', async () => {
    expect(await selectVariant('HF_TOKEN', {}, { endpoint: PROBE, fetch: statusFetch(200) })).toBe('fallback');
  });
});
