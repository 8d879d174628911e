/**
 * Credential resolution for authenticated downloads.
 *
 * Rules map a registry host to the environment variable holding its
 * token.  Matching works on the parsed hostname (exact host or a
 * dot-separated subdomain of it), never on a substring of the URL, and
 * rules are tried in declaration order.
 */

import type { CredentialRule } from '../contracts/index.js';
import type { Env } from '../config/index.js';
import type { Fetch } from '../transfer/index.js';

export interface ResolvedCredential {
  /** Host pattern of the rule that matched. */
  host: string;
  env: string;
  secret: string;
}

export interface CredentialResolver {
  resolve(url: string): ResolvedCredential | null;
}

/** Rules used when a profile declares none. */
export const DEFAULT_CREDENTIAL_RULES: readonly CredentialRule[] = [
  { host: 'huggingface.co', env: 'HF_TOKEN', include_subdomains: true },
  { host: 'civitai.com', env: 'CIVITAI_TOKEN', include_subdomains: true },
];

export function hostMatches(hostname: string, rule: CredentialRule): boolean {
  const host = hostname.toLowerCase().replace(/\.$/, '');
  const pattern = rule.host.toLowerCase();
  if (host === pattern) return true;
  return rule.include_subdomains && host.endsWith(`.${pattern}`);
}

/**
 * Build a resolver over `rules` and an explicit environment snapshot.
 * A matching rule whose variable is unset or blank does not count as a
 * match, so a later rule for the same host can still apply.  With no
 * usable rule the request goes out unauthenticated.
 */
export function createCredentialResolver(rules: readonly CredentialRule[], env: Env): CredentialResolver {
  return {
    resolve(url: string): ResolvedCredential | null {
      let parsed: URL;
      try {
        parsed = new URL(url);
      } catch {
        return null;
      }
      if (parsed.protocol !== 'https:') return null;

      for (const rule of rules) {
        if (!hostMatches(parsed.hostname, rule)) continue;
        const secret = env[rule.env]?.trim();
        if (secret) return { host: rule.host, env: rule.env, secret };
      }
      return null;
    },
  };
}

export function bearerHeader(credential: ResolvedCredential | null): Record<string, string> {
  return credential ? { Authorization: `Bearer ${credential.secret}` } : {};
}

export interface TokenProbeOptions {
  endpoint: string;
  fetch?: Fetch;
  timeoutMs?: number;
}

/**
 * Probe a token against a fixed endpoint.  Classification is by status
 * code alone: 200 is valid; any other status, a timeout or a network
 * error is invalid.  Never throws.
 */
export async function hasValidToken(secret: string | undefined, opts: TokenProbeOptions): Promise<boolean> {
  if (!secret || secret.trim() === '') return false;
  const doFetch = opts.fetch ?? fetch;

  try {
    const response = await doFetch(opts.endpoint, {
      method: 'GET',
      headers: {
        Authorization: `Bearer ${secret.trim()}`,
        'Content-Type': 'application/json',
      },
      signal: AbortSignal.timeout(opts.timeoutMs ?? 15_000),
    });
    await response.body?.cancel();
    return response.status === 200;
  } catch {
    return false;
  }
}

export type VariantChoice = 'licensed' | 'fallback';

/**
 * Choose between a licensed and a fallback resource set based on
 * whether the token held in `tokenEnv` passes the probe.
 */
export async function selectVariant(
  tokenEnv: string,
  env: Env,
  opts: TokenProbeOptions,
): Promise<VariantChoice> {
  return (await hasValidToken(env[tokenEnv], opts)) ? 'licensed' : 'fallback';
}
