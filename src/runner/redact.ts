/**
 * Denylist-based redaction for logs and run artifacts.
 *
 * Download tokens travel through URLs, headers and environment lookups,
 * so every structured log line and evidence file passes through here
 * before it is written.
 */

/** Default key patterns that must never appear in output. */
export const REDACT_DENYLIST_KEYS: readonly string[] = [
  'password',
  'secret',
  'token',
  'api_key',
  'apikey',
  'access_key',
  'private_key',
  'authorization',
  'credential',
  'bearer',
];

/** Regex patterns that match sensitive values regardless of key name. */
const REDACT_VALUE_PATTERNS: readonly RegExp[] = [
  /hf_[a-zA-Z0-9]{30,}/,                 // Hugging Face access token
  /ghp_[0-9a-zA-Z]{36}/,                 // GitHub PAT
  /sk-[a-zA-Z0-9]{32,}/,                 // OpenAI-style key
  /-----BEGIN (?:RSA |EC )?PRIVATE KEY-----/,
  /Bearer\s+\S+/i,
];

/** Query parameters that carry credentials in download URLs. */
const SENSITIVE_QUERY_PATTERN = /([?&](?:token|access_token|api_key|key)=)[^&#\s"']*/gi;

const REDACTED = '[REDACTED]';

function keyMatchesDenylist(key: string): boolean {
  const lower = key.toLowerCase();
  return REDACT_DENYLIST_KEYS.some((dk) => lower.includes(dk));
}

function valueMatchesPattern(value: string): boolean {
  return REDACT_VALUE_PATTERNS.some((p) => p.test(value));
}

/**
 * Deep-redact a value: keys on the denylist become `[REDACTED]`, strings
 * matching a secret pattern become `[REDACTED]`, and URLs lose the values
 * of credential query parameters.  Returns a new value (never mutates).
 */
export function redact(obj: unknown): unknown {
  if (obj === null || obj === undefined) return obj;

  if (typeof obj === 'string') {
    if (valueMatchesPattern(obj)) return REDACTED;
    return /^https?:\/\//i.test(obj) ? redactUrl(obj) : obj;
  }

  if (typeof obj !== 'object') return obj;

  if (Array.isArray(obj)) {
    return obj.map((item) => redact(item));
  }

  const out: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(obj)) {
    out[key] = keyMatchesDenylist(key) ? REDACTED : redact(value);
  }
  return out;
}

/**
 * Mask credential query parameters (`?token=...`) and userinfo in a URL.
 */
export function redactUrl(input: string): string {
  return input
    .replace(SENSITIVE_QUERY_PATTERN, `$1${REDACTED}`)
    .replace(/^(https?:\/\/)[^/@\s]+@/i, '$1');
}

/**
 * Redact a free-form string by replacing inline secret patterns.
 */
export function redactString(input: string): string {
  let result = input;
  result = result.replace(/hf_[a-zA-Z0-9]{30,}/g, REDACTED);
  result = result.replace(/ghp_[0-9a-zA-Z]{36}/g, REDACTED);
  result = result.replace(/sk-[a-zA-Z0-9]{32,}/g, REDACTED);
  result = result.replace(/-----BEGIN (?:RSA |EC )?PRIVATE KEY-----/g, REDACTED);
  result = result.replace(/(Bearer\s+)\S+/gi, `$1${REDACTED}`);
  result = result.replace(SENSITIVE_QUERY_PATTERN, `$1${REDACTED}`);
  result = result.replace(/[a-zA-Z0-9_]+_token\s*[:=]\s*['"]?[a-zA-Z0-9_-]{16,}['"]?/gi, REDACTED);
  return result;
}
