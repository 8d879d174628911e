/**
 * Retry / back-off policy for install actions and transfers.
 *
 * Every unit action and every download goes through `withRetry`, so
 * transient failures are handled uniformly: a bounded number of
 * automatic attempts, then an optional operator prompt, then a
 * recorded failure.  An action failing never makes `withRetry` throw.
 */

import { errorMessage } from './errors.js';
import type { StructuredLogger } from './logger.js';

export interface RetryPolicy {
  maxAttempts: number;
  initialDelayMs: number;
  maxDelayMs: number;
  backoffFactor: number;
  /** Whether the operator may be asked to keep retrying once maxAttempts is reached. */
  allowInteractive: boolean;
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxAttempts: 3,
  initialDelayMs: 1000,
  maxDelayMs: 30_000,
  backoffFactor: 2,
  allowInteractive: true,
};

export type RetryResult<T> =
  | {
      success: true;
      value: T;
      attempts: number;
      errors: string[];
    }
  | {
      success: false;
      attempts: number;
      errors: string[];
      lastError: unknown;
      /** The operator was asked and declined to retry further. */
      abandonedByOperator: boolean;
    };

/** Asks the operator a yes/no question; resolves `true` for "retry". */
export type RetryPrompt = (question: string) => Promise<boolean>;

export interface RetryOptions {
  description: string;
  logger?: StructuredLogger;
  /**
   * Only supplied when the run is interactive.  Without it, reaching
   * `maxAttempts` is terminal regardless of `allowInteractive`.
   */
  prompt?: RetryPrompt;
  sleep?: (ms: number) => Promise<void>;
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export function resolvePolicy(overrides: Partial<RetryPolicy> = {}): RetryPolicy {
  return { ...DEFAULT_RETRY_POLICY, ...overrides };
}

/**
 * Execute `fn` with exponential back-off and optional interactive
 * escalation.  `attempts` in the result counts every invocation of `fn`,
 * including those made after the operator asked to continue.
 */
export async function withRetry<T>(
  fn: (attempt: number) => T | Promise<T>,
  policy: RetryPolicy,
  opts: RetryOptions,
): Promise<RetryResult<T>> {
  const { description, logger } = opts;
  const wait = opts.sleep ?? sleep;
  const maxAttempts = Math.max(1, policy.maxAttempts);
  const errors: string[] = [];

  let attempts = 0;
  let round = 0;
  let delay = policy.initialDelayMs;

  for (;;) {
    attempts++;
    round++;

    try {
      const value = await fn(attempts);
      logger?.info('retry.success', `Success: ${description}`, { attempts });
      return { success: true, value, attempts, errors };
    } catch (err) {
      const msg = errorMessage(err);
      errors.push(`attempt ${attempts}: ${msg}`);
      logger?.warn('retry.attempt', `Attempt #${round} failed: ${description}`, {
        attempt: round,
        total_attempts: attempts,
        error: msg,
      });

      if (round < maxAttempts) {
        await wait(Math.min(delay, policy.maxDelayMs));
        delay *= policy.backoffFactor;
        continue;
      }

      let abandonedByOperator = false;
      if (policy.allowInteractive && opts.prompt) {
        // A closed prompt (Ctrl+C, stdin EOF) is not an answer.
        let answer: boolean | null = null;
        try {
          answer = await opts.prompt(`Failed: ${description}. Retry?`);
        } catch (promptErr) {
          logger?.warn('retry.prompt', `Prompt closed, not retrying: ${description}`, {
            error: errorMessage(promptErr),
          });
        }
        if (answer === true) {
          round = 0;
          delay = policy.initialDelayMs;
          continue;
        }
        abandonedByOperator = answer === false;
      }

      logger?.error('retry.give_up', `Giving up: ${description}`, { attempts, error: msg });
      return { success: false, attempts, errors, lastError: err, abandonedByOperator };
    }
  }
}
