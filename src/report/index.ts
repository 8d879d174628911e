/**
 * Run report: outcomes accumulated over one provisioning run.
 *
 * Outcomes are appended in the order units (and download specs) finish
 * their turn.  A failure never stops the run; it only decides the exit
 * status.  Failures the operator explicitly abandoned at the retry
 * prompt are reported but do not make the exit status non-zero.
 */

import { EXIT_SUCCESS, EXIT_UNITS_FAILED } from '../runner/index.js';
import type { RunOutcome, RunReportSummary } from '../contracts/index.js';

export interface RunReport {
  record(outcome: RunOutcome): void;
  outcomes(): readonly RunOutcome[];
  failures(): readonly RunOutcome[];
  exitCode(): number;
  summary(): RunReportSummary;
}

export function createRunReport(): RunReport {
  const recorded: RunOutcome[] = [];

  const failures = (): RunOutcome[] => recorded.filter((o) => o.status === 'failed');
  const exitCode = (): number =>
    failures().some((o) => !o.abandoned_by_operator) ? EXIT_UNITS_FAILED : EXIT_SUCCESS;

  return {
    record(outcome) {
      recorded.push(outcome);
    },

    outcomes: () => recorded,
    failures,
    exitCode,

    summary() {
      const failed = failures();
      const unique = (names: string[]): string[] => [...new Set(names)];
      return {
        total: recorded.length,
        skipped: recorded.filter((o) => o.status === 'skipped').length,
        succeeded: recorded.filter((o) => o.status === 'succeeded').length,
        failed: failed.length,
        failed_units: unique(failed.map((o) => o.unit)),
        abandoned_units: unique(failed.filter((o) => o.abandoned_by_operator).map((o) => o.unit)),
        exit_code: exitCode(),
        outcomes: [...recorded],
      };
    },
  };
}

/** One line per outcome, for the human-readable summary. */
export function formatOutcome(outcome: RunOutcome): string {
  const status = outcome.status.toUpperCase().padEnd(9);
  const suffix = outcome.status === 'failed'
    ? ` (${outcome.abandoned_by_operator ? 'abandoned: ' : ''}${outcome.error ?? 'unknown error'})`
    : outcome.detail ? ` (${outcome.detail})` : '';
  return `${status} ${outcome.name}${suffix}`;
}
