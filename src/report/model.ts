/**
 * Report model construction
 *
 * Results and reports are frozen once built; renderers only read them.
 *
 * @license MIT
 */

import type { CheckDefinition, CheckOutcome, CheckResult, Report, ResultRow } from '../types.js';

/**
 * Build the result for a check, or null when its result set is empty
 */
export function createCheckResult(check: CheckDefinition, rows: readonly ResultRow[]): CheckResult | null {
  if (rows.length === 0) {
    return null;
  }

  return Object.freeze({
    name: check.name,
    description: check.description ?? '',
    warning: check.warningMessage ?? '',
    rows: Object.freeze(rows.map(row => Object.freeze([...row]))),
  });
}

export function createReport(results: readonly CheckResult[]): Report {
  return Object.freeze([...results]);
}

/**
 * Report made of the checks that produced findings, in outcome order
 */
export function reportFromOutcomes(outcomes: readonly CheckOutcome[]): Report {
  const results: CheckResult[] = [];

  for (const outcome of outcomes) {
    if (outcome.status === 'findings') {
      results.push(outcome.result);
    }
  }

  return createReport(results);
}

export function failedOutcomes(
  outcomes: readonly CheckOutcome[]
): Extract<CheckOutcome, { status: 'failed' }>[] {
  return outcomes.filter(
    (outcome): outcome is Extract<CheckOutcome, { status: 'failed' }> => outcome.status === 'failed'
  );
}

/**
 * Total number of finding rows across the report
 */
export function countFindings(report: Report): number {
  return report.reduce((total, result) => total + result.rows.length, 0);
}
