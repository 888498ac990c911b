/**
 * Check execution engine
 *
 * Runs each check definition against one exclusively-owned cursor, strictly
 * in definition order, and aggregates the non-empty result sets into a report.
 *
 * @license MIT
 */

import type {
  CheckCursor,
  CheckDefinition,
  CheckOutcome,
  CheckResult,
  ExclusionList,
  Report,
  ResultRow,
} from '../types.js';
import { CheckExecutionError } from '../errors/index.js';
import { createComponentLogger, type StructuredLogger } from '../observability/logger.js';
import { createCheckResult, createReport } from '../report/model.js';
import { renderQuery } from './substitution.js';

export interface CheckRunnerOptions {
  logger?: StructuredLogger;
}

/**
 * Run every check and return the report of checks with findings
 *
 * Fails fast: the first check whose statement fails aborts the batch with a
 * CheckExecutionError and no report is produced.
 */
export async function runChecks(
  cursor: CheckCursor,
  checks: readonly CheckDefinition[],
  exclusions: ExclusionList,
  options: CheckRunnerOptions = {}
): Promise<Report> {
  const logger = options.logger ?? createComponentLogger('check-runner');
  const results: CheckResult[] = [];

  for (const check of checks) {
    const result = await executeCheck(cursor, check, exclusions, logger);
    if (result) {
      results.push(result);
    }
  }

  logger.info('Checks completed', {
    operation: 'runChecks',
    checks: checks.length,
    checksWithFindings: results.length,
  });

  return createReport(results);
}

/**
 * Run every check, recording failures as outcomes instead of aborting
 *
 * Always returns one outcome per definition, in definition order.
 */
export async function collectCheckOutcomes(
  cursor: CheckCursor,
  checks: readonly CheckDefinition[],
  exclusions: ExclusionList,
  options: CheckRunnerOptions = {}
): Promise<CheckOutcome[]> {
  const logger = options.logger ?? createComponentLogger('check-runner');
  const outcomes: CheckOutcome[] = [];

  for (const check of checks) {
    try {
      const result = await executeCheck(cursor, check, exclusions, logger);
      outcomes.push(
        result
          ? { status: 'findings', name: check.name, result }
          : { status: 'empty', name: check.name }
      );
    } catch (error) {
      if (!(error instanceof CheckExecutionError)) {
        throw error;
      }
      outcomes.push({ status: 'failed', name: check.name, error });
    }
  }

  logger.info('Checks completed', {
    operation: 'collectCheckOutcomes',
    checks: checks.length,
    failed: outcomes.filter(outcome => outcome.status === 'failed').length,
  });

  return outcomes;
}

async function executeCheck(
  cursor: CheckCursor,
  check: CheckDefinition,
  exclusions: ExclusionList,
  logger: StructuredLogger
): Promise<CheckResult | null> {
  logger.info('Running check', { check: check.name });

  const sql = renderQuery(check.query, exclusions);
  const timer = logger.createTimer();

  let rows: ResultRow[];
  try {
    rows = await cursor.execute(sql);
  } catch (error) {
    logger.error('Check failed', error, { check: check.name });
    throw new CheckExecutionError(check.name, error);
  }

  timer.end('Check finished', { check: check.name, rowCount: rows.length });

  return createCheckResult(check, rows);
}
