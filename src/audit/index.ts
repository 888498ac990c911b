/**
 * Audit orchestration
 *
 * Load checks, resolve the password, run the checks over one scoped
 * connection, then render the report and write it where the format asks.
 *
 * @license MIT
 */

import { loadCheckDocument } from '../config/loader.js';
import { OracleConnector, withConnection } from '../connectors/oracle.js';
import { resolvePassword, type SecretStore } from '../credentials/resolver.js';
import { createComponentLogger, logTimedOperation, type StructuredLogger } from '../observability/logger.js';
import { loadStylesheetDirectory, reportFileName, writeReportArtifact } from '../report/artifact.js';
import { renderHtmlReport } from '../report/html-renderer.js';
import { countFindings, failedOutcomes, reportFromOutcomes } from '../report/model.js';
import { renderTextReport } from '../report/text-renderer.js';
import { collectCheckOutcomes, runChecks } from '../runner/check-runner.js';
import type {
  ConnectionTarget,
  ManagedConnection,
  OracleConnectorConfig,
  ThickClientOptions,
} from '../types/connector.js';
import { describeTarget } from '../types/connector.js';
import type { CheckCursor, CheckOutcome, OutputFormat, Report, RunMode } from '../types.js';

export type AuditConnection = CheckCursor & ManagedConnection;

export interface AuditOptions {
  target: ConnectionTarget;
  user: string;
  /** Literal password or `gcp-secret:<name>` reference */
  password: string;
  /** Check document path (default: bundled catalogue) */
  configPath?: string;
  format?: OutputFormat;
  /** `fail-fast` aborts on the first failing check; `continue` records failures */
  mode?: RunMode;
  /** Directory for the HTML artifact (default: cwd) */
  outputDir?: string;
  /** Directory of extra `.css` files to inline into the HTML report */
  cssDir?: string;
  /** Driver round-trip timeout in milliseconds */
  callTimeout?: number;
  /** Connect in thick mode through the Oracle Client libraries */
  thickClient?: ThickClientOptions;
  now?: () => Date;
  secretStore?: SecretStore | (() => SecretStore);
  createConnection?: (config: OracleConnectorConfig) => AuditConnection;
  logger?: StructuredLogger;
}

export interface AuditResult {
  report: Report;
  /** Per-check outcomes, in `continue` mode only */
  outcomes?: CheckOutcome[];
  failedChecks: string[];
  /** Rendered report (text or HTML) */
  rendered: string;
  /** Where the HTML report was written */
  artifactPath?: string;
}

/**
 * Run a full audit
 *
 * Configuration and credential errors surface before any connection is
 * opened. In fail-fast mode a failing check rejects with CheckExecutionError
 * and nothing is rendered; the connection is closed either way.
 */
export async function runAudit(options: AuditOptions): Promise<AuditResult> {
  const logger = options.logger ?? createComponentLogger('audit');
  const format = options.format ?? 'text';
  const mode = options.mode ?? 'fail-fast';
  const now = options.now ?? (() => new Date());

  const document = await loadCheckDocument(options.configPath);
  logger.info('Check document loaded', {
    checks: document.checks.length,
    excludedOwners: document.ownerExcludeList.length,
  });

  const password = await resolvePassword(options.password, {
    secretStore: options.secretStore,
    logger,
  });

  const connectorConfig: OracleConnectorConfig = {
    target: options.target,
    user: options.user,
    password,
    ...(options.callTimeout ? { callTimeout: options.callTimeout } : {}),
    ...(options.thickClient ? { thickClient: options.thickClient } : {}),
  };
  const connection = options.createConnection
    ? options.createConnection(connectorConfig)
    : new OracleConnector(connectorConfig, { logger: logger.child({ component: 'oracle' }) });

  const runDate = now();
  const runnerOptions = { logger: logger.child({ component: 'check-runner' }) };

  const { report, outcomes } = await logTimedOperation(logger, 'check batch', () =>
    withConnection(connection, async (cursor) => {
      if (mode === 'continue') {
        const collected = await collectCheckOutcomes(cursor, document.checks, document.ownerExcludeList, runnerOptions);
        return { report: reportFromOutcomes(collected), outcomes: collected };
      }
      return {
        report: await runChecks(cursor, document.checks, document.ownerExcludeList, runnerOptions),
        outcomes: undefined,
      };
    }),
    { target: describeTarget(options.target), mode }
  );

  const failedChecks = outcomes ? failedOutcomes(outcomes).map(outcome => outcome.name) : [];

  logger.info('Audit finished', {
    target: describeTarget(options.target),
    checksWithFindings: report.length,
    findings: countFindings(report),
    failedChecks: failedChecks.length,
  });

  if (format === 'text') {
    return { report, outcomes, failedChecks, rendered: renderTextReport(report) };
  }

  const extraStylesheets = options.cssDir ? await loadStylesheetDirectory(options.cssDir) : [];
  const rendered = renderHtmlReport(report, { now: () => runDate, extraStylesheets });
  const artifactPath = await writeReportArtifact(
    options.outputDir ?? process.cwd(),
    reportFileName(options.target, runDate, format),
    rendered
  );

  logger.info('HTML report written', { path: artifactPath });

  return { report, outcomes, failedChecks, rendered, artifactPath };
}
