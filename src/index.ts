/**
 * ora-compat-audit - Oracle migration compatibility checks
 *
 * Run a catalogue of SQL checks against an Oracle database and render the
 * findings as a text or HTML report.
 *
 * @module ora-compat-audit
 * @license MIT
 */

// Audit orchestration
export { runAudit } from './audit/index.js';
export type { AuditOptions, AuditResult, AuditConnection } from './audit/index.js';

// Check runner
export { runChecks, collectCheckOutcomes } from './runner/check-runner.js';
export type { CheckRunnerOptions } from './runner/check-runner.js';
export { renderQuery, formatExclusionList, OWNER_EXCLUDE_PLACEHOLDER } from './runner/substitution.js';

// Report model and renderers
export {
  createCheckResult,
  createReport,
  reportFromOutcomes,
  failedOutcomes,
  countFindings,
} from './report/model.js';
export { renderTextReport } from './report/text-renderer.js';
export { renderHtmlReport, escapeHtml, REPORT_TITLE } from './report/html-renderer.js';
export type { HtmlRenderOptions } from './report/html-renderer.js';
export {
  deriveHostToken,
  targetToken,
  reportFileName,
  writeReportArtifact,
  loadStylesheetDirectory,
  REPORT_FILE_PREFIX,
} from './report/artifact.js';

// Check document
export { loadCheckDocument, parseCheckDocument, DEFAULT_CHECKS_PATH } from './config/loader.js';

// Credentials and connection
export {
  resolvePassword,
  isSecretReference,
  GoogleSecretManagerStore,
  SECRET_REFERENCE_PREFIX,
} from './credentials/resolver.js';
export type { SecretStore, SecretVersionAccessor } from './credentials/resolver.js';
export {
  OracleConnector,
  withConnection,
  buildConnectString,
  buildConnectAttributes,
  fetchTypeHandler,
} from './connectors/oracle.js';
export type { OracleDriver, OracleSession, OracleConnectAttributes } from './connectors/oracle.js';

// Errors
export {
  AuditError,
  ConfigurationError,
  CredentialError,
  ConnectionError,
  CheckExecutionError,
  RenderError,
  UnexpectedError,
  ErrorHandler,
} from './errors/index.js';

// Logging
export { StructuredLogger, createComponentLogger, LogLevel } from './observability/logger.js';
export type { LoggerConfig, LogContext } from './observability/logger.js';

export type {
  CheckDefinition,
  CheckDocument,
  CheckResult,
  CheckOutcome,
  CheckCursor,
  ExclusionList,
  OutputFormat,
  Report,
  ResultRow,
  RunMode,
} from './types.js';
export type {
  ConnectionTarget,
  DirectConnectionTarget,
  AliasConnectionTarget,
  OracleConnectorConfig,
  OracleProtocol,
  ManagedConnection,
  ThickClientOptions,
} from './types/connector.js';
export { describeTarget } from './types/connector.js';
