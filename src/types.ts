/**
 * Shared TypeScript types for the compatibility audit
 *
 * @license MIT
 */

// ==============================================
// Check Definitions
// ==============================================

/**
 * One compatibility rule: a named SQL query plus the text shown with its findings
 */
export interface CheckDefinition {
  readonly name: string;
  /** SQL template; `{owner_exclude_list}` is replaced before execution */
  readonly query: string;
  readonly description?: string;
  readonly warningMessage?: string;
}

/**
 * Schema/owner names substituted into every check query
 */
export type ExclusionList = readonly string[];

/**
 * Loaded check definition document
 */
export interface CheckDocument {
  readonly checks: readonly CheckDefinition[];
  readonly ownerExcludeList: ExclusionList;
}

// ==============================================
// Report Model
// ==============================================

/**
 * One row of a check's result set, columns in select-list order
 */
export type ResultRow = readonly unknown[];

/**
 * Findings of a check that returned at least one row
 */
export interface CheckResult {
  readonly name: string;
  readonly description: string;
  readonly warning: string;
  readonly rows: readonly ResultRow[];
}

/**
 * Ordered results of one run, in check definition order
 */
export type Report = readonly CheckResult[];

/**
 * Per-check outcome when the runner collects failures instead of aborting
 */
export type CheckOutcome =
  | { readonly status: 'findings'; readonly name: string; readonly result: CheckResult }
  | { readonly status: 'empty'; readonly name: string }
  | { readonly status: 'failed'; readonly name: string; readonly error: Error };

export type RunMode = 'fail-fast' | 'continue';

export type OutputFormat = 'text' | 'html';

// ==============================================
// Execution Handle
// ==============================================

/**
 * Exclusive statement handle for one batch of checks
 *
 * The runner owns the handle for the duration of a batch and awaits each
 * statement before issuing the next; implementations need not support
 * concurrent calls.
 */
export interface CheckCursor {
  /** Execute a statement and return every row of its result set */
  execute(sql: string): Promise<ResultRow[]>;
}
