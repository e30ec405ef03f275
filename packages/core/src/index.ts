/**
 * @opsbridge/core — barrel export
 *
 * Service clients shared by the CLI.
 */

// Configuration
export { ConfigError, loadEnvFile, loadJiraConfig, loadConfluenceConfig, loadRedshiftConfig } from './config.js';
export type { Env, JiraConfig, ConfluenceConfig, RedshiftConfig } from './config.js';

// HTTP plumbing
export { ServiceRequestError, describeErrorBody } from './http/errors.js';
export type { ServiceName } from './http/errors.js';
export { ResponseShapeError } from './http/validate.js';

// Jira
export { JiraTools, SUMMARY_FIELDS } from './jira/client.js';
export type { JiraToolsOptions } from './jira/client.js';
export {
  CLOSED_STATUSES,
  buildMyIssuesJql,
  decodeEscapes,
  expandNewlines,
  openIssuesOnly,
  parseJiraDate,
  quoteJql,
  sortIssues,
} from './jira/issues.js';
export type { IssueSortField, SortOrder } from './jira/issues.js';
export type {
  CreatedComment,
  CreatedIssue,
  HistoryEntry,
  IssueComment,
  IssueDetails,
  IssueMetrics,
  IssueSummary,
  JiraProject,
  LinkedIssueRef,
  RelatedIssue,
} from './jira/types.js';

// Confluence
export { ConfluenceTools, PersonalSpaceError, confluenceSiteRoot } from './confluence/client.js';
export type { ConfluenceToolsOptions } from './confluence/client.js';
export type { ConfluenceContent, ConfluenceSpace, ContentVersion } from './confluence/types.js';

// Redshift query context reporter
export { DEFAULT_SCHEMA, DEFAULT_REDSHIFT_PORT } from './redshift/defaults.js';
export {
  WarehouseError,
  WarehouseConnectionError,
  QueryExecutionError,
  CatalogLookupError,
} from './redshift/errors.js';
export type { WarehouseErrorCode } from './redshift/errors.js';
export { connectRedshift, redshiftConnectionFactory } from './redshift/connection.js';
export type { ConnectionFactory } from './redshift/connection.js';
export { CatalogCache, LIST_TABLES_SQL, LIST_COLUMNS_SQL } from './redshift/catalog.js';
export { extractReferencedTables } from './redshift/table-refs.js';
export { toFrame, frameToRecords } from './redshift/frame.js';
export { QueryContextReporter, unwrapOutcome } from './redshift/reporter.js';
export type { ReporterOptions } from './redshift/reporter.js';
export { withReporter, runQuery } from './redshift/run.js';
export type { OutputShape, RunQueryOptions } from './redshift/run.js';
export { formatDiagnostic, textDiagnosticSink } from './redshift/diagnostics.js';
export type {
  ColumnInfo,
  DiagnosticSink,
  QueryDiagnostic,
  QueryOutcome,
  Row,
  TabularFrame,
  WarehouseConnection,
  WarehouseQueryResult,
} from './redshift/types.js';
