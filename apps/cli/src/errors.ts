import {
  CatalogLookupError,
  ConfigError,
  PersonalSpaceError,
  QueryExecutionError,
  ResponseShapeError,
  ServiceRequestError,
  WarehouseConnectionError,
} from '@opsbridge/core';

export const EXIT_CODE_SUCCESS = 0;
export const EXIT_CODE_USAGE = 1;
export const EXIT_CODE_RUNTIME = 2;
export const EXIT_CODE_CONFIG = 3;

export type CliErrorCode =
  | 'INVALID_ARGS'
  | 'CONFIG_MISSING'
  | 'PERSONAL_SPACE_ONLY'
  | 'TRANSITION_UNAVAILABLE'
  | 'PDF_EXPORT_FAILED'
  | 'JIRA_REQUEST_FAILED'
  | 'CONFLUENCE_REQUEST_FAILED'
  | 'UNEXPECTED_RESPONSE'
  | 'DB_CONN_FAILED'
  | 'DB_QUERY_FAILED'
  | 'CATALOG_LOOKUP_FAILED'
  | 'INTERNAL_ERROR';

export type CliErrorKind = 'usage' | 'runtime' | 'config';

export class CliError extends Error {
  readonly kind: CliErrorKind;
  readonly code: CliErrorCode;
  readonly details?: unknown;

  constructor(kind: CliErrorKind, code: CliErrorCode, message: string, details?: unknown) {
    super(message);
    this.kind = kind;
    this.code = code;
    this.details = details;
  }
}

export function usageError(message: string, code: CliErrorCode = 'INVALID_ARGS', details?: unknown): CliError {
  return new CliError('usage', code, message, details);
}

export function runtimeError(message: string, code: CliErrorCode = 'INTERNAL_ERROR', details?: unknown): CliError {
  return new CliError('runtime', code, message, details);
}

export function configError(message: string, missing: string[]): CliError {
  return new CliError('config', 'CONFIG_MISSING', message, missing.length > 0 ? { missing } : undefined);
}

/**
 * Map errors raised by @opsbridge/core onto CLI errors. Anything
 * unrecognised comes back unchanged.
 */
export function toCliError(error: unknown): unknown {
  if (error instanceof CliError) return error;
  if (error instanceof ConfigError) return configError(error.message, error.missing);
  if (error instanceof PersonalSpaceError) return usageError(error.message, 'PERSONAL_SPACE_ONLY');
  if (error instanceof ServiceRequestError) {
    return runtimeError(
      error.message,
      error.service === 'jira' ? 'JIRA_REQUEST_FAILED' : 'CONFLUENCE_REQUEST_FAILED',
      error.status !== undefined ? { status: error.status } : undefined,
    );
  }
  if (error instanceof ResponseShapeError) return runtimeError(error.message, 'UNEXPECTED_RESPONSE');
  if (error instanceof WarehouseConnectionError) return runtimeError(error.message, 'DB_CONN_FAILED');
  if (error instanceof QueryExecutionError) return runtimeError(error.message, 'DB_QUERY_FAILED');
  if (error instanceof CatalogLookupError) {
    return runtimeError(error.message, 'CATALOG_LOOKUP_FAILED', { target: error.target });
  }
  return error;
}

export function toExitCode(error: unknown): number {
  const mapped = toCliError(error);
  if (mapped instanceof CliError) {
    if (mapped.kind === 'usage') return EXIT_CODE_USAGE;
    if (mapped.kind === 'config') return EXIT_CODE_CONFIG;
    return EXIT_CODE_RUNTIME;
  }
  return EXIT_CODE_RUNTIME;
}
