import axios from 'axios';

export type ServiceName = 'jira' | 'confluence';

const SERVICE_LABELS: Record<ServiceName, string> = {
  jira: 'Jira',
  confluence: 'Confluence',
};

export class ServiceRequestError extends Error {
  readonly service: ServiceName;
  readonly status?: number;

  constructor(service: ServiceName, message: string, status?: number, cause?: unknown) {
    super(message, { cause });
    this.name = 'ServiceRequestError';
    this.service = service;
    this.status = status;
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Pull the human-readable part out of an Atlassian error body.
 * Jira sends `errorMessages` and `errors`; Confluence sends `message`.
 */
export function describeErrorBody(body: unknown): string | undefined {
  if (typeof body === 'string') return body.trim() || undefined;
  if (!isRecord(body)) return undefined;

  const parts: string[] = [];
  if (Array.isArray(body.errorMessages)) {
    parts.push(...body.errorMessages.filter((m): m is string => typeof m === 'string'));
  }
  if (isRecord(body.errors)) {
    for (const [field, msg] of Object.entries(body.errors)) {
      if (typeof msg === 'string') parts.push(`${field}: ${msg}`);
    }
  }
  if (typeof body.message === 'string') {
    parts.push(body.message);
  }
  return parts.length > 0 ? parts.join('; ') : undefined;
}

export function toServiceError(service: ServiceName, action: string, err: unknown): ServiceRequestError {
  if (err instanceof ServiceRequestError) return err;
  const label = SERVICE_LABELS[service];
  if (axios.isAxiosError(err)) {
    const status = err.response?.status;
    const detail = describeErrorBody(err.response?.data) ?? err.message;
    const prefix = status ? `${label} ${action} failed (HTTP ${status})` : `${label} ${action} failed`;
    return new ServiceRequestError(service, `${prefix}: ${detail}`, status, err);
  }
  const detail = err instanceof Error ? err.message : String(err);
  return new ServiceRequestError(service, `${label} ${action} failed: ${detail}`, undefined, err);
}
