/**
 * Client-side issue helpers: JQL building, open-issue filtering, sorting,
 * and flattening raw payloads.
 */

import type {
  HistoryEntry,
  IssueDetails,
  IssueMetrics,
  IssueSummary,
  RawIssue,
  RelatedIssue,
} from './types.js';

/** Statuses treated as finished when listing open work */
export const CLOSED_STATUSES = ['done', 'completed', 'closed', 'resolved'];

export type IssueSortField = 'created' | 'updated';
export type SortOrder = 'asc' | 'desc';

export function quoteJql(value: string): string {
  return `"${value.replace(/\\/g, '\\\\').replace(/"/g, '\\"')}"`;
}

export function buildMyIssuesJql(filters: { status?: string; priority?: string } = {}): string {
  let jql = 'assignee = currentUser()';
  if (filters.status) jql += ` AND status = ${quoteJql(filters.status)}`;
  if (filters.priority) jql += ` AND priority = ${quoteJql(filters.priority)}`;
  return jql;
}

export const OVERDUE_JQL = 'assignee = currentUser() AND duedate < now() AND status not in (Closed, Done, Resolved)';

export function sprintJql(projectKey: string): string {
  return `project = ${quoteJql(projectKey)} AND sprint in openSprints()`;
}

/**
 * Jira timestamps carry offsets like `+0000`; Date.parse wants `+00:00`.
 * Returns NaN for missing or unreadable values.
 */
export function parseJiraDate(value: string | null): number {
  if (!value) return Number.NaN;
  return Date.parse(value.replace(/([+-]\d{2})(\d{2})$/, '$1:$2'));
}

export function openIssuesOnly<T extends { status: string }>(issues: T[]): T[] {
  return issues.filter((issue) => !CLOSED_STATUSES.includes(issue.status.toLowerCase()));
}

/** Stable sort; issues without a readable date go last. */
export function sortIssues<T extends IssueSummary>(issues: T[], field: IssueSortField = 'created', order: SortOrder = 'asc'): T[] {
  const direction = order === 'desc' ? -1 : 1;
  return [...issues].sort((a, b) => {
    const ta = parseJiraDate(a[field]);
    const tb = parseJiraDate(b[field]);
    if (Number.isNaN(ta) && Number.isNaN(tb)) return 0;
    if (Number.isNaN(ta)) return 1;
    if (Number.isNaN(tb)) return -1;
    return (ta - tb) * direction;
  });
}

/** Turn literal `\n` sequences typed on a command line into newlines. */
export function expandNewlines(text: string): string {
  return text.replace(/\\n/g, '\n');
}

/** Decode the common backslash escapes (`\n`, `\t`, `\r`, `\\`). */
export function decodeEscapes(text: string): string {
  return text.replace(/\\([ntr\\])/g, (_, ch: string) => {
    switch (ch) {
      case 'n':
        return '\n';
      case 't':
        return '\t';
      case 'r':
        return '\r';
      default:
        return '\\';
    }
  });
}

export function toIssueSummary(issue: RawIssue): IssueSummary {
  const f = issue.fields;
  return {
    key: issue.key,
    summary: f.summary ?? '',
    status: f.status?.name ?? 'Unknown',
    priority: f.priority?.name ?? null,
    assignee: f.assignee?.displayName ?? null,
    created: f.created ?? null,
    updated: f.updated ?? null,
    dueDate: f.duedate ?? null,
  };
}

export function toIssueDetails(issue: RawIssue, acceptanceCriteriaField: string): IssueDetails {
  const f = issue.fields;
  return {
    key: issue.key,
    summary: f.summary ?? '',
    description: f.description ?? null,
    status: f.status?.name ?? 'Unknown',
    priority: f.priority?.name ?? null,
    assignee: f.assignee?.displayName ?? null,
    created: f.created ?? null,
    updated: f.updated ?? null,
    comments: (f.comment?.comments ?? []).map((c) => ({
      author: c.author?.displayName ?? null,
      body: c.body ?? '',
    })),
    acceptanceCriteria: f[acceptanceCriteriaField] ?? null,
    components: (f.components ?? []).flatMap((c) => (c.name ? [c.name] : [])),
    labels: f.labels ?? [],
    linkedIssues: (f.issuelinks ?? []).flatMap((link) =>
      link.outwardIssue ? [{ key: link.outwardIssue.key, type: link.type?.name ?? '' }] : [],
    ),
  };
}

export function toRelatedIssues(issue: RawIssue): RelatedIssue[] {
  const related: RelatedIssue[] = [];
  for (const link of issue.fields.issuelinks ?? []) {
    const type = link.type?.name ?? '';
    if (link.outwardIssue) {
      related.push({
        key: link.outwardIssue.key,
        summary: link.outwardIssue.fields?.summary ?? '',
        direction: 'outward',
        type,
      });
    } else if (link.inwardIssue) {
      related.push({
        key: link.inwardIssue.key,
        summary: link.inwardIssue.fields?.summary ?? '',
        direction: 'inward',
        type,
      });
    }
  }
  return related;
}

export function toHistory(issue: RawIssue): HistoryEntry[] {
  const entries: HistoryEntry[] = [];
  for (const history of issue.changelog?.histories ?? []) {
    for (const item of history.items ?? []) {
      entries.push({
        date: history.created ?? null,
        author: history.author?.displayName ?? null,
        field: item.field ?? '',
        from: item.fromString ?? null,
        to: Object.hasOwn(item, 'toString') ? (item.toString ?? null) : null,
      });
    }
  }
  return entries;
}

export function toMetrics(issue: RawIssue): IssueMetrics {
  const f = issue.fields;
  return {
    timeEstimate: f.timeestimate ?? null,
    timeSpent: f.timespent ?? null,
    createdDate: f.created ?? null,
    updatedDate: f.updated ?? null,
    resolutionDate: f.resolutiondate ?? null,
  };
}
