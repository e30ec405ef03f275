/**
 * Jira shapes: the raw REST v2 payload fields this client reads, and the
 * flattened records it returns.
 */

export interface RawNamed {
  name?: string;
}

export interface RawUser {
  displayName?: string;
}

export interface RawComment {
  author?: RawUser;
  body?: string;
}

export interface RawLinkedIssue {
  key: string;
  fields?: { summary?: string; status?: RawNamed };
}

export interface RawIssueLink {
  type?: RawNamed;
  outwardIssue?: RawLinkedIssue;
  inwardIssue?: RawLinkedIssue;
}

export interface RawIssueFields {
  summary?: string;
  description?: string | null;
  status?: RawNamed;
  priority?: RawNamed | null;
  assignee?: RawUser | null;
  created?: string;
  updated?: string;
  duedate?: string | null;
  resolutiondate?: string | null;
  timeestimate?: number | null;
  timespent?: number | null;
  labels?: string[];
  components?: RawNamed[];
  comment?: { comments?: RawComment[] };
  issuelinks?: RawIssueLink[];
  [field: string]: unknown;
}

export interface RawHistoryItem {
  field?: string;
  fromString?: string | null;
  toString?: string | null;
}

export interface RawHistory {
  created?: string;
  author?: RawUser;
  items?: RawHistoryItem[];
}

export interface RawIssue {
  id: string;
  key: string;
  fields: RawIssueFields;
  changelog?: { histories?: RawHistory[] };
}

export interface RawSearchPage {
  issues: RawIssue[];
  nextPageToken?: string;
}

export interface RawTransition {
  id: string;
  name: string;
}

export interface IssueSummary {
  key: string;
  summary: string;
  status: string;
  priority: string | null;
  assignee: string | null;
  created: string | null;
  updated: string | null;
  dueDate: string | null;
}

export interface IssueComment {
  author: string | null;
  body: string;
}

export interface LinkedIssueRef {
  key: string;
  type: string;
}

export interface IssueDetails {
  key: string;
  summary: string;
  description: string | null;
  status: string;
  priority: string | null;
  assignee: string | null;
  created: string | null;
  updated: string | null;
  comments: IssueComment[];
  acceptanceCriteria: unknown;
  components: string[];
  labels: string[];
  linkedIssues: LinkedIssueRef[];
}

export interface RelatedIssue {
  key: string;
  summary: string;
  direction: 'outward' | 'inward';
  type: string;
}

export interface HistoryEntry {
  date: string | null;
  author: string | null;
  field: string;
  from: string | null;
  to: string | null;
}

export interface IssueMetrics {
  timeEstimate: number | null;
  timeSpent: number | null;
  createdDate: string | null;
  updatedDate: string | null;
  resolutionDate: string | null;
}

export interface JiraProject {
  id: string;
  key: string;
  name: string;
}

export interface CreatedIssue {
  id: string;
  key: string;
}

export interface CreatedComment {
  id: string;
  body: string;
}
