/**
 * Jira Cloud client over REST API v2 (plain-text descriptions and comment
 * bodies).
 */

import type { AxiosAdapter, AxiosInstance } from 'axios';
import { loadJiraConfig, type Env, type JiraConfig } from '../config.js';
import { createHttpClient } from '../http/client.js';
import { toServiceError } from '../http/errors.js';
import { ResponseShapeError, expectShape } from '../http/validate.js';
import {
  OVERDUE_JQL,
  buildMyIssuesJql,
  expandNewlines,
  sprintJql,
  toHistory,
  toIssueDetails,
  toIssueSummary,
  toMetrics,
  toRelatedIssues,
} from './issues.js';
import {
  validateCreatedComment,
  validateCreatedIssue,
  validateIssue,
  validateProject,
  validateProjectList,
  validateSearchPage,
  validateTransitions,
} from './shapes.js';
import type {
  CreatedComment,
  CreatedIssue,
  HistoryEntry,
  IssueDetails,
  IssueMetrics,
  IssueSummary,
  JiraProject,
  RawIssue,
  RelatedIssue,
} from './types.js';

/** Fields requested for search results */
export const SUMMARY_FIELDS = ['summary', 'status', 'priority', 'assignee', 'created', 'updated', 'duedate'];

export interface JiraToolsOptions {
  adapter?: AxiosAdapter;
  /** Upper bound on issues collected by one search */
  maxResults?: number;
  /** Issues requested per search page */
  pageSize?: number;
}

export class JiraTools {
  private readonly http: AxiosInstance;
  private readonly maxResults: number;
  private readonly pageSize: number;

  constructor(
    private readonly config: JiraConfig,
    options: JiraToolsOptions = {},
  ) {
    this.http = createHttpClient({
      baseURL: `${config.baseUrl}/rest/api/2`,
      username: config.email,
      apiToken: config.apiToken,
      adapter: options.adapter,
    });
    this.maxResults = options.maxResults ?? 500;
    this.pageSize = options.pageSize ?? 100;
  }

  static fromEnv(env?: Env, options: JiraToolsOptions = {}): JiraTools {
    return new JiraTools(loadJiraConfig(env), options);
  }

  async getIssue(issueKey: string): Promise<IssueSummary> {
    return toIssueSummary(await this.fetchIssue(issueKey));
  }

  async createIssue(
    projectKey: string,
    summary: string,
    description: string,
    issueType = 'Task',
  ): Promise<CreatedIssue> {
    return this.call('create issue', async () => {
      const res = await this.http.post('/issue', {
        fields: {
          project: { key: projectKey },
          summary,
          description,
          issuetype: { name: issueType },
        },
      });
      return expectShape(validateCreatedIssue, res.data, 'Jira create issue');
    });
  }

  /**
   * Run a JQL search, following page tokens until the results run out or
   * `maxResults` issues have been collected.
   */
  async searchIssues(jql: string): Promise<IssueSummary[]> {
    return this.call('search', async () => {
      const collected: IssueSummary[] = [];
      let nextPageToken: string | undefined;
      do {
        const res = await this.http.get('/search/jql', {
          params: {
            jql,
            fields: SUMMARY_FIELDS.join(','),
            maxResults: Math.min(this.pageSize, this.maxResults - collected.length),
            nextPageToken,
          },
        });
        const page = expectShape(validateSearchPage, res.data, 'Jira search');
        collected.push(...page.issues.map(toIssueSummary));
        nextPageToken = page.nextPageToken;
      } while (nextPageToken && collected.length < this.maxResults);
      return collected.slice(0, this.maxResults);
    });
  }

  async addComment(issueKey: string, body: string): Promise<CreatedComment> {
    return this.call('add comment', async () => {
      const res = await this.http.post(`/issue/${encodeURIComponent(issueKey)}/comment`, { body });
      return expectShape(validateCreatedComment, res.data, 'Jira comment');
    });
  }

  async getProject(projectKey: string): Promise<JiraProject> {
    return this.call('get project', async () => {
      const res = await this.http.get(`/project/${encodeURIComponent(projectKey)}`);
      const project = expectShape(validateProject, res.data, 'Jira project');
      return { id: project.id, key: project.key, name: project.name };
    });
  }

  async getAllProjects(): Promise<JiraProject[]> {
    return this.call('list projects', async () => {
      const res = await this.http.get('/project');
      return expectShape(validateProjectList, res.data, 'Jira project list').map((p) => ({
        id: p.id,
        key: p.key,
        name: p.name,
      }));
    });
  }

  getMyIssues(filters: { status?: string; priority?: string } = {}): Promise<IssueSummary[]> {
    return this.searchIssues(buildMyIssuesJql(filters));
  }

  async getIssueDetails(issueKey: string): Promise<IssueDetails> {
    return toIssueDetails(await this.fetchIssue(issueKey), this.config.acceptanceCriteriaField);
  }

  getOverdueIssues(): Promise<IssueSummary[]> {
    return this.searchIssues(OVERDUE_JQL);
  }

  async getRelatedIssues(issueKey: string): Promise<RelatedIssue[]> {
    return toRelatedIssues(await this.fetchIssue(issueKey));
  }

  /**
   * Move the issue through the transition named `statusName`
   * (case-insensitive). Returns false when no such transition is offered.
   */
  async updateIssueStatus(issueKey: string, statusName: string): Promise<boolean> {
    return this.call('transition issue', async () => {
      const path = `/issue/${encodeURIComponent(issueKey)}/transitions`;
      const res = await this.http.get(path);
      const { transitions } = expectShape(validateTransitions, res.data, 'Jira transitions');
      const target = transitions.find((t) => t.name.toLowerCase() === statusName.toLowerCase());
      if (!target) return false;
      await this.http.post(path, { transition: { id: target.id } });
      return true;
    });
  }

  async getIssueHistory(issueKey: string): Promise<HistoryEntry[]> {
    return toHistory(await this.fetchIssue(issueKey, { expand: 'changelog' }));
  }

  getSprintIssues(projectKey: string): Promise<IssueSummary[]> {
    return this.searchIssues(sprintJql(projectKey));
  }

  async getIssueMetrics(issueKey: string): Promise<IssueMetrics> {
    return toMetrics(await this.fetchIssue(issueKey));
  }

  async updateIssueDescription(issueKey: string, description: string): Promise<boolean> {
    return this.call('update description', async () => {
      await this.http.put(`/issue/${encodeURIComponent(issueKey)}`, {
        fields: { description: expandNewlines(description) },
      });
      return true;
    });
  }

  private fetchIssue(issueKey: string, params: { expand?: string } = {}): Promise<RawIssue> {
    return this.call('get issue', async () => {
      const res = await this.http.get(`/issue/${encodeURIComponent(issueKey)}`, { params });
      return expectShape(validateIssue, res.data, 'Jira issue');
    });
  }

  private async call<T>(action: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (err: unknown) {
      if (err instanceof ResponseShapeError) throw err;
      throw toServiceError('jira', action, err);
    }
  }
}
