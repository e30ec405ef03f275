/**
 * Confluence client over the content REST API. Cloud sites serve it under
 * `/wiki/rest/api`, Server and Data Center under `/rest/api`.
 */

import { readFile, writeFile } from 'node:fs/promises';
import { basename } from 'node:path';
import type { AxiosAdapter, AxiosInstance } from 'axios';
import { loadConfluenceConfig, type ConfluenceConfig, type Env } from '../config.js';
import { createHttpClient } from '../http/client.js';
import { toServiceError } from '../http/errors.js';
import { ResponseShapeError, expectShape } from '../http/validate.js';
import { validateContent, validateContentList, validateSpaceList, validateVersionedContent } from './shapes.js';
import type { ConfluenceContent, ConfluenceSpace } from './types.js';

/** Page creation outside the configured personal space. No request is sent. */
export class PersonalSpaceError extends Error {
  readonly personalSpace: string;

  constructor(personalSpace: string) {
    super(`Pages can only be created in your personal space (${personalSpace})`);
    this.name = 'PersonalSpaceError';
    this.personalSpace = personalSpace;
  }
}

export interface ConfluenceToolsOptions {
  adapter?: AxiosAdapter;
  /** Receives failures that are reported rather than thrown (PDF export) */
  onWarning?: (message: string) => void;
}

/** Site root the REST API and the PDF export action hang off. */
export function confluenceSiteRoot(config: Pick<ConfluenceConfig, 'baseUrl' | 'isCloud'>): string {
  if (config.isCloud && !config.baseUrl.endsWith('/wiki')) {
    return `${config.baseUrl}/wiki`;
  }
  return config.baseUrl;
}

function storage(value: string) {
  return { storage: { value, representation: 'storage' } };
}

export class ConfluenceTools {
  readonly personalSpace: string;
  private readonly http: AxiosInstance;
  private readonly siteRoot: string;
  private readonly onWarning: (message: string) => void;

  constructor(config: ConfluenceConfig, options: ConfluenceToolsOptions = {}) {
    this.personalSpace = config.personalSpace;
    this.siteRoot = confluenceSiteRoot(config);
    this.http = createHttpClient({
      baseURL: `${this.siteRoot}/rest/api`,
      username: config.username,
      apiToken: config.apiToken,
      adapter: options.adapter,
    });
    this.onWarning = options.onWarning ?? (() => {});
  }

  static fromEnv(env?: Env, options: ConfluenceToolsOptions = {}): ConfluenceTools {
    return new ConfluenceTools(loadConfluenceConfig(env), options);
  }

  async getPage(pageId: string): Promise<ConfluenceContent> {
    return this.call('get page', async () => {
      const res = await this.http.get(`/content/${encodeURIComponent(pageId)}`, {
        params: { expand: 'body.storage,version,space' },
      });
      return expectShape(validateContent, res.data, 'Confluence page');
    });
  }

  /** `body` is storage-format XHTML. */
  async createPage(spaceKey: string, title: string, body: string, parentId?: string): Promise<ConfluenceContent> {
    if (spaceKey !== this.personalSpace) {
      throw new PersonalSpaceError(this.personalSpace);
    }
    return this.call('create page', async () => {
      const res = await this.http.post('/content', {
        type: 'page',
        title,
        space: { key: spaceKey },
        body: storage(body),
        ...(parentId ? { ancestors: [{ id: parentId }] } : {}),
      });
      return expectShape(validateContent, res.data, 'Confluence page');
    });
  }

  /** Replace title and body, writing the version after the current one. */
  async updatePage(pageId: string, title: string, body: string): Promise<ConfluenceContent> {
    return this.call('update page', async () => {
      const path = `/content/${encodeURIComponent(pageId)}`;
      const current = expectShape(
        validateVersionedContent,
        (await this.http.get(path, { params: { expand: 'version' } })).data,
        'Confluence page',
      );
      const res = await this.http.put(path, {
        id: pageId,
        type: 'page',
        title,
        version: { number: current.version.number + 1 },
        body: storage(body),
      });
      return expectShape(validateContent, res.data, 'Confluence page');
    });
  }

  async deletePage(pageId: string): Promise<boolean> {
    return this.call('delete page', async () => {
      await this.http.delete(`/content/${encodeURIComponent(pageId)}`);
      return true;
    });
  }

  getPageChildren(pageId: string): Promise<ConfluenceContent[]> {
    return this.listContent('get children', `/content/${encodeURIComponent(pageId)}/child/page`, {});
  }

  searchContent(cql: string, limit = 25): Promise<ConfluenceContent[]> {
    return this.listContent('search', '/content/search', { cql, limit });
  }

  getSpaceContent(spaceKey: string, limit = 100): Promise<ConfluenceContent[]> {
    return this.listContent('get space content', '/content', {
      spaceKey,
      type: 'page',
      start: 0,
      limit,
    });
  }

  async addComment(pageId: string, text: string): Promise<ConfluenceContent> {
    return this.call('add comment', async () => {
      const res = await this.http.post('/content', {
        type: 'comment',
        container: { id: pageId, type: 'page', status: 'current' },
        body: storage(text),
      });
      return expectShape(validateContent, res.data, 'Confluence comment');
    });
  }

  getPageComments(pageId: string): Promise<ConfluenceContent[]> {
    return this.listContent('get comments', `/content/${encodeURIComponent(pageId)}/child/comment`, {
      expand: 'body.storage',
    });
  }

  async getSpaceList(): Promise<ConfluenceSpace[]> {
    return this.call('list spaces', async () => {
      const res = await this.http.get('/space', { params: { start: 0, limit: 50 } });
      return expectShape(validateSpaceList, res.data, 'Confluence space list').results;
    });
  }

  /** Upload a local file as an attachment of the page. */
  async attachFile(pageId: string, filePath: string): Promise<ConfluenceContent> {
    const data = await readFile(filePath);
    return this.call('attach file', async () => {
      const form = new FormData();
      form.append('file', new Blob([data]), basename(filePath));
      form.append('minorEdit', 'true');
      const res = await this.http.post(`/content/${encodeURIComponent(pageId)}/child/attachment`, form, {
        headers: { 'X-Atlassian-Token': 'no-check' },
      });
      const [attachment] = expectShape(validateContentList, res.data, 'Confluence attachment').results;
      if (!attachment) {
        throw new ResponseShapeError('Confluence attachment', 'no attachment returned');
      }
      return attachment;
    });
  }

  getAttachments(pageId: string): Promise<ConfluenceContent[]> {
    return this.listContent('get attachments', `/content/${encodeURIComponent(pageId)}/child/attachment`, {});
  }

  /**
   * Save the page as a PDF through the flyingpdf export action. Failures
   * go to `onWarning` and yield false.
   */
  async exportPageAsPdf(pageId: string, outputPath: string): Promise<boolean> {
    try {
      const res = await this.http.get<ArrayBuffer>(`${this.siteRoot}/spaces/flyingpdf/pdfpageexport.action`, {
        params: { pageId },
        responseType: 'arraybuffer',
      });
      await writeFile(outputPath, Buffer.from(res.data));
      return true;
    } catch (err: unknown) {
      const detail = toServiceError('confluence', 'export PDF', err).message;
      this.onWarning(`Failed to export page as PDF: ${detail}`);
      return false;
    }
  }

  private listContent(action: string, path: string, params: Record<string, string | number>): Promise<ConfluenceContent[]> {
    return this.call(action, async () => {
      const res = await this.http.get(path, { params });
      return expectShape(validateContentList, res.data, `Confluence ${action}`).results;
    });
  }

  private async call<T>(action: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (err: unknown) {
      if (err instanceof ResponseShapeError) throw err;
      throw toServiceError('confluence', action, err);
    }
  }
}
