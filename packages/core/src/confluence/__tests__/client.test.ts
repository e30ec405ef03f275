import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { mkdtemp, readFile, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { ConfluenceTools, PersonalSpaceError, confluenceSiteRoot } from '../client.js';
import { ServiceRequestError } from '../../http/errors.js';
import { ResponseShapeError } from '../../http/validate.js';
import { FakeHttp } from '../../http/__tests__/fake-adapter.js';
import type { ConfluenceConfig } from '../../config.js';

const config: ConfluenceConfig = {
  baseUrl: 'https://example.atlassian.net',
  username: 'dev@example.com',
  apiToken: 'test-token',
  personalSpace: '~dev',
  isCloud: true,
};

const EXPORT_URL = 'https://example.atlassian.net/wiki/spaces/flyingpdf/pdfpageexport.action';

function setup() {
  const http = new FakeHttp();
  const warnings: string[] = [];
  const confluence = new ConfluenceTools(config, {
    adapter: http.adapter,
    onWarning: (message) => warnings.push(message),
  });
  return { http, confluence, warnings };
}

describe('confluenceSiteRoot', () => {
  it('adds /wiki for cloud sites', () => {
    assert.equal(confluenceSiteRoot(config), 'https://example.atlassian.net/wiki');
  });

  it('keeps an explicit /wiki suffix', () => {
    assert.equal(
      confluenceSiteRoot({ baseUrl: 'https://example.atlassian.net/wiki', isCloud: true }),
      'https://example.atlassian.net/wiki',
    );
  });

  it('uses the base URL as is for server sites', () => {
    assert.equal(confluenceSiteRoot({ baseUrl: 'https://wiki.example.com', isCloud: false }), 'https://wiki.example.com');
  });
});

describe('ConfluenceTools pages', () => {
  it('fetches a page with body, version and space', async () => {
    const { http, confluence } = setup();
    const page = { id: '123', title: 'Runbook', version: { number: 3 }, space: { key: '~dev' } };
    http.on('GET', '/content/123', { data: page });

    assert.deepEqual(await confluence.getPage('123'), page);
    assert.equal(http.requests[0].baseURL, 'https://example.atlassian.net/wiki/rest/api');
    assert.deepEqual(http.requests[0].params, { expand: 'body.storage,version,space' });
    assert.deepEqual(http.requests[0].auth, { username: 'dev@example.com', password: 'test-token' });
  });

  it('talks to /rest/api on server sites', async () => {
    const http = new FakeHttp();
    const confluence = new ConfluenceTools(
      { ...config, baseUrl: 'https://wiki.example.com', isCloud: false },
      { adapter: http.adapter },
    );
    http.on('GET', '/content/123', { data: { id: '123', title: 'Runbook' } });

    await confluence.getPage('123');

    assert.equal(http.requests[0].baseURL, 'https://wiki.example.com/rest/api');
  });

  it('creates pages in the personal space under a parent', async () => {
    const { http, confluence } = setup();
    http.on('POST', '/content', { data: { id: '200', title: 'Notes' } });

    const page = await confluence.createPage('~dev', 'Notes', '<p>Hello</p>', '123');

    assert.equal(page.id, '200');
    assert.deepEqual(http.requests[0].body, {
      type: 'page',
      title: 'Notes',
      space: { key: '~dev' },
      body: { storage: { value: '<p>Hello</p>', representation: 'storage' } },
      ancestors: [{ id: '123' }],
    });
  });

  it('refuses other spaces without sending a request', async () => {
    const { http, confluence } = setup();

    await assert.rejects(confluence.createPage('OPS', 'Notes', '<p>Hello</p>'), (err: unknown) => {
      assert.ok(err instanceof PersonalSpaceError);
      assert.equal(err.message, 'Pages can only be created in your personal space (~dev)');
      return true;
    });
    assert.equal(http.requests.length, 0);
  });

  it('writes the next version on update', async () => {
    const { http, confluence } = setup();
    http
      .on('GET', '/content/123', { data: { id: '123', title: 'Runbook', version: { number: 4 } } })
      .on('PUT', '/content/123', { data: { id: '123', title: 'Runbook v2', version: { number: 5 } } });

    const page = await confluence.updatePage('123', 'Runbook v2', '<p>Updated</p>');

    assert.equal(page.version?.number, 5);
    assert.deepEqual(http.requests[1].body, {
      id: '123',
      type: 'page',
      title: 'Runbook v2',
      version: { number: 5 },
      body: { storage: { value: '<p>Updated</p>', representation: 'storage' } },
    });
  });

  it('rejects an update when the page has no version', async () => {
    const { http, confluence } = setup();
    http.on('GET', '/content/123', { data: { id: '123', title: 'Runbook' } });

    await assert.rejects(confluence.updatePage('123', 'Runbook', '<p>x</p>'), ResponseShapeError);
    assert.equal(http.requests.length, 1);
  });

  it('reports the service message when a delete fails', async () => {
    const { http, confluence } = setup();
    http.on('DELETE', '/content/99', { status: 404, data: { message: 'No content found with id: 99' } });

    await assert.rejects(confluence.deletePage('99'), (err: unknown) => {
      assert.ok(err instanceof ServiceRequestError);
      assert.equal(err.message, 'Confluence delete page failed (HTTP 404): No content found with id: 99');
      return true;
    });
  });

  it('deletes a page', async () => {
    const { http, confluence } = setup();
    http.on('DELETE', '/content/123', { status: 204 });

    assert.equal(await confluence.deletePage('123'), true);
  });
});

describe('ConfluenceTools listings', () => {
  const results = [
    { id: '1', title: 'First' },
    { id: '2', title: 'Second' },
  ];

  it('searches with CQL', async () => {
    const { http, confluence } = setup();
    http.on('GET', '/content/search', { data: { results, size: 2 } });

    assert.deepEqual(await confluence.searchContent('type = page AND space = "~dev"'), results);
    assert.deepEqual(http.requests[0].params, { cql: 'type = page AND space = "~dev"', limit: 25 });
  });

  it('lists pages in a space', async () => {
    const { http, confluence } = setup();
    http.on('GET', '/content', { data: { results } });

    await confluence.getSpaceContent('~dev', 10);

    assert.deepEqual(http.requests[0].params, { spaceKey: '~dev', type: 'page', start: 0, limit: 10 });
  });

  it('lists child pages, comments and attachments', async () => {
    const { http, confluence } = setup();
    http
      .on('GET', '/content/123/child/page', { data: { results } })
      .on('GET', '/content/123/child/comment', { data: { results: [{ id: '9', title: 'Re: Runbook' }] } })
      .on('GET', '/content/123/child/attachment', { data: { results: [{ id: 'att1', title: 'diagram.png' }] } });

    assert.deepEqual(await confluence.getPageChildren('123'), results);
    assert.deepEqual(await confluence.getPageComments('123'), [{ id: '9', title: 'Re: Runbook' }]);
    assert.deepEqual(await confluence.getAttachments('123'), [{ id: 'att1', title: 'diagram.png' }]);
    assert.deepEqual(http.requests[1].params, { expand: 'body.storage' });
  });

  it('lists spaces', async () => {
    const { http, confluence } = setup();
    http.on('GET', '/space', { data: { results: [{ key: '~dev', name: 'Dev Personal', type: 'personal' }] } });

    assert.deepEqual(await confluence.getSpaceList(), [{ key: '~dev', name: 'Dev Personal', type: 'personal' }]);
  });
});

describe('ConfluenceTools comments and files', () => {
  it('adds a storage-format comment to the page', async () => {
    const { http, confluence } = setup();
    http.on('POST', '/content', { data: { id: '900', title: 'Re: Runbook' } });

    await confluence.addComment('123', '<p>Looks good</p>');

    assert.deepEqual(http.requests[0].body, {
      type: 'comment',
      container: { id: '123', type: 'page', status: 'current' },
      body: { storage: { value: '<p>Looks good</p>', representation: 'storage' } },
    });
  });

  it('uploads an attachment as multipart form data', async () => {
    const { http, confluence } = setup();
    const dir = await mkdtemp(join(tmpdir(), 'opsbridge-'));
    const filePath = join(dir, 'notes.txt');
    await writeFile(filePath, 'release notes');
    http.on('POST', '/content/123/child/attachment', { data: { results: [{ id: 'att2', title: 'notes.txt' }] } });

    const attachment = await confluence.attachFile('123', filePath);

    assert.deepEqual(attachment, { id: 'att2', title: 'notes.txt' });
    const req = http.requests[0];
    assert.equal(req.headers['X-Atlassian-Token'], 'no-check');
    assert.ok(req.body instanceof FormData);
    const file = req.body.get('file');
    assert.ok(file !== null && typeof file !== 'string');
    assert.equal(file.name, 'notes.txt');
    assert.equal(await file.text(), 'release notes');
    assert.equal(req.body.get('minorEdit'), 'true');
  });

  it('writes the exported PDF to disk', async () => {
    const { http, confluence } = setup();
    const dir = await mkdtemp(join(tmpdir(), 'opsbridge-'));
    const outputPath = join(dir, 'page.pdf');
    http.on('GET', EXPORT_URL, { data: Buffer.from('%PDF-1.4 test') });

    assert.equal(await confluence.exportPageAsPdf('123', outputPath), true);
    assert.equal(await readFile(outputPath, 'utf8'), '%PDF-1.4 test');
    assert.deepEqual(http.requests[0].params, { pageId: '123' });
  });

  it('reports a failed export and returns false', async () => {
    const { http, confluence, warnings } = setup();
    http.on('GET', EXPORT_URL, { status: 500, data: { message: 'Export failed' } });

    assert.equal(await confluence.exportPageAsPdf('123', join(tmpdir(), 'unused.pdf')), false);
    assert.deepEqual(warnings, [
      'Failed to export page as PDF: Confluence export PDF failed (HTTP 500): Export failed',
    ]);
  });
});
