import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { mkdtemp, writeFile, rm } from 'fs/promises';
import os from 'os';
import path from 'path';

import { PaperlessClient } from './paperless-client.js';

type FetchArgs = [input: string | URL | Request, init?: RequestInit];

function jsonResponse(body: unknown, status = 200, headers: Record<string, string> = {}): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json', ...headers },
  });
}

function clientWith(handler: (url: string, init?: RequestInit) => Response) {
  const fetchMock = vi.fn(async (...[input, init]: FetchArgs) => handler(String(input), init));
  const client = new PaperlessClient({
    baseUrl: 'http://paperless.test/',
    token: 'test-token',
    fetch: fetchMock,
  });
  return { client, fetchMock };
}

describe('PaperlessClient.probe', () => {
  it('reads the server and API versions', async () => {
    const { client, fetchMock } = clientWith(() =>
      jsonResponse({}, 200, { 'X-Version': '2.7.2', 'X-Api-Version': '5' })
    );

    expect(await client.probe()).toEqual({ version: '2.7.2', apiVersion: '5' });

    const [url, init] = fetchMock.mock.calls[0];
    expect(url).toBe('http://paperless.test/api/');
    expect(new Headers(init?.headers).get('Authorization')).toBe('Token test-token');
  });

  it('fails with a connectivity error on a non-success status', async () => {
    const { client } = clientWith(() => jsonResponse({ detail: 'Invalid token.' }, 401));

    await expect(client.probe()).rejects.toMatchObject({
      kind: 'connectivity',
      message: "Unable to communicate with paperless-ngx instance at 'http://paperless.test/api/' (HTTP 401)",
    });
  });

  it('fails with a connectivity error when the server is unreachable', async () => {
    const { client } = clientWith(() => {
      throw new TypeError('fetch failed');
    });

    await expect(client.probe()).rejects.toMatchObject({
      kind: 'connectivity',
      message: "Unable to reach paperless-ngx at 'http://paperless.test/api/': fetch failed",
    });
  });
});

describe('PaperlessClient.fetchTagMap', () => {
  it('collects every page of tags keyed by lowercased slug', async () => {
    const { client, fetchMock } = clientWith((url) => {
      if (url === 'http://paperless.test/api/tags/') {
        return jsonResponse({
          count: 2,
          next: 'http://paperless.test/api/tags/?page=2',
          results: [{ id: 3, slug: 'Invoice', name: 'Invoice' }],
        });
      }
      return jsonResponse({ count: 2, next: null, results: [{ id: 7, slug: 'receipt', name: 'Receipt' }] });
    });

    const tags = await client.fetchTagMap();

    expect([...tags.entries()]).toEqual([
      ['invoice', 3],
      ['receipt', 7],
    ]);
    expect(fetchMock).toHaveBeenCalledTimes(2);
  });

  it('fails with a connectivity error when the tag list is refused', async () => {
    const { client } = clientWith(() => jsonResponse({ detail: 'error' }, 500));

    await expect(client.fetchTagMap()).rejects.toMatchObject({ kind: 'connectivity' });
  });

  it('fails with a connectivity error when the tag list is not JSON', async () => {
    const { client } = clientWith(
      () => new Response('<html>Please sign in</html>', { status: 200, headers: { 'Content-Type': 'text/html' } })
    );

    await expect(client.fetchTagMap()).rejects.toMatchObject({
      name: 'MigrationError',
      kind: 'connectivity',
      message: expect.stringMatching(/^Tag list from 'http:\/\/paperless\.test\/api\/tags\/' is not JSON: /),
    });
  });

  it('rejects a tag list of the wrong shape', async () => {
    const { client } = clientWith(() => jsonResponse({ results: [{ id: 'three' }] }));

    await expect(client.fetchTagMap()).rejects.toMatchObject({
      kind: 'connectivity',
      message: "Unexpected tag list from 'http://paperless.test/api/tags/'",
    });
  });
});

describe('PaperlessClient.uploadDocument', () => {
  let dir: string;
  let pdfPath: string;

  beforeEach(async () => {
    dir = await mkdtemp(path.join(os.tmpdir(), 'paperless-upload-'));
    pdfPath = path.join(dir, '20190312_1540_08.pdf');
    await writeFile(pdfPath, '%PDF-1.4 test');
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('posts the date, one field per tag and the file', async () => {
    const { client, fetchMock } = clientWith(() => jsonResponse('0f3e1c1a-task'));

    const taskId = await client.uploadDocument({ filePath: pdfPath, created: '2019-03-12', tags: [3, 7] });

    expect(taskId).toBe('0f3e1c1a-task');

    const [url, init] = fetchMock.mock.calls[0];
    expect(url).toBe('http://paperless.test/api/documents/post_document/');
    expect(init?.method).toBe('POST');

    const body = init?.body;
    if (!(body instanceof FormData)) throw new Error('expected a multipart body');
    expect(body.get('created')).toBe('2019-03-12');
    expect(body.getAll('tags')).toEqual(['3', '7']);

    const document = body.get('document');
    expect(document).toBeInstanceOf(Blob);
    if (!(document instanceof Blob)) throw new Error('expected a file part');
    expect(await document.text()).toBe('%PDF-1.4 test');
  });

  it('sends no tags field for an untagged document', async () => {
    const { client, fetchMock } = clientWith(() => jsonResponse('task'));

    await client.uploadDocument({ filePath: pdfPath, created: '2019-03-12', tags: [] });

    const body = fetchMock.mock.calls[0][1]?.body;
    if (!(body instanceof FormData)) throw new Error('expected a multipart body');
    expect(body.getAll('tags')).toEqual([]);
  });

  it('fails with an upload error when the server refuses the file', async () => {
    const { client } = clientWith(() => jsonResponse({ document: ['Unsupported type'] }, 400));

    await expect(
      client.uploadDocument({ filePath: pdfPath, created: '2019-03-12', tags: [] })
    ).rejects.toMatchObject({
      kind: 'upload',
      message: `Unable to submit '${pdfPath}' to paperless-ngx (HTTP 400)`,
    });
  });
});
