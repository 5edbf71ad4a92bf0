/**
 * Paperwork Migrate - paperless-ngx REST Client
 *
 * Endpoints used:
 * - GET  /api/                          health probe (X-Version, X-Api-Version headers)
 * - GET  /api/tags/                     paginated tag list
 * - POST /api/documents/post_document/  multipart upload, answers with a task id
 */

import { readFile } from 'fs/promises';
import path from 'path';
import { z } from 'zod';

import type { ServerInfo, TagMap, UploadPayload } from './types.js';
import { MigrationError, errorMessage, type MigrationErrorKind } from './errors.js';
import { buildTagMap } from './tags.js';

// ============================================================================
// Types
// ============================================================================

export interface PaperlessClientOptions {
  baseUrl: string;
  token: string;
  fetch?: typeof fetch;
}

const TagPageSchema = z.object({
  next: z.string().nullable().optional(),
  results: z.array(
    z.object({
      id: z.number(),
      slug: z.string(),
    })
  ),
});

// ============================================================================
// Client
// ============================================================================

export class PaperlessClient {
  private readonly baseUrl: string;
  private readonly token: string;
  private readonly fetchImpl: typeof fetch;

  constructor(options: PaperlessClientOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, '');
    this.token = options.token;
    this.fetchImpl = options.fetch ?? fetch;
  }

  private async request(
    url: string,
    init: RequestInit,
    failureKind: MigrationErrorKind
  ): Promise<Response> {
    const headers = new Headers(init.headers);
    headers.set('Authorization', `Token ${this.token}`);
    headers.set('Accept', 'application/json');

    try {
      return await this.fetchImpl(url, { ...init, headers });
    } catch (error) {
      throw new MigrationError(
        failureKind,
        `Unable to reach paperless-ngx at '${url}': ${errorMessage(error)}`,
        { url }
      );
    }
  }

  /**
   * Check the instance answers before anything is exported
   */
  async probe(): Promise<ServerInfo> {
    const url = `${this.baseUrl}/api/`;
    const response = await this.request(url, { method: 'GET' }, 'connectivity');
    if (!response.ok) {
      throw new MigrationError(
        'connectivity',
        `Unable to communicate with paperless-ngx instance at '${url}' (HTTP ${response.status})`,
        { status: response.status }
      );
    }

    return {
      version: response.headers.get('X-Version') ?? 'unknown',
      apiVersion: response.headers.get('X-Api-Version') ?? 'unknown',
    };
  }

  /**
   * Slug → id for every tag on the server, following `next` links
   */
  async fetchTagMap(): Promise<TagMap> {
    const tags: Array<{ id: number; slug: string }> = [];
    const visited = new Set<string>();
    let url: string | null = `${this.baseUrl}/api/tags/`;

    while (url && !visited.has(url)) {
      visited.add(url);

      const response = await this.request(url, { method: 'GET' }, 'connectivity');
      if (!response.ok) {
        throw new MigrationError(
          'connectivity',
          `Unable to list tags from '${url}' (HTTP ${response.status})`,
          { status: response.status }
        );
      }

      let body: unknown;
      try {
        body = await response.json();
      } catch (error) {
        throw new MigrationError(
          'connectivity',
          `Tag list from '${url}' is not JSON: ${errorMessage(error)}`,
          { status: response.status }
        );
      }

      const parsed = TagPageSchema.safeParse(body);
      if (!parsed.success) {
        throw new MigrationError('connectivity', `Unexpected tag list from '${url}'`, parsed.error.issues);
      }

      tags.push(...parsed.data.results);
      url = parsed.data.next ? new URL(parsed.data.next, this.baseUrl).toString() : null;
    }

    return buildTagMap(tags);
  }

  /**
   * Submit a PDF for consumption. Returns the consumption task id.
   */
  async uploadDocument(payload: UploadPayload): Promise<string> {
    const content = await readFile(payload.filePath);

    const form = new FormData();
    form.append('created', payload.created);
    for (const tag of payload.tags) {
      form.append('tags', String(tag));
    }
    form.append(
      'document',
      new Blob([new Uint8Array(content)], { type: 'application/pdf' }),
      path.basename(payload.filePath)
    );

    const url = `${this.baseUrl}/api/documents/post_document/`;
    const response = await this.request(url, { method: 'POST', body: form }, 'upload');
    if (!response.ok) {
      const body = await response.text();
      throw new MigrationError(
        'upload',
        `Unable to submit '${payload.filePath}' to paperless-ngx (HTTP ${response.status})`,
        { status: response.status, body: body.slice(0, 500) }
      );
    }

    const body = (await response.text()).trim();
    return body.replace(/^"(.*)"$/, '$1');
  }
}
