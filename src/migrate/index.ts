/**
 * Paperwork Migrate - Orchestrator
 *
 * One sequential pass over the archive:
 *   probe server → load tags → scan archive → per document:
 *   skip if exported → date → labels + filters → export → upload
 *
 * The export file doubles as the progress marker, so a crashed run is
 * resumed by running it again.
 */

import { existsSync } from 'fs';

import type {
  DocumentRef,
  DocumentResult,
  DocumentStatus,
  MigrationSummary,
  TagMap,
} from '../core/types.js';
import { errorMessage } from '../core/errors.js';
import { resolveTagIds } from '../core/tags.js';
import type { PaperlessClient } from '../core/paperless-client.js';
import type { PaperworkJson } from '../ingest/paperwork-json.js';
import { scanArchive, parseDocumentDate, exportPathFor } from '../ingest/archive.js';
import { exportDocument } from '../ingest/export.js';

// ============================================================================
// Types
// ============================================================================

export interface MigrateOptions {
  archivePath: string;
  exportDir: string;
  dryRun?: boolean;
  /** Record a failed document and keep going instead of aborting the run */
  continueOnError?: boolean;
  onProgress?: (current: number, total: number, docId: string) => void;
}

// ============================================================================
// Single Document
// ============================================================================

/**
 * Fills in `result` as it goes, so a failure leaves whatever was already known
 */
async function migrateDocument(
  doc: DocumentRef,
  result: DocumentResult,
  paperwork: PaperworkJson,
  paperless: PaperlessClient,
  tagMap: TagMap,
  options: MigrateOptions
): Promise<void> {
  const { exportPath } = result;

  if (existsSync(exportPath)) {
    console.log(`  ${exportPath} already exists; assume already migrated`);
    return;
  }

  result.created = parseDocumentDate(doc.id);
  result.labels = await paperwork.getLabels(doc.id);
  console.log(`  Date: ${result.created}, Labels: ${JSON.stringify(result.labels)}`);

  const filters = await paperwork.listFilters(doc.id);
  const outcome = await exportDocument(paperwork, doc.id, exportPath, filters);

  if (outcome === 'already-done') {
    console.log(`  ${exportPath} appeared during export; assume already migrated`);
    return;
  }
  if (outcome === 'unsupported') {
    result.status = 'unsupported';
    return;
  }

  result.tags = resolveTagIds(result.labels, tagMap);

  if (options.dryRun) {
    result.status = 'exported';
    return;
  }

  console.log(`  Uploading ${exportPath} to paperless-ngx server...`);
  const taskId = await paperless.uploadDocument({
    filePath: exportPath,
    created: result.created,
    tags: result.tags,
  });
  if (taskId) {
    console.log(`  Queued as task ${taskId}`);
  }
  result.status = 'uploaded';
}

// ============================================================================
// Whole Archive
// ============================================================================

function emptyCounts(): Record<DocumentStatus, number> {
  return { skipped: 0, unsupported: 0, exported: 0, uploaded: 0, failed: 0 };
}

export async function migrateArchive(
  paperwork: PaperworkJson,
  paperless: PaperlessClient,
  options: MigrateOptions
): Promise<MigrationSummary> {
  // Server checks come first: a bad URL or token must not cost an export
  const server = await paperless.probe();
  console.log(`Found paperless-ngx v${server.version} instance with API v${server.apiVersion}`);

  const tagMap = await paperless.fetchTagMap();
  console.log(`Loaded ${tagMap.size} tags`);

  console.log(`Getting docs from paperwork archive at '${options.archivePath}'...`);
  const docs = await scanArchive(options.archivePath);

  const results: DocumentResult[] = [];
  const counts = emptyCounts();

  for (let i = 0; i < docs.length; i++) {
    const doc = docs[i];
    options.onProgress?.(i + 1, docs.length, doc.id);

    const result: DocumentResult = {
      id: doc.id,
      status: 'skipped',
      labels: [],
      tags: [],
      exportPath: exportPathFor(options.exportDir, doc.id),
    };
    try {
      await migrateDocument(doc, result, paperwork, paperless, tagMap, options);
    } catch (error) {
      if (!options.continueOnError) throw error;

      console.error(`[migrate] ${doc.id} failed: ${errorMessage(error)}`);
      result.status = 'failed';
      result.error = errorMessage(error);
    }

    results.push(result);
    counts[result.status]++;
  }

  return {
    server,
    dryRun: options.dryRun ?? false,
    total: docs.length,
    counts,
    results,
  };
}
