/**
 * Paperwork Migrate - Core Types
 *
 * Thin, transient records passed between the archive scan, the
 * paperwork-json wrapper and the paperless-ngx client.
 */

// ============================================================================
// Source side (Paperwork)
// ============================================================================

export interface DocumentRef {
  id: string;        // Directory name, e.g. 20190312_1540_08
  path: string;      // Absolute path of the document directory
}

// Filters exposed by `paperwork-json export`
export const FILTER_UNMODIFIED_PDF = 'unmodified_pdf';
export const FILTER_DOC_TO_PAGES = 'doc_to_pages';
export const FILTER_IMG_BOXES = 'img_boxes';
export const FILTER_GENERATED_PDF = 'generated_pdf';

export type ExportOutcome =
  | 'exported'       // paperwork-json wrote the PDF
  | 'unsupported'    // No known filter chain for this document
  | 'already-done';  // Export artifact was already on disk

// ============================================================================
// Target side (paperless-ngx)
// ============================================================================

/** Lowercased tag slug → tag id */
export type TagMap = Map<string, number>;

export interface ServerInfo {
  version: string;
  apiVersion: string;
}

export interface UploadPayload {
  filePath: string;
  created: string;   // YYYY-MM-DD
  tags: number[];
}

// ============================================================================
// Results
// ============================================================================

export type DocumentStatus =
  | 'skipped'        // Export artifact existed before this run
  | 'unsupported'
  | 'exported'       // Dry run: exported, not uploaded
  | 'uploaded'
  | 'failed';

export interface DocumentResult {
  id: string;
  status: DocumentStatus;
  created?: string;
  labels: string[];
  tags: number[];
  exportPath: string;
  error?: string;
}

export interface MigrationSummary {
  server: ServerInfo;
  dryRun: boolean;
  total: number;
  counts: Record<DocumentStatus, number>;
  results: DocumentResult[];
}
