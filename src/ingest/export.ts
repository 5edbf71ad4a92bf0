/**
 * Paperwork Migrate - PDF Export
 *
 * Chooses how a document is turned into a PDF:
 * 1. unmodified_pdf: the document was imported as a PDF, export it untouched
 * 2. doc_to_pages → img_boxes → generated_pdf: scanned pages, rebuild a PDF
 *    with the OCR text boxes laid over the images
 */

import { existsSync } from 'fs';

import type { ExportOutcome } from '../core/types.js';
import {
  FILTER_UNMODIFIED_PDF,
  FILTER_DOC_TO_PAGES,
  FILTER_IMG_BOXES,
  FILTER_GENERATED_PDF,
} from '../core/types.js';
import type { PaperworkJson } from './paperwork-json.js';

export const SCANNED_PAGES_CHAIN = [FILTER_DOC_TO_PAGES, FILTER_IMG_BOXES, FILTER_GENERATED_PDF];

/**
 * First matching chain wins; null when no known chain applies
 */
export function chooseFilterChain(available: string[]): string[] | null {
  if (available.includes(FILTER_UNMODIFIED_PDF)) {
    return [FILTER_UNMODIFIED_PDF];
  }
  if (available.includes(FILTER_DOC_TO_PAGES)) {
    return [...SCANNED_PAGES_CHAIN];
  }
  return null;
}

export async function exportDocument(
  paperwork: PaperworkJson,
  docId: string,
  exportPath: string,
  available: string[]
): Promise<ExportOutcome> {
  if (existsSync(exportPath)) {
    return 'already-done';
  }

  const chain = chooseFilterChain(available);
  if (!chain) {
    console.error(`[paperwork] Unknown filters ${JSON.stringify(available)} for ${docId}; not exported`);
    return 'unsupported';
  }

  console.log(`  Exporting to ${exportPath} (${chain.join(' → ')})...`);
  await paperwork.exportDocument(docId, chain, exportPath);
  return 'exported';
}
