/**
 * Paperwork Migrate - Archive Scanner
 *
 * A Paperwork archive is a directory with one subdirectory per document,
 * named <YYYYMMDD>_<suffix>. Nothing below the first level is read.
 */

import { readdir, stat } from 'fs/promises';
import path from 'path';

import type { DocumentRef } from '../core/types.js';
import { MigrationError } from '../core/errors.js';

/**
 * Whether a symlink points at a directory; dangling links count as no
 */
async function isDirectoryTarget(linkPath: string): Promise<boolean> {
  try {
    return (await stat(linkPath)).isDirectory();
  } catch (error) {
    if ((error as NodeJS.ErrnoException).code === 'ENOENT') return false;
    throw error;
  }
}

/**
 * List the documents of an archive, in directory listing order
 */
export async function scanArchive(archivePath: string): Promise<DocumentRef[]> {
  const root = path.resolve(archivePath);

  let isDirectory = false;
  try {
    isDirectory = (await stat(root)).isDirectory();
  } catch (error) {
    if ((error as NodeJS.ErrnoException).code !== 'ENOENT') throw error;
  }
  if (!isDirectory) {
    throw new MigrationError('configuration', `'${root}' does not exist!`);
  }

  const entries = await readdir(root, { withFileTypes: true });

  const docs: DocumentRef[] = [];
  for (const entry of entries) {
    const entryPath = path.join(root, entry.name);
    if (entry.isDirectory() || (entry.isSymbolicLink() && (await isDirectoryTarget(entryPath)))) {
      docs.push({ id: entry.name, path: entryPath });
    }
  }
  return docs;
}

/**
 * Creation date from the document id prefix: "20190312_1540_08" → "2019-03-12"
 */
export function parseDocumentDate(docId: string): string {
  const token = docId.split('_')[0];
  const match = /^(\d{4})(\d{2})(\d{2})$/.exec(token);
  if (!match) {
    throw new MigrationError('data', `Cannot read a date from document '${docId}'`);
  }

  const [, year, month, day] = match;
  const date = new Date(Date.UTC(Number(year), Number(month) - 1, Number(day)));

  // Date.UTC rolls 20190231 over into March
  if (
    date.getUTCFullYear() !== Number(year) ||
    date.getUTCMonth() !== Number(month) - 1 ||
    date.getUTCDate() !== Number(day)
  ) {
    throw new MigrationError('data', `Invalid date '${token}' in document '${docId}'`);
  }

  return `${year}-${month}-${day}`;
}

/**
 * Deterministic export path; its existence marks the document as migrated
 */
export function exportPathFor(exportDir: string, docId: string): string {
  return path.join(path.resolve(exportDir), `${docId}.pdf`);
}
