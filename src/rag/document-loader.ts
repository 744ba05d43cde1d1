/**
 * Document Loader
 *
 * Finds files under a directory and turns them into documents: one per PDF
 * page, one per text file.
 */

import { readFile, stat } from 'fs/promises';
import * as path from 'path';
import { glob } from 'glob';
import { extractText, getDocumentProxy } from 'unpdf';
import { errorMessage } from '../errors.js';
import { logger } from '../logger.js';
import type { Document } from './types.js';

/** Default pattern, matching the PDF corpus layout */
export const DEFAULT_GLOB = '**/*.pdf';

/**
 * Load a PDF as one document per page. `page` is zero-based.
 */
async function loadPdfFile(filePath: string): Promise<Document[]> {
  const buffer = await readFile(filePath);
  let pages: string[];
  try {
    const pdf = await getDocumentProxy(new Uint8Array(buffer));
    ({ text: pages } = await extractText(pdf, { mergePages: false }));
  } catch (error) {
    throw new Error(
      `Failed to parse PDF ${filePath}: ${errorMessage(error)}`,
      { cause: error }
    );
  }

  const documents: Document[] = [];
  pages.forEach((text, page) => {
    if (text.trim() === '') return;
    documents.push({ content: text, metadata: { source: filePath, page } });
  });
  return documents;
}

async function loadTextFile(filePath: string): Promise<Document[]> {
  const content = await readFile(filePath, 'utf-8');
  if (content.trim() === '') return [];
  return [{ content, metadata: { source: filePath } }];
}

/**
 * Load a single file by extension.
 */
export async function loadFile(filePath: string): Promise<Document[]> {
  return path.extname(filePath).toLowerCase() === '.pdf'
    ? loadPdfFile(filePath)
    : loadTextFile(filePath);
}

/**
 * Load every file under a directory matching a glob pattern, in path order.
 */
export async function loadDirectory(directory: string, pattern: string = DEFAULT_GLOB): Promise<Document[]> {
  let isDirectory: boolean;
  try {
    isDirectory = (await stat(directory)).isDirectory();
  } catch (error) {
    throw new Error(`Cannot read ${directory}: ${errorMessage(error)}`, { cause: error });
  }
  if (!isDirectory) {
    throw new Error(`Not a directory: ${directory}`);
  }

  const matches = await glob(pattern, { cwd: directory, nodir: true });
  const files = matches.sort().map((match) => path.join(directory, match));

  const documents: Document[] = [];
  for (const file of files) {
    const loaded = await loadFile(file);
    logger.debug(`Loaded ${loaded.length} documents from ${file}`);
    documents.push(...loaded);
  }

  logger.verbose(`Loaded ${documents.length} documents from ${files.length} files`);
  return documents;
}
