/**
 * Document Loader
 *
 * Reads FNOL documents from disk as plain text. Text files are read as
 * UTF-8; PDFs go through pdfjs-dist.
 */

import fs from 'node:fs/promises';
import path from 'node:path';
import { logger } from '@claim-triage/core';
import { extractTextFromPdf } from './pdf';

export type DocumentFormat = 'txt' | 'pdf';

export interface LoadedDocument {
  text: string;
  format: DocumentFormat;
  filePath: string;
}

const FORMATS_BY_EXTENSION: Record<string, DocumentFormat> = {
  '.txt': 'txt',
  '.pdf': 'pdf',
};

export class DocumentNotFoundError extends Error {
  readonly filePath: string;

  constructor(filePath: string) {
    super(`Document not found: ${filePath}`);
    this.name = 'DocumentNotFoundError';
    this.filePath = filePath;
  }
}

export class UnsupportedDocumentFormatError extends Error {
  readonly filePath: string;
  readonly extension: string;

  constructor(filePath: string, extension: string) {
    super(`Unsupported document format '${extension || '(none)'}': ${filePath}. Expected .txt or .pdf`);
    this.name = 'UnsupportedDocumentFormatError';
    this.filePath = filePath;
    this.extension = extension;
  }
}

export function getDocumentFormat(filePath: string): DocumentFormat | null {
  return FORMATS_BY_EXTENSION[path.extname(filePath).toLowerCase()] ?? null;
}

async function isFile(filePath: string): Promise<boolean> {
  try {
    return (await fs.stat(filePath)).isFile();
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      return false;
    }
    throw error;
  }
}

/**
 * Load a document's text.
 *
 * @throws DocumentNotFoundError when no file exists at filePath
 * @throws UnsupportedDocumentFormatError for extensions other than .txt and .pdf
 */
export async function loadDocument(filePath: string): Promise<LoadedDocument> {
  if (!(await isFile(filePath))) {
    throw new DocumentNotFoundError(filePath);
  }

  const format = getDocumentFormat(filePath);
  if (format === null) {
    throw new UnsupportedDocumentFormatError(filePath, path.extname(filePath));
  }

  const text =
    format === 'pdf'
      ? (await extractTextFromPdf(filePath)).combinedText
      : await fs.readFile(filePath, 'utf-8');

  logger.debug('Document loaded', { file_path: filePath, format, chars: text.length });

  return { text, format, filePath };
}

/**
 * Supported documents directly inside dir, sorted by file name.
 *
 * @throws DocumentNotFoundError when dir does not exist
 */
export async function listDocuments(dir: string): Promise<string[]> {
  let entries: string[];
  try {
    entries = await fs.readdir(dir);
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      throw new DocumentNotFoundError(dir);
    }
    throw error;
  }

  return entries
    .filter((entry) => getDocumentFormat(entry) !== null)
    .sort()
    .map((entry) => path.join(dir, entry));
}

/**
 * Output path for a document's result: <stem>_result.json in outputDir.
 */
export function resultPathFor(documentPath: string, outputDir: string): string {
  const stem = path.basename(documentPath, path.extname(documentPath));
  return path.join(outputDir, `${stem}_result.json`);
}
