/**
 * Document Text Extractor
 * Turns an uploaded CV (PDF or Word) into plain text for the parse stage.
 */

import mammoth from 'mammoth';
import { getDocument } from 'pdfjs-dist/legacy/build/pdf.mjs';
import { UnreadableDocumentError, UnsupportedFormatError } from '../errors';
import type { RawDocument } from '../types/analysis';

export type DocumentFormat = 'pdf' | 'docx';

const FORMAT_BY_EXTENSION: Readonly<Record<string, DocumentFormat>> = Object.freeze({
  pdf: 'pdf',
  docx: 'docx',
  doc: 'docx',
});

export function fileExtension(fileName: string): string {
  const dot = fileName.lastIndexOf('.');
  return dot === -1 ? '' : fileName.slice(dot + 1).trim().toLowerCase();
}

export function resolveDocumentFormat(fileName: string): DocumentFormat {
  const extension = fileExtension(fileName);
  const format = FORMAT_BY_EXTENSION[extension];
  if (!format) {
    throw new UnsupportedFormatError(extension);
  }
  return format;
}

/**
 * Text of every page, in page order. Lines follow the end-of-line markers
 * pdf.js reports for each text run.
 */
export async function extractPdfText(data: Buffer): Promise<string> {
  const pdf = await getDocument({
    data: new Uint8Array(data),
    isEvalSupported: false,
    useSystemFonts: true,
  }).promise;

  try {
    let text = '';
    for (let pageNumber = 1; pageNumber <= pdf.numPages; pageNumber++) {
      const page = await pdf.getPage(pageNumber);
      const content = await page.getTextContent();
      for (const item of content.items) {
        if ('str' in item) {
          text += item.str;
          if (item.hasEOL) text += '\n';
        }
      }
      text += '\n';
    }
    return text;
  } finally {
    await pdf.destroy();
  }
}

/**
 * Paragraph texts joined with single newlines, in document order.
 * mammoth ends every paragraph with a blank line.
 */
export async function extractDocxText(data: Buffer): Promise<string> {
  const result = await mammoth.extractRawText({ buffer: data });
  return result.value.split('\n\n').join('\n');
}

/**
 * Plain text of an uploaded CV. Legacy binary .doc files and corrupt uploads
 * fail in the reader and surface as UnreadableDocumentError.
 */
export async function extractDocumentText(document: RawDocument): Promise<string> {
  const format = resolveDocumentFormat(document.fileName);
  let text: string;
  try {
    text = format === 'pdf' ? await extractPdfText(document.data) : await extractDocxText(document.data);
  } catch (error) {
    throw new UnreadableDocumentError(document.fileName, { cause: error });
  }
  return text.trim();
}
