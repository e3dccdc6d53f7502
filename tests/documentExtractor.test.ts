import { beforeEach, describe, expect, it, vi } from 'vitest';

const pdfMocks = vi.hoisted(() => ({
  getDocument: vi.fn(),
  destroy: vi.fn(),
}));

const docxMocks = vi.hoisted(() => ({
  extractRawText: vi.fn(),
}));

vi.mock('pdfjs-dist/legacy/build/pdf.mjs', () => ({
  getDocument: pdfMocks.getDocument,
}));

vi.mock('mammoth', () => ({
  default: { extractRawText: docxMocks.extractRawText },
}));

import { UnreadableDocumentError, UnsupportedFormatError, ValidationError } from '../src/errors';
import {
  extractDocumentText,
  fileExtension,
  resolveDocumentFormat,
} from '../src/services/documentExtractor';

function fakePdf(pages: Array<Array<{ str: string; hasEOL: boolean }>>) {
  return {
    promise: Promise.resolve({
      numPages: pages.length,
      getPage: async (pageNumber: number) => ({
        getTextContent: async () => ({ items: pages[pageNumber - 1] }),
      }),
      destroy: pdfMocks.destroy,
    }),
  };
}

describe('document format', () => {
  it('reads the extension case-insensitively', () => {
    expect(fileExtension('Resume.PDF')).toBe('pdf');
    expect(fileExtension('my.cv.docx')).toBe('docx');
    expect(fileExtension('README')).toBe('');
  });

  it('maps legacy .doc to the Word reader', () => {
    expect(resolveDocumentFormat('old.doc')).toBe('docx');
  });

  it('rejects other formats naming the extension', () => {
    expect(() => resolveDocumentFormat('resume.txt')).toThrow(UnsupportedFormatError);
    expect(() => resolveDocumentFormat('resume.txt')).toThrow('Unsupported file format: txt');
  });
});

describe('extractDocumentText', () => {
  beforeEach(() => {
    pdfMocks.getDocument.mockReset();
    pdfMocks.destroy.mockReset();
    docxMocks.extractRawText.mockReset();
  });

  it('concatenates PDF pages in order', async () => {
    pdfMocks.getDocument.mockReturnValue(
      fakePdf([
        [
          { str: 'Jane Doe', hasEOL: true },
          { str: 'Engineer', hasEOL: false },
        ],
        [{ str: 'Skills: Python', hasEOL: false }],
      ]),
    );

    const text = await extractDocumentText({ fileName: 'cv.pdf', data: Buffer.from('%PDF') });

    expect(text).toBe('Jane Doe\nEngineer\nSkills: Python');
    expect(pdfMocks.destroy).toHaveBeenCalledTimes(1);
  });

  it('joins Word paragraphs with single newlines', async () => {
    docxMocks.extractRawText.mockResolvedValue({ value: 'Jane Doe\n\nEngineer\n\n', messages: [] });

    const text = await extractDocumentText({ fileName: 'cv.docx', data: Buffer.from('PK') });

    expect(text).toBe('Jane Doe\nEngineer');
    expect(docxMocks.extractRawText).toHaveBeenCalledWith({ buffer: Buffer.from('PK') });
  });

  it('reports a Word file mammoth cannot read as a client error', async () => {
    const cause = new Error("Can't find end of central directory");
    docxMocks.extractRawText.mockRejectedValue(cause);

    const failure = extractDocumentText({ fileName: 'old.doc', data: Buffer.from('\xd0\xcf\x11\xe0', 'latin1') });

    await expect(failure).rejects.toBeInstanceOf(UnreadableDocumentError);
    await expect(failure).rejects.toMatchObject({
      status: 400,
      cause,
      message: "Could not read the document 'old.doc'. Please upload a valid PDF or DOCX file.",
    });
  });

  it('reports a corrupt PDF as a client error', async () => {
    pdfMocks.getDocument.mockImplementation(() => ({ promise: Promise.reject(new Error('Invalid PDF structure.')) }));

    await expect(extractDocumentText({ fileName: 'cv.pdf', data: Buffer.from('junk') })).rejects.toBeInstanceOf(
      ValidationError,
    );
  });

  it('does not open unsupported files', async () => {
    await expect(extractDocumentText({ fileName: 'resume.txt', data: Buffer.from('text') })).rejects.toThrow(
      'Unsupported file format: txt',
    );
    expect(pdfMocks.getDocument).not.toHaveBeenCalled();
    expect(docxMocks.extractRawText).not.toHaveBeenCalled();
  });
});
