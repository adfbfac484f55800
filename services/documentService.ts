import { Document, Packer, Paragraph, TextRun } from 'docx';
import { saveAs } from 'file-saver';
import type { PDFDocumentProxy } from 'pdfjs-dist/legacy/build/pdf.mjs';
import type { RawUpload } from '../types';
import { createLogger } from './logService';

type DocumentKind = 'pdf' | 'docx' | 'text';

const logger = createLogger('documents');

const getDocumentKind = (fileName: string): DocumentKind => {
  const name = fileName.toLowerCase();
  if (name.endsWith('.pdf')) return 'pdf';
  if (name.endsWith('.docx')) return 'docx';
  return 'text';
};

export const readUpload = async (file: File): Promise<RawUpload> => ({
  name: file.name,
  data: await file.arrayBuffer(),
});

/** UTF-8 first; bytes that aren't valid UTF-8 are read as a single-byte encoding. */
export const decodeText = (data: ArrayBuffer): string => {
  const bytes = new Uint8Array(data);
  try {
    return new TextDecoder('utf-8', { fatal: true }).decode(bytes).trim();
  } catch {
    return new TextDecoder('latin1').decode(bytes).trim();
  }
};

type PageTextItem = { str: string; hasEOL: boolean } | { type: string };

/** Items on one line are joined with spaces; an end-of-line item closes the line. */
export const readPageText = (items: readonly PageTextItem[]): string => {
  const lines: string[] = [];
  let line: string[] = [];
  for (const item of items) {
    if (!('str' in item)) continue;
    if (item.str) line.push(item.str);
    if (item.hasEOL) {
      lines.push(line.join(' '));
      line = [];
    }
  }
  if (line.length > 0) lines.push(line.join(' '));
  return lines.join('\n');
};

const extractPdfText = async (data: ArrayBuffer): Promise<string> => {
  const pdfjs = await import('pdfjs-dist/legacy/build/pdf.mjs');

  let pdf: PDFDocumentProxy;
  try {
    pdf = await pdfjs.getDocument({ data: new Uint8Array(data.slice(0)) }).promise;
  } catch (error) {
    logger.warn('pdf_unreadable', { errorName: error instanceof Error ? error.name : typeof error });
    return '';
  }

  const pages: string[] = [];
  try {
    for (let i = 1; i <= pdf.numPages; i++) {
      try {
        const page = await pdf.getPage(i);
        const content = await page.getTextContent();
        pages.push(readPageText(content.items));
      } catch (error) {
        logger.warn('pdf_page_unreadable', {
          page: i,
          errorName: error instanceof Error ? error.name : typeof error,
        });
        pages.push('');
      }
    }
  } finally {
    void pdf.destroy();
  }

  return pages.join('\n').trim();
};

const extractDocxText = async (data: ArrayBuffer): Promise<string> => {
  const { default: mammoth } = await import('mammoth');
  try {
    const result = await mammoth.extractRawText({ arrayBuffer: data });
    return result.value.trim();
  } catch (error) {
    logger.warn('docx_unreadable', { errorName: error instanceof Error ? error.name : typeof error });
    return '';
  }
};

/**
 * Text of an uploaded CV, job description or example letter. A missing or
 * empty upload yields '' and so does a document that cannot be parsed.
 */
export const extractTextFromUpload = async (upload: RawUpload | null): Promise<string> => {
  if (!upload || upload.data.byteLength === 0) return '';

  switch (getDocumentKind(upload.name)) {
    case 'pdf':
      return extractPdfText(upload.data);
    case 'docx':
      return extractDocxText(upload.data);
    case 'text':
      return decodeText(upload.data);
  }
};

export const downloadAsText = (text: string, filename: string) => {
  const blob = new Blob([text], { type: 'text/plain;charset=utf-8' });
  saveAs(blob, `${filename}.txt`);
};

export const buildLetterDocument = (text: string): Document => {
  const children = text.split('\n').map(line => {
    const trimmed = line.trim();
    if (!trimmed) return new Paragraph({ spacing: { before: 100, after: 100 } });

    return new Paragraph({
      children: [new TextRun(trimmed)],
      spacing: { before: 80, after: 80 },
    });
  });

  return new Document({
    sections: [{
      properties: {},
      children,
    }],
  });
};

export const downloadAsDocx = async (text: string, filename: string) => {
  const blob = await Packer.toBlob(buildLetterDocument(text));
  saveAs(blob, `${filename}.docx`);
};
