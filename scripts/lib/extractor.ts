/**
 * Text extraction for statute sources.
 *
 * PDFs are read with pdfjs-dist first. When that fails or yields too little
 * text (scanned or oddly encoded files), poppler's `pdftotext` is tried and
 * the longer result wins. Plain-text sources are read as-is.
 *
 * pdfjs-dist is imported lazily so text-only runs never load it.
 */

import { execFileSync } from 'child_process';
import * as fs from 'fs';

export const MIN_EXTRACTED_LENGTH = 500;

export type Extractor = 'pdfjs' | 'pdftotext' | 'text';

export interface ExtractedText {
  text: string;
  extractor: Extractor;
  pages: number | null;
}

function normaliseLineEndings(value: string): string {
  return value.replace(/\r\n?/g, '\n');
}

async function extractWithPdfJs(pdfPath: string): Promise<{ text: string; pages: number }> {
  const { getDocument } = await import('pdfjs-dist/legacy/build/pdf.mjs');
  const data = new Uint8Array(fs.readFileSync(pdfPath));
  const document = await getDocument({ data, useSystemFonts: true, isEvalSupported: false }).promise;

  try {
    const pages: string[] = [];
    for (let pageNumber = 1; pageNumber <= document.numPages; pageNumber++) {
      const page = await document.getPage(pageNumber);
      const content = await page.getTextContent();

      let pageText = '';
      for (const item of content.items) {
        if (!('str' in item)) continue;
        pageText += item.str;
        if (item.hasEOL) pageText += '\n';
      }
      pages.push(pageText);
      page.cleanup();
    }

    return { text: pages.join('\n'), pages: document.numPages };
  } finally {
    await document.destroy();
  }
}

function extractWithPdfToText(pdfPath: string): string {
  return execFileSync('pdftotext', ['-layout', '-enc', 'UTF-8', pdfPath, '-'], {
    encoding: 'utf8',
    maxBuffer: 256 * 1024 * 1024,
    stdio: ['ignore', 'pipe', 'ignore'],
  });
}

export async function readPdfText(pdfPath: string): Promise<ExtractedText> {
  let primary: ExtractedText = { text: '', extractor: 'pdfjs', pages: null };
  let primaryError: unknown = null;

  try {
    const extracted = await extractWithPdfJs(pdfPath);
    primary = { text: normaliseLineEndings(extracted.text), extractor: 'pdfjs', pages: extracted.pages };
  } catch (error) {
    primaryError = error;
  }

  if (primary.text.length >= MIN_EXTRACTED_LENGTH) {
    return primary;
  }

  let fallbackText: string;
  try {
    fallbackText = normaliseLineEndings(extractWithPdfToText(pdfPath));
  } catch (fallbackError) {
    if (primaryError) {
      const primaryMessage = primaryError instanceof Error ? primaryError.message : String(primaryError);
      const fallbackMessage = fallbackError instanceof Error ? fallbackError.message : String(fallbackError);
      throw new Error(`Unable to extract text from ${pdfPath}: pdfjs=${primaryMessage}; pdftotext=${fallbackMessage}`);
    }
    // Short pdfjs text is still the best we have.
    return primary;
  }

  if (fallbackText.length > primary.text.length) {
    return { text: fallbackText, extractor: 'pdftotext', pages: primary.pages };
  }
  return primary;
}

export async function readSourceText(filePath: string, kind: 'pdf' | 'text'): Promise<ExtractedText> {
  if (kind === 'pdf') {
    return readPdfText(filePath);
  }

  return {
    text: normaliseLineEndings(fs.readFileSync(filePath, 'utf8')),
    extractor: 'text',
    pages: null,
  };
}
