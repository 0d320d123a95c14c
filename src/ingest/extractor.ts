import type { Result as PdfResult } from 'pdf-parse';
import { ExtractedText } from '@media/resolver';

type PdfParse = (data: Buffer) => Promise<PdfResult>;

let cachedPdfParse: PdfParse | null = null;

const getPdfParse = async () => {
  if (!cachedPdfParse) {
    const mod = await import('pdf-parse');
    cachedPdfParse = mod.default;
  }
  return cachedPdfParse;
};

export const countWords = (text: string) => text.split(/\s+/).filter(Boolean).length;

const pdfProperties = (result: PdfResult): Record<string, unknown> => {
  const properties: Record<string, unknown> = { pages: result.numpages };
  const info: unknown = result.info;
  if (info && typeof info === 'object') {
    for (const key of ['Title', 'Author', 'Subject'] as const) {
      const value: unknown = Reflect.get(info, key);
      if (typeof value === 'string' && value) {
        properties[key.toLowerCase()] = value;
      }
    }
  }
  return properties;
};

/**
 * Text for plain-text and PDF documents. Formats without an extractor yield
 * empty text; callers catch parser failures and degrade the same way.
 */
export const extractText = async (bytes: Buffer, mimeType?: string) => {
  if (mimeType === 'text/plain') {
    const text = bytes.toString('utf8');
    return { text, properties: { lines: text.split(/\r?\n/).length } } satisfies ExtractedText;
  }
  if (mimeType === 'application/pdf') {
    const parse = await getPdfParse();
    const result = await parse(bytes);
    return { text: result.text, properties: pdfProperties(result) } satisfies ExtractedText;
  }
  return { text: '', properties: {} } satisfies ExtractedText;
};
