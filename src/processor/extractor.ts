import { extname } from 'node:path';
import pdf from 'pdf-parse/lib/pdf-parse.js';
import { DocumentKind, ExtractedDocument, UploadedFile } from '../types.js';
import { ExtractionError, describeError } from '../util/errors.js';
import { logger } from '../util/logger.js';

const TEXT_EXTENSIONS = ['.txt', '.md', '.markdown', '.text'];
const PDF_MAGIC = Buffer.from('%PDF-');

/**
 * Decide how to read a file from its MIME type, extension and leading bytes.
 * Returns null for anything that is neither PDF nor plain text.
 */
export function detectDocumentKind(file: UploadedFile): DocumentKind | null {
  const mimeType = file.mimeType?.toLowerCase();
  const extension = extname(file.name).toLowerCase();

  if (mimeType === 'application/pdf' || extension === '.pdf') {
    return 'pdf';
  }
  if (file.data.subarray(0, PDF_MAGIC.length).equals(PDF_MAGIC)) {
    return 'pdf';
  }
  if (mimeType?.startsWith('text/') || TEXT_EXTENSIONS.includes(extension)) {
    return 'text';
  }
  return null;
}

/**
 * Normalize line endings, collapse whitespace runs and trim.
 * After this no run of whitespace is longer than a paragraph break, so every chunk has text.
 */
export function normalizeText(text: string): string {
  return text
    .replace(/\r\n?/g, '\n')
    .replace(/[^\S\n]+/g, ' ')
    .replace(/ ?\n ?/g, '\n')
    .replace(/\n{3,}/g, '\n\n')
    .trim();
}

async function extractPdf(file: UploadedFile): Promise<ExtractedDocument> {
  let result: Awaited<ReturnType<typeof pdf>>;
  try {
    // pdf-parse renders pages in order and joins them with blank lines
    result = await pdf(file.data);
  } catch (error) {
    throw new ExtractionError(`Could not read PDF ${file.name}: ${describeError(error)}`, { cause: error });
  }

  return {
    kind: 'pdf',
    text: normalizeText(result.text ?? ''),
    pageCount: result.numpages,
  };
}

function extractPlainText(file: UploadedFile): ExtractedDocument {
  let text: string;
  try {
    text = new TextDecoder('utf-8', { fatal: true, ignoreBOM: false }).decode(file.data);
  } catch (error) {
    throw new ExtractionError(`Could not read ${file.name} as UTF-8 text`, { cause: error });
  }
  return { kind: 'text', text: normalizeText(text) };
}

/**
 * Convert an uploaded PDF or text file into a single flat string.
 * @throws ExtractionError if the type is unsupported, the file is unreadable, or no text was found
 */
export async function extractText(file: UploadedFile): Promise<ExtractedDocument> {
  const kind = detectDocumentKind(file);
  if (!kind) {
    throw new ExtractionError(`Unsupported file type: ${file.name}. Upload a PDF or plain-text file.`);
  }

  logger.debug(`[Extractor] Extracting ${kind} text from ${file.name} (${file.data.length} bytes)`);
  const extracted = kind === 'pdf' ? await extractPdf(file) : extractPlainText(file);

  if (extracted.text.length === 0) {
    throw new ExtractionError(`No extractable text found in ${file.name}`);
  }

  logger.debug(`[Extractor] Extracted ${extracted.text.length} characters from ${file.name}`);
  return extracted;
}
