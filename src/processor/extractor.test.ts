import pdf from 'pdf-parse/lib/pdf-parse.js';
import { detectDocumentKind, extractText, normalizeText } from './extractor.js';
import { ExtractionError } from '../util/errors.js';

vi.mock('pdf-parse/lib/pdf-parse.js', () => ({
  default: vi.fn(),
}));

const mockPdf = vi.mocked(pdf);

function pdfResult(text: string, numpages: number) {
  return { text, numpages, numrender: numpages, info: {}, metadata: null, version: 'v1.10.100' as const };
}

describe('detectDocumentKind', () => {
  it('should detect PDFs by MIME type, extension or magic bytes', () => {
    expect(detectDocumentKind({ name: 'a', data: Buffer.from('x'), mimeType: 'application/pdf' })).toBe('pdf');
    expect(detectDocumentKind({ name: 'Report.PDF', data: Buffer.from('x') })).toBe('pdf');
    expect(detectDocumentKind({ name: 'upload.bin', data: Buffer.from('%PDF-1.7\n...') })).toBe('pdf');
  });

  it('should detect text by MIME type or extension', () => {
    expect(detectDocumentKind({ name: 'notes', data: Buffer.from('x'), mimeType: 'text/plain' })).toBe('text');
    expect(detectDocumentKind({ name: 'notes.txt', data: Buffer.from('x') })).toBe('text');
    expect(detectDocumentKind({ name: 'README.md', data: Buffer.from('x') })).toBe('text');
  });

  it('should return null for other types', () => {
    expect(detectDocumentKind({ name: 'image.png', data: Buffer.from([0x89, 0x50, 0x4e, 0x47]) })).toBeNull();
  });
});

describe('normalizeText', () => {
  it('should normalize line endings and trim', () => {
    expect(normalizeText('  a\r\nb\rc\n  ')).toBe('a\nb\nc');
  });

  it('should collapse whitespace runs', () => {
    expect(normalizeText('Intro sentence.' + ' '.repeat(3000) + 'Outro sentence.')).toBe('Intro sentence. Outro sentence.');
    expect(normalizeText('a\t\t b  \n \n\n\n\nc')).toBe('a b\n\nc');
  });
});

describe('extractText', () => {
  it('should decode UTF-8 text and strip the BOM', async () => {
    const result = await extractText({ name: 'notes.txt', data: Buffer.from('\uFEFFLine one\r\nLine two\r\n', 'utf-8') });

    expect(result).toEqual({ kind: 'text', text: 'Line one\nLine two' });
  });

  it('should keep non-ASCII characters', async () => {
    const result = await extractText({
      name: 'water.txt',
      data: Buffer.from('The sky is blue. Water boils at 100°C at sea level.', 'utf-8'),
    });
    expect(result.text).toBe('The sky is blue. Water boils at 100°C at sea level.');
  });

  it('should extract PDF text with the page count', async () => {
    mockPdf.mockResolvedValueOnce(pdfResult('Page one text\n\nPage two text\n', 2));

    const result = await extractText({ name: 'report.pdf', data: Buffer.from('%PDF-1.4 test') });

    expect(result).toEqual({ kind: 'pdf', text: 'Page one text\n\nPage two text', pageCount: 2 });
    expect(mockPdf).toHaveBeenCalledTimes(1);
  });

  it('should reject unsupported file types', async () => {
    await expect(extractText({ name: 'image.png', data: Buffer.from([0x89, 0x50]) })).rejects.toThrow(
      'Unsupported file type: image.png. Upload a PDF or plain-text file.'
    );
  });

  it('should reject files without text', async () => {
    await expect(extractText({ name: 'blank.txt', data: Buffer.from('  \n\n ') })).rejects.toThrow(
      'No extractable text found in blank.txt'
    );
  });

  it('should reject scanned PDFs with no text layer', async () => {
    mockPdf.mockResolvedValueOnce(pdfResult('\n\n', 3));

    await expect(extractText({ name: 'scan.pdf', data: Buffer.from('%PDF-1.4') })).rejects.toThrow(
      'No extractable text found in scan.pdf'
    );
  });

  it('should wrap PDF parser failures', async () => {
    mockPdf.mockRejectedValueOnce(new Error('bad XRef entry'));

    const promise = extractText({ name: 'broken.pdf', data: Buffer.from('%PDF-1.4') });
    await expect(promise).rejects.toBeInstanceOf(ExtractionError);
    await expect(promise).rejects.toThrow('Could not read PDF broken.pdf: bad XRef entry');
  });

  it('should reject invalid UTF-8', async () => {
    await expect(extractText({ name: 'bad.txt', data: Buffer.from([0xff, 0xfe, 0xfd]) })).rejects.toThrow(
      'Could not read bad.txt as UTF-8 text'
    );
  });
});
