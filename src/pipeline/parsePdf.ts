import { IngestError, describeError } from '../errors';

export type ParsedDocument = {
  text: string;
  pages: number;
};

export interface DocumentExtractor {
  extract(bytes: Buffer): Promise<ParsedDocument>;
}

const MIN_DOCUMENT_BYTES = 8;

const EMPTY_MESSAGE = 'The uploaded resume is empty. Please upload a PDF that contains text.';
const UNREADABLE_MESSAGE = 'The uploaded resume could not be read. Please upload a text-based PDF.';

/** Text extraction for uploaded resumes, through pdf-parse. */
export class PdfDocumentExtractor implements DocumentExtractor {
  async extract(bytes: Buffer): Promise<ParsedDocument> {
    if (bytes.length < MIN_DOCUMENT_BYTES) {
      throw new IngestError(`Document has ${bytes.length} bytes.`, 'INGEST_EMPTY_DOCUMENT', EMPTY_MESSAGE);
    }

    // Loaded on first use so the parser is never pulled into processes that only take pasted text.
    const { default: pdfParse } = await import('pdf-parse');

    let result: { text?: string; numpages?: number };

    try {
      result = await pdfParse(bytes);
    } catch (error) {
      throw new IngestError(`PDF parsing failed: ${describeError(error)}`, 'INGEST_UNREADABLE_DOCUMENT', UNREADABLE_MESSAGE, {
        cause: error,
      });
    }

    const text = (result.text ?? '').trim();
    const pages = typeof result.numpages === 'number' ? Math.max(0, Math.trunc(result.numpages)) : 0;

    if (!text) {
      throw new IngestError('PDF contains no extractable text.', 'INGEST_UNREADABLE_DOCUMENT', UNREADABLE_MESSAGE);
    }

    return {
      text,
      pages,
    };
  }
}
