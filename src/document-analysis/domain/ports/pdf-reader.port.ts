export interface PdfPageContent {
  pageNumber: number; // 1-based
  text: string;
  imageCount: number;
}

export interface PdfReadOptions {
  /** Read at most this many leading pages (all pages when omitted) */
  maxPages?: number;
  /** Count embedded images per page (slower) */
  withImages?: boolean;
}

export interface PdfReadResult {
  pageCount: number;
  pages: PdfPageContent[];
}

export interface PdfReaderPort {
  /**
   * Open a PDF and return per-page content
   * @throws ExtractionError if the bytes cannot be parsed as a PDF
   */
  read(buffer: Buffer, options?: PdfReadOptions): Promise<PdfReadResult>;

  /**
   * @throws ExtractionError if the bytes cannot be parsed as a PDF
   */
  getPageCount(buffer: Buffer): Promise<number>;
}

export const PDF_READER_PORT = 'PdfReaderPort';
