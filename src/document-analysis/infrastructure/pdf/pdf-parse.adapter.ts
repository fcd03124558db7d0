import { Injectable, Logger } from '@nestjs/common';
import type { PDFParse } from 'pdf-parse';
import {
  PdfPageContent,
  PdfReaderPort,
  PdfReadOptions,
  PdfReadResult,
} from '../../domain/ports/pdf-reader.port';
import { ExtractionError } from '../../domain/errors/document-analysis.errors';
import { errorMessage } from '../../../utils/analysis-error';

type PdfParseModule = typeof import('pdf-parse');

/**
 * PdfReaderPort backed by pdf-parse.
 *
 * NOTE: pdf-parse v2 exports PDFParse as a named export with a CJS build.
 * It is required lazily so pdf.js is only loaded when a PDF is read.
 */
@Injectable()
export class PdfParseAdapter implements PdfReaderPort {
  private readonly logger = new Logger(PdfParseAdapter.name);

  async read(
    buffer: Buffer,
    options: PdfReadOptions = {},
  ): Promise<PdfReadResult> {
    return this.withParser(buffer, async (parser) => {
      const params = options.maxPages ? { first: options.maxPages } : {};
      const textResult = await parser.getText(params);

      const imageCounts = new Map<number, number>();
      if (options.withImages) {
        const imageResult = await parser.getImage({
          ...params,
          imageBuffer: false,
          imageDataUrl: false,
        });
        for (const page of imageResult.pages) {
          imageCounts.set(page.pageNumber, page.images.length);
        }
      }

      const pages: PdfPageContent[] = textResult.pages.map((page) => ({
        pageNumber: page.num,
        text: page.text,
        imageCount: imageCounts.get(page.num) ?? 0,
      }));

      this.logger.debug(
        `[PDF Reader] Read ${pages.length}/${textResult.total} pages (images: ${options.withImages ? 'yes' : 'no'})`,
      );
      return { pageCount: textResult.total, pages };
    });
  }

  async getPageCount(buffer: Buffer): Promise<number> {
    return this.withParser(buffer, async (parser) => {
      const info = await parser.getInfo();
      return info.total;
    });
  }

  private async withParser<T>(
    buffer: Buffer,
    work: (parser: PDFParse) => Promise<T>,
  ): Promise<T> {
    let parser: PDFParse;
    try {
      // eslint-disable-next-line @typescript-eslint/no-require-imports
      const { PDFParse: Parser }: PdfParseModule = require('pdf-parse');
      // pdf.js may transfer the bytes it is given, so hand it a copy
      parser = new Parser({ data: new Uint8Array(buffer) });
    } catch (error) {
      throw new ExtractionError(
        `Failed to initialise PDF parser: ${errorMessage(error)}`,
        { cause: error },
      );
    }

    try {
      return await work(parser);
    } catch (error) {
      throw new ExtractionError(
        `Failed to parse PDF: ${errorMessage(error)}`,
        { cause: error },
      );
    } finally {
      await parser.destroy().catch((error: unknown) => {
        this.logger.debug(
          `[PDF Reader] Parser cleanup failed: ${errorMessage(error)}`,
        );
      });
    }
  }
}
