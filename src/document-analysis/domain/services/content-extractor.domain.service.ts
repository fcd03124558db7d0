import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { readFile, stat } from 'node:fs/promises';
import { basename } from 'node:path';
import { AllConfigType } from '../../../config/config.type';
import { PDF_READER_PORT, PdfReaderPort } from '../ports/pdf-reader.port';
import { ExtractedDocument } from '../entities/extracted-document.entity';
import { ReadingMetrics } from '../entities/reading-metrics.entity';
import {
  DownloadError,
  ExtractionError,
  InvalidInputError,
  NotAPdfError,
} from '../errors/document-analysis.errors';
import {
  countWordsAndChars,
  detectLanguage,
  estimateTotalWords,
} from '../utils/text-metrics.util';
import { buildTocPreview } from '../utils/toc-preview.util';
import { ReadingTimeEstimatorDomainService } from './reading-time-estimator.domain.service';
import { errorMessage } from '../../../utils/analysis-error';
import { timeoutSignal } from '../../../utils/with-deadline';

export type DocumentSource = { path: string } | { url: string };

const PDF_SIGNATURE = '%PDF';
const DEFAULT_ESTIMATOR_LANGUAGE = 'ru';

export const isPdf = (buffer: Buffer): boolean =>
  buffer.subarray(0, PDF_SIGNATURE.length).toString('latin1') ===
  PDF_SIGNATURE;

/** URL-decoded last path segment of a URL, null when there is none. */
export function sourceNameFromUrl(url: string): string | null {
  const segments = new URL(url).pathname.split('/');
  const last = segments[segments.length - 1] ?? '';
  if (!last) {
    return null;
  }

  try {
    return decodeURIComponent(last);
  } catch {
    return last; // Malformed escape sequence, keep raw segment
  }
}

/**
 * Turns a path, URL or uploaded buffer into an ExtractedDocument.
 */
@Injectable()
export class ContentExtractorDomainService {
  private readonly logger = new Logger(ContentExtractorDomainService.name);

  constructor(
    @Inject(PDF_READER_PORT)
    private readonly pdfReader: PdfReaderPort,
    private readonly readingTimeEstimator: ReadingTimeEstimatorDomainService,
    private readonly configService: ConfigService<AllConfigType>,
  ) {}

  /**
   * @param signal caller deadline, aborts the file read or download
   */
  async extract(
    source: DocumentSource,
    signal?: AbortSignal,
  ): Promise<ExtractedDocument> {
    if ('path' in source) {
      const buffer = await this.readLocalFile(source.path, signal);
      return this.extractBuffer(buffer, basename(source.path));
    }

    const buffer = await this.download(source.url, signal);
    return this.extractBuffer(buffer, sourceNameFromUrl(source.url));
  }

  async extractBuffer(
    buffer: Buffer,
    sourceName: string | null,
  ): Promise<ExtractedDocument> {
    if (!isPdf(buffer)) {
      throw new NotAPdfError();
    }

    const { extraction, toc } = this.configService.getOrThrow(
      'documentAnalysis',
      { infer: true },
    );
    const fullText = extraction.textPages === 'full';
    const pagesToRead = fullText
      ? undefined
      : Math.max(1, toc.enabled ? toc.maxPages : 1);

    let pageCount: number;
    let pageTexts: string[];
    try {
      const result = await this.pdfReader.read(buffer, {
        maxPages: pagesToRead,
      });
      pageCount = result.pageCount;
      pageTexts = result.pages.map((page) => page.text);
    } catch (error) {
      if (error instanceof ExtractionError) {
        throw error;
      }
      throw new ExtractionError(`Failed to open PDF: ${errorMessage(error)}`, {
        cause: error,
      });
    }

    const firstPageText = pageTexts[0] ?? '';
    const text = fullText
      ? pageTexts
          .map((pageText) => pageText.trim())
          .filter(Boolean)
          .join('\n\n')
      : firstPageText;

    const { words: firstPageWords } = countWordsAndChars(firstPageText);
    const languageHint = detectLanguage(text);
    let wordCountHint = estimateTotalWords(
      firstPageWords,
      pageCount,
      buffer.length,
    );

    const readingMetrics = await this.tryEstimate(buffer, languageHint);
    if (readingMetrics && readingMetrics.wordCount > 0) {
      wordCountHint = readingMetrics.wordCount;
    }

    const tocPreview = toc.enabled
      ? buildTocPreview(pageTexts.slice(0, toc.maxPages), toc.maxChars)
      : null;

    this.logger.log(
      `[Content Extractor] ${sourceName ?? '<unnamed>'}: ${pageCount} pages, ` +
        `${buffer.length} bytes, ~${wordCountHint} words, lang=${languageHint ?? 'unknown'}`,
    );

    return {
      text,
      pageCount,
      byteSize: buffer.length,
      wordCountHint,
      languageHint,
      sourceName,
      tocPreview,
      readingMetrics,
    };
  }

  private async tryEstimate(
    buffer: Buffer,
    languageHint: string | null,
  ): Promise<ReadingMetrics | null> {
    try {
      return await this.readingTimeEstimator.estimate(buffer, {
        language: languageHint ?? DEFAULT_ESTIMATOR_LANGUAGE,
      });
    } catch (error) {
      this.logger.debug(
        `[Content Extractor] Reading-time estimation skipped: ${errorMessage(error)}`,
      );
      return null;
    }
  }

  private async readLocalFile(
    path: string,
    signal?: AbortSignal,
  ): Promise<Buffer> {
    try {
      const stats = await stat(path);
      if (!stats.isFile()) {
        throw new InvalidInputError(`Not a file: ${path}`);
      }
    } catch (error) {
      if (error instanceof InvalidInputError) {
        throw error;
      }
      throw new InvalidInputError(`File not found: ${path}`);
    }

    return readFile(path, { signal });
  }

  private async download(url: string, signal?: AbortSignal): Promise<Buffer> {
    let parsed: URL;
    try {
      parsed = new URL(url);
    } catch {
      throw new InvalidInputError(`Invalid URL: ${url}`);
    }
    if (parsed.protocol !== 'http:' && parsed.protocol !== 'https:') {
      throw new InvalidInputError(`Only http(s) URLs are supported: ${url}`);
    }

    const { downloadTimeoutMs, maxDownloadMb } = this.configService.getOrThrow(
      'documentAnalysis.extraction',
      { infer: true },
    );
    const maxBytes = maxDownloadMb * 1024 * 1024;

    let response: Response;
    try {
      response = await fetch(url, {
        redirect: 'follow',
        signal: timeoutSignal(downloadTimeoutMs, signal),
        headers: { Accept: 'application/pdf,*/*' },
      });
    } catch (error) {
      throw new DownloadError(
        `Download failed for URL: ${url} (${errorMessage(error)})`,
        url,
        undefined,
        { cause: error },
      );
    }

    if (!response.ok) {
      throw new DownloadError(
        `HTTP ${response.status} for URL: ${url}`,
        url,
        response.status,
      );
    }

    const declaredLength = Number(response.headers.get('content-length'));
    if (declaredLength > maxBytes) {
      await response.body?.cancel();
      throw new DownloadError(
        `Download exceeds ${maxDownloadMb} MB for URL: ${url}`,
        url,
        response.status,
      );
    }

    return this.readBody(response, url, maxDownloadMb);
  }

  /** Read the body chunk by chunk, cancelling once it passes the size limit. */
  private async readBody(
    response: Response,
    url: string,
    maxDownloadMb: number,
  ): Promise<Buffer> {
    const maxBytes = maxDownloadMb * 1024 * 1024;
    if (!response.body) {
      return Buffer.alloc(0);
    }

    const reader = response.body.getReader();
    const chunks: Uint8Array[] = [];
    let received = 0;
    try {
      for (;;) {
        const { done, value } = await reader.read();
        if (done) break;

        const chunk: Uint8Array = value;
        received += chunk.byteLength;
        if (received > maxBytes) {
          await reader.cancel();
          throw new DownloadError(
            `Download exceeds ${maxDownloadMb} MB for URL: ${url}`,
            url,
            response.status,
          );
        }
        chunks.push(chunk);
      }
    } catch (error) {
      if (error instanceof DownloadError) {
        throw error;
      }
      throw new DownloadError(
        `Download interrupted for URL: ${url} (${errorMessage(error)})`,
        url,
        response.status,
        { cause: error },
      );
    }

    return Buffer.concat(chunks);
  }
}
