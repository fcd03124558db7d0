import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { AllConfigType } from '../../../config/config.type';
import {
  PDF_READER_PORT,
  PdfPageContent,
  PdfReaderPort,
} from '../ports/pdf-reader.port';
import { ReadingTimeMode } from '../enums/reading-time-mode.enum';
import { PageClass } from '../enums/page-class.enum';
import { ComplexityLevel } from '../enums/complexity-level.enum';
import {
  emptyPageClassCounts,
  ReadingMetrics,
} from '../entities/reading-metrics.entity';
import { ExtractionError } from '../errors/document-analysis.errors';
import {
  baseWpm,
  clamp,
  countMetricWords,
  effectiveWpm,
  round2,
} from '../utils/text-metrics.util';
import { errorMessage } from '../../../utils/analysis-error';

const TABLE_RE = /(?<![\p{L}\p{N}_])(?:table|таблица|табл\.)(?![\p{L}\p{N}_])/giu;
const CODE_LINE_RE =
  /[;{}()[\]]|^\s*(?:def\b|class\b|#include\b|for\s*\(|while\s*\()/i;

const TABLE_SECONDS = 12;
const CODE_SECONDS_PER_LINE = 0.6;

export interface EstimateOptions {
  language: string | null;
  complexityLevel?: ComplexityLevel | null;
  mode?: ReadingTimeMode;
  perImageSeconds?: [number, number];
}

export interface PageSignals {
  words: number;
  images: number;
  tables: number;
  codeLines: number;
}

/** Classify a page by its word and image counts. */
export function classifyPage(words: number, images: number): PageClass {
  if (words >= 200) return PageClass.TEXT;
  if (words >= 80) return PageClass.MIXED;
  if (images > 0) return PageClass.SLIDE; // Image-led page with little text
  return PageClass.EMPTY;
}

export function pageSignals(page: PdfPageContent): PageSignals {
  const codeLines = page.text
    .split(/\r?\n/)
    .filter((line) => CODE_LINE_RE.test(line)).length;

  return {
    words: countMetricWords(page.text),
    images: page.imageCount,
    tables: page.text.match(TABLE_RE)?.length ?? 0,
    codeLines,
  };
}

/**
 * Content-based reading-time estimator.
 *
 * Accurate mode walks every page and adds non-text time for images, tables,
 * code and slide-like pages. Fast mode extrapolates from the first page.
 */
@Injectable()
export class ReadingTimeEstimatorDomainService {
  private readonly logger = new Logger(ReadingTimeEstimatorDomainService.name);

  constructor(
    @Inject(PDF_READER_PORT)
    private readonly pdfReader: PdfReaderPort,
    private readonly configService: ConfigService<AllConfigType>,
  ) {}

  /**
   * Estimate reading time of a whole PDF.
   * @throws ExtractionError if the PDF cannot be opened
   */
  async estimate(
    buffer: Buffer,
    options: EstimateOptions,
  ): Promise<ReadingMetrics> {
    const readingTime = this.configService.getOrThrow(
      'documentAnalysis.readingTime',
      { infer: true },
    );

    try {
      const pageCount = await this.pdfReader.getPageCount(buffer);
      const mode = this.resolveMode(
        options.mode ?? readingTime.mode,
        pageCount,
        readingTime.maxPages,
      );

      const { pages } = await this.pdfReader.read(
        buffer,
        mode === ReadingTimeMode.FAST
          ? { maxPages: 1 }
          : { withImages: true },
      );

      return this.estimateFromPages(pages, pageCount, {
        ...options,
        mode,
        perImageSeconds: options.perImageSeconds ?? readingTime.perImageSeconds,
      });
    } catch (error) {
      if (error instanceof ExtractionError) {
        throw error;
      }
      throw new ExtractionError(
        `Failed to read PDF for reading-time estimation: ${errorMessage(error)}`,
        { cause: error },
      );
    }
  }

  /**
   * Pure estimation over already-read pages.
   */
  estimateFromPages(
    pages: PdfPageContent[],
    pageCount: number,
    options: EstimateOptions,
  ): ReadingMetrics {
    const mode = options.mode ?? ReadingTimeMode.ACCURATE;
    const wpm = effectiveWpm(
      baseWpm(options.language),
      options.complexityLevel,
    );

    if (mode === ReadingTimeMode.FAST) {
      const words = this.fastWordCount(pages, pageCount);
      const textMinutes = round2(words / Math.max(1, wpm));
      return {
        mode,
        totalMinutes: textMinutes,
        textMinutes,
        nontextMinutes: 0,
        wordCount: words,
        effectiveWpm: wpm,
        pageClassCounts: emptyPageClassCounts(),
        imageSeconds: 0,
        tableSeconds: 0,
        codeSeconds: 0,
        slideSeconds: 0,
      };
    }

    const [lowImageSeconds] = options.perImageSeconds ?? [
      3, 10,
    ];
    const pageClassCounts = emptyPageClassCounts();
    let words = 0;
    let imageSeconds = 0;
    let tableSeconds = 0;
    let codeSeconds = 0;
    let slideSeconds = 0;

    for (const page of pages) {
      const signals = pageSignals(page);
      const pageClass = classifyPage(signals.words, signals.images);
      pageClassCounts[pageClass] += 1;

      if (pageClass === PageClass.TEXT || pageClass === PageClass.MIXED) {
        words += signals.words;
        imageSeconds += signals.images * lowImageSeconds;
      } else if (pageClass === PageClass.SLIDE) {
        slideSeconds += Math.trunc(clamp(6 + signals.words / 10, 8, 25));
      }

      tableSeconds += signals.tables * TABLE_SECONDS;
      codeSeconds += Math.trunc(signals.codeLines * CODE_SECONDS_PER_LINE);
    }

    const textMinutes = round2(words / Math.max(1, wpm));
    const nontextMinutes = round2(
      (imageSeconds + tableSeconds + codeSeconds + slideSeconds) / 60,
    );

    this.logger.debug(
      `[Reading Time] ${pages.length} pages, ${words} words, ${wpm} wpm, ` +
        `text=${textMinutes}min nontext=${nontextMinutes}min`,
    );

    return {
      mode,
      totalMinutes: round2(textMinutes + nontextMinutes),
      textMinutes,
      nontextMinutes,
      wordCount: words,
      effectiveWpm: wpm,
      pageClassCounts,
      imageSeconds,
      tableSeconds,
      codeSeconds,
      slideSeconds,
    };
  }

  resolveMode(
    requested: ReadingTimeMode,
    pageCount: number,
    maxPages: number,
  ): ReadingTimeMode {
    if (requested === ReadingTimeMode.ACCURATE && pageCount > maxPages) {
      this.logger.log(
        `[Reading Time] ${pageCount} pages exceed ${maxPages}, using fast mode`,
      );
      return ReadingTimeMode.FAST;
    }
    return requested;
  }

  private fastWordCount(pages: PdfPageContent[], pageCount: number): number {
    const firstPageWords = pages.length > 0 ? countMetricWords(pages[0].text) : 0;

    if (pageCount > 0 && firstPageWords >= 30) {
      return Math.trunc(clamp(firstPageWords, 60, 900)) * pageCount;
    }
    if (pageCount > 0) {
      return 300 * pageCount;
    }
    return Math.max(firstPageWords, 300);
  }
}
