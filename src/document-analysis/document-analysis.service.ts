import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { AllConfigType } from '../config/config.type';
import {
  ContentExtractorDomainService,
  DocumentSource,
} from './domain/services/content-extractor.domain.service';
import { HeuristicAnalyzerDomainService } from './domain/services/heuristic-analyzer.domain.service';
import {
  AnalysisResult,
  WordCountMethod,
} from './domain/entities/analysis-result.entity';
import {
  CategoryDecision,
  ExistingCategory,
  fallbackCategoryDecision,
} from './domain/entities/category-decision.entity';
import {
  DocumentMeta,
  DocumentMetaInput,
  resolveDocumentMeta,
} from './domain/entities/document-meta.entity';
import {
  ExtractedDocument,
  toDocumentMeta,
} from './domain/entities/extracted-document.entity';
import { nontextSeconds } from './domain/entities/reading-metrics.entity';
import { SchemaViolationError } from './domain/errors/document-analysis.errors';
import {
  baseWpm,
  countWordsAndChars,
  effectiveWpm,
  round1,
  round2,
} from './domain/utils/text-metrics.util';
import { AnalysisResponseNormalizerService } from './utils/analysis-response-normalizer.service';
import { repairJson } from './utils/json-repair.util';
import {
  hasAnalysisResultKeys,
  validateAnalysisResult,
} from './schemas/schema-validator';
import {
  ANALYSIS_SYSTEM_PROMPT,
  buildAnalysisPrompt,
  buildCategoryPrompt,
  CATEGORY_SYSTEM_PROMPT,
} from './prompts/analysis.prompts';
import {
  LlmRouterService,
  ProviderSummary,
} from '../llm/services/llm-router.service';
import { withDeadline } from '../utils/with-deadline';
import { errorMessage } from '../utils/analysis-error';

export interface ExtractionResult {
  text: string;
  meta: DocumentMeta;
}

const EXTRACTION_SHARE = 0.3;

/**
 * Entry point of the pipeline: extraction, LM analysis with repair and
 * normalization, heuristic fallback and category decisions.
 */
@Injectable()
export class DocumentAnalysisService {
  private readonly logger = new Logger(DocumentAnalysisService.name);

  constructor(
    private readonly contentExtractor: ContentExtractorDomainService,
    private readonly heuristicAnalyzer: HeuristicAnalyzerDomainService,
    private readonly normalizer: AnalysisResponseNormalizerService,
    private readonly llmRouter: LlmRouterService,
    private readonly configService: ConfigService<AllConfigType>,
  ) {}

  /**
   * @throws InvalidInputError | NotAPdfError | DownloadError | ExtractionError | AnalysisTimeoutError
   */
  async extract(
    source: DocumentSource,
    timeoutMs?: number,
  ): Promise<ExtractionResult> {
    const document = await withDeadline(
      'PDF extraction',
      timeoutMs ?? this.defaultTimeoutMs(),
      (signal) => this.contentExtractor.extract(source, signal),
    );
    return this.toExtractionResult(document);
  }

  async extractUpload(
    buffer: Buffer,
    fileName: string | null,
    timeoutMs?: number,
  ): Promise<ExtractionResult> {
    const document = await withDeadline(
      'PDF extraction',
      timeoutMs ?? this.defaultTimeoutMs(),
      () => this.contentExtractor.extractBuffer(buffer, fileName),
    );
    return this.toExtractionResult(document);
  }

  /**
   * Analyze first-page text with its metadata. Never fails: any LM, parse
   * or validation failure (or the deadline) yields the heuristic result.
   */
  async analyze(
    text: string,
    metaInput?: DocumentMetaInput,
    timeoutMs?: number,
  ): Promise<AnalysisResult> {
    const meta = this.withTextCounts(text, resolveDocumentMeta(metaInput));
    const { useMockAnalysis } = this.configService.getOrThrow(
      'documentAnalysis.analysis',
      { infer: true },
    );

    if (useMockAnalysis) {
      this.logger.log('[Analysis] Mock analysis enabled, using heuristics');
      return this.heuristicAnalyzer.analyze(text, meta);
    }

    try {
      return await withDeadline(
        'analysis',
        timeoutMs ?? this.defaultTimeoutMs(),
        (signal) => this.analyzeWithLlm(text, meta, signal),
      );
    } catch (error) {
      this.logger.warn(
        `[Analysis] LM analysis failed, falling back to heuristics: ${errorMessage(error)}`,
      );
      return this.heuristicAnalyzer.analyze(text, meta);
    }
  }

  /** Extract then analyze, splitting the deadline 30/70. */
  async analyzePdf(
    source: DocumentSource,
    timeoutMs?: number,
  ): Promise<AnalysisResult> {
    const total = timeoutMs ?? this.defaultTimeoutMs();
    const extractionTimeout = Math.round(total * EXTRACTION_SHARE);

    const { text, meta } = await this.extract(source, extractionTimeout);
    return this.analyze(text, meta, total - extractionTimeout);
  }

  /**
   * Match the document to an existing category or define a new one.
   * Returns the neutral decision when no LM answer is usable.
   */
  async classifyOrCreateCategory(
    text: string,
    metaInput?: DocumentMetaInput,
    existing: ExistingCategory[] = [],
    timeoutMs?: number,
  ): Promise<CategoryDecision> {
    const meta = resolveDocumentMeta(metaInput);

    try {
      return await withDeadline(
        'category decision',
        timeoutMs ?? this.defaultTimeoutMs(),
        async (signal) => {
          const { content, provider } = await this.llmRouter.generate({
            prompt: buildCategoryPrompt(text, meta.llm, existing),
            systemPrompt: CATEGORY_SYSTEM_PROMPT,
            maxRetries: this.maxRetries(),
            signal,
          });
          this.logger.debug(`[Category] Decision received from ${provider}`);
          return this.normalizer.normalizeCategoryDecision(
            repairJson(content),
            existing,
          );
        },
      );
    } catch (error) {
      this.logger.warn(
        `[Category] Category decision failed, using neutral category: ${errorMessage(error)}`,
      );
      return fallbackCategoryDecision();
    }
  }

  /**
   * Define a new category for one document. With no existing categories a
   * matched answer cannot stand, so the decision is always created_new.
   */
  async defineCategory(
    text: string,
    metaInput?: DocumentMetaInput,
    timeoutMs?: number,
  ): Promise<CategoryDecision> {
    return this.classifyOrCreateCategory(text, metaInput, [], timeoutMs);
  }

  listProviders(): ProviderSummary[] {
    return this.llmRouter.listProviders();
  }

  private async analyzeWithLlm(
    text: string,
    meta: DocumentMeta,
    signal: AbortSignal,
  ): Promise<AnalysisResult> {
    const { content, provider } = await this.llmRouter.generate({
      prompt: buildAnalysisPrompt(text, meta.llm),
      systemPrompt: ANALYSIS_SYSTEM_PROMPT,
      maxRetries: this.maxRetries(),
      signal,
    });
    this.logger.debug(
      `[Analysis] Response from ${provider}: ${content.slice(0, 200)}`,
    );

    const normalized = this.normalizer.normalize(
      repairJson(content),
      meta,
      text,
    );
    const result = this.applyReadingTime(normalized, meta);

    const violations = validateAnalysisResult(result);
    if (violations.length > 0) {
      if (!hasAnalysisResultKeys(result)) {
        throw new SchemaViolationError(violations);
      }
      this.logger.warn(
        `[Analysis] Returning normalized result from ${provider} with ${violations.length} schema violation(s): ${violations.join('; ')}`,
      );
    }
    return result;
  }

  /**
   * Replace the model's volume figures with content-based ones: words from
   * the metrics (else the hint), wpm from language and complexity level,
   * plus non-text reading time.
   */
  private applyReadingTime(
    result: AnalysisResult,
    meta: DocumentMeta,
  ): AnalysisResult {
    const metrics = meta.internal.readingMetrics;
    const words =
      metrics?.wordCount ||
      meta.llm.precomputed_word_count ||
      result.volume.word_count;
    const wpm = effectiveWpm(
      baseWpm(result.doc_language),
      result.complexity.level,
    );
    const textMinutes = round2(words / Math.max(1, wpm));
    const nontextMinutes = metrics ? round2(nontextSeconds(metrics) / 60) : 0;

    return {
      ...result,
      volume: {
        ...result.volume,
        word_count: words,
        reading_time_min: round1(textMinutes + nontextMinutes),
        method: {
          ...result.volume.method,
          word_count: WordCountMethod.CONTENT_BASED_FULL_SCAN,
        },
      },
    };
  }

  private withTextCounts(text: string, meta: DocumentMeta): DocumentMeta {
    if (meta.llm.precomputed_word_count !== null) {
      return meta;
    }
    const { words, chars } = countWordsAndChars(text);
    return {
      ...meta,
      llm: {
        ...meta.llm,
        precomputed_word_count: words,
        char_count: meta.llm.char_count ?? chars,
      },
    };
  }

  private toExtractionResult(document: ExtractedDocument): ExtractionResult {
    return { text: document.text, meta: toDocumentMeta(document) };
  }

  private defaultTimeoutMs(): number {
    return this.configService.getOrThrow('documentAnalysis.analysis.timeoutMs', {
      infer: true,
    });
  }

  private maxRetries(): number {
    return this.configService.getOrThrow('documentAnalysis.analysis.maxRetries', {
      infer: true,
    });
  }
}
