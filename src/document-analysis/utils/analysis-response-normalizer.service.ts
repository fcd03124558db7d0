import { Injectable, Logger } from '@nestjs/common';
import {
  AnalysisResult,
  Category,
  Complexity,
  ESTIMATED_NO_SPACES,
  Limitations,
  MAX_TOPICS,
  Topic,
  UNCATEGORIZED_LABEL,
  Volume,
  WordCountMethod,
} from '../domain/entities/analysis-result.entity';
import {
  CategoryDecision,
  CategoryDecisionKind,
  ExistingCategory,
  NewCategoryDefinition,
} from '../domain/entities/category-decision.entity';
import { DocumentMeta } from '../domain/entities/document-meta.entity';
import {
  ComplexityLevel,
  complexityLevelFromScore,
  parseComplexityLevel,
} from '../domain/enums/complexity-level.enum';
import { SchemaViolationError } from '../domain/errors/document-analysis.errors';
import {
  clamp,
  countWordsAndChars,
  detectLanguage,
  estimateReadingTimeMin,
} from '../domain/utils/text-metrics.util';
import {
  validateAnalysisResult,
  validateCategoryDecision,
} from '../schemas/schema-validator';
import {
  isRecord,
  LooseRecord,
  pickAlias,
  toBoolean,
  toCount,
  toNumber,
  toStringList,
  toText,
} from '../../utils/coerce.util';

type CanonicalKey = keyof AnalysisResult;

const TOP_LEVEL_ALIASES: Record<string, CanonicalKey> = {
  doc_language: 'doc_language',
  language: 'doc_language',
  lang: 'doc_language',
  язык: 'doc_language',
  volume: 'volume',
  объём: 'volume',
  объем: 'volume',
  complexity: 'complexity',
  сложность: 'complexity',
  topics: 'topics',
  topic: 'topics',
  тематика: 'topics',
  темы: 'topics',
  category: 'category',
  категория: 'category',
  limitations: 'limitations',
  ограничения: 'limitations',
};

const LANGUAGE_NAMES: Record<string, string> = {
  english: 'en',
  английский: 'en',
  russian: 'ru',
  русский: 'ru',
};

const VOLUME_FIELDS = {
  wordCount: ['word_count', 'words', 'wordcount', 'количество_слов'],
  charCount: ['char_count', 'chars', 'characters', 'количество_символов'],
  pageCount: ['page_count', 'pages', 'количество_страниц'],
  byteSize: ['byte_size', 'bytes', 'size', 'размер_в_байтах'],
  readingTime: [
    'reading_time_min',
    'reading_time_minutes',
    'read_time_minutes',
    'time_to_read_minutes',
    'время_чтения_минут',
  ],
} as const;

const COMPLEXITY_FIELDS = {
  score: ['score', 'оценка', 'оценка_1_5'],
  level: ['level', 'label', 'уровень'],
  grade: ['estimated_grade', 'grade', 'класс'],
  drivers: ['drivers', 'ключевые_слова', 'keywords'],
  notes: ['notes', 'description', 'basis', 'основание', 'описание'],
} as const;

const TOPIC_FIELDS = {
  label: ['label', 'major', 'name', 'title'],
  keywords: ['keywords', 'minor', 'ключевые_слова'],
  rationale: ['rationale', 'basis', 'обоснование'],
} as const;

const CATEGORY_FIELDS = {
  label: ['label', 'name', 'title', 'название'],
  score: ['score', 'confidence', 'уверенность'],
  basis: ['basis', 'description', 'основание', 'описание'],
  keywords: ['keywords', 'ключевые_слова'],
} as const;

const MATCHED_DECISIONS = new Set([
  'matched_existing',
  'matched',
  'existing',
  'match',
]);

const DEFAULT_COMPLEXITY_SCORE = 40;
const DEFAULT_GRADE = 'school';
const DEFAULT_TOPIC_SCORE = 0.5;
const SHORT_INPUT_WORDS = 150;

/**
 * Rescale a model-reported complexity score onto 0-100:
 * 0..1 fractions are percentages, integers 2..5 are a five-point scale.
 */
export function rescaleComplexityScore(value: unknown): number | null {
  const num = toNumber(value);
  if (num === null) {
    return null;
  }
  if (num >= 0 && num <= 1) {
    return Math.round(num * 100);
  }
  if (Number.isInteger(num) && num > 1 && num <= 5) {
    return Math.round((num / 5) * 100);
  }
  return Math.round(clamp(num, 0, 100));
}

/**
 * Maps loosely-shaped model output onto the AnalysisResult and
 * CategoryDecision shapes. Total: any object yields every field.
 */
@Injectable()
export class AnalysisResponseNormalizerService {
  private readonly logger = new Logger(AnalysisResponseNormalizerService.name);

  normalize(data: LooseRecord, meta: DocumentMeta, text: string): AnalysisResult {
    const source = this.canonicalize(data);
    const docLanguage = this.normalizeLanguage(source.doc_language, meta, text);

    const result: AnalysisResult = {
      doc_language: docLanguage,
      volume: this.normalizeVolume(source.volume, meta, text, docLanguage),
      complexity: this.normalizeComplexity(source.complexity),
      topics: this.normalizeTopics(source.topics),
      category: this.normalizeCategory(source.category),
      limitations: this.normalizeLimitations(source.limitations, text),
    };

    const violations = validateAnalysisResult(result);
    if (violations.length > 0) {
      this.logger.warn(
        `[Normalizer] ${new SchemaViolationError(violations).message}`,
      );
    }

    return result;
  }

  normalizeCategoryDecision(
    data: LooseRecord,
    existing: ExistingCategory[] = [],
  ): CategoryDecision {
    const category = this.normalizeCategory(
      pickAlias(data, ['category', 'категория']),
    );
    const rawDecision = toText(pickAlias(data, ['decision', 'решение']))
      .toLowerCase()
      .replace(/\s+/g, '_');
    const claimedLabel =
      toText(pickAlias(data, ['existing_label', 'matched_label'])) ||
      category.label;

    if (MATCHED_DECISIONS.has(rawDecision)) {
      const known = existing.find(
        (candidate) =>
          candidate.label.trim().toLowerCase() ===
          claimedLabel.trim().toLowerCase(),
      );
      if (known) {
        return this.checked({
          decision: CategoryDecisionKind.MATCHED_EXISTING,
          category,
          existing_label: known.label,
          new_category_def: null,
        });
      }
      this.logger.debug(
        `[Normalizer] Matched label "${claimedLabel}" is not an existing category, treating as new`,
      );
    }

    return this.checked({
      decision: CategoryDecisionKind.CREATED_NEW,
      category,
      existing_label: null,
      new_category_def: this.normalizeNewCategoryDefinition(
        pickAlias(data, ['new_category_def', 'new_category']),
        category,
      ),
    });
  }

  private checked(decision: CategoryDecision): CategoryDecision {
    const violations = validateCategoryDecision(decision);
    if (violations.length > 0) {
      this.logger.warn(
        `[Normalizer] ${new SchemaViolationError(violations, 'CategoryDecision').message}`,
      );
    }
    return decision;
  }

  private canonicalize(data: LooseRecord): Partial<Record<CanonicalKey, unknown>> {
    const source: Partial<Record<CanonicalKey, unknown>> = {};

    for (const [key, value] of Object.entries(data)) {
      const canonical = TOP_LEVEL_ALIASES[key.trim().toLowerCase()];
      if (canonical && source[canonical] === undefined && value !== null) {
        source[canonical] = value;
      }
    }

    // {"analysis": {...}} style wrappers
    if (Object.keys(source).length === 0) {
      const nested = Object.values(data).find(isRecord);
      if (nested) {
        return this.canonicalize(nested);
      }
    }

    return source;
  }

  private normalizeLanguage(
    value: unknown,
    meta: DocumentMeta,
    text: string,
  ): string {
    const raw = toText(value).toLowerCase();
    const language = LANGUAGE_NAMES[raw] ?? raw;
    if (language && language.length <= 10) {
      return language;
    }
    return meta.llm.lang_hint || detectLanguage(text) || 'ru';
  }

  private normalizeVolume(
    value: unknown,
    meta: DocumentMeta,
    text: string,
    docLanguage: string,
  ): Volume {
    const raw = isRecord(value) ? value : {};
    const counts = countWordsAndChars(text);

    const modelWords = toCount(pickAlias(raw, VOLUME_FIELDS.wordCount));
    const wordCount =
      modelWords !== null && modelWords > 0
        ? modelWords
        : meta.llm.precomputed_word_count ?? counts.words;

    const modelChars = toCount(pickAlias(raw, VOLUME_FIELDS.charCount));
    const charCount =
      modelChars !== null && modelChars > 0 ? modelChars : counts.chars;

    const readingTime = toNumber(pickAlias(raw, VOLUME_FIELDS.readingTime));

    return {
      word_count: wordCount,
      char_count: charCount,
      page_count:
        toCount(pickAlias(raw, VOLUME_FIELDS.pageCount)) ?? meta.llm.page_count,
      byte_size:
        toCount(pickAlias(raw, VOLUME_FIELDS.byteSize)) ?? meta.llm.byte_size,
      reading_time_min:
        readingTime !== null && readingTime > 0
          ? readingTime
          : estimateReadingTimeMin(docLanguage, wordCount),
      method: this.normalizeMethod(raw.method, meta),
    };
  }

  private normalizeMethod(value: unknown, meta: DocumentMeta): Volume['method'] {
    const defaultWordMethod = meta.internal.readingMetrics
      ? WordCountMethod.CONTENT_BASED_FULL_SCAN
      : WordCountMethod.PRECOMPUTED;
    const raw = isRecord(value) ? value : {};

    return {
      word_count: toText(raw.word_count) || defaultWordMethod,
      char_count: toText(raw.char_count) || ESTIMATED_NO_SPACES,
    };
  }

  private normalizeComplexity(value: unknown): Complexity {
    let raw: LooseRecord = {};
    if (isRecord(value)) raw = value;
    else if (typeof value === 'string') raw = { level: value };
    else if (typeof value === 'number') raw = { score: value };

    const score = rescaleComplexityScore(
      pickAlias(raw, COMPLEXITY_FIELDS.score),
    );
    const level =
      parseComplexityLevel(pickAlias(raw, COMPLEXITY_FIELDS.level)) ??
      (score !== null ? complexityLevelFromScore(score) : ComplexityLevel.MEDIUM);

    return {
      score: score ?? DEFAULT_COMPLEXITY_SCORE,
      level,
      estimated_grade: toText(
        pickAlias(raw, COMPLEXITY_FIELDS.grade),
        DEFAULT_GRADE,
      ),
      drivers: toStringList(pickAlias(raw, COMPLEXITY_FIELDS.drivers)),
      notes: toText(pickAlias(raw, COMPLEXITY_FIELDS.notes)),
    };
  }

  private normalizeTopics(value: unknown): Topic[] {
    const items: unknown[] = Array.isArray(value)
      ? value
      : value === undefined
        ? []
        : [value];

    const topics: Topic[] = [];
    for (const item of items) {
      const raw: LooseRecord =
        typeof item === 'string' ? { label: item } : isRecord(item) ? item : {};
      const label = toText(pickAlias(raw, TOPIC_FIELDS.label));
      if (!label) {
        continue;
      }

      const score = toNumber(raw.score);
      topics.push({
        label,
        score: clamp(score ?? DEFAULT_TOPIC_SCORE, 0, 1),
        keywords: toStringList(pickAlias(raw, TOPIC_FIELDS.keywords)),
        rationale: toText(pickAlias(raw, TOPIC_FIELDS.rationale)),
      });
    }

    return topics.slice(0, MAX_TOPICS);
  }

  private normalizeCategory(value: unknown): Category {
    const raw: LooseRecord =
      typeof value === 'string' ? { label: value } : isRecord(value) ? value : {};

    const modelLabel = toText(pickAlias(raw, CATEGORY_FIELDS.label));
    const category: Category = {
      label: modelLabel || UNCATEGORIZED_LABEL,
      score: toNumber(pickAlias(raw, CATEGORY_FIELDS.score)) ?? 0,
      basis:
        toText(pickAlias(raw, CATEGORY_FIELDS.basis)) ||
        (modelLabel ? 'llm' : 'none'),
      keywords: toStringList(pickAlias(raw, CATEGORY_FIELDS.keywords)),
    };

    if (!modelLabel) {
      this.logger.debug(
        `[Normalizer] No category label in model output (keys: ${Object.keys(raw).join(', ') || 'none'})`,
      );
    }

    return category;
  }

  private normalizeNewCategoryDefinition(
    value: unknown,
    category: Category,
  ): NewCategoryDefinition {
    const raw = isRecord(value) ? value : {};
    const definition: NewCategoryDefinition = {
      label: toText(pickAlias(raw, ['label', 'name', 'title'])) || category.label,
      description: toText(pickAlias(raw, ['description', 'описание'])),
      keywords: toStringList(raw.keywords),
    };
    if (definition.keywords.length === 0) {
      definition.keywords = [...category.keywords];
    }

    const examples = toStringList(raw.examples);
    if (examples.length > 0) {
      definition.examples = examples;
    }
    return definition;
  }

  private normalizeLimitations(value: unknown, text: string): Limitations {
    const raw = isRecord(value) ? value : {};
    const { words } = countWordsAndChars(text);

    return {
      short_or_noisy_input:
        toBoolean(raw.short_or_noisy_input) ?? words < SHORT_INPUT_WORDS,
      comments: toText(pickAlias(raw, ['comments', 'description', 'комментарии'])),
    };
  }
}
