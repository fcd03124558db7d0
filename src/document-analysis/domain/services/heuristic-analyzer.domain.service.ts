import { Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { AllConfigType } from '../../../config/config.type';
import {
  AnalysisResult,
  Category,
  ESTIMATED_NO_SPACES,
  GENERAL_TOPIC_LABEL,
  Topic,
  UNCATEGORIZED_LABEL,
  WordCountMethod,
} from '../entities/analysis-result.entity';
import { DocumentMeta } from '../entities/document-meta.entity';
import { ComplexityLevel } from '../enums/complexity-level.enum';
import {
  averageCharsPerWord,
  countWordsAndChars,
  detectLanguage,
  estimateReadingTimeMin,
} from '../utils/text-metrics.util';

const SHORT_TEXT_WORDS = 150;
const MAX_STEM_LABEL_LENGTH = 50;
const FILENAME_CATEGORY_SCORE = 0.6;

interface FilenameCategoryGroup {
  label: string;
  triggers: string[];
  topicScore: number;
  topicKeywords: string[];
}

const FILENAME_CATEGORY_GROUPS: FilenameCategoryGroup[] = [
  {
    label: 'Technology',
    triggers: ['tech', 'programming', 'code', 'dev', 'github'],
    topicScore: 0.8,
    topicKeywords: ['programming', 'software development'],
  },
  {
    label: 'Machine Learning',
    triggers: ['ml', 'ai', 'machine', 'learning', 'neural', 'data'],
    topicScore: 0.8,
    topicKeywords: ['ML', 'AI', 'data'],
  },
  {
    label: 'Science',
    triggers: ['science', 'research', 'paper', 'journal'],
    topicScore: 0.7,
    topicKeywords: ['research', 'science'],
  },
  {
    label: 'Business',
    triggers: ['business', 'economy', 'finance', 'market'],
    topicScore: 0.7,
    topicKeywords: ['economics', 'finance'],
  },
];

export interface HeuristicOptions {
  filenameCategoryHeuristics: boolean;
}

const neutralTopic = (): Topic => ({
  label: GENERAL_TOPIC_LABEL,
  score: 0.5,
  keywords: [],
  rationale: 'default category',
});

/** File name without directories and extension. */
export function fileStem(sourceName: string): string {
  const base = sourceName.split(/[\\/]/).pop() ?? '';
  const dot = base.lastIndexOf('.');
  return dot > 0 ? base.slice(0, dot) : base;
}

const stemTokens = (stem: string): string[] =>
  stem.toLowerCase().split(/[^a-z0-9]+/).filter(Boolean);

const triggerMatches = (token: string, trigger: string): boolean =>
  token === trigger || (trigger.length >= 4 && token.startsWith(trigger));

function filenameCategory(sourceName: string): {
  category: Category;
  topics: Topic[];
} {
  const stem = fileStem(sourceName);
  const tokens = stemTokens(stem);

  const group = FILENAME_CATEGORY_GROUPS.find((candidate) =>
    tokens.some((token) =>
      candidate.triggers.some((trigger) => triggerMatches(token, trigger)),
    ),
  );

  if (group) {
    return {
      category: {
        label: group.label,
        score: FILENAME_CATEGORY_SCORE,
        basis: 'filename',
        keywords: [],
      },
      topics: [
        {
          label: group.label,
          score: group.topicScore,
          keywords: [...group.topicKeywords],
          rationale: 'file name heuristic',
        },
      ],
    };
  }

  const label =
    stem && stem.length <= MAX_STEM_LABEL_LENGTH ? stem : UNCATEGORIZED_LABEL;
  return {
    category: {
      label,
      score: FILENAME_CATEGORY_SCORE,
      basis: 'filename',
      keywords: [],
    },
    topics: [neutralTopic()],
  };
}

/**
 * Schema-valid analysis built from text and metadata alone.
 * Used whenever no language model answer is available.
 */
export function heuristicAnalysis(
  text: string,
  meta: DocumentMeta,
  options: HeuristicOptions,
): AnalysisResult {
  const { words: firstPageWords } = countWordsAndChars(text);
  const language = meta.llm.lang_hint || detectLanguage(text) || 'ru';
  const metrics = meta.internal.readingMetrics;

  const totalWords = metrics
    ? metrics.wordCount
    : meta.llm.precomputed_word_count || firstPageWords;
  const readingTime = metrics
    ? metrics.totalMinutes
    : estimateReadingTimeMin(language, totalWords);

  const shortText = firstPageWords < SHORT_TEXT_WORDS;
  const note = shortText ? 'short text' : 'heuristic estimate without LM';

  const { category, topics } =
    options.filenameCategoryHeuristics && meta.llm.source_name
      ? filenameCategory(meta.llm.source_name)
      : {
          category: {
            label: UNCATEGORIZED_LABEL,
            score: 0,
            basis: 'none',
            keywords: [],
          },
          topics: [neutralTopic()],
        };

  return {
    doc_language: language,
    volume: {
      word_count: totalWords,
      char_count: Math.round(
        totalWords * averageCharsPerWord(text, firstPageWords),
      ),
      page_count: meta.llm.page_count,
      byte_size: meta.llm.byte_size,
      reading_time_min: readingTime,
      method: {
        word_count: metrics
          ? WordCountMethod.CONTENT_BASED_FULL_SCAN
          : WordCountMethod.PRECOMPUTED,
        char_count: ESTIMATED_NO_SPACES,
      },
    },
    complexity: {
      score: shortText ? 15 : 40,
      level: shortText ? ComplexityLevel.LOW : ComplexityLevel.MEDIUM,
      estimated_grade: 'school',
      drivers: ['heuristic estimate'],
      notes: note,
    },
    topics,
    category,
    limitations: { short_or_noisy_input: shortText, comments: note },
  };
}

@Injectable()
export class HeuristicAnalyzerDomainService {
  constructor(private readonly configService: ConfigService<AllConfigType>) {}

  analyze(text: string, meta: DocumentMeta): AnalysisResult {
    return heuristicAnalysis(text, meta, {
      filenameCategoryHeuristics: this.configService.getOrThrow(
        'documentAnalysis.analysis.filenameCategoryHeuristics',
        { infer: true },
      ),
    });
  }
}
