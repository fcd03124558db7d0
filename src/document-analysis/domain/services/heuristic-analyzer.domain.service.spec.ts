import { Test, TestingModule } from '@nestjs/testing';
import { ConfigService } from '@nestjs/config';
import {
  fileStem,
  heuristicAnalysis,
  HeuristicAnalyzerDomainService,
} from './heuristic-analyzer.domain.service';
import { resolveDocumentMeta } from '../entities/document-meta.entity';
import { ReadingMetrics } from '../entities/reading-metrics.entity';
import { ComplexityLevel } from '../enums/complexity-level.enum';
import { ReadingTimeMode } from '../enums/reading-time-mode.enum';
import { validateAnalysisResult } from '../../schemas/schema-validator';

const words = (count: number): string =>
  Array.from({ length: count }, () => 'word').join(' ');

const metrics: ReadingMetrics = {
  mode: ReadingTimeMode.ACCURATE,
  totalMinutes: 5.5,
  textMinutes: 5.29,
  nontextMinutes: 0.2,
  wordCount: 900,
  effectiveWpm: 170,
  pageClassCounts: { text: 3, mixed: 0, slide: 0, empty: 0 },
  imageSeconds: 12,
  tableSeconds: 0,
  codeSeconds: 0,
  slideSeconds: 0,
};

describe('heuristicAnalysis', () => {
  const neutral = { filenameCategoryHeuristics: false };

  it('should build a complete neutral result for short text', () => {
    const meta = resolveDocumentMeta({
      llm: { page_count: 2, byte_size: 1000 },
    });

    const result = heuristicAnalysis(words(20), meta, neutral);

    expect(result).toEqual({
      doc_language: 'en',
      volume: {
        word_count: 20,
        char_count: 90,
        page_count: 2,
        byte_size: 1000,
        reading_time_min: 0.1,
        method: { word_count: 'precomputed', char_count: 'estimated_no_spaces' },
      },
      complexity: {
        score: 15,
        level: ComplexityLevel.LOW,
        estimated_grade: 'school',
        drivers: ['heuristic estimate'],
        notes: 'short text',
      },
      topics: [
        {
          label: 'General',
          score: 0.5,
          keywords: [],
          rationale: 'default category',
        },
      ],
      category: {
        label: 'uncategorized',
        score: 0,
        basis: 'none',
        keywords: [],
      },
      limitations: { short_or_noisy_input: true, comments: 'short text' },
    });
    expect(validateAnalysisResult(result)).toEqual([]);
  });

  it('should prefer reading metrics for volume', () => {
    const meta = resolveDocumentMeta({
      llm: { lang_hint: 'ru', precomputed_word_count: 500 },
      internal: { readingMetrics: metrics },
    });

    const result = heuristicAnalysis(words(200), meta, neutral);

    expect(result.doc_language).toBe('ru');
    expect(result.volume.word_count).toBe(900);
    expect(result.volume.reading_time_min).toBe(5.5);
    expect(result.volume.method.word_count).toBe('content_based_full_scan');
    expect(result.complexity).toMatchObject({
      score: 40,
      level: ComplexityLevel.MEDIUM,
      notes: 'heuristic estimate without LM',
    });
    expect(result.limitations.short_or_noisy_input).toBe(false);
  });

  it('should keep the neutral category even with a file name when heuristics are off', () => {
    const meta = resolveDocumentMeta({
      llm: { source_name: 'intro-to-ml.pdf' },
    });

    expect(heuristicAnalysis(words(20), meta, neutral).category).toEqual({
      label: 'uncategorized',
      score: 0,
      basis: 'none',
      keywords: [],
    });
  });

  describe('filename heuristics', () => {
    const enabled = { filenameCategoryHeuristics: true };

    it('should map file name tokens to a keyword group', () => {
      const meta = resolveDocumentMeta({
        llm: { source_name: 'intro-to-ml.pdf' },
      });

      const result = heuristicAnalysis(words(20), meta, enabled);

      expect(result.category).toEqual({
        label: 'Machine Learning',
        score: 0.6,
        basis: 'filename',
        keywords: [],
      });
      expect(result.topics).toEqual([
        {
          label: 'Machine Learning',
          score: 0.8,
          keywords: ['ML', 'AI', 'data'],
          rationale: 'file name heuristic',
        },
      ]);
    });

    it('should fall back to the file stem', () => {
      const meta = resolveDocumentMeta({
        llm: { source_name: 'Quarterly Report 2024.pdf' },
      });

      const result = heuristicAnalysis(words(20), meta, enabled);

      expect(result.category.label).toBe('Quarterly Report 2024');
      expect(result.category.basis).toBe('filename');
      expect(result.topics[0].label).toBe('General');
    });

    it('should not use overly long stems as labels', () => {
      const meta = resolveDocumentMeta({
        llm: { source_name: `${'x'.repeat(60)}.pdf` },
      });

      expect(heuristicAnalysis(words(20), meta, enabled).category.label).toBe(
        'uncategorized',
      );
    });
  });

  it('should strip directories and the extension from file names', () => {
    expect(fileStem('/tmp/docs/report.final.pdf')).toBe('report.final');
    expect(fileStem('.hidden')).toBe('.hidden');
  });
});

describe('HeuristicAnalyzerDomainService', () => {
  it('should read the filename heuristics flag from config', async () => {
    const mockConfig = {
      getOrThrow: jest.fn((key: string) => {
        if (key === 'documentAnalysis.analysis.filenameCategoryHeuristics') {
          return true;
        }
        throw new Error(`Unexpected config key ${key}`);
      }),
    };

    const module: TestingModule = await Test.createTestingModule({
      providers: [
        HeuristicAnalyzerDomainService,
        { provide: ConfigService, useValue: mockConfig },
      ],
    }).compile();
    const service = module.get(HeuristicAnalyzerDomainService);

    const result = service.analyze(
      words(20),
      resolveDocumentMeta({ llm: { source_name: 'market-outlook.pdf' } }),
    );

    expect(result.category.label).toBe('Business');
  });
});
