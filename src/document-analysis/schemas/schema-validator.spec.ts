import {
  hasAnalysisResultKeys,
  validateAnalysisResult,
  validateCategoryDecision,
} from './schema-validator';
import { AnalysisResult } from '../domain/entities/analysis-result.entity';
import { fallbackCategoryDecision } from '../domain/entities/category-decision.entity';
import { ComplexityLevel } from '../domain/enums/complexity-level.enum';

const validResult = (): AnalysisResult => ({
  doc_language: 'en',
  volume: {
    word_count: 1200,
    char_count: 6600,
    page_count: null,
    byte_size: 48000,
    reading_time_min: 7.1,
    method: {
      word_count: 'content_based_full_scan',
      char_count: 'estimated_no_spaces',
    },
  },
  complexity: {
    score: 55,
    level: ComplexityLevel.MEDIUM,
    estimated_grade: 'university',
    drivers: ['terminology'],
    notes: '',
  },
  topics: [
    { label: 'Databases', score: 0.9, keywords: ['sql'], rationale: 'title' },
  ],
  category: { label: 'engineering', score: 0.7, basis: 'llm', keywords: [] },
  limitations: { short_or_noisy_input: false, comments: '' },
});

describe('schema validator', () => {
  it('should accept a complete result with nullable counts', () => {
    expect(validateAnalysisResult(validResult())).toEqual([]);
  });

  it('should reject non-objects', () => {
    expect(validateAnalysisResult('{}')).toEqual(['<root>: must be an object']);
    expect(validateAnalysisResult([])).toEqual(['<root>: must be an object']);
  });

  it('should report nested violations with their path', () => {
    const result = validResult();
    result.complexity.score = 150;

    expect(validateAnalysisResult(result)).toEqual([
      'complexity.score: score must not be greater than 100',
    ]);
  });

  it('should cap the number of topics', () => {
    const result = validResult();
    result.topics = Array.from({ length: 7 }, (_, index) => ({
      label: `Topic ${index}`,
      score: 0.5,
      keywords: [],
      rationale: '',
    }));

    expect(validateAnalysisResult(result)).toEqual([
      'topics: topics must contain no more than 6 elements',
    ]);
  });

  it('should reject unknown complexity levels', () => {
    const base = validResult();
    const result = {
      ...base,
      complexity: { ...base.complexity, level: 'extreme' },
    };

    expect(validateAnalysisResult(result)).toEqual([
      expect.stringMatching(
        /^complexity\.level: level must be one of the following values/,
      ),
    ]);
  });

  it('should accept the fallback category decision', () => {
    expect(validateCategoryDecision(fallbackCategoryDecision())).toEqual([]);
  });

  it('should reject decisions with an unknown kind', () => {
    const decision = { ...fallbackCategoryDecision(), decision: 'maybe' };

    expect(validateCategoryDecision(decision)).toEqual([
      expect.stringMatching(/^decision: decision must be one of/),
    ]);
  });
});

describe('hasAnalysisResultKeys', () => {
  it('should accept a result with every top-level key', () => {
    expect(hasAnalysisResultKeys(validResult())).toBe(true);
  });

  it('should reject a result missing a top-level key', () => {
    const { category: _category, ...rest } = validResult();
    expect(hasAnalysisResultKeys(rest)).toBe(false);
  });

  it('should reject null keys and non-objects', () => {
    expect(hasAnalysisResultKeys({ ...validResult(), volume: null })).toBe(
      false,
    );
    expect(hasAnalysisResultKeys('result')).toBe(false);
  });
});
