import { ComplexityLevel } from '../enums/complexity-level.enum';
import {
  averageCharsPerWord,
  baseWpm,
  countMetricWords,
  countWordsAndChars,
  detectLanguage,
  effectiveWpm,
  estimateReadingTimeMin,
  estimateTotalWords,
  round1,
  round2,
} from './text-metrics.util';

describe('text metrics', () => {
  describe('countWordsAndChars', () => {
    it('should skip single-character tokens and count non-space chars', () => {
      expect(countWordsAndChars('Hello world, this is a test')).toEqual({
        words: 5,
        chars: 22,
      });
    });

    it('should ignore URLs', () => {
      expect(countWordsAndChars('see https://example.com now').words).toBe(2);
    });

    it('should return zeros for blank text', () => {
      expect(countWordsAndChars('   ')).toEqual({ words: 0, chars: 0 });
    });
  });

  it('should count Latin, Cyrillic and digit runs as metric words', () => {
    expect(countMetricWords('Глава 3: data-driven design')).toBe(5);
  });

  describe('detectLanguage', () => {
    it('should detect Cyrillic-dominant text as ru', () => {
      expect(detectLanguage('Привет мир, это тестовый документ')).toBe('ru');
    });

    it('should detect Latin-dominant text as en', () => {
      expect(
        detectLanguage('The quick brown fox jumps over the lazy dog'),
      ).toBe('en');
    });

    it('should return null when there are too few letters', () => {
      expect(detectLanguage('short 123')).toBeNull();
    });
  });

  describe('reading speed', () => {
    it('should pick the base wpm by language prefix', () => {
      expect(baseWpm('en-US')).toBe(200);
      expect(baseWpm('ru')).toBe(180);
      expect(baseWpm('de')).toBe(180);
      expect(baseWpm(null)).toBe(180);
    });

    it('should scale by complexity with a floor of 60', () => {
      expect(effectiveWpm(200, ComplexityLevel.MEDIUM)).toBe(170);
      expect(effectiveWpm(200, ComplexityLevel.HIGH)).toBe(140);
      expect(effectiveWpm(180, undefined)).toBe(153);
      expect(effectiveWpm(100, ComplexityLevel.VERY_HIGH)).toBe(60);
    });

    it('should estimate plain reading time with one decimal', () => {
      expect(estimateReadingTimeMin('en', 1000)).toBe(5);
      expect(estimateReadingTimeMin('ru', 1000)).toBe(5.6);
      expect(estimateReadingTimeMin(null, 90)).toBe(0.5);
    });
  });

  describe('estimateTotalWords', () => {
    it('should extrapolate from a dense first page', () => {
      expect(estimateTotalWords(250, 10, null)).toBe(2500);
      expect(estimateTotalWords(1000, 4, 1)).toBe(3600);
    });

    it('should fall back to bytes per page', () => {
      expect(estimateTotalWords(10, 5, 6000)).toBe(1000);
      expect(estimateTotalWords(10, 5, 60000)).toBe(4500);
    });

    it('should assume 300 words per page otherwise', () => {
      expect(estimateTotalWords(10, 5, null)).toBe(1500);
      expect(estimateTotalWords(10, null, null)).toBe(300);
    });
  });

  it('should clamp average chars per word to 4.5..6.5', () => {
    expect(averageCharsPerWord('aa bb', 2)).toBe(4.5);
    expect(averageCharsPerWord('abcdefghij', 1)).toBe(6.5);
  });

  it('should round half away from zero for positives', () => {
    expect(round1(2.25)).toBe(2.3);
    expect(round2(0.125)).toBe(0.13);
  });
});
