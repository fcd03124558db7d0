import {
  COMPLEXITY_READING_FACTORS,
  ComplexityLevel,
} from '../enums/complexity-level.enum';

/** Word tokens used by content-based metrics (Latin, Cyrillic, digits). */
const METRIC_WORD_RE = /[A-Za-zА-Яа-яЁё0-9Ѐ-ӿ]+/g;
const URL_TOKEN_RE = /^https?:\/\//i;
const NON_WORD_RE = /[^\p{L}\p{N}_]+/gu;
const CYRILLIC_RE = /[Ѐ-ӿ]/g;
const LATIN_RE = /[A-Za-z]/g;

export const MIN_WPM = 60;
const WPM_BY_LANGUAGE: Record<string, number> = { ru: 180, en: 200 };
const DEFAULT_WPM = 180;

export const clamp = (value: number, low: number, high: number): number =>
  Math.max(low, Math.min(high, value));

export const round1 = (value: number): number => Math.round(value * 10) / 10;

export const round2 = (value: number): number =>
  Math.round(value * 100) / 100;

/** Count word tokens the way the reading-time estimator does. */
export function countMetricWords(text: string): number {
  return text.match(METRIC_WORD_RE)?.length ?? 0;
}

/**
 * Rough word and character count of free text.
 *
 * Words are whitespace-separated tokens, ignoring URLs and tokens with at
 * most one letter or digit. Characters exclude all whitespace.
 */
export function countWordsAndChars(text: string): {
  words: number;
  chars: number;
} {
  let words = 0;
  for (const token of text.split(/\s+/)) {
    if (!token || URL_TOKEN_RE.test(token)) {
      continue;
    }
    if (token.replace(NON_WORD_RE, '').length <= 1) {
      continue;
    }
    words += 1;
  }

  return { words, chars: text.replace(/\s+/g, '').length };
}

/**
 * Script-based language hint on the first 5000 characters.
 * Returns 'ru' for Cyrillic-dominant text, 'en' for Latin-dominant text,
 * null when there are too few letters to tell.
 */
export function detectLanguage(text: string): string | null {
  const sample = text.slice(0, 5000);
  const cyrillic = sample.match(CYRILLIC_RE)?.length ?? 0;
  const latin = sample.match(LATIN_RE)?.length ?? 0;
  const letters = cyrillic + latin;

  if (letters < 20) {
    return null;
  }
  if (cyrillic / letters >= 0.5) {
    return 'ru';
  }
  return 'en';
}

export function baseWpm(language: string | null | undefined): number {
  if (!language) {
    return DEFAULT_WPM;
  }
  const lang = language.toLowerCase();
  for (const [prefix, wpm] of Object.entries(WPM_BY_LANGUAGE)) {
    if (lang.startsWith(prefix)) {
      return wpm;
    }
  }
  return DEFAULT_WPM;
}

export function effectiveWpm(
  base: number,
  level: ComplexityLevel | null | undefined,
): number {
  const factor = COMPLEXITY_READING_FACTORS[level ?? ComplexityLevel.MEDIUM];
  return Math.max(MIN_WPM, Math.trunc(base * factor));
}

/** Plain reading time without complexity adjustment, one decimal. */
export function estimateReadingTimeMin(
  language: string | null | undefined,
  wordCount: number,
): number {
  const wpm = language?.toLowerCase().startsWith('en') ? 200 : 180;
  return round1(wordCount / wpm);
}

/**
 * Estimate the total word count of a document from its first page.
 *
 * - first page has >= 30 words: clamp(w1, 60..900) words per page
 * - otherwise with a byte size: clamp(bytes / pages / 6, 60..900)
 * - otherwise 300 words per page (300 when the page count is unknown)
 */
export function estimateTotalWords(
  firstPageWords: number,
  pageCount: number | null,
  byteSize: number | null,
): number {
  if (pageCount && firstPageWords >= 30) {
    return Math.trunc(clamp(firstPageWords, 60, 900)) * pageCount;
  }
  if (pageCount && byteSize) {
    const approx = byteSize / Math.max(pageCount, 1) / 6;
    return Math.trunc(clamp(approx, 60, 900)) * pageCount;
  }
  if (pageCount) {
    return 300 * pageCount;
  }
  return 300;
}

export function averageCharsPerWord(
  firstPageText: string,
  firstPageWords: number,
): number {
  const { chars } = countWordsAndChars(firstPageText);
  return clamp(chars / Math.max(firstPageWords, 1), 4.5, 6.5);
}
