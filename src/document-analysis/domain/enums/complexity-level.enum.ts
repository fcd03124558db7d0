/**
 * Canonical complexity levels of the analysis result.
 */
export enum ComplexityLevel {
  VERY_LOW = 'very-low',
  LOW = 'low',
  MEDIUM = 'medium',
  HIGH = 'high',
  VERY_HIGH = 'very-high',
}

/** Reading speed multiplier applied to the base words-per-minute. */
export const COMPLEXITY_READING_FACTORS: Record<ComplexityLevel, number> = {
  [ComplexityLevel.VERY_LOW]: 1.1,
  [ComplexityLevel.LOW]: 1.0,
  [ComplexityLevel.MEDIUM]: 0.85,
  [ComplexityLevel.HIGH]: 0.7,
  [ComplexityLevel.VERY_HIGH]: 0.55,
};

const LEVEL_ALIASES: Record<string, ComplexityLevel> = {
  'very-low': ComplexityLevel.VERY_LOW,
  'very low': ComplexityLevel.VERY_LOW,
  'очень низкая': ComplexityLevel.VERY_LOW,
  low: ComplexityLevel.LOW,
  easy: ComplexityLevel.LOW,
  низкая: ComplexityLevel.LOW,
  medium: ComplexityLevel.MEDIUM,
  moderate: ComplexityLevel.MEDIUM,
  average: ComplexityLevel.MEDIUM,
  средняя: ComplexityLevel.MEDIUM,
  high: ComplexityLevel.HIGH,
  hard: ComplexityLevel.HIGH,
  высокая: ComplexityLevel.HIGH,
  'very-high': ComplexityLevel.VERY_HIGH,
  'very high': ComplexityLevel.VERY_HIGH,
  'очень высокая': ComplexityLevel.VERY_HIGH,
};

/**
 * Map an English or Russian level label onto the canonical enum.
 * Returns null for anything unrecognised.
 */
export function parseComplexityLevel(value: unknown): ComplexityLevel | null {
  if (typeof value !== 'string') {
    return null;
  }

  const key = value
    .trim()
    .toLowerCase()
    .replace(/ё/g, 'е')
    .replace(/[_\s]+/g, ' ');

  return LEVEL_ALIASES[key] ?? LEVEL_ALIASES[key.replace(' ', '-')] ?? null;
}

/** Bucket a 0-100 score into a level. */
export function complexityLevelFromScore(score: number): ComplexityLevel {
  if (score <= 20) return ComplexityLevel.VERY_LOW;
  if (score <= 40) return ComplexityLevel.LOW;
  if (score <= 60) return ComplexityLevel.MEDIUM;
  if (score <= 80) return ComplexityLevel.HIGH;
  return ComplexityLevel.VERY_HIGH;
}
