import { ComplexityLevel } from '../enums/complexity-level.enum';

export const UNCATEGORIZED_LABEL = 'uncategorized';
export const GENERAL_TOPIC_LABEL = 'General';

export enum WordCountMethod {
  CONTENT_BASED_FULL_SCAN = 'content_based_full_scan',
  PRECOMPUTED = 'precomputed',
}

export const ESTIMATED_NO_SPACES = 'estimated_no_spaces';

export interface VolumeMethod {
  word_count: string;
  char_count: string;
}

export interface Volume {
  word_count: number;
  char_count: number;
  page_count: number | null;
  byte_size: number | null;
  reading_time_min: number;
  method: VolumeMethod;
}

export interface Complexity {
  score: number; // Integer 0-100
  level: ComplexityLevel;
  estimated_grade: string;
  drivers: string[];
  notes: string;
}

export interface Topic {
  label: string;
  score: number; // 0-1
  keywords: string[];
  rationale: string;
}

export interface Category {
  label: string;
  score: number;
  basis: string;
  keywords: string[];
}

export interface Limitations {
  short_or_noisy_input: boolean;
  comments: string;
}

/**
 * Structured description of one document. Every field is always present
 * once the result leaves the normalizer.
 */
export interface AnalysisResult {
  doc_language: string;
  volume: Volume;
  complexity: Complexity;
  topics: Topic[];
  category: Category;
  limitations: Limitations;
}

export const ANALYSIS_RESULT_KEYS = [
  'doc_language',
  'volume',
  'complexity',
  'topics',
  'category',
  'limitations',
] as const;

export const MAX_TOPICS = 6;
