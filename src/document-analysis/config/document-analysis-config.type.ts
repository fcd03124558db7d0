import { ReadingTimeMode } from '../domain/enums/reading-time-mode.enum';

export type TextPagesPolicy = 'first' | 'full';

export type DocumentAnalysisConfig = {
  readingTime: {
    mode: ReadingTimeMode;
    maxPages: number; // Above this page count fast mode is forced
    perImageSeconds: [number, number]; // [low, high]
  };
  extraction: {
    textPages: TextPagesPolicy;
    downloadTimeoutMs: number;
    maxDownloadMb: number;
  };
  toc: {
    enabled: boolean;
    maxPages: number;
    maxChars: number;
  };
  analysis: {
    timeoutMs: number;
    maxRetries: number;
    useMockAnalysis: boolean;
    filenameCategoryHeuristics: boolean;
  };
};
