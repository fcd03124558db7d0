import { PageClass } from '../enums/page-class.enum';
import { ReadingTimeMode } from '../enums/reading-time-mode.enum';

export type PageClassCounts = Record<PageClass, number>;

/**
 * Content-based reading-time breakdown of a whole document.
 * Built once per estimation and never mutated.
 */
export interface ReadingMetrics {
  readonly mode: ReadingTimeMode;
  readonly totalMinutes: number;
  readonly textMinutes: number;
  readonly nontextMinutes: number;
  readonly wordCount: number;
  readonly effectiveWpm: number;
  readonly pageClassCounts: Readonly<PageClassCounts>;
  readonly imageSeconds: number;
  readonly tableSeconds: number;
  readonly codeSeconds: number;
  readonly slideSeconds: number;
}

export const emptyPageClassCounts = (): PageClassCounts => ({
  [PageClass.TEXT]: 0,
  [PageClass.MIXED]: 0,
  [PageClass.SLIDE]: 0,
  [PageClass.EMPTY]: 0,
});

/** Seconds of non-text reading time (images, tables, code, slides). */
export const nontextSeconds = (metrics: ReadingMetrics): number =>
  metrics.imageSeconds +
  metrics.tableSeconds +
  metrics.codeSeconds +
  metrics.slideSeconds;
