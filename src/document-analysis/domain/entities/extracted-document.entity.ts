import { DocumentMeta } from './document-meta.entity';
import { ReadingMetrics } from './reading-metrics.entity';

/**
 * Result of one extraction call. Immutable, owned by the caller for the
 * duration of one analysis.
 */
export interface ExtractedDocument {
  readonly text: string; // First page by default
  readonly pageCount: number | null;
  readonly byteSize: number | null;
  readonly wordCountHint: number | null;
  readonly languageHint: string | null;
  readonly sourceName: string | null;
  readonly tocPreview: string | null;
  readonly readingMetrics: ReadingMetrics | null;
}

/**
 * Split an extracted document into prompt-safe and internal metadata.
 */
export function toDocumentMeta(document: ExtractedDocument): DocumentMeta {
  return {
    llm: {
      byte_size: document.byteSize,
      page_count: document.pageCount,
      precomputed_word_count: document.wordCountHint,
      lang_hint: document.languageHint,
      source_name: document.sourceName,
      toc_preview: document.tocPreview,
    },
    internal: document.readingMetrics
      ? { readingMetrics: document.readingMetrics }
      : {},
  };
}
