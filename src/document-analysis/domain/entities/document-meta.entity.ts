import { ReadingMetrics } from './reading-metrics.entity';

/**
 * Document metadata that is safe to embed in a language-model prompt.
 */
export interface LlmMetadata {
  byte_size: number | null;
  page_count: number | null;
  precomputed_word_count: number | null;
  lang_hint: string | null;
  source_name: string | null;
  toc_preview: string | null;
  char_count?: number;
}

/**
 * Metadata used only for post-processing inside the service.
 * Never serialized into a prompt.
 */
export interface InternalMetadata {
  readingMetrics?: ReadingMetrics;
}

export interface DocumentMeta {
  llm: LlmMetadata;
  internal: InternalMetadata;
}

export const emptyLlmMetadata = (): LlmMetadata => ({
  byte_size: null,
  page_count: null,
  precomputed_word_count: null,
  lang_hint: null,
  source_name: null,
  toc_preview: null,
});

/** Metadata as accepted from callers: every part optional. */
export interface DocumentMetaInput {
  llm?: Partial<LlmMetadata>;
  internal?: InternalMetadata;
}

export function resolveDocumentMeta(input?: DocumentMetaInput): DocumentMeta {
  const llm = input?.llm ?? {};
  const resolved: LlmMetadata = {
    byte_size: llm.byte_size ?? null,
    page_count: llm.page_count ?? null,
    precomputed_word_count: llm.precomputed_word_count ?? null,
    lang_hint: llm.lang_hint ?? null,
    source_name: llm.source_name ?? null,
    toc_preview: llm.toc_preview ?? null,
  };
  if (typeof llm.char_count === 'number') {
    resolved.char_count = llm.char_count;
  }

  return {
    llm: resolved,
    internal: input?.internal?.readingMetrics
      ? { readingMetrics: input.internal.readingMetrics }
      : {},
  };
}
