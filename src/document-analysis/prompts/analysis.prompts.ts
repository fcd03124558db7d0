import { LlmMetadata } from '../domain/entities/document-meta.entity';
import { ExistingCategory } from '../domain/entities/category-decision.entity';

const MAX_PROMPT_TEXT_CHARS = 20000;

export const ANALYSIS_SYSTEM_PROMPT = [
  'You analyze the text of PDF documents: volume, then complexity, then topics, then category.',
  'From the supplied content determine the document volume, overall text complexity, its topics and category, and return strictly valid JSON.',
  'Do not use Markdown. Return exactly one JSON object.',
].join('\n\n');

export const CATEGORY_SYSTEM_PROMPT =
  'You categorize documents: assign the document to one of the existing categories or define a new one. Return strictly valid JSON.';

const RESULT_SHAPE = `{
  "doc_language": string,
  "volume": {"word_count": int, "char_count": int, "page_count": int|null, "byte_size": int|null,
             "reading_time_min": number, "method": {"word_count": string, "char_count": string}},
  "complexity": {"score": int 0-100, "level": "very-low"|"low"|"medium"|"high"|"very-high",
                 "estimated_grade": string, "drivers": [string], "notes": string},
  "topics": [{"label": string, "score": number 0-1, "keywords": [string], "rationale": string}] (at most 6),
  "category": {"label": string, "score": number, "basis": string, "keywords": [string]},
  "limitations": {"short_or_noisy_input": boolean, "comments": string}
}`;

const DECISION_SHAPE = `{
  "decision": "matched_existing"|"created_new",
  "category": {"label": string, "score": number, "basis": string, "keywords": [string]},
  "existing_label": string|null,
  "new_category_def": {"label": string, "description": string, "keywords": [string], "examples": [string]}|null
}`;

const metadataJson = (meta: LlmMetadata): string => JSON.stringify(meta);

export function buildAnalysisPrompt(text: string, meta: LlmMetadata): string {
  return [
    'Input for PDF analysis.',
    'Important: TEXT is only the first page of the document.',
    'Estimate volume and reading time from META; when precomputed_word_count is present treat it as the source of truth.',
    'Do not invent page_count or byte_size: use the META values or null.',
    'Determine the category from TEXT and/or META.source_name (file name or last URL segment).',
    `Answer with one JSON object of this shape:\n${RESULT_SHAPE}`,
    `TEXT (first page, may be truncated):\n${text.slice(0, MAX_PROMPT_TEXT_CHARS)}`,
    `META (JSON):\n${metadataJson(meta)}`,
  ].join('\n\n');
}

export function buildCategoryPrompt(
  text: string,
  meta: LlmMetadata,
  existing: ExistingCategory[],
): string {
  const known =
    existing.length > 0
      ? existing
          .map((category) => {
            const details = [
              category.description,
              category.keywords?.length
                ? `keywords: ${category.keywords.join(', ')}`
                : undefined,
            ]
              .filter(Boolean)
              .join('; ');
            return details ? `- ${category.label} (${details})` : `- ${category.label}`;
          })
          .join('\n')
      : '(none)';

  return [
    'Decide the category of a PDF document.',
    'If one of the existing categories fits, answer "matched_existing" and put its exact label in existing_label.',
    'Otherwise answer "created_new" and describe the new category in new_category_def.',
    `Existing categories:\n${known}`,
    `Answer with one JSON object of this shape:\n${DECISION_SHAPE}`,
    `TEXT (first page, may be truncated):\n${text.slice(0, MAX_PROMPT_TEXT_CHARS)}`,
    `META (JSON):\n${metadataJson(meta)}`,
  ].join('\n\n');
}
