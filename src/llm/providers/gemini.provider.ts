import { LlmConfig } from '../config/llm-config.type';
import { ProviderResponseError } from '../errors/provider.errors';
import { isRecord } from '../../utils/coerce.util';
import {
  GenerationRequest,
  LlmProvider,
  ProviderSpec,
} from './llm-provider';
import { postJson } from './provider-http';

/** Concatenated text parts of the first candidate. */
export function extractGeminiText(data: unknown): string {
  if (!isRecord(data) || !Array.isArray(data.candidates)) {
    return '';
  }
  const candidate: unknown = data.candidates[0];
  if (!isRecord(candidate) || !isRecord(candidate.content)) {
    return '';
  }
  const parts = candidate.content.parts;
  if (!Array.isArray(parts)) {
    return '';
  }

  return parts
    .map((part: unknown) =>
      isRecord(part) && typeof part.text === 'string' ? part.text : '',
    )
    .join('');
}

/**
 * Google Gemini generateContent REST API.
 */
export class GeminiProvider implements LlmProvider {
  readonly spec: ProviderSpec;

  constructor(
    private readonly config: LlmConfig['gemini'] & { apiKey: string },
    private readonly temperature: number,
  ) {
    this.spec = {
      name: 'gemini',
      model: config.model,
      credential: config.apiKey,
      usesDirectClient: false,
    };
  }

  async generate(
    request: GenerationRequest,
    signal: AbortSignal,
  ): Promise<string> {
    const url = `${this.config.baseUrl}/models/${encodeURIComponent(this.config.model)}:generateContent`;
    const body = {
      contents: [{ role: 'user', parts: [{ text: request.prompt }] }],
      ...(request.systemPrompt
        ? { systemInstruction: { parts: [{ text: request.systemPrompt }] } }
        : {}),
      generationConfig: {
        temperature: this.temperature,
        responseMimeType: 'application/json',
      },
    };

    const data = await postJson(
      this.spec.name,
      url,
      JSON.stringify(body),
      {
        'Content-Type': 'application/json',
        'x-goog-api-key': this.spec.credential,
      },
      signal,
    );

    const content = extractGeminiText(data);
    if (!content.trim()) {
      throw new ProviderResponseError(this.spec.name, 'empty content');
    }
    return content;
  }
}
