import { LlmConfig } from '../config/llm-config.type';
import { ProviderResponseError } from '../errors/provider.errors';
import {
  GenerationRequest,
  LlmProvider,
  ProviderSpec,
} from './llm-provider';
import { extractChatContent, postJson } from './provider-http';

export type ChatMessage = { role: 'system' | 'user'; content: string };

export const toChatMessages = (request: GenerationRequest): ChatMessage[] => [
  ...(request.systemPrompt
    ? [{ role: 'system' as const, content: request.systemPrompt }]
    : []),
  { role: 'user', content: request.prompt },
];

/**
 * Perplexity OpenAI-compatible chat completions.
 */
export class PerplexityProvider implements LlmProvider {
  readonly spec: ProviderSpec;

  constructor(
    private readonly config: LlmConfig['perplexity'] & { apiKey: string },
    private readonly temperature: number,
  ) {
    this.spec = {
      name: 'perplexity',
      model: config.model,
      credential: config.apiKey,
      usesDirectClient: false,
    };
  }

  async generate(
    request: GenerationRequest,
    signal: AbortSignal,
  ): Promise<string> {
    const data = await postJson(
      this.spec.name,
      `${this.config.baseUrl}/chat/completions`,
      JSON.stringify({
        model: this.config.model,
        messages: toChatMessages(request),
        temperature: this.temperature,
      }),
      {
        'Content-Type': 'application/json',
        Authorization: `Bearer ${this.spec.credential}`,
      },
      signal,
    );

    const content = extractChatContent(data);
    if (!content.trim()) {
      throw new ProviderResponseError(this.spec.name, 'empty content');
    }
    return content;
  }
}
