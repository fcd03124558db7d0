export type LlmProviderName = 'gemini' | 'perplexity' | 'gigachat';

export interface ProviderSpec {
  name: LlmProviderName;
  model: string;
  credential: string; // Never logged or returned
  usesDirectClient: boolean; // Talks to its own client instead of a plain chat endpoint
}

export interface GenerationRequest {
  prompt: string;
  systemPrompt?: string;
}

export interface LlmProvider {
  readonly spec: ProviderSpec;

  /**
   * One generation call, no retries.
   * @throws ProviderAuthError | ProviderTransientError | ProviderResponseError
   */
  generate(request: GenerationRequest, signal: AbortSignal): Promise<string>;
}

export const LLM_PROVIDERS = 'LlmProviders';
