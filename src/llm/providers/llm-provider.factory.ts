import { Logger } from '@nestjs/common';
import { LlmConfig } from '../config/llm-config.type';
import { GeminiProvider } from './gemini.provider';
import { GigaChatProvider } from './gigachat.provider';
import { LlmProvider } from './llm-provider';
import { PerplexityProvider } from './perplexity.provider';

const logger = new Logger('LlmProviderFactory');

/**
 * Providers in priority order (Gemini, Perplexity, GigaChat).
 * A provider is included only when its credential is configured.
 */
export function createLlmProviders(config: LlmConfig): LlmProvider[] {
  const providers: LlmProvider[] = [];
  const { gemini, perplexity, gigachat } = config;

  if (gemini.apiKey) {
    providers.push(
      new GeminiProvider({ ...gemini, apiKey: gemini.apiKey }, config.temperature),
    );
  }
  if (perplexity.apiKey) {
    providers.push(
      new PerplexityProvider(
        { ...perplexity, apiKey: perplexity.apiKey },
        config.temperature,
      ),
    );
  }
  if (gigachat.authKey) {
    providers.push(
      new GigaChatProvider(
        { ...gigachat, authKey: gigachat.authKey },
        {
          temperature: config.temperature,
          requestTimeoutMs: config.requestTimeoutMs,
        },
      ),
    );
  }

  logger.log(
    `[LLM Providers] Enabled: ${providers.map((p) => `${p.spec.name} (${p.spec.model})`).join(', ') || 'none'}`,
  );
  return providers;
}
