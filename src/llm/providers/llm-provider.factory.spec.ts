import { LlmConfig } from '../config/llm-config.type';
import { createLlmProviders } from './llm-provider.factory';

const baseConfig = (): LlmConfig => ({
  requestTimeoutMs: 30000,
  backoffBaseMs: 2000,
  temperature: 0.2,
  gemini: {
    apiKey: null,
    model: 'gemini-2.5-flash-lite',
    baseUrl: 'https://gemini.test',
  },
  perplexity: {
    apiKey: null,
    model: 'sonar',
    baseUrl: 'https://perplexity.test',
  },
  gigachat: {
    authKey: null,
    scope: 'GIGACHAT_API_PERS',
    model: 'GigaChat-2',
    apiBaseUrl: 'https://gigachat.test',
    authUrl: 'https://auth.test',
  },
});

describe('createLlmProviders', () => {
  it('should return no providers without credentials', () => {
    expect(createLlmProviders(baseConfig())).toEqual([]);
  });

  it('should keep the priority order of configured providers', () => {
    const config = baseConfig();
    config.gigachat.authKey = 'test-auth-key';
    config.gemini.apiKey = 'test-key';
    config.perplexity.apiKey = 'test-secret';

    expect(createLlmProviders(config).map((p) => p.spec.name)).toEqual([
      'gemini',
      'perplexity',
      'gigachat',
    ]);
  });

  it('should skip providers whose credential is missing', () => {
    const config = baseConfig();
    config.gigachat.authKey = 'test-auth-key';

    const providers = createLlmProviders(config);

    expect(providers.map((p) => p.spec)).toEqual([
      {
        name: 'gigachat',
        model: 'GigaChat-2',
        credential: 'test-auth-key',
        usesDirectClient: true,
      },
    ]);
  });
});
