import { Test, TestingModule } from '@nestjs/testing';
import { ConfigService } from '@nestjs/config';
import { LlmRouterService } from './llm-router.service';
import {
  GenerationRequest,
  LLM_PROVIDERS,
  LlmProvider,
  LlmProviderName,
} from '../providers/llm-provider';
import {
  ProviderAuthError,
  ProviderExhaustedError,
  ProviderResponseError,
  ProviderTransientError,
} from '../errors/provider.errors';

type GenerateMock = jest.Mock<Promise<string>, [GenerationRequest, AbortSignal]>;

const fakeProvider = (
  name: LlmProviderName,
): LlmProvider & { generate: GenerateMock } => ({
  spec: {
    name,
    model: `${name}-model`,
    credential: 'test-secret',
    usesDirectClient: name === 'gigachat',
  },
  generate: jest.fn<Promise<string>, [GenerationRequest, AbortSignal]>(),
});

describe('LlmRouterService', () => {
  let gemini: ReturnType<typeof fakeProvider>;
  let perplexity: ReturnType<typeof fakeProvider>;

  const createRouter = async (
    providers: LlmProvider[],
  ): Promise<LlmRouterService> => {
    const mockConfig = {
      getOrThrow: jest.fn((key: string) => {
        if (key === 'llm') {
          return { requestTimeoutMs: 1000, backoffBaseMs: 0, temperature: 0.2 };
        }
        throw new Error(`Unexpected config key ${key}`);
      }),
    };

    const module: TestingModule = await Test.createTestingModule({
      providers: [
        LlmRouterService,
        { provide: LLM_PROVIDERS, useValue: providers },
        { provide: ConfigService, useValue: mockConfig },
      ],
    }).compile();

    return module.get<LlmRouterService>(LlmRouterService);
  };

  beforeEach(() => {
    gemini = fakeProvider('gemini');
    perplexity = fakeProvider('perplexity');
  });

  it('should retry transient failures on the same provider', async () => {
    gemini.generate
      .mockRejectedValueOnce(new ProviderTransientError('gemini', 'HTTP 503'))
      .mockRejectedValueOnce(new ProviderTransientError('gemini', 'HTTP 429'))
      .mockResolvedValueOnce('{"ok":true}');
    const router = await createRouter([gemini, perplexity]);

    const result = await router.generate({ prompt: 'p', maxRetries: 3 });

    expect(result).toEqual({ content: '{"ok":true}', provider: 'gemini' });
    expect(gemini.generate).toHaveBeenCalledTimes(3);
    expect(perplexity.generate).not.toHaveBeenCalled();
  });

  it('should pass the prompts to the provider', async () => {
    gemini.generate.mockResolvedValue('{}');
    const router = await createRouter([gemini]);

    await router.generate({ prompt: 'p', systemPrompt: 's' });

    expect(gemini.generate).toHaveBeenCalledWith(
      { prompt: 'p', systemPrompt: 's' },
      expect.any(AbortSignal),
    );
  });

  it('should move to the next provider on an auth failure', async () => {
    gemini.generate.mockRejectedValue(
      new ProviderAuthError('gemini', 'HTTP 401', 401),
    );
    perplexity.generate.mockResolvedValue('{"ok":true}');
    const router = await createRouter([gemini, perplexity]);

    const result = await router.generate({ prompt: 'p' });

    expect(result.provider).toBe('perplexity');
    expect(gemini.generate).toHaveBeenCalledTimes(1);
  });

  it('should move on once the retries are used up', async () => {
    gemini.generate.mockRejectedValue(
      new ProviderTransientError('gemini', 'HTTP 503'),
    );
    perplexity.generate.mockResolvedValue('{"ok":true}');
    const router = await createRouter([gemini, perplexity]);

    const result = await router.generate({ prompt: 'p', maxRetries: 2 });

    expect(result.provider).toBe('perplexity');
    expect(gemini.generate).toHaveBeenCalledTimes(2);
  });

  it('should treat empty content as a response failure', async () => {
    gemini.generate.mockResolvedValue('   ');
    perplexity.generate.mockResolvedValue('{"ok":true}');
    const router = await createRouter([gemini, perplexity]);

    const result = await router.generate({ prompt: 'p' });

    expect(result.provider).toBe('perplexity');
    expect(gemini.generate).toHaveBeenCalledTimes(1);
  });

  it('should not retry unexpected errors', async () => {
    gemini.generate.mockRejectedValue(new Error('boom'));
    const router = await createRouter([gemini]);

    await expect(router.generate({ prompt: 'p' })).rejects.toThrow(
      'All LLM providers failed. Last error from gemini: gemini: unexpected error: boom',
    );
    expect(gemini.generate).toHaveBeenCalledTimes(1);
  });

  it('should report every attempt when all providers fail', async () => {
    gemini.generate.mockRejectedValue(
      new ProviderAuthError('gemini', 'HTTP 403', 403),
    );
    perplexity.generate.mockRejectedValue(
      new ProviderResponseError('perplexity', 'HTTP 400 - bad', 400),
    );
    const router = await createRouter([gemini, perplexity]);

    const failure = await router.generate({ prompt: 'p' }).catch(
      (error: unknown) => error,
    );

    expect(failure).toBeInstanceOf(ProviderExhaustedError);
    if (!(failure instanceof ProviderExhaustedError)) return;
    expect(failure.message).toBe(
      'All LLM providers failed. Last error from perplexity: perplexity: HTTP 400 - bad',
    );
    expect(failure.attempts).toEqual([
      {
        provider: 'gemini',
        kind: 'ProviderAuthFailure',
        message: 'gemini: HTTP 403',
      },
      {
        provider: 'perplexity',
        kind: 'ProviderResponseFailure',
        message: 'perplexity: HTTP 400 - bad',
      },
    ]);
  });

  it('should fail when no provider is configured', async () => {
    const router = await createRouter([]);

    expect(router.hasProviders()).toBe(false);
    await expect(router.generate({ prompt: 'p' })).rejects.toThrow(
      'No LLM providers configured',
    );
  });

  it('should not start an attempt after the caller deadline', async () => {
    const controller = new AbortController();
    controller.abort();
    const router = await createRouter([gemini]);

    await expect(
      router.generate({ prompt: 'p', signal: controller.signal }),
    ).rejects.toThrow('LLM generation cancelled by caller deadline');
    expect(gemini.generate).not.toHaveBeenCalled();
  });

  it('should stop backing off when the caller deadline passes', async () => {
    const controller = new AbortController();
    gemini.generate.mockImplementation(async () => {
      controller.abort();
      throw new ProviderTransientError('gemini', 'HTTP 503');
    });
    const router = await createRouter([gemini, perplexity]);

    const failure = await router
      .generate({ prompt: 'p', signal: controller.signal })
      .catch((error: unknown) => error);

    expect(failure).toBeInstanceOf(ProviderExhaustedError);
    if (!(failure instanceof ProviderExhaustedError)) return;
    expect(failure.message).toBe('LLM generation cancelled by caller deadline');
    expect(failure.attempts).toHaveLength(1);
    expect(perplexity.generate).not.toHaveBeenCalled();
  });

  it('should abort the in-flight provider call when the caller deadline passes', async () => {
    const controller = new AbortController();
    let providerSignal: AbortSignal | undefined;
    gemini.generate.mockImplementation(
      (_request, signal) =>
        new Promise<string>((_resolve, reject) => {
          providerSignal = signal;
          signal.addEventListener('abort', () =>
            reject(new ProviderTransientError('gemini', 'request aborted')),
          );
        }),
    );
    const router = await createRouter([gemini, perplexity]);

    const pending = router
      .generate({ prompt: 'p', signal: controller.signal })
      .catch((error: unknown) => error);
    await new Promise((resolve) => setImmediate(resolve));
    controller.abort();
    const failure = await pending;

    expect(providerSignal?.aborted).toBe(true);
    expect(failure).toBeInstanceOf(ProviderExhaustedError);
    if (!(failure instanceof ProviderExhaustedError)) return;
    expect(failure.message).toBe('LLM generation cancelled by caller deadline');
    expect(failure.attempts).toEqual([
      {
        provider: 'gemini',
        kind: 'ProviderTransientFailure',
        message: 'gemini: request aborted',
      },
    ]);
    expect(gemini.generate).toHaveBeenCalledTimes(1);
    expect(perplexity.generate).not.toHaveBeenCalled();
  });

  it('should list providers without credentials', async () => {
    const router = await createRouter([gemini, fakeProvider('gigachat')]);

    expect(router.listProviders()).toEqual([
      { name: 'gemini', model: 'gemini-model', usesDirectClient: false },
      { name: 'gigachat', model: 'gigachat-model', usesDirectClient: true },
    ]);
  });
});
