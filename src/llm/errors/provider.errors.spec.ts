import {
  ProviderAuthError,
  ProviderExhaustedError,
  providerErrorFromNetworkError,
  providerErrorFromResponse,
  ProviderResponseError,
  ProviderTransientError,
} from './provider.errors';

describe('provider errors', () => {
  describe('providerErrorFromResponse', () => {
    it('should classify 401 and 403 as auth failures', async () => {
      const error = await providerErrorFromResponse(
        'gemini',
        new Response('API key not valid', { status: 401 }),
      );

      expect(error).toBeInstanceOf(ProviderAuthError);
      expect(error.message).toBe('gemini: HTTP 401 - API key not valid');
      expect(error.status).toBe(401);
    });

    it('should classify retryable statuses as transient', async () => {
      const error = await providerErrorFromResponse(
        'perplexity',
        new Response('', { status: 503 }),
      );

      expect(error).toBeInstanceOf(ProviderTransientError);
      expect(error.message).toBe('perplexity: HTTP 503');
    });

    it('should treat overload wording as transient', async () => {
      const error = await providerErrorFromResponse(
        'gemini',
        new Response('The model is overloaded. Please try again later.', {
          status: 400,
        }),
      );

      expect(error).toBeInstanceOf(ProviderTransientError);
    });

    it('should classify other statuses as response errors', async () => {
      const error = await providerErrorFromResponse(
        'gigachat',
        new Response('invalid request', { status: 400 }),
      );

      expect(error).toBeInstanceOf(ProviderResponseError);
      expect(error.kind).toBe('ProviderResponseFailure');
    });

    it('should cap the body preview at 200 characters', async () => {
      const error = await providerErrorFromResponse(
        'gigachat',
        new Response('e'.repeat(300), { status: 400 }),
      );

      expect(error.message).toBe(`gigachat: HTTP 400 - ${'e'.repeat(200)}`);
    });
  });

  describe('providerErrorFromNetworkError', () => {
    it('should report timeouts as transient', () => {
      const timeout = Object.assign(new Error('The operation timed out'), {
        name: 'TimeoutError',
      });

      const error = providerErrorFromNetworkError('gemini', timeout);

      expect(error).toBeInstanceOf(ProviderTransientError);
      expect(error.message).toBe('gemini: request timed out');
    });

    it('should report other network failures as transient', () => {
      const error = providerErrorFromNetworkError(
        'gemini',
        new TypeError('fetch failed'),
      );

      expect(error).toBeInstanceOf(ProviderTransientError);
      expect(error.message).toBe('gemini: network error: fetch failed');
    });

    it('should pass provider errors through unchanged', () => {
      const original = new ProviderAuthError('gigachat', 'HTTP 401', 401);

      expect(providerErrorFromNetworkError('gigachat', original)).toBe(original);
    });
  });

  it('should serialize the attempts of an exhausted chain', () => {
    const error = new ProviderExhaustedError('All LLM providers failed', [
      { provider: 'gemini', kind: 'ProviderAuthFailure', message: 'denied' },
    ]);

    expect(error.toJSON()).toEqual({
      error: 'ProviderExhaustedError',
      kind: 'ProviderExhausted',
      message: 'All LLM providers failed',
      timestamp: error.timestamp,
      attempts: [
        { provider: 'gemini', kind: 'ProviderAuthFailure', message: 'denied' },
      ],
    });
  });
});
