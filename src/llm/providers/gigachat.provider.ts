import { Logger } from '@nestjs/common';
import { randomUUID } from 'crypto';
import { LlmConfig } from '../config/llm-config.type';
import {
  ProviderAuthError,
  ProviderResponseError,
} from '../errors/provider.errors';
import {
  AccessTokenGrant,
  AccessTokenManager,
  parseTokenPayload,
} from '../services/access-token-manager';
import {
  GenerationRequest,
  LlmProvider,
  ProviderSpec,
} from './llm-provider';
import { toChatMessages } from './perplexity.provider';
import { extractChatContent, postJson } from './provider-http';

export interface GigaChatOptions {
  temperature: number;
  requestTimeoutMs: number;
}

/**
 * GigaChat: OAuth client-credentials token, then chat completions.
 *
 * The access token is cached by an AccessTokenManager; a 401 on a
 * completion drops it and retries once with a fresh token.
 */
export class GigaChatProvider implements LlmProvider {
  private readonly logger = new Logger(GigaChatProvider.name);

  readonly spec: ProviderSpec;
  readonly tokenManager: AccessTokenManager;

  constructor(
    private readonly config: LlmConfig['gigachat'] & { authKey: string },
    private readonly options: GigaChatOptions,
    tokenManager?: AccessTokenManager,
  ) {
    this.spec = {
      name: 'gigachat',
      model: config.model,
      credential: config.authKey,
      usesDirectClient: true,
    };
    this.tokenManager =
      tokenManager ?? new AccessTokenManager(() => this.requestAccessToken());
  }

  async generate(
    request: GenerationRequest,
    signal: AbortSignal,
  ): Promise<string> {
    const token = await this.tokenManager.getToken();

    try {
      return await this.complete(token, request, signal);
    } catch (error) {
      if (!(error instanceof ProviderAuthError) || error.status !== 401) {
        throw error;
      }
      this.logger.log('[GigaChat] Access token rejected, refreshing');
      this.tokenManager.invalidate();
      const freshToken = await this.tokenManager.getToken();
      return this.complete(freshToken, request, signal);
    }
  }

  private async complete(
    token: string,
    request: GenerationRequest,
    signal: AbortSignal,
  ): Promise<string> {
    const data = await postJson(
      this.spec.name,
      `${this.config.apiBaseUrl}/chat/completions`,
      JSON.stringify({
        model: this.config.model,
        messages: toChatMessages(request),
        temperature: this.options.temperature,
      }),
      {
        'Content-Type': 'application/json',
        Authorization: `Bearer ${token}`,
      },
      signal,
    );

    const content = extractChatContent(data);
    if (!content.trim()) {
      throw new ProviderResponseError(this.spec.name, 'empty content');
    }
    return content;
  }

  private async requestAccessToken(): Promise<AccessTokenGrant> {
    const data = await postJson(
      this.spec.name,
      this.config.authUrl,
      new URLSearchParams({ scope: this.config.scope }).toString(),
      {
        'Content-Type': 'application/x-www-form-urlencoded',
        RqUID: randomUUID(),
        Authorization: `Basic ${this.spec.credential}`,
      },
      AbortSignal.timeout(this.options.requestTimeoutMs),
    );

    const grant = parseTokenPayload(data, Date.now());
    if (!grant) {
      throw new ProviderAuthError(
        this.spec.name,
        'token endpoint returned no access_token',
      );
    }

    this.logger.log('[GigaChat] Access token obtained');
    return grant;
  }
}
