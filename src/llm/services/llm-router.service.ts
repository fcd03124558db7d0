import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { setTimeout as sleep } from 'timers/promises';
import { AllConfigType } from '../../config/config.type';
import {
  isProviderError,
  ProviderAttempt,
  ProviderError,
  ProviderExhaustedError,
  ProviderResponseError,
  ProviderTransientError,
} from '../errors/provider.errors';
import {
  GenerationRequest,
  LLM_PROVIDERS,
  LlmProvider,
  LlmProviderName,
} from '../providers/llm-provider';
import { errorMessage } from '../../utils/analysis-error';
import { timeoutSignal } from '../../utils/with-deadline';

const DEFAULT_MAX_RETRIES = 3;

export interface RouterRequest extends GenerationRequest {
  /** Total attempts per provider */
  maxRetries?: number;
  /** Caller deadline; aborts the in-flight call and stops further attempts */
  signal?: AbortSignal;
}

export interface RouterResult {
  content: string;
  provider: LlmProviderName;
}

export interface ProviderSummary {
  name: LlmProviderName;
  model: string;
  usesDirectClient: boolean;
}

/**
 * Chain of responsibility over the configured LM providers.
 *
 * Auth failures move on immediately, transient failures are retried on the
 * same provider with exponential backoff, anything else moves on.
 */
@Injectable()
export class LlmRouterService {
  private readonly logger = new Logger(LlmRouterService.name);

  constructor(
    @Inject(LLM_PROVIDERS)
    private readonly providers: LlmProvider[],
    private readonly configService: ConfigService<AllConfigType>,
  ) {}

  listProviders(): ProviderSummary[] {
    return this.providers.map(({ spec }) => ({
      name: spec.name,
      model: spec.model,
      usesDirectClient: spec.usesDirectClient,
    }));
  }

  hasProviders(): boolean {
    return this.providers.length > 0;
  }

  /**
   * @throws ProviderExhaustedError when no provider produced content
   */
  async generate(request: RouterRequest): Promise<RouterResult> {
    if (this.providers.length === 0) {
      throw new ProviderExhaustedError('No LLM providers configured');
    }

    const { requestTimeoutMs, backoffBaseMs } = this.configService.getOrThrow(
      'llm',
      { infer: true },
    );
    const maxRetries = Math.max(1, request.maxRetries ?? DEFAULT_MAX_RETRIES);
    const attempts: ProviderAttempt[] = [];
    let lastFailure: { provider: string; error: ProviderError } | null = null;

    for (const provider of this.providers) {
      const { name } = provider.spec;

      for (let attempt = 0; attempt < maxRetries; attempt++) {
        if (request.signal?.aborted) {
          throw this.cancelled(attempts);
        }

        this.logger.log(
          `[LLM Router] Trying ${name} (attempt ${attempt + 1}/${maxRetries})`,
        );

        try {
          const content = await provider.generate(
            { prompt: request.prompt, systemPrompt: request.systemPrompt },
            timeoutSignal(requestTimeoutMs, request.signal),
          );
          if (!content.trim()) {
            throw new ProviderResponseError(name, 'empty content');
          }

          this.logger.log(`[LLM Router] Got response from ${name}`);
          return { content, provider: name };
        } catch (error) {
          const failure = this.toProviderError(name, error);
          attempts.push({
            provider: name,
            kind: failure.kind,
            message: failure.message,
          });
          lastFailure = { provider: name, error: failure };

          if (request.signal?.aborted) {
            this.logger.debug(
              `[LLM Router] ${name} aborted by caller deadline (${failure.message})`,
            );
            throw this.cancelled(attempts);
          }

          if (
            failure instanceof ProviderTransientError &&
            attempt < maxRetries - 1
          ) {
            const delayMs = backoffBaseMs * 2 ** attempt;
            this.logger.warn(
              `[LLM Router] ${name} temporarily unavailable (${failure.message}), retrying in ${delayMs}ms`,
            );
            try {
              await sleep(delayMs, undefined, { signal: request.signal });
            } catch (sleepError) {
              this.logger.debug(
                `[LLM Router] Backoff interrupted: ${errorMessage(sleepError)}`,
              );
              throw this.cancelled(attempts);
            }
            continue;
          }

          this.logger.warn(
            `[LLM Router] ${name} failed (${failure.kind}): ${failure.message}, trying next provider`,
          );
          break;
        }
      }
    }

    const last = lastFailure
      ? `Last error from ${lastFailure.provider}: ${lastFailure.error.message}`
      : 'No attempt was made';
    throw new ProviderExhaustedError(`All LLM providers failed. ${last}`, attempts);
  }

  private cancelled(attempts: ProviderAttempt[]): ProviderExhaustedError {
    return new ProviderExhaustedError(
      'LLM generation cancelled by caller deadline',
      attempts,
    );
  }

  private toProviderError(provider: string, error: unknown): ProviderError {
    if (isProviderError(error)) {
      return error;
    }
    if (error instanceof Error && error.name === 'TimeoutError') {
      return new ProviderTransientError(provider, 'request timed out');
    }
    return new ProviderResponseError(
      provider,
      `unexpected error: ${errorMessage(error)}`,
    );
  }
}
