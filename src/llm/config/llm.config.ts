import { registerAs } from '@nestjs/config';
import {
  IsInt,
  IsNumber,
  IsOptional,
  IsString,
  IsUrl,
  Max,
  Min,
} from 'class-validator';
import { LlmConfig } from './llm-config.type';
import validateConfig from '../../utils/validate-config';

class EnvironmentVariablesValidator {
  @IsString()
  @IsOptional()
  GEMINI_API_KEY?: string;

  @IsString()
  @IsOptional()
  GEMINI_MODEL?: string;

  @IsUrl({ require_tld: false })
  @IsOptional()
  GEMINI_BASE_URL?: string;

  @IsString()
  @IsOptional()
  PERPLEXITY_API_KEY?: string;

  @IsString()
  @IsOptional()
  PERPLEXITYAI_API_KEY?: string;

  @IsString()
  @IsOptional()
  PERPLEXITY_MODEL?: string;

  @IsUrl({ require_tld: false })
  @IsOptional()
  PERPLEXITY_BASE_URL?: string;

  @IsString()
  @IsOptional()
  GIGACHAT_AUTH_KEY?: string;

  @IsString()
  @IsOptional()
  GIGACHAT_SCOPE?: string;

  @IsString()
  @IsOptional()
  GIGACHAT_MODEL?: string;

  @IsUrl({ require_tld: false })
  @IsOptional()
  GIGACHAT_API_BASE_URL?: string;

  @IsUrl({ require_tld: false })
  @IsOptional()
  GIGACHAT_AUTH_URL?: string;

  @IsInt()
  @Min(1000)
  @IsOptional()
  LLM_REQUEST_TIMEOUT_MS?: number;

  @IsInt()
  @Min(0)
  @IsOptional()
  LLM_BACKOFF_BASE_MS?: number;

  @IsNumber()
  @Min(0)
  @Max(2)
  @IsOptional()
  LLM_TEMPERATURE?: number;
}

const nonEmpty = (value: string | undefined): string | null =>
  value && value.trim() ? value.trim() : null;

export default registerAs<LlmConfig>('llm', () => {
  validateConfig(process.env, EnvironmentVariablesValidator);

  return {
    requestTimeoutMs: process.env.LLM_REQUEST_TIMEOUT_MS
      ? parseInt(process.env.LLM_REQUEST_TIMEOUT_MS, 10)
      : 30000,
    backoffBaseMs: process.env.LLM_BACKOFF_BASE_MS
      ? parseInt(process.env.LLM_BACKOFF_BASE_MS, 10)
      : 2000,
    temperature: process.env.LLM_TEMPERATURE
      ? parseFloat(process.env.LLM_TEMPERATURE)
      : 0.2,
    gemini: {
      apiKey: nonEmpty(process.env.GEMINI_API_KEY),
      model: process.env.GEMINI_MODEL || 'gemini-2.5-flash-lite',
      baseUrl:
        process.env.GEMINI_BASE_URL ||
        'https://generativelanguage.googleapis.com/v1beta',
    },
    perplexity: {
      apiKey:
        nonEmpty(process.env.PERPLEXITY_API_KEY) ??
        nonEmpty(process.env.PERPLEXITYAI_API_KEY),
      model: process.env.PERPLEXITY_MODEL || 'sonar',
      baseUrl: process.env.PERPLEXITY_BASE_URL || 'https://api.perplexity.ai',
    },
    gigachat: {
      authKey: nonEmpty(process.env.GIGACHAT_AUTH_KEY),
      scope: process.env.GIGACHAT_SCOPE || 'GIGACHAT_API_PERS',
      model: process.env.GIGACHAT_MODEL || 'GigaChat-2',
      apiBaseUrl:
        process.env.GIGACHAT_API_BASE_URL ||
        'https://gigachat.devices.sberbank.ru/api/v1',
      authUrl:
        process.env.GIGACHAT_AUTH_URL ||
        'https://ngw.devices.sberbank.ru:9443/api/v2/oauth',
    },
  };
});
