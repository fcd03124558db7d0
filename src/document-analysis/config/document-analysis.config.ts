import { registerAs } from '@nestjs/config';
import {
  IsBoolean,
  IsEnum,
  IsInt,
  IsString,
  Max,
  Min,
  validateSync,
} from 'class-validator';
import { plainToClass } from 'class-transformer';
import {
  DocumentAnalysisConfig,
  TextPagesPolicy,
} from './document-analysis-config.type';
import { ReadingTimeMode } from '../domain/enums/reading-time-mode.enum';

const DEFAULT_PER_IMAGE_SECONDS: [number, number] = [3, 10];

/**
 * Parse "low,high" seconds-per-image bounds.
 * Anything other than two integers falls back to the default pair.
 */
export function parsePerImageSeconds(
  value: string | undefined,
): [number, number] {
  if (!value) {
    return [...DEFAULT_PER_IMAGE_SECONDS];
  }

  const parts = value.split(',').map((part) => part.trim());
  if (parts.length !== 2 || parts.some((part) => !/^-?\d+$/.test(part))) {
    return [...DEFAULT_PER_IMAGE_SECONDS];
  }

  const [low, high] = parts.map((part) => Math.max(0, parseInt(part, 10)));
  return [low, high];
}

class EnvironmentVariablesValidator {
  @IsEnum(ReadingTimeMode)
  PDF_READTIME_MODE: ReadingTimeMode = ReadingTimeMode.ACCURATE;

  @IsInt()
  @Min(1)
  PDF_MAX_PAGES: number = 200;

  @IsString()
  PDF_TEXT_PAGES: TextPagesPolicy = 'first';

  @IsBoolean()
  PDF_TOC_ENABLED: boolean = true;

  @IsInt()
  @Min(1)
  @Max(50)
  PDF_TOC_MAX_PAGES: number = 3;

  @IsInt()
  @Min(100)
  PDF_TOC_MAX_CHARS: number = 1500;

  @IsInt()
  @Min(1000)
  PDF_DOWNLOAD_TIMEOUT_MS: number = 20000;

  @IsInt()
  @Min(1)
  @Max(500)
  PDF_MAX_DOWNLOAD_MB: number = 50;

  @IsInt()
  @Min(1000)
  ANALYSIS_TIMEOUT_MS: number = 60000;

  @IsInt()
  @Min(1)
  @Max(10)
  ANALYSIS_MAX_RETRIES: number = 3;

  @IsBoolean()
  USE_MOCK_ANALYSIS: boolean = false;

  @IsBoolean()
  FILENAME_CATEGORY_HEURISTICS: boolean = false;
}

const parseFlag = (value: string | undefined, fallback: boolean): boolean =>
  value === undefined
    ? fallback
    : ['true', '1', 'yes'].includes(value.toLowerCase());

export default registerAs<DocumentAnalysisConfig>('documentAnalysis', () => {
  const rawMode = (process.env.PDF_READTIME_MODE || 'accurate')
    .toLowerCase()
    .trim();
  const rawTextPages = (process.env.PDF_TEXT_PAGES || 'first').toLowerCase();

  const validatedConfig = plainToClass(
    EnvironmentVariablesValidator,
    {
      PDF_READTIME_MODE: rawMode,
      PDF_MAX_PAGES: process.env.PDF_MAX_PAGES
        ? parseInt(process.env.PDF_MAX_PAGES, 10)
        : 200,
      PDF_TEXT_PAGES: rawTextPages === 'full' ? 'full' : 'first',
      PDF_TOC_ENABLED: parseFlag(process.env.PDF_TOC_ENABLED, true),
      PDF_TOC_MAX_PAGES: process.env.PDF_TOC_MAX_PAGES
        ? parseInt(process.env.PDF_TOC_MAX_PAGES, 10)
        : 3,
      PDF_TOC_MAX_CHARS: process.env.PDF_TOC_MAX_CHARS
        ? parseInt(process.env.PDF_TOC_MAX_CHARS, 10)
        : 1500,
      PDF_DOWNLOAD_TIMEOUT_MS: process.env.PDF_DOWNLOAD_TIMEOUT_MS
        ? parseInt(process.env.PDF_DOWNLOAD_TIMEOUT_MS, 10)
        : 20000,
      PDF_MAX_DOWNLOAD_MB: process.env.PDF_MAX_DOWNLOAD_MB
        ? parseInt(process.env.PDF_MAX_DOWNLOAD_MB, 10)
        : 50,
      ANALYSIS_TIMEOUT_MS: process.env.ANALYSIS_TIMEOUT_MS
        ? parseInt(process.env.ANALYSIS_TIMEOUT_MS, 10)
        : 60000,
      ANALYSIS_MAX_RETRIES: process.env.ANALYSIS_MAX_RETRIES
        ? parseInt(process.env.ANALYSIS_MAX_RETRIES, 10)
        : 3,
      USE_MOCK_ANALYSIS: parseFlag(process.env.USE_MOCK_ANALYSIS, false),
      FILENAME_CATEGORY_HEURISTICS: parseFlag(
        process.env.FILENAME_CATEGORY_HEURISTICS,
        false,
      ),
    },
    { enableImplicitConversion: true },
  );

  const errors = validateSync(validatedConfig, {
    skipMissingProperties: false,
  });

  if (errors.length > 0) {
    throw new Error(
      `Document Analysis config validation error: ${errors.toString()}`,
    );
  }

  return {
    readingTime: {
      mode: validatedConfig.PDF_READTIME_MODE,
      maxPages: validatedConfig.PDF_MAX_PAGES,
      perImageSeconds: parsePerImageSeconds(
        process.env.PDF_PER_IMAGE_SECONDS,
      ),
    },
    extraction: {
      textPages: validatedConfig.PDF_TEXT_PAGES,
      downloadTimeoutMs: validatedConfig.PDF_DOWNLOAD_TIMEOUT_MS,
      maxDownloadMb: validatedConfig.PDF_MAX_DOWNLOAD_MB,
    },
    toc: {
      enabled: validatedConfig.PDF_TOC_ENABLED,
      maxPages: validatedConfig.PDF_TOC_MAX_PAGES,
      maxChars: validatedConfig.PDF_TOC_MAX_CHARS,
    },
    analysis: {
      timeoutMs: validatedConfig.ANALYSIS_TIMEOUT_MS,
      maxRetries: validatedConfig.ANALYSIS_MAX_RETRIES,
      useMockAnalysis: validatedConfig.USE_MOCK_ANALYSIS,
      filenameCategoryHeuristics: validatedConfig.FILENAME_CATEGORY_HEURISTICS,
    },
  };
});
