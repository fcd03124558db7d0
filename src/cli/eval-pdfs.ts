#!/usr/bin/env node
import 'dotenv/config';
import { Logger } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { mkdir, readdir, writeFile } from 'node:fs/promises';
import { basename, extname, join, resolve } from 'node:path';
import { AppModule } from '../app.module';
import { DocumentAnalysisService } from '../document-analysis/document-analysis.service';
import { AnalysisResult } from '../document-analysis/domain/entities/analysis-result.entity';
import { errorMessage } from '../utils/analysis-error';

export interface EvalOptions {
  inputDir: string;
  outDir: string;
  concurrency: number;
  timeoutSeconds: number;
}

export type EvalEntry =
  | { ok: true; file: string; result: AnalysisResult }
  | { ok: false; file: string; error: string };

export type AnalyzeFile = (
  path: string,
  timeoutMs: number,
) => Promise<AnalysisResult>;

export const EXIT_OK = 0;
export const EXIT_NO_PDFS = 1;
export const EXIT_PARTIAL_FAILURE = 2;

const DEFAULT_OPTIONS: EvalOptions = {
  inputDir: 'pdf_for_eval',
  outDir: 'eval_results',
  concurrency: 3,
  timeoutSeconds: 120,
};

const logger = new Logger('EvalPdfs');

const positiveOr = (value: number, fallback: number): number =>
  Number.isFinite(value) && value > 0 ? value : fallback;

/**
 * Parse command line arguments
 */
export function parseEvalArgs(args: string[]): EvalOptions {
  const options: EvalOptions = { ...DEFAULT_OPTIONS };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    const next = args[i + 1];
    if (next === undefined) {
      continue;
    }

    if (arg === '--input-dir') {
      options.inputDir = next;
      i++;
    } else if (arg === '--out-dir') {
      options.outDir = next;
      i++;
    } else if (arg === '--concurrency') {
      options.concurrency = Math.trunc(
        positiveOr(parseInt(next, 10), DEFAULT_OPTIONS.concurrency),
      );
      i++;
    } else if (arg === '--timeout') {
      options.timeoutSeconds = positiveOr(
        parseFloat(next),
        DEFAULT_OPTIONS.timeoutSeconds,
      );
      i++;
    }
  }

  return options;
}

/** Sorted *.pdf files (case-insensitive extension) directly in dir. */
export async function listPdfs(dir: string): Promise<string[]> {
  const entries = await readdir(dir, { withFileTypes: true });
  return entries
    .filter(
      (entry) => entry.isFile() && extname(entry.name).toLowerCase() === '.pdf',
    )
    .map((entry) => join(dir, entry.name))
    .sort();
}

export function formatSummary(entry: EvalEntry): string {
  if (!entry.ok) {
    return `[FAIL] ${entry.file}: ${entry.error}`;
  }

  const { doc_language, volume, complexity, category } = entry.result;
  return (
    `[OK] ${entry.file} | lang=${doc_language} ` +
    `pages=${volume.page_count ?? 'n/a'} words=${volume.word_count} ` +
    `t=${volume.reading_time_min}m | complexity=${complexity.level}(${complexity.score}) ` +
    `| category=${category.label}(${category.score}) basis=${category.basis}`
  );
}

/** Run worker over items with at most `limit` in flight, keeping order. */
export async function mapWithConcurrency<T, R>(
  items: T[],
  limit: number,
  worker: (item: T) => Promise<R>,
): Promise<R[]> {
  const results: R[] = new Array<R>(items.length);
  let cursor = 0;

  const runNext = async (): Promise<void> => {
    while (cursor < items.length) {
      const index = cursor++;
      results[index] = await worker(items[index]);
    }
  };

  const lanes = Math.max(1, Math.min(limit, items.length));
  await Promise.all(Array.from({ length: lanes }, () => runNext()));
  return results;
}

async function processOne(
  file: string,
  options: EvalOptions,
  analyze: AnalyzeFile,
): Promise<EvalEntry> {
  try {
    const result = await analyze(file, options.timeoutSeconds * 1000);
    await mkdir(options.outDir, { recursive: true });
    const stem = basename(file, extname(file));
    await writeFile(
      join(options.outDir, `${stem}.json`),
      JSON.stringify(result, null, 2),
      'utf8',
    );
    return { ok: true, file, result };
  } catch (error) {
    logger.error(`Analysis failed for ${file}: ${errorMessage(error)}`);
    return { ok: false, file, error: errorMessage(error) };
  }
}

/**
 * Analyze every PDF of the input directory and write one JSON per file.
 * Returns the process exit code.
 */
export async function runEvaluation(
  options: EvalOptions,
  analyze: AnalyzeFile,
  print: (line: string) => void = console.log,
): Promise<number> {
  const inputDir = resolve(options.inputDir);
  const outDir = resolve(options.outDir);
  const files = await listPdfs(inputDir);
  if (files.length === 0) {
    print(`No PDF files in ${inputDir}`);
    return EXIT_NO_PDFS;
  }

  print(
    `Found ${files.length} PDF(s). Running analysis ` +
      `(timeout=${options.timeoutSeconds}s, concurrency=${options.concurrency})...`,
  );

  const entries = await mapWithConcurrency(
    files,
    options.concurrency,
    (file) => processOne(file, { ...options, outDir }, analyze),
  );

  print('');
  print('Results:');
  entries.forEach((entry) => print(formatSummary(entry)));

  const okCount = entries.filter((entry) => entry.ok).length;
  print('');
  print(
    `Total: OK=${okCount}, FAIL=${entries.length - okCount}. JSON written to ${outDir}.`,
  );
  return okCount === entries.length ? EXIT_OK : EXIT_PARTIAL_FAILURE;
}

async function main(): Promise<void> {
  const options = parseEvalArgs(process.argv.slice(2));
  const app = await NestFactory.createApplicationContext(AppModule, {
    logger: ['error', 'warn', 'log'],
  });

  try {
    const analysisService = app.get(DocumentAnalysisService);
    process.exitCode = await runEvaluation(options, (path, timeoutMs) =>
      analysisService.analyzePdf({ path }, timeoutMs),
    );
  } finally {
    await app.close();
  }
}

if (require.main === module) {
  main().catch((error: unknown) => {
    logger.error(`Evaluation aborted: ${errorMessage(error)}`);
    process.exit(1);
  });
}
