import { mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import {
  EXIT_NO_PDFS,
  EXIT_PARTIAL_FAILURE,
  formatSummary,
  mapWithConcurrency,
  parseEvalArgs,
  runEvaluation,
} from './eval-pdfs';
import { AnalysisResult } from '../document-analysis/domain/entities/analysis-result.entity';
import { ComplexityLevel } from '../document-analysis/domain/enums/complexity-level.enum';

const sampleResult = (): AnalysisResult => ({
  doc_language: 'en',
  volume: {
    word_count: 1200,
    char_count: 6000,
    page_count: 4,
    byte_size: 2048,
    reading_time_min: 7.1,
    method: {
      word_count: 'content_based_full_scan',
      char_count: 'estimated_no_spaces',
    },
  },
  complexity: {
    score: 55,
    level: ComplexityLevel.MEDIUM,
    estimated_grade: 'university',
    drivers: [],
    notes: '',
  },
  topics: [],
  category: { label: 'Science', score: 0.8, basis: 'llm', keywords: [] },
  limitations: { short_or_noisy_input: false, comments: '' },
});

describe('eval-pdfs', () => {
  describe('parseEvalArgs', () => {
    it('should use defaults without arguments', () => {
      expect(parseEvalArgs([])).toEqual({
        inputDir: 'pdf_for_eval',
        outDir: 'eval_results',
        concurrency: 3,
        timeoutSeconds: 120,
      });
    });

    it('should read every option', () => {
      expect(
        parseEvalArgs([
          '--input-dir',
          'in',
          '--out-dir',
          'out',
          '--concurrency',
          '5',
          '--timeout',
          '30.5',
        ]),
      ).toEqual({
        inputDir: 'in',
        outDir: 'out',
        concurrency: 5,
        timeoutSeconds: 30.5,
      });
    });

    it('should keep defaults for invalid numbers and missing values', () => {
      expect(
        parseEvalArgs(['--concurrency', '0', '--timeout', 'soon', '--out-dir']),
      ).toEqual({
        inputDir: 'pdf_for_eval',
        outDir: 'eval_results',
        concurrency: 3,
        timeoutSeconds: 120,
      });
    });
  });

  describe('formatSummary', () => {
    it('should summarize a successful analysis', () => {
      expect(
        formatSummary({ ok: true, file: 'a.pdf', result: sampleResult() }),
      ).toBe(
        '[OK] a.pdf | lang=en pages=4 words=1200 t=7.1m | complexity=medium(55) | category=Science(0.8) basis=llm',
      );
    });

    it('should print n/a for an unknown page count', () => {
      const result = sampleResult();
      result.volume.page_count = null;

      expect(formatSummary({ ok: true, file: 'a.pdf', result })).toContain(
        'pages=n/a',
      );
    });

    it('should summarize a failure', () => {
      expect(formatSummary({ ok: false, file: 'b.pdf', error: 'broken' })).toBe(
        '[FAIL] b.pdf: broken',
      );
    });
  });

  describe('mapWithConcurrency', () => {
    it('should keep input order and respect the limit', async () => {
      let inFlight = 0;
      let peak = 0;

      const results = await mapWithConcurrency([30, 10, 20, 0], 2, async (ms) => {
        inFlight++;
        peak = Math.max(peak, inFlight);
        await new Promise((resolve) => setTimeout(resolve, ms));
        inFlight--;
        return ms * 2;
      });

      expect(results).toEqual([60, 20, 40, 0]);
      expect(peak).toBe(2);
    });
  });

  describe('runEvaluation', () => {
    let dir: string;

    beforeEach(async () => {
      dir = await mkdtemp(join(tmpdir(), 'eval-pdfs-'));
    });

    afterEach(async () => {
      await rm(dir, { recursive: true, force: true });
    });

    it('should report when there are no PDFs', async () => {
      const lines: string[] = [];
      const analyze = jest.fn();

      const code = await runEvaluation(
        { inputDir: dir, outDir: join(dir, 'out'), concurrency: 2, timeoutSeconds: 5 },
        analyze,
        (line) => lines.push(line),
      );

      expect(code).toBe(EXIT_NO_PDFS);
      expect(lines).toEqual([`No PDF files in ${dir}`]);
      expect(analyze).not.toHaveBeenCalled();
    });

    it('should write one JSON per analyzed PDF and summarize failures', async () => {
      await writeFile(join(dir, 'a.PDF'), '%PDF-1.4');
      await writeFile(join(dir, 'b.pdf'), '%PDF-1.4');
      await writeFile(join(dir, 'notes.txt'), 'not a pdf');
      const outDir = join(dir, 'out');
      const lines: string[] = [];
      const analyze = jest.fn(async (path: string) => {
        if (path.endsWith('b.pdf')) {
          throw new Error('broken');
        }
        return sampleResult();
      });

      const code = await runEvaluation(
        { inputDir: dir, outDir, concurrency: 3, timeoutSeconds: 120 },
        analyze,
        (line) => lines.push(line),
      );

      expect(code).toBe(EXIT_PARTIAL_FAILURE);
      expect(analyze).toHaveBeenCalledWith(join(dir, 'a.PDF'), 120000);
      expect(lines).toEqual([
        'Found 2 PDF(s). Running analysis (timeout=120s, concurrency=3)...',
        '',
        'Results:',
        formatSummary({
          ok: true,
          file: join(dir, 'a.PDF'),
          result: sampleResult(),
        }),
        `[FAIL] ${join(dir, 'b.pdf')}: broken`,
        '',
        `Total: OK=1, FAIL=1. JSON written to ${outDir}.`,
      ]);
      expect(JSON.parse(await readFile(join(outDir, 'a.json'), 'utf8'))).toEqual(
        sampleResult(),
      );
    });
  });
});
