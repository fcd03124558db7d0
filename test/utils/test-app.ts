import {
  INestApplication,
  ValidationPipe,
  VersioningType,
} from '@nestjs/common';
import { Test } from '@nestjs/testing';
import { AppModule } from '../../src/app.module';
import {
  PDF_READER_PORT,
  PdfPageContent,
  PdfReaderPort,
  PdfReadOptions,
  PdfReadResult,
} from '../../src/document-analysis/domain/ports/pdf-reader.port';
import {
  GenerationRequest,
  LLM_PROVIDERS,
  LlmProvider,
  LlmProviderName,
  ProviderSpec,
} from '../../src/llm/providers/llm-provider';
import validationOptions from '../../src/utils/validation-options';

export const words = (count: number): string =>
  Array.from({ length: count }, () => 'word').join(' ');

/**
 * PdfReaderPort serving fixed pages for any buffer
 */
export class InMemoryPdfReader implements PdfReaderPort {
  constructor(private readonly pages: PdfPageContent[]) {}

  async read(
    _buffer: Buffer,
    options: PdfReadOptions = {},
  ): Promise<PdfReadResult> {
    const pages = options.maxPages
      ? this.pages.slice(0, options.maxPages)
      : this.pages;
    return { pageCount: this.pages.length, pages };
  }

  async getPageCount(): Promise<number> {
    return this.pages.length;
  }
}

/**
 * LlmProvider answering from a replaceable script, no network
 */
export class ScriptedProvider implements LlmProvider {
  readonly spec: ProviderSpec;
  readonly requests: GenerationRequest[] = [];

  reply: () => Promise<string> = async () => '{}';

  constructor(name: LlmProviderName, model: string) {
    this.spec = {
      name,
      model,
      credential: 'test-secret',
      usesDirectClient: false,
    };
  }

  async generate(request: GenerationRequest): Promise<string> {
    this.requests.push(request);
    return this.reply();
  }
}

/**
 * Boot the application in-process with the same global setup as main.ts
 */
export async function createTestApp(
  pdfReader: PdfReaderPort,
  providers: LlmProvider[],
): Promise<INestApplication> {
  const moduleRef = await Test.createTestingModule({
    imports: [AppModule],
  })
    .overrideProvider(PDF_READER_PORT)
    .useValue(pdfReader)
    .overrideProvider(LLM_PROVIDERS)
    .useValue(providers)
    .compile();

  const app = moduleRef.createNestApplication();
  app.setGlobalPrefix('api', { exclude: ['/'] });
  app.enableVersioning({ type: VersioningType.URI });
  app.useGlobalPipes(new ValidationPipe(validationOptions));
  await app.init();
  return app;
}
