import {
  Body,
  Controller,
  Get,
  HttpCode,
  HttpException,
  HttpStatus,
  Logger,
  Post,
  UploadedFile,
  UseInterceptors,
} from '@nestjs/common';
import { FileInterceptor } from '@nestjs/platform-express';
import {
  ApiBadRequestResponse,
  ApiBody,
  ApiConsumes,
  ApiGatewayTimeoutResponse,
  ApiOkResponse,
  ApiOperation,
  ApiTags,
} from '@nestjs/swagger';
import { DocumentAnalysisService } from './document-analysis.service';
import { DocumentSource } from './domain/services/content-extractor.domain.service';
import { AnalysisResult } from './domain/entities/analysis-result.entity';
import { CategoryDecision } from './domain/entities/category-decision.entity';
import { InvalidInputError } from './domain/errors/document-analysis.errors';
import { AnalysisResultSchema } from './schemas/analysis-result.schema';
import { CategoryDecisionSchema } from './schemas/category-decision.schema';
import { PdfSourceDto } from './dto/pdf-source.dto';
import { AnalyzeTextDto } from './dto/analyze-text.dto';
import {
  DecideCategoryDto,
  DefineCategoryDto,
} from './dto/category-request.dto';
import { ExtractionResponseDto } from './dto/extraction-response.dto';
import { ProviderSummaryDto } from './dto/provider-summary.dto';
import { AnalysisError, AnalysisErrorKind } from '../utils/analysis-error';

const STATUS_BY_KIND: Partial<Record<AnalysisErrorKind, HttpStatus>> = {
  InvalidInput: HttpStatus.BAD_REQUEST,
  NotAPdf: HttpStatus.BAD_REQUEST,
  DownloadFailure: HttpStatus.BAD_GATEWAY,
  ExtractionFailure: HttpStatus.UNPROCESSABLE_ENTITY,
  Timeout: HttpStatus.GATEWAY_TIMEOUT,
};

/**
 * Document Analysis Controller
 *
 * Thin HTTP layer over DocumentAnalysisService. Analysis and category
 * endpoints always answer 200 with a schema-valid body; only extraction
 * failures surface as errors.
 */
@ApiTags('Document Analysis')
@Controller({ path: 'analysis', version: '1' })
export class DocumentAnalysisController {
  private readonly logger = new Logger(DocumentAnalysisController.name);

  constructor(private readonly analysisService: DocumentAnalysisService) {}

  @Post('extract')
  @HttpCode(HttpStatus.OK)
  @ApiOperation({ summary: 'Extract text and metadata from a PDF path or URL' })
  @ApiOkResponse({ type: ExtractionResponseDto })
  @ApiBadRequestResponse({ description: 'Missing source or not a PDF' })
  @ApiGatewayTimeoutResponse({ description: 'Extraction deadline exceeded' })
  async extract(@Body() body: PdfSourceDto): Promise<ExtractionResponseDto> {
    try {
      return await this.analysisService.extract(
        this.toSource(body),
        body.timeoutMs,
      );
    } catch (error) {
      throw this.handleError(error);
    }
  }

  @Post('extract/upload')
  @HttpCode(HttpStatus.OK)
  @ApiOperation({ summary: 'Extract text and metadata from an uploaded PDF' })
  @ApiConsumes('multipart/form-data')
  @ApiBody({
    schema: {
      type: 'object',
      properties: {
        file: { type: 'string', format: 'binary', description: 'PDF file' },
      },
      required: ['file'],
    },
  })
  @ApiOkResponse({ type: ExtractionResponseDto })
  @UseInterceptors(FileInterceptor('file'))
  async extractUpload(
    @UploadedFile() file: Express.Multer.File | undefined,
  ): Promise<ExtractionResponseDto> {
    try {
      if (!file) {
        throw new InvalidInputError('A PDF file must be uploaded as "file"');
      }
      return await this.analysisService.extractUpload(
        file.buffer,
        file.originalname || null,
      );
    } catch (error) {
      throw this.handleError(error);
    }
  }

  @Post('analyze')
  @HttpCode(HttpStatus.OK)
  @ApiOperation({
    summary: 'Analyze extracted text',
    description: 'Falls back to heuristics when no language model answers',
  })
  @ApiOkResponse({ type: AnalysisResultSchema })
  async analyze(@Body() body: AnalyzeTextDto): Promise<AnalysisResult> {
    try {
      return await this.analysisService.analyze(
        body.text,
        body.meta,
        body.timeoutMs,
      );
    } catch (error) {
      throw this.handleError(error);
    }
  }

  @Post('analyze/pdf')
  @HttpCode(HttpStatus.OK)
  @ApiOperation({ summary: 'Extract and analyze a PDF path or URL' })
  @ApiOkResponse({ type: AnalysisResultSchema })
  async analyzePdf(@Body() body: PdfSourceDto): Promise<AnalysisResult> {
    try {
      return await this.analysisService.analyzePdf(
        this.toSource(body),
        body.timeoutMs,
      );
    } catch (error) {
      throw this.handleError(error);
    }
  }

  @Post('categories/decide')
  @HttpCode(HttpStatus.OK)
  @ApiOperation({ summary: 'Match an existing category or define a new one' })
  @ApiOkResponse({ type: CategoryDecisionSchema })
  async decideCategory(
    @Body() body: DecideCategoryDto,
  ): Promise<CategoryDecision> {
    try {
      return await this.analysisService.classifyOrCreateCategory(
        body.text,
        body.meta,
        body.existingCategories ?? [],
        body.timeoutMs,
      );
    } catch (error) {
      throw this.handleError(error);
    }
  }

  @Post('categories/define')
  @HttpCode(HttpStatus.OK)
  @ApiOperation({ summary: 'Define a new category for the document' })
  @ApiOkResponse({ type: CategoryDecisionSchema })
  async defineCategory(
    @Body() body: DefineCategoryDto,
  ): Promise<CategoryDecision> {
    try {
      return await this.analysisService.defineCategory(
        body.text,
        body.meta,
        body.timeoutMs,
      );
    } catch (error) {
      throw this.handleError(error);
    }
  }

  @Get('providers')
  @ApiOperation({ summary: 'List configured language-model providers' })
  @ApiOkResponse({ type: [ProviderSummaryDto] })
  listProviders(): ProviderSummaryDto[] {
    return this.analysisService.listProviders();
  }

  private toSource(body: PdfSourceDto): DocumentSource {
    if (body.path) {
      return { path: body.path };
    }
    if (body.url) {
      return { url: body.url };
    }
    throw new InvalidInputError("Either 'path' or 'url' must be provided");
  }

  // ============================================================
  // Error Handling
  // ============================================================

  /**
   * Convert AnalysisError to HttpException
   */
  private handleError(error: unknown): HttpException {
    if (error instanceof AnalysisError) {
      const status =
        STATUS_BY_KIND[error.kind] ?? HttpStatus.INTERNAL_SERVER_ERROR;
      if (status === HttpStatus.INTERNAL_SERVER_ERROR) {
        this.logger.error(`[Analysis] ${error.name}: ${error.message}`);
      }
      return new HttpException(
        { error: error.name, kind: error.kind, message: error.message },
        status,
      );
    }

    if (error instanceof HttpException) {
      return error;
    }

    this.logger.error(
      `Unexpected error: ${error instanceof Error ? error.message : 'Unknown'}`,
    );

    return new HttpException(
      {
        error: 'InternalError',
        kind: 'Internal',
        message: 'An unexpected error occurred',
      },
      HttpStatus.INTERNAL_SERVER_ERROR,
    );
  }
}
