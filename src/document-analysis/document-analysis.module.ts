import { Module } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { MulterModule } from '@nestjs/platform-express';
import documentAnalysisConfig from './config/document-analysis.config';
import { AllConfigType } from '../config/config.type';
import { LlmModule } from '../llm/llm.module';
import { DocumentAnalysisController } from './document-analysis.controller';
import { DocumentAnalysisService } from './document-analysis.service';
import { ContentExtractorDomainService } from './domain/services/content-extractor.domain.service';
import { ReadingTimeEstimatorDomainService } from './domain/services/reading-time-estimator.domain.service';
import { HeuristicAnalyzerDomainService } from './domain/services/heuristic-analyzer.domain.service';
import { PDF_READER_PORT } from './domain/ports/pdf-reader.port';
import { PdfParseAdapter } from './infrastructure/pdf/pdf-parse.adapter';
import { AnalysisResponseNormalizerService } from './utils/analysis-response-normalizer.service';

@Module({
  imports: [
    // Configuration
    ConfigModule.forFeature(documentAnalysisConfig),

    // File upload, same ceiling as URL downloads
    MulterModule.registerAsync({
      imports: [ConfigModule.forFeature(documentAnalysisConfig)],
      useFactory: (configService: ConfigService<AllConfigType>) => ({
        limits: {
          fileSize:
            configService.getOrThrow(
              'documentAnalysis.extraction.maxDownloadMb',
              { infer: true },
            ) *
            1024 *
            1024,
          files: 1,
        },
      }),
      inject: [ConfigService],
    }),

    // Language-model providers
    LlmModule,
  ],
  controllers: [DocumentAnalysisController],
  providers: [
    // Application layer
    DocumentAnalysisService,
    AnalysisResponseNormalizerService,

    // Domain layer
    ContentExtractorDomainService,
    ReadingTimeEstimatorDomainService,
    HeuristicAnalyzerDomainService,

    // Infrastructure adapters (Hexagonal Architecture)
    {
      provide: PDF_READER_PORT,
      useClass: PdfParseAdapter,
    },
  ],
  exports: [DocumentAnalysisService],
})
export class DocumentAnalysisModule {}
