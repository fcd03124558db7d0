import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import { Type } from 'class-transformer';
import {
  IsEnum,
  IsInt,
  IsNumber,
  IsOptional,
  IsString,
  Min,
  ValidateNested,
} from 'class-validator';
import {
  DocumentMetaInput,
  LlmMetadata,
} from '../domain/entities/document-meta.entity';
import {
  PageClassCounts,
  ReadingMetrics,
} from '../domain/entities/reading-metrics.entity';
import { ReadingTimeMode } from '../domain/enums/reading-time-mode.enum';

export class LlmMetadataDto implements Partial<LlmMetadata> {
  @ApiPropertyOptional({ type: Number, nullable: true, example: 512000 })
  @IsOptional()
  @IsInt()
  @Min(0)
  byte_size?: number | null;

  @ApiPropertyOptional({ type: Number, nullable: true, example: 14 })
  @IsOptional()
  @IsInt()
  @Min(0)
  page_count?: number | null;

  @ApiPropertyOptional({ type: Number, nullable: true, example: 4200 })
  @IsOptional()
  @IsInt()
  @Min(0)
  precomputed_word_count?: number | null;

  @ApiPropertyOptional({ type: String, nullable: true, example: 'en' })
  @IsOptional()
  @IsString()
  lang_hint?: string | null;

  @ApiPropertyOptional({ type: String, nullable: true, example: 'intro.pdf' })
  @IsOptional()
  @IsString()
  source_name?: string | null;

  @ApiPropertyOptional({ type: String, nullable: true })
  @IsOptional()
  @IsString()
  toc_preview?: string | null;

  @ApiPropertyOptional({ example: 26500 })
  @IsOptional()
  @IsInt()
  @Min(0)
  char_count?: number;
}

export class PageClassCountsDto implements PageClassCounts {
  @ApiProperty()
  @IsInt()
  @Min(0)
  text!: number;

  @ApiProperty()
  @IsInt()
  @Min(0)
  mixed!: number;

  @ApiProperty()
  @IsInt()
  @Min(0)
  slide!: number;

  @ApiProperty()
  @IsInt()
  @Min(0)
  empty!: number;
}

export class ReadingMetricsDto implements ReadingMetrics {
  @ApiProperty({ enum: ReadingTimeMode })
  @IsEnum(ReadingTimeMode)
  mode!: ReadingTimeMode;

  @ApiProperty()
  @IsNumber()
  @Min(0)
  totalMinutes!: number;

  @ApiProperty()
  @IsNumber()
  @Min(0)
  textMinutes!: number;

  @ApiProperty()
  @IsNumber()
  @Min(0)
  nontextMinutes!: number;

  @ApiProperty()
  @IsInt()
  @Min(0)
  wordCount!: number;

  @ApiProperty()
  @IsInt()
  @Min(0)
  effectiveWpm!: number;

  @ApiProperty({ type: () => PageClassCountsDto })
  @ValidateNested()
  @Type(() => PageClassCountsDto)
  pageClassCounts!: PageClassCountsDto;

  @ApiProperty()
  @IsNumber()
  @Min(0)
  imageSeconds!: number;

  @ApiProperty()
  @IsNumber()
  @Min(0)
  tableSeconds!: number;

  @ApiProperty()
  @IsNumber()
  @Min(0)
  codeSeconds!: number;

  @ApiProperty()
  @IsNumber()
  @Min(0)
  slideSeconds!: number;
}

export class InternalMetadataDto {
  @ApiPropertyOptional({ type: () => ReadingMetricsDto })
  @IsOptional()
  @ValidateNested()
  @Type(() => ReadingMetricsDto)
  readingMetrics?: ReadingMetricsDto;
}

/**
 * Metadata as returned by the extract endpoints; every part is optional
 * when posted back for analysis.
 */
export class DocumentMetaDto implements DocumentMetaInput {
  @ApiPropertyOptional({ type: () => LlmMetadataDto })
  @IsOptional()
  @ValidateNested()
  @Type(() => LlmMetadataDto)
  llm?: LlmMetadataDto;

  @ApiPropertyOptional({ type: () => InternalMetadataDto })
  @IsOptional()
  @ValidateNested()
  @Type(() => InternalMetadataDto)
  internal?: InternalMetadataDto;
}
