import { ApiProperty } from '@nestjs/swagger';
import { Type } from 'class-transformer';
import {
  ArrayMaxSize,
  IsArray,
  IsBoolean,
  IsEnum,
  IsInt,
  IsNotEmpty,
  IsNumber,
  IsString,
  Max,
  Min,
  ValidateIf,
  ValidateNested,
} from 'class-validator';
import { ComplexityLevel } from '../domain/enums/complexity-level.enum';
import {
  AnalysisResult,
  Category,
  Complexity,
  Limitations,
  MAX_TOPICS,
  Topic,
  Volume,
  VolumeMethod,
} from '../domain/entities/analysis-result.entity';

export class VolumeMethodSchema implements VolumeMethod {
  @ApiProperty({ example: 'content_based_full_scan' })
  @IsString()
  word_count!: string;

  @ApiProperty({ example: 'estimated_no_spaces' })
  @IsString()
  char_count!: string;
}

export class VolumeSchema implements Volume {
  @ApiProperty({ example: 4200 })
  @IsInt()
  @Min(0)
  word_count!: number;

  @ApiProperty({ example: 26500 })
  @IsInt()
  @Min(0)
  char_count!: number;

  @ApiProperty({ type: Number, nullable: true, example: 14 })
  @ValidateIf((_, value) => value !== null)
  @IsInt()
  @Min(0)
  page_count!: number | null;

  @ApiProperty({ type: Number, nullable: true, example: 512000 })
  @ValidateIf((_, value) => value !== null)
  @IsInt()
  @Min(0)
  byte_size!: number | null;

  @ApiProperty({ example: 24.7 })
  @IsNumber()
  @Min(0)
  reading_time_min!: number;

  @ApiProperty({ type: () => VolumeMethodSchema })
  @ValidateNested()
  @Type(() => VolumeMethodSchema)
  method!: VolumeMethodSchema;
}

export class ComplexitySchema implements Complexity {
  @ApiProperty({ minimum: 0, maximum: 100, example: 55 })
  @IsInt()
  @Min(0)
  @Max(100)
  score!: number;

  @ApiProperty({ enum: ComplexityLevel, example: ComplexityLevel.MEDIUM })
  @IsEnum(ComplexityLevel)
  level!: ComplexityLevel;

  @ApiProperty({ example: 'university' })
  @IsString()
  estimated_grade!: string;

  @ApiProperty({ type: [String] })
  @IsArray()
  @IsString({ each: true })
  drivers!: string[];

  @ApiProperty()
  @IsString()
  notes!: string;
}

export class TopicSchema implements Topic {
  @ApiProperty({ example: 'Distributed systems' })
  @IsString()
  @IsNotEmpty()
  label!: string;

  @ApiProperty({ minimum: 0, maximum: 1, example: 0.8 })
  @IsNumber()
  @Min(0)
  @Max(1)
  score!: number;

  @ApiProperty({ type: [String] })
  @IsArray()
  @IsString({ each: true })
  keywords!: string[];

  @ApiProperty()
  @IsString()
  rationale!: string;
}

export class CategorySchema implements Category {
  @ApiProperty({ example: 'engineering' })
  @IsString()
  @IsNotEmpty()
  label!: string;

  @ApiProperty({ example: 0.7 })
  @IsNumber()
  score!: number;

  @ApiProperty({ example: 'llm' })
  @IsString()
  basis!: string;

  @ApiProperty({ type: [String] })
  @IsArray()
  @IsString({ each: true })
  keywords!: string[];
}

export class LimitationsSchema implements Limitations {
  @ApiProperty()
  @IsBoolean()
  short_or_noisy_input!: boolean;

  @ApiProperty()
  @IsString()
  comments!: string;
}

export class AnalysisResultSchema implements AnalysisResult {
  @ApiProperty({ example: 'en' })
  @IsString()
  @IsNotEmpty()
  doc_language!: string;

  @ApiProperty({ type: () => VolumeSchema })
  @ValidateNested()
  @Type(() => VolumeSchema)
  volume!: VolumeSchema;

  @ApiProperty({ type: () => ComplexitySchema })
  @ValidateNested()
  @Type(() => ComplexitySchema)
  complexity!: ComplexitySchema;

  @ApiProperty({ type: () => [TopicSchema], maxItems: MAX_TOPICS })
  @IsArray()
  @ArrayMaxSize(MAX_TOPICS)
  @ValidateNested({ each: true })
  @Type(() => TopicSchema)
  topics!: TopicSchema[];

  @ApiProperty({ type: () => CategorySchema })
  @ValidateNested()
  @Type(() => CategorySchema)
  category!: CategorySchema;

  @ApiProperty({ type: () => LimitationsSchema })
  @ValidateNested()
  @Type(() => LimitationsSchema)
  limitations!: LimitationsSchema;
}
