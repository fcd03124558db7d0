import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import { Type } from 'class-transformer';
import {
  ArrayMaxSize,
  IsArray,
  IsNotEmpty,
  IsOptional,
  IsString,
  ValidateNested,
} from 'class-validator';
import { ExistingCategory } from '../domain/entities/category-decision.entity';
import { AnalyzeTextDto } from './analyze-text.dto';

export class ExistingCategoryDto implements ExistingCategory {
  @ApiProperty({ example: 'machine learning' })
  @IsString()
  @IsNotEmpty()
  label!: string;

  @ApiPropertyOptional()
  @IsOptional()
  @IsString()
  description?: string;

  @ApiPropertyOptional({ type: [String] })
  @IsOptional()
  @IsArray()
  @IsString({ each: true })
  keywords?: string[];
}

export class DefineCategoryDto extends AnalyzeTextDto {}

export class DecideCategoryDto extends AnalyzeTextDto {
  @ApiPropertyOptional({ type: () => [ExistingCategoryDto] })
  @IsOptional()
  @IsArray()
  @ArrayMaxSize(500)
  @ValidateNested({ each: true })
  @Type(() => ExistingCategoryDto)
  existingCategories?: ExistingCategoryDto[];
}
