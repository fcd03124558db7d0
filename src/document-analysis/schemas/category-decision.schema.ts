import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import { Type } from 'class-transformer';
import {
  IsArray,
  IsEnum,
  IsNotEmpty,
  IsString,
  ValidateIf,
  ValidateNested,
} from 'class-validator';
import {
  CategoryDecision,
  CategoryDecisionKind,
  NewCategoryDefinition,
} from '../domain/entities/category-decision.entity';
import { CategorySchema } from './analysis-result.schema';

export class NewCategoryDefinitionSchema implements NewCategoryDefinition {
  @ApiProperty({ example: 'quantum computing' })
  @IsString()
  @IsNotEmpty()
  label!: string;

  @ApiProperty()
  @IsString()
  description!: string;

  @ApiProperty({ type: [String] })
  @IsArray()
  @IsString({ each: true })
  keywords!: string[];

  @ApiPropertyOptional({ type: [String] })
  @ValidateIf((_, value) => value !== undefined)
  @IsArray()
  @IsString({ each: true })
  examples?: string[];
}

export class CategoryDecisionSchema implements CategoryDecision {
  @ApiProperty({ enum: CategoryDecisionKind })
  @IsEnum(CategoryDecisionKind)
  decision!: CategoryDecisionKind;

  @ApiProperty({ type: () => CategorySchema })
  @ValidateNested()
  @Type(() => CategorySchema)
  category!: CategorySchema;

  @ApiProperty({ type: String, nullable: true })
  @ValidateIf((_, value) => value !== null)
  @IsString()
  existing_label!: string | null;

  @ApiProperty({ type: () => NewCategoryDefinitionSchema, nullable: true })
  @ValidateIf((_, value) => value !== null)
  @ValidateNested()
  @Type(() => NewCategoryDefinitionSchema)
  new_category_def!: NewCategoryDefinitionSchema | null;
}
