import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import { Type } from 'class-transformer';
import {
  IsInt,
  IsOptional,
  IsString,
  Max,
  MaxLength,
  Min,
  ValidateNested,
} from 'class-validator';
import { DocumentMetaDto } from './document-meta.dto';

export class AnalyzeTextDto {
  @ApiProperty({
    description: 'Text of the first page (or the whole document)',
    example: 'Introduction to distributed systems ...',
  })
  @IsString()
  @MaxLength(2_000_000)
  text!: string;

  @ApiPropertyOptional({ type: () => DocumentMetaDto })
  @IsOptional()
  @ValidateNested()
  @Type(() => DocumentMetaDto)
  meta?: DocumentMetaDto;

  @ApiPropertyOptional({ example: 60000 })
  @IsOptional()
  @IsInt()
  @Min(1)
  @Max(600000)
  timeoutMs?: number;
}
