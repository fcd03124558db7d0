import { ApiPropertyOptional } from '@nestjs/swagger';
import {
  IsInt,
  IsNotEmpty,
  IsOptional,
  IsString,
  Max,
  Min,
} from 'class-validator';

export class PdfSourceDto {
  @ApiPropertyOptional({
    description: 'Local file path; takes precedence over url',
    example: '/data/reports/annual-2024.pdf',
  })
  @IsOptional()
  @IsString()
  @IsNotEmpty()
  path?: string;

  @ApiPropertyOptional({
    description: 'http(s) URL of the PDF',
    example: 'https://example.com/papers/intro.pdf',
  })
  @IsOptional()
  @IsString()
  @IsNotEmpty()
  url?: string;

  @ApiPropertyOptional({
    description: 'Deadline for the whole call, in milliseconds',
    example: 60000,
  })
  @IsOptional()
  @IsInt()
  @Min(1)
  @Max(600000)
  timeoutMs?: number;
}
