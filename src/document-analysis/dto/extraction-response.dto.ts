import { ApiProperty } from '@nestjs/swagger';
import { DocumentMetaDto } from './document-meta.dto';

export class ExtractionResponseDto {
  @ApiProperty({ description: 'Extracted text (first page by default)' })
  text!: string;

  @ApiProperty({ type: () => DocumentMetaDto })
  meta!: DocumentMetaDto;
}
