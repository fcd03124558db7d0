import { ApiProperty } from '@nestjs/swagger';
import { ProviderSummary } from '../../llm/services/llm-router.service';
import { LlmProviderName } from '../../llm/providers/llm-provider';

export class ProviderSummaryDto implements ProviderSummary {
  @ApiProperty({ enum: ['gemini', 'perplexity', 'gigachat'], example: 'gemini' })
  name!: LlmProviderName;

  @ApiProperty({ example: 'gemini-1.5-flash' })
  model!: string;

  @ApiProperty({ description: 'Uses a hand-written HTTP client with its own token flow' })
  usesDirectClient!: boolean;
}
