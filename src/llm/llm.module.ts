import { Module } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import llmConfig from './config/llm.config';
import { AllConfigType } from '../config/config.type';
import { LLM_PROVIDERS } from './providers/llm-provider';
import { createLlmProviders } from './providers/llm-provider.factory';
import { LlmRouterService } from './services/llm-router.service';

@Module({
  imports: [ConfigModule.forFeature(llmConfig)],
  providers: [
    {
      provide: LLM_PROVIDERS,
      useFactory: (configService: ConfigService<AllConfigType>) =>
        createLlmProviders(configService.getOrThrow('llm', { infer: true })),
      inject: [ConfigService],
    },
    LlmRouterService,
  ],
  exports: [LlmRouterService],
})
export class LlmModule {}
