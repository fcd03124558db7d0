import { AppConfig } from './app-config.type';
import { DocumentAnalysisConfig } from '../document-analysis/config/document-analysis-config.type';
import { LlmConfig } from '../llm/config/llm-config.type';

export type AllConfigType = {
  app: AppConfig;
  documentAnalysis: DocumentAnalysisConfig;
  llm: LlmConfig;
};
