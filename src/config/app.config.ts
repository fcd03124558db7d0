import { registerAs } from '@nestjs/config';
import {
  IsBoolean,
  IsEnum,
  IsInt,
  IsOptional,
  IsString,
  Max,
  Min,
} from 'class-validator';
import { AppConfig } from './app-config.type';
import validateConfig from '../utils/validate-config';

enum Environment {
  Development = 'development',
  Production = 'production',
  Test = 'test',
}

class EnvironmentVariablesValidator {
  @IsEnum(Environment)
  @IsOptional()
  NODE_ENV?: Environment;

  @IsInt()
  @Min(0)
  @Max(65535)
  @IsOptional()
  APP_PORT?: number;

  @IsString()
  @IsOptional()
  APP_NAME?: string;

  @IsString()
  @IsOptional()
  API_PREFIX?: string;

  @IsBoolean()
  @IsOptional()
  SWAGGER_ENABLED?: boolean;
}

export default registerAs<AppConfig>('app', () => {
  validateConfig(
    {
      ...process.env,
      SWAGGER_ENABLED: process.env.SWAGGER_ENABLED
        ? process.env.SWAGGER_ENABLED !== 'false'
        : undefined,
    },
    EnvironmentVariablesValidator,
  );

  return {
    nodeEnv: process.env.NODE_ENV || Environment.Development,
    name: process.env.APP_NAME || 'document-analysis',
    port: process.env.APP_PORT ? parseInt(process.env.APP_PORT, 10) : 3000,
    apiPrefix: process.env.API_PREFIX || 'api',
    swaggerEnabled: process.env.SWAGGER_ENABLED !== 'false',
  };
});
