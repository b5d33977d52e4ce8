import { plainToInstance } from 'class-transformer';
import { IsEnum, IsIn, IsInt, IsOptional, IsString, Min, validateSync } from 'class-validator';
import { NOTIFIER_DRIVERS, QUEUE_DRIVERS, STORE_DRIVERS } from './pipeline.config';

enum NodeEnv {
  Development = 'development',
  Production = 'production',
  Test = 'test',
}

class EnvironmentVariables {
  @IsEnum(NodeEnv)
  @IsOptional()
  NODE_ENV: NodeEnv = NodeEnv.Development;

  @IsInt()
  @IsOptional()
  PORT: number = 3000;

  @IsIn(QUEUE_DRIVERS)
  @IsOptional()
  QUEUE_DRIVER?: string;

  @IsIn(STORE_DRIVERS)
  @IsOptional()
  STORE_DRIVER?: string;

  @IsIn(NOTIFIER_DRIVERS)
  @IsOptional()
  NOTIFIER_DRIVER?: string;

  @IsString()
  @IsOptional()
  REDIS_URL?: string;

  @IsInt()
  @Min(1)
  @IsOptional()
  QUEUE_VISIBILITY_TIMEOUT_MS?: number;

  @IsInt()
  @Min(1)
  @IsOptional()
  QUEUE_MAX_ATTEMPTS?: number;

  @IsInt()
  @Min(1)
  @IsOptional()
  TICKET_WORKER_CONCURRENCY?: number;

  @IsString()
  @IsOptional()
  DB_HOST?: string;

  @IsInt()
  @IsOptional()
  DB_PORT?: number;

  @IsString()
  @IsOptional()
  DB_USERNAME?: string;

  @IsString()
  @IsOptional()
  DB_PASSWORD?: string;

  @IsString()
  @IsOptional()
  DB_DATABASE?: string;

  @IsString()
  @IsOptional()
  MAIL_HOST?: string;

  @IsInt()
  @IsOptional()
  MAIL_PORT?: number;

  @IsString()
  @IsOptional()
  MAIL_USER?: string;

  @IsString()
  @IsOptional()
  MAIL_PASS?: string;

  @IsString()
  @IsOptional()
  MAIL_FROM?: string;

  @IsInt()
  @Min(1)
  @IsOptional()
  MAIL_BREAKER_TIMEOUT_MS?: number;
}

export function validate(config: Record<string, unknown>): EnvironmentVariables {
  const validatedConfig = plainToInstance(EnvironmentVariables, config, {
    enableImplicitConversion: true,
  });

  const errors = validateSync(validatedConfig, { skipMissingProperties: false });
  if (errors.length > 0) {
    throw new Error(errors.toString());
  }

  // Tickets accepted with a 202 must survive a restart
  if (validatedConfig.NODE_ENV === NodeEnv.Production) {
    if (validatedConfig.QUEUE_DRIVER !== 'bullmq' || !validatedConfig.REDIS_URL) {
      throw new Error('QUEUE_DRIVER=bullmq and REDIS_URL are required in production');
    }
    if (validatedConfig.STORE_DRIVER !== 'typeorm') {
      throw new Error('STORE_DRIVER=typeorm is required in production');
    }
  }

  return validatedConfig;
}
