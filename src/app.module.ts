import { DynamicModule, MiddlewareConsumer, Module, ModuleMetadata, NestModule } from '@nestjs/common';
import { ConfigModule, ConfigType } from '@nestjs/config';
import { TypeOrmModule } from '@nestjs/typeorm';

// Config
import {
  databaseConfig,
  mailConfig,
  PIPELINE_DRIVERS,
  pipelineConfig,
  PipelineDrivers,
  resolvePipelineDrivers,
  validate,
} from './config';

// Common
import { LoggerModule } from './common/logger/logger.module';
import { CorrelationIdMiddleware } from './common/middleware/correlation-id.middleware';
import { QueueModule } from './common/queue/queue.module';

// Modules
import { TicketsModule } from './modules/tickets/tickets.module';

export interface AppModuleOptions {
  /** Adapters to compose; read from the loaded environment when omitted */
  drivers?: PipelineDrivers;
  /** Defaults to `.env` in the working directory */
  envFilePath?: string;
}

@Module({})
export class AppModule implements NestModule {
  static async forRoot(options: AppModuleOptions = {}): Promise<DynamicModule> {
    // Loads .env into process.env, so the drivers below see it
    const configModule = await ConfigModule.forRoot({
      isGlobal: true,
      envFilePath: options.envFilePath,
      load: [pipelineConfig, databaseConfig, mailConfig],
      validate,
    });
    const drivers = options.drivers ?? resolvePipelineDrivers(process.env);

    const imports: NonNullable<ModuleMetadata['imports']> = [
      // Configuration
      configModule,

      // Structured Logging with Winston
      LoggerModule,
    ];

    // Infrastructure only for the adapters in use
    if (drivers.queue === 'bullmq') {
      imports.push(QueueModule);
    }
    if (drivers.store === 'typeorm') {
      imports.push(
        TypeOrmModule.forRootAsync({
          inject: [databaseConfig.KEY],
          useFactory: (config: ConfigType<typeof databaseConfig>) => config,
        }),
      );
    }

    imports.push(TicketsModule.register(drivers));

    return {
      module: AppModule,
      imports,
      providers: [{ provide: PIPELINE_DRIVERS, useValue: drivers }],
      exports: [PIPELINE_DRIVERS],
    };
  }

  configure(consumer: MiddlewareConsumer) {
    consumer.apply(CorrelationIdMiddleware).forRoutes('*');
  }
}
