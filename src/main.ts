import 'reflect-metadata';

import { Logger } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { AppModule } from './app.module';
import { configureApp, setupSwagger } from './app.setup';
import { PIPELINE_DRIVERS, PipelineDrivers } from './config';

async function bootstrap() {
  const app = await NestFactory.create(await AppModule.forRoot(), { bufferLogs: true });
  const drivers = app.get<PipelineDrivers>(PIPELINE_DRIVERS);

  configureApp(app);

  // Enable graceful shutdown hooks (SIGTERM, SIGINT); consumers drain on shutdown
  app.enableShutdownHooks();

  if (process.env.NODE_ENV !== 'production' || process.env.ENABLE_SWAGGER === 'true') {
    setupSwagger(app);
  }

  const port = process.env.PORT || 3000;
  await app.listen(port);

  new Logger('Bootstrap').log(
    `Listening on http://localhost:${port}/api/v1 (queue=${drivers.queue}, store=${drivers.store}, notifier=${drivers.notifier})`,
  );
}
void bootstrap();
