import { INestApplication } from '@nestjs/common';
import { DocumentBuilder, SwaggerModule } from '@nestjs/swagger';
import helmet from 'helmet';
import { WINSTON_MODULE_NEST_PROVIDER } from 'nest-winston';
import { AllExceptionsFilter } from './common/filters';
import { createValidationPipe } from './common/pipes/validation.pipe';

export const API_PREFIX = 'api/v1';

/**
 * HTTP concerns shared by the server and the e2e tests: security headers,
 * prefix, payload shape validation, error rendering and logging.
 */
export function configureApp(app: INestApplication): INestApplication {
  app.useLogger(app.get(WINSTON_MODULE_NEST_PROVIDER));

  // Security: Apply Helmet for HTTP security headers
  app.use(helmet());

  app.setGlobalPrefix(API_PREFIX);
  app.useGlobalPipes(createValidationPipe());
  app.useGlobalFilters(new AllExceptionsFilter());

  return app;
}

export function setupSwagger(app: INestApplication): void {
  const config = new DocumentBuilder()
    .setTitle(process.env.APP_NAME || 'Warranty Exchange API')
    .setDescription('Opens warranty exchange tickets for mobile devices and queues them for processing')
    .setVersion('1.0')
    .addTag('Tickets', 'Warranty exchange intake')
    .build();

  const document = SwaggerModule.createDocument(app, config);
  SwaggerModule.setup('api/docs', app, document);
}
