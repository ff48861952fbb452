import { INestApplication, ValidationPipe } from '@nestjs/common';
import { json } from 'express';
import { ApiExceptionFilter } from './common/filters/api-exception.filter';
import { bodyParseErrorHandler } from './common/middleware/body-parse-error.middleware';

/**
 * Middleware, filters and pipes shared by the server and the e2e tests.
 * The application must be created with `bodyParser: false`.
 */
export function configureApp(app: INestApplication): void {
  app.use(json({ limit: '50mb' }));
  app.use(bodyParseErrorHandler);

  app.useGlobalFilters(new ApiExceptionFilter());

  app.useGlobalPipes(
    new ValidationPipe({
      transform: true,
      whitelist: true,
    }),
  );

  app.enableCors();
}
