import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { SwaggerModule, DocumentBuilder } from '@nestjs/swagger';
import { AppModule } from './app.module';
import { configureApp } from './app.setup';
import { resolveLogLevels } from './config/configuration';
import { FileCredentialsService } from './credentials/file-credentials.service';

async function bootstrap() {
  const logger = new Logger('Bootstrap');

  const app = await NestFactory.create(AppModule, {
    bodyParser: false,
    logger: resolveLogLevels(process.env.LOG_LEVEL),
  });

  configureApp(app);

  const config = new DocumentBuilder()
    .setTitle('CloudCode Gateway')
    .setDescription(
      'OpenAI and Gemini compatible API in front of the CloudCode agent API',
    )
    .setVersion('1.0')
    .addBearerAuth()
    .addTag('OpenAI Compatible', 'OpenAI-compatible chat completions API')
    .addTag('Gemini Compatible', 'Gemini-compatible generateContent API')
    .addTag('Models', 'Model listing and information')
    .addTag('Admin', 'Credential management')
    .build();
  const documentFactory = () => SwaggerModule.createDocument(app, config);
  SwaggerModule.setup('docs', app, documentFactory);

  const configService = app.get(ConfigService);
  const port = configService.get<number>('port') || 3000;

  if (!app.get(FileCredentialsService).getStatus().present) {
    logger.warn('='.repeat(60));
    logger.warn('NO CREDENTIALS CONFIGURED');
    logger.warn(
      `Store a credential record at ${configService.get<string>('credentials.path')}`,
    );
    logger.warn('or PUT one to /admin/credentials (requires ADMIN_API_KEY).');
    logger.warn('='.repeat(60));
  }

  await app.listen(port);

  logger.log('='.repeat(60));
  logger.log(`CloudCode Gateway running on http://localhost:${port}`);
  logger.log('');
  logger.log('Endpoints:');
  logger.log(`  POST /v1/chat/completions              - Chat completion (OpenAI)`);
  logger.log(`  GET  /v1/models                        - List models`);
  logger.log(`  GET  /v1/models/:id                    - Model details`);
  logger.log(`  POST /v1beta/models/:model:generateContent       - Gemini`);
  logger.log(`  POST /v1beta/models/:model:streamGenerateContent - Gemini (SSE)`);
  logger.log(`  GET  /admin/credentials                - Credential status`);
  logger.log(`  GET  /health                           - Health check`);
  logger.log(`  GET  /docs                             - Swagger UI`);
  logger.log('='.repeat(60));
}
void bootstrap();
