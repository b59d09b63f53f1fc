import 'reflect-metadata';

import { NestFactory } from '@nestjs/core';
import helmet from 'helmet';
import rateLimit from 'express-rate-limit';
import { AppModule } from './app.module';
import { buildValidationPipe } from './common/pipes/validation.pipe';
import { ConfigService } from '@nestjs/config';
import { WINSTON_MODULE_NEST_PROVIDER } from 'nest-winston';
import { DocumentBuilder, SwaggerModule } from '@nestjs/swagger';
import { PRINCIPAL_ID_HEADER } from './common/middleware/principal-context.middleware';

async function bootstrap() {
  const app = await NestFactory.create(AppModule, { bufferLogs: true });

  app.useLogger(app.get(WINSTON_MODULE_NEST_PROVIDER));
  app.enableShutdownHooks();

  const config = app.get(ConfigService);
  const apiPrefix = config.get<string>('app.apiPrefix');
  const rateWindowMs = config.get<number>('app.rateLimitWindowMs');
  const rateMax = config.get<number>('app.rateLimitMaxRequests');

  app.setGlobalPrefix(apiPrefix ?? 'api/v1');

  app.use(helmet());
  app.use(
    rateLimit({
      windowMs: rateWindowMs ?? 15 * 60 * 1000,
      max: rateMax ?? 100,
      standardHeaders: true,
      legacyHeaders: false,
    }),
  );

  app.useGlobalPipes(buildValidationPipe());

  // Swagger UI, development only
  if (config.get<string>('app.nodeEnv') !== 'production') {
    const swaggerConfig = new DocumentBuilder()
      .setTitle('Retail Ledger API')
      .setDescription('Sales documents, payments, procurement and the per-branch stock ledger')
      .setVersion('1.0')
      .addApiKey({ type: 'apiKey', in: 'header', name: PRINCIPAL_ID_HEADER }, 'principal')
      .build();

    const document = SwaggerModule.createDocument(app, swaggerConfig);
    SwaggerModule.setup('api/docs', app, document);
  }

  const port = config.get<number>('app.port') ?? 3000;
  await app.listen(port);
}

void bootstrap();
