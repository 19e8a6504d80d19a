import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { ConfigService } from '@nestjs/config';
import { ValidationPipe } from '@nestjs/common';
import { SwaggerModule, DocumentBuilder } from '@nestjs/swagger';
import { AppModule } from './app.module';
import { JsonLogger } from './logging/json-logger.service';
import { createHttpLoggingMiddleware } from './logging/http-logging.middleware';
import { AllExceptionsFilter } from './logging/all-exceptions.filter';

async function bootstrap() {
  const app = await NestFactory.create(AppModule, {
    bufferLogs: true,
    logger: new JsonLogger('bootstrap')
  });

  const logger = app.get(JsonLogger);
  app.useLogger(logger);
  const config = app.get(ConfigService);

  app.useGlobalPipes(
    new ValidationPipe({
      whitelist: true,
      forbidNonWhitelisted: true,
      transform: true
    })
  );

  const port = config.getOrThrow<number>('PORT');
  const env = config.get<string>('NODE_ENV') ?? 'dev';
  const storeDriver = config.get<string>('STORE_DRIVER');

  logger.setLogLevels(env === 'production' ? ['log', 'warn', 'error'] : ['log', 'warn', 'error', 'debug', 'verbose']);

  // Request/response logs (no headers/body).
  app.use(createHttpLoggingMiddleware(logger));

  app.useGlobalFilters(new AllExceptionsFilter(logger));

  // CORS only when origins are configured; tools without an Origin header always pass.
  const corsOrigins = (config.get<string>('CORS_ORIGINS') ?? '')
    .split(',')
    .map((s) => s.trim().replace(/\/$/, ''))
    .filter(Boolean);

  if (corsOrigins.length > 0) {
    const allowSet = new Set(corsOrigins);
    app.enableCors({
      origin: (origin: string | undefined, callback: (err: Error | null, allow?: boolean) => void) => {
        if (!origin) return callback(null, true);
        const normalized = origin.trim().replace(/\/$/, '');
        if (allowSet.has(normalized)) return callback(null, true);
        logger.warn('CORS blocked origin', { origin, normalized, allowListCount: allowSet.size });
        return callback(new Error(`CORS blocked origin: ${origin}`), false);
      },
      methods: ['GET', 'HEAD', 'POST', 'PUT', 'DELETE', 'OPTIONS'],
      optionsSuccessStatus: 204,
      maxAge: 86400
    });

    logger.log('CORS enabled', { allowList: corsOrigins });
  }

  if (config.get<boolean>('SWAGGER_ENABLED')) {
    const swaggerConfig = new DocumentBuilder()
      .setTitle('Access API')
      .setDescription(
        'Rights store and token service.' +
          '\n\n**Authorization model:**' +
          '\nA right grants one REST method on a resource (or one instance of it) to a group or a user.' +
          '\nUsers inherit the rights of their groups. Anything not granted is denied.' +
          '\n\n**Getting a token:**' +
          '\nOutside production, `POST /auth/token` with `{ "pseudo": "alice" }` returns an ES512 JWT.' +
          '\nSend it as `Authorization: Bearer <token>`.'
      )
      .setVersion('1.0.0')
      .addBearerAuth(
        {
          type: 'http',
          scheme: 'bearer',
          bearerFormat: 'JWT',
          name: 'Authorization',
          description: 'ES512 token whose `iss` claim is the user pseudo.',
          in: 'header'
        },
        'bearer'
      )
      .addTag('auth', 'Token issuance and refresh')
      .addTag('health', 'Health check (public, no auth required)')
      .addTag('groups', 'Security groups')
      .addTag('rights', 'Grants of REST methods on resources')
      .build();

    const document = SwaggerModule.createDocument(app, swaggerConfig);
    SwaggerModule.setup('api/docs', app, document, {
      customSiteTitle: 'Access API Docs',
      swaggerOptions: {
        persistAuthorization: true,
        docExpansion: 'none',
        tagsSorter: 'alpha',
        operationsSorter: 'alpha'
      }
    });

    logger.log('Swagger documentation available', { url: `http://localhost:${port}/api/docs` });
  }

  logger.log('access-api bootstrapping', { port, env, storeDriver });

  process.on('unhandledRejection', (reason) => {
    logger.error('unhandledRejection', { reason: reason instanceof Error ? reason.stack ?? reason.message : String(reason) });
  });

  process.on('uncaughtException', (error) => {
    logger.error('uncaughtException', { error: error.stack ?? error.message });
  });

  app.enableShutdownHooks();

  await app.listen(port);
  logger.log('access-api listening', { port, env });
}

bootstrap().catch((error) => {
  // Logger may not exist yet; write the same JSON shape directly.
  console.error(JSON.stringify({ level: 'error', msg: 'bootstrap failed', error: String(error) }));
  process.exit(1);
});
