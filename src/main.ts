import 'reflect-metadata';
import { Logger } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { AppModule } from './app.module';
import helmet from 'helmet';
import { SwaggerModule, DocumentBuilder } from '@nestjs/swagger';
import { configureApp } from './app.setup';

async function bootstrap() {
  const app = await NestFactory.create(AppModule);
  const logger = new Logger('Bootstrap');

  configureApp(app);

  // Seguridad base (opt-in por ENV para no romper flujos locales)
  const enableCors = process.env.ENABLE_CORS?.toLowerCase() === 'true';
  const corsOrigin = process.env.CORS_ORIGIN || '*';
  if (enableCors) {
    app.enableCors({ origin: corsOrigin === '*' ? true : corsOrigin.split(','), credentials: true });
  }
  if (process.env.ENABLE_HELMET?.toLowerCase() === 'true') {
    app.use(helmet());
  }

  // Swagger (OpenAPI)
  const swaggerEnabled = process.env.ENABLE_SWAGGER?.toLowerCase() !== 'false';
  if (swaggerEnabled) {
    const config = new DocumentBuilder()
      .setTitle('EPL Stats API')
      .setDescription('Estadísticas de jugadores de la Premier League (fuente: Understat).')
      .setVersion('1.0')
      .addBearerAuth({ type: 'http', scheme: 'bearer', bearerFormat: 'JWT' }, 'bearer')
      .build();
    const document = SwaggerModule.createDocument(app, config);
    SwaggerModule.setup('docs', app, document, {
      swaggerOptions: {
        persistAuthorization: true,
      },
    });
  }

  app.enableShutdownHooks();

  const port = process.env.PORT ? Number(process.env.PORT) : 3000;
  await app.listen(port);
  logger.log(`API listening on http://localhost:${port}/api`);
  if (swaggerEnabled) logger.log(`Swagger UI: http://localhost:${port}/docs`);
  logger.log(
    `Flags -> AUTH:${process.env.ENABLE_AUTH||'false'} CORS:${process.env.ENABLE_CORS||'false'} HELMET:${process.env.ENABLE_HELMET||'false'} IMPORT_CRON:${process.env.IMPORT_CRON_ENABLED||'false'}`,
  );
}

bootstrap().catch((e: unknown) => {
  new Logger('Bootstrap').error(e instanceof Error ? e.stack : String(e));
  process.exit(1);
});
