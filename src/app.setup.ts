import { INestApplication, ValidationPipe } from '@nestjs/common';
import { GlobalHttpExceptionFilter } from './common/http-exception.filter';

// Compartido por main.ts y los e2e: prefijo, validación y formato de errores
export function configureApp(app: INestApplication): INestApplication {
  app.setGlobalPrefix('api');
  app.useGlobalPipes(
    new ValidationPipe({
      whitelist: true,           // elimina props no declaradas en DTOs
      forbidNonWhitelisted: false,
      transform: true,           // habilita transformaciones de tipos (class-transformer)
      transformOptions: { enableImplicitConversion: true },
    }),
  );
  app.useGlobalFilters(new GlobalHttpExceptionFilter());
  return app;
}
