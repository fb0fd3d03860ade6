import { INestApplication, ValidationPipe } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import cookieParser from 'cookie-parser';
import { AllExceptionsFilter } from './common/http-exception.filter';
import { LoggingInterceptor } from './common/logging.interceptor';

export function corsOrigins(raw: string | undefined): string[] | true {
  const origins = (raw ?? '*')
    .split(',')
    .map((o) => o.trim())
    .filter((o) => o.length > 0);
  return origins.length === 0 || origins.includes('*') ? true : origins;
}

/** Global pipes, filters and middleware shared by `main.ts` and the e2e tests. */
export function configureApp(app: INestApplication): void {
  const config = app.get(ConfigService);

  app.useGlobalPipes(
    new ValidationPipe({
      whitelist: true,
      forbidNonWhitelisted: true,
      transform: true,
    }),
  );

  app.useGlobalFilters(new AllExceptionsFilter());
  app.useGlobalInterceptors(new LoggingInterceptor());
  app.use(cookieParser());

  app.enableCors({
    origin: corsOrigins(config.get<string>('CORS_ORIGINS')),
    credentials: true,
  });
  app.enableShutdownHooks();
}
