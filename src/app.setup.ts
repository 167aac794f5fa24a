import { ValidationPipe } from '@nestjs/common';
import type { INestApplication } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';

/** Shared by main.ts and the HTTP specs so both run the same pipeline. */
export function configureApp(app: INestApplication): void {
  app.useGlobalPipes(new ValidationPipe({ whitelist: true, transform: true }));

  const origin = app.get(ConfigService).get<string>('CORS_ORIGIN');
  if (origin) {
    app.enableCors({ origin });
  }
}
