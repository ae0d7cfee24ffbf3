import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { AppModule } from './app.module';
import { logError, logInfo } from './common/logging/structured-logger';
import { ScanConfigStore } from './modules/scan-config/scan-config.store';

function parseCorsOrigins(value: string | undefined): string[] {
  if (!value) {
    return [];
  }
  return [...new Set(value.split(',').map((origin) => origin.trim()).filter(Boolean))];
}

async function bootstrap(): Promise<void> {
  const app = await NestFactory.create(AppModule, { logger: ['error', 'warn'] });
  const nodeEnv = process.env.NODE_ENV ?? 'development';
  const isProduction = nodeEnv === 'production';
  const corsAllowlist = parseCorsOrigins(process.env.CORS_ORIGINS);

  app.enableCors({
    origin: (origin: string | undefined, callback: (err: Error | null, allow?: boolean) => void) => {
      // Non-browser requests (no Origin header) are not subject to CORS.
      if (!origin) {
        callback(null, true);
        return;
      }

      if (!isProduction) {
        callback(null, true);
        return;
      }

      if (corsAllowlist.length === 0) {
        callback(null, false);
        return;
      }

      callback(null, corsAllowlist.includes(origin));
    },
    credentials: false,
    allowedHeaders: ['Content-Type', 'X-Request-Id'],
    exposedHeaders: ['X-Request-Id', 'Content-Disposition'],
    methods: ['GET', 'HEAD', 'POST', 'OPTIONS'],
    optionsSuccessStatus: 204
  });
  app.enableShutdownHooks();

  // Listen address is read once; changing it needs a restart.
  const { host, port } = app.get(ScanConfigStore).get();
  await app.listen(port, host);
  logInfo('server.listening', { host, port, env: nodeEnv });
}

bootstrap().catch((error: unknown) => {
  logError('server.startup_failed', { error });
  process.exit(1);
});
