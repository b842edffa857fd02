import 'reflect-metadata';
import { Logger } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { AppModule } from './app.module';
import { VoiceCatalogService } from './voices/voice-catalog.service';

function parseCorsOrigins(): { origins: string[] | true; allowCredentials: boolean } {
  const raw = process.env.CORS_ORIGINS;
  if (!raw) {
    return { origins: true, allowCredentials: false };
  }
  const entries = raw
    .split(',')
    .map((v) => v.trim())
    .filter((v) => v.length > 0);
  if (!entries.length || entries.includes('*')) {
    return { origins: true, allowCredentials: false };
  }
  return { origins: entries, allowCredentials: true };
}

async function bootstrap() {
  const app = await NestFactory.create(AppModule);
  app.enableShutdownHooks();

  const { origins, allowCredentials } = parseCorsOrigins();
  app.enableCors({
    origin: origins,
    credentials: allowCredentials,
    methods: ['GET', 'HEAD', 'POST', 'PATCH', 'DELETE', 'OPTIONS'],
    allowedHeaders: ['Content-Type', 'Accept', 'Origin', 'X-Requested-With'],
    exposedHeaders: ['Content-Disposition', 'X-Dialogue-Segments', 'X-Dialogue-Duration-Ms'],
  });

  const logger = new Logger('Bootstrap');
  try {
    const voices = await app.get(VoiceCatalogService).fetchAll();
    logger.log(`Voice catalog ready (${voices.length} voices)`);
  } catch (error) {
    logger.error(`Voice catalog unavailable; the form cannot be used until Polly is reachable: ${
      error instanceof Error ? error.message : error
    }`);
  }

  const port = process.env.PORT ? Number(process.env.PORT) : 3000;
  await app.listen(port, '0.0.0.0');
  logger.log(`HTTP server listening on port ${port}`);
}

bootstrap().catch((err) => {
  // eslint-disable-next-line no-console
  console.error('Failed to start server', err);
  process.exit(1);
});
