import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { logError, logger } from '../libs/observability';
import { AppModule } from './app.module';

async function bootstrap() {
  const app = await NestFactory.create(AppModule);

  // Ends every pool on SIGTERM / SIGINT
  app.enableShutdownHooks();

  const port = parseInt(process.env.PORT || '3000', 10);
  await app.listen(port);
  logger.info({ port }, `🚀 [PID ${process.pid}] Service running on http://localhost:${port}`);
}

bootstrap().catch((error: unknown) => {
  logError(
    error instanceof Error ? error : new Error(String(error)),
    'bootstrap',
  );
  process.exit(1);
});
