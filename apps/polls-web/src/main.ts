import { NestFactory } from '@nestjs/core';
import { Logger } from '@nestjs/common';
import { ConfigType } from '@nestjs/config';
import { NestExpressApplication } from '@nestjs/platform-express';
import { AppModule } from './app.module';
import { loggingConfig, serverConfig } from '@app/shared/config/configuration';
import { resolveLogLevels } from './common/log-levels';

const SHUTDOWN_TIMEOUT_MS = 10000;

async function bootstrap() {
  const logger = new Logger('PollsWeb');

  // Held until the validated logging config is available
  const app = await NestFactory.create<NestExpressApplication>(AppModule, {
    bufferLogs: true,
  });
  const logging = app.get<ConfigType<typeof loggingConfig>>(loggingConfig.KEY);
  app.useLogger(resolveLogLevels(logging.level));

  const server = app.get<ConfigType<typeof serverConfig>>(serverConfig.KEY);
  await app.listen(server.port, server.host);
  logger.log(`Polls web listening on http://${server.host}:${server.port}/polls/`);

  const shutdown = async () => {
    logger.log('Shutting down...');
    const closePromise = app.close();
    const timeoutPromise = new Promise<never>((_, reject) =>
      setTimeout(() => reject(new Error('Shutdown timeout')), SHUTDOWN_TIMEOUT_MS),
    );
    try {
      await Promise.race([closePromise, timeoutPromise]);
      process.exit(0);
    } catch (err) {
      logger.error(`Shutdown error: ${err instanceof Error ? err.message : String(err)}`);
      process.exit(1);
    }
  };
  process.on('SIGINT', () => void shutdown());
  process.on('SIGTERM', () => void shutdown());
}

bootstrap().catch((err: unknown) => {
  const message = err instanceof Error ? err.message : String(err);
  new Logger('PollsWeb').error(`Failed to start: ${message}`);
  process.exit(1);
});
