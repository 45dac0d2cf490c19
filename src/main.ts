import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { ConfigService } from '@nestjs/config';
import { AppModule } from './app.module';
import { AppConfig } from './config/configuration';
import { PinoLoggerService } from './shared/logging/pino-logger.service';

/**
 * Bootstrap the NestJS worker
 * This is an SQS consumer-based worker (no HTTP server)
 */
async function bootstrap() {
  // Create NestJS application context (no HTTP)
  const app = await NestFactory.createApplicationContext(AppModule, {
    bufferLogs: true,
  });

  // Get services
  const configService = app.get<ConfigService<AppConfig, true>>(ConfigService);
  const logger = await app.resolve(PinoLoggerService);

  // Use custom logger
  app.useLogger(logger);
  logger.setContext('Bootstrap');

  // Get configuration
  const nodeEnv = configService.get('nodeEnv', { infer: true });
  const sqsConfig = configService.get('sqs', { infer: true });
  const s3Config = configService.get('s3', { infer: true });

  // Enable graceful shutdown
  app.enableShutdownHooks();

  // Register shutdown handlers
  const shutdownHandler = async (signal: string) => {
    logger.info({ signal }, 'Received shutdown signal, stopping consumer...');
    await app.close();
    logger.info('Consumer stopped, application shut down gracefully');
    process.exit(0);
  };

  process.on('SIGTERM', () => {
    void shutdownHandler('SIGTERM');
  });
  process.on('SIGINT', () => {
    void shutdownHandler('SIGINT');
  });

  // Handle uncaught errors
  process.on('uncaughtException', (error) => {
    logger.error({ error: error.message, stack: error.stack }, 'Uncaught exception');
    process.exit(1);
  });

  process.on('unhandledRejection', (reason) => {
    logger.error({ reason }, 'Unhandled rejection');
    process.exit(1);
  });

  // Log startup
  logger.info(
    {
      nodeEnv,
      pid: process.pid,
      requestsQueue: sqsConfig.videoRequestsUrl,
      outputBucket: s3Config.outputBucket,
    },
    'Video frame extractor started - listening to SQS queue',
  );

  // The SQS consumer starts via the OnModuleInit lifecycle hook
}

bootstrap().catch((error) => {
  console.error('Failed to start worker:', error);
  process.exit(1);
});
