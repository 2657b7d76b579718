import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { NestExpressApplication } from '@nestjs/platform-express';
import { DataSource } from 'typeorm';
import { AppModule } from './app.module';
import { configureApp } from './app.setup';

async function bootstrap() {
  const logger = new Logger('Bootstrap');
  const app = configureApp(await NestFactory.create<NestExpressApplication>(AppModule));

  const configService = app.get(ConfigService);
  const dataSource = app.get(DataSource);

  const shutdown = async (signal: string) => {
    logger.log(`Received ${signal}. Starting graceful shutdown...`);

    const timeout = configService.get<number>('app.shutdownTimeout') || 30000;
    const shutdownTimer = setTimeout(() => {
      logger.error('Graceful shutdown timed out. Forcing exit.');
      process.exit(1);
    }, timeout);

    try {
      // 새 요청 수신부터 중단
      await app.close();
      logger.log('HTTP server closed.');

      if (dataSource.isInitialized) {
        logger.log('Closing database connections...');
        await dataSource.destroy();
        logger.log('Database connections closed.');
      }

      clearTimeout(shutdownTimer);
      logger.log('Graceful shutdown completed.');
      process.exit(0);
    } catch (error) {
      logger.error('Error during shutdown:', error);
      clearTimeout(shutdownTimer);
      process.exit(1);
    }
  };

  process.on('SIGTERM', () => void shutdown('SIGTERM'));
  process.on('SIGINT', () => void shutdown('SIGINT'));

  const port = configService.get<number>('app.port') || 3000;
  await app.listen(port);

  logger.log(`Application running on port ${port} (${configService.get<string>('app.nodeEnv')})`);
  logger.log(`Storage root: ${configService.get<string>('storage.root')}`);
  logger.log(`Database: ${configService.get<string>('database.type')}`);
}

bootstrap().catch((error: unknown) => {
  new Logger('Bootstrap').error('Failed to start', error instanceof Error ? error.stack : error);
  process.exit(1);
});
