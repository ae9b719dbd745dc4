import 'reflect-metadata';
import { Logger, ValidationPipe } from '@nestjs/common';
import { ConfigType } from '@nestjs/config';
import { NestFactory } from '@nestjs/core';
import { Logger as PinoLogger } from 'nestjs-pino';
import { AppModule } from './app.module';
import { tradingConfig } from './config/trading.config';

async function bootstrap(): Promise<void> {
  const app = await NestFactory.create(AppModule, { bufferLogs: true });

  // Replace default NestJS logger with nestjs-pino
  app.useLogger(app.get(PinoLogger));

  app.useGlobalPipes(
    new ValidationPipe({ transform: true, whitelist: true, forbidNonWhitelisted: true }),
  );

  // SIGINT/SIGTERM run onApplicationShutdown, which exports paper trades
  app.enableShutdownHooks();

  const config = app.get<ConfigType<typeof tradingConfig>>(tradingConfig.KEY);
  await app.listen(config.port);

  const logger = new Logger('Bootstrap');
  logger.log(`${config.mode.toUpperCase()} trading ledger running on port ${config.port}`);
  if (config.mode === 'live') {
    logger.warn('LIVE mode: fills are booked from broker confirmations');
  }
}

bootstrap().catch((error: unknown) => {
  new Logger('Bootstrap').error(error instanceof Error ? error.stack : String(error));
  process.exit(1);
});
