import { Module } from '@nestjs/common';
import { APP_FILTER } from '@nestjs/core';
import { ConfigModule, ConfigType } from '@nestjs/config';
import { ScheduleModule } from '@nestjs/schedule';
import { LoggerModule } from 'nestjs-pino';
import { AppController } from './app.controller';
import { tradingConfig } from './config/trading.config';
import { buildLoggerConfig } from './config/logger.config';
import { LedgerErrorFilter } from './common/filters/ledger-error.filter';
import { PositionModule } from './position/position.module';
import { MarketPriceModule } from './market-price/market-price.module';
import { InstrumentsModule } from './instruments/instruments.module';
import { TradingModule } from './trading/trading.module';

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      load: [tradingConfig],
    }),
    LoggerModule.forRootAsync({
      inject: [tradingConfig.KEY],
      useFactory: (config: ConfigType<typeof tradingConfig>) => buildLoggerConfig(config.logLevel),
    }),
    ScheduleModule.forRoot(), // price ticker interval lives in SchedulerRegistry
    PositionModule,
    MarketPriceModule,
    InstrumentsModule,
    TradingModule,
  ],
  controllers: [AppController],
  providers: [{ provide: APP_FILTER, useClass: LedgerErrorFilter }],
})
export class AppModule {}
