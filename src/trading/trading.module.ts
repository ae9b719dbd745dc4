import { Module } from '@nestjs/common';
import { ConfigType } from '@nestjs/config';
import { TradingController } from './trading.controller';
import { TradingSessionService } from './trading-session.service';
import { PaperOrderExecutor } from './paper-order-executor';
import { ConfirmedFillExecutor } from './confirmed-fill-executor';
import { ORDER_EXECUTOR, OrderExecutor } from './order-executor';
import { PositionModule } from '../position/position.module';
import { MarketPriceModule } from '../market-price/market-price.module';
import { InstrumentsModule } from '../instruments/instruments.module';
import { tradingConfig } from '../config/trading.config';

@Module({
  imports: [PositionModule, MarketPriceModule, InstrumentsModule],
  controllers: [TradingController],
  providers: [
    PaperOrderExecutor,
    ConfirmedFillExecutor,
    {
      provide: ORDER_EXECUTOR,
      inject: [tradingConfig.KEY, PaperOrderExecutor, ConfirmedFillExecutor],
      useFactory: (
        config: ConfigType<typeof tradingConfig>,
        paper: PaperOrderExecutor,
        confirmed: ConfirmedFillExecutor,
      ): OrderExecutor => (config.mode === 'paper' ? paper : confirmed),
    },
    TradingSessionService,
  ],
})
export class TradingModule {}
