import { Module } from '@nestjs/common';
import { MarketPriceService } from './market-price.service';
import { PriceTickerService } from './price-ticker.service';
import { MarketPriceController } from './market-price.controller';
import { PositionModule } from '../position/position.module';

@Module({
  imports: [PositionModule],
  controllers: [MarketPriceController],
  providers: [MarketPriceService, PriceTickerService],
  exports: [MarketPriceService],
})
export class MarketPriceModule {}
