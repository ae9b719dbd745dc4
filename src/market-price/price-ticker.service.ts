import { Inject, Injectable, Logger, OnModuleInit } from '@nestjs/common';
import { ConfigType } from '@nestjs/config';
import { SchedulerRegistry } from '@nestjs/schedule';
import { MarketPriceService } from './market-price.service';
import { PositionManagerService } from '../position/position-manager.service';
import { tradingConfig } from '../config/trading.config';

export const PRICE_TICK_INTERVAL = 'priceTick';

/**
 * Pushes the latest traded price into the ledger on a fixed cadence
 * while a position is open.
 */
@Injectable()
export class PriceTickerService implements OnModuleInit {
  private readonly logger = new Logger(PriceTickerService.name);

  constructor(
    @Inject(tradingConfig.KEY) private readonly config: ConfigType<typeof tradingConfig>,
    private readonly schedulerRegistry: SchedulerRegistry,
    private readonly marketPriceService: MarketPriceService,
    private readonly positionManager: PositionManagerService,
  ) {}

  // Interval comes from config, so it is registered here rather than via @Interval
  onModuleInit(): void {
    const interval = setInterval(() => {
      void this.tick();
    }, this.config.pricePollIntervalMs);
    this.schedulerRegistry.addInterval(PRICE_TICK_INTERVAL, interval);

    this.logger.log({
      message: 'Price ticker initialized',
      pollIntervalMs: this.config.pricePollIntervalMs,
    });
  }

  /** Returns true when a tick was applied. Never throws. */
  async tick(): Promise<boolean> {
    try {
      if (!(await this.positionManager.hasOpenPosition())) {
        return false;
      }
      const ltp = this.marketPriceService.getLastTradedPrice();
      if (ltp === undefined || ltp <= 0) {
        return false;
      }
      await this.positionManager.applyPriceTick(ltp);
      return true;
    } catch (error) {
      this.logger.debug({
        message: 'Price tick skipped',
        error: error instanceof Error ? error.message : String(error),
      });
      return false;
    }
  }
}
