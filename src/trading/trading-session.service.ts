import { Inject, Injectable, Logger, OnApplicationShutdown } from '@nestjs/common';
import { ConfigType } from '@nestjs/config';
import { ORDER_EXECUTOR, OrderExecutor, OrderRequest } from './order-executor';
import { Order, OrderSide } from '../position/entities/order.entity';
import { PositionManagerService } from '../position/position-manager.service';
import { ExportResult } from '../position/trade-export.service';
import { MarketPriceService } from '../market-price/market-price.service';
import { InstrumentConfigLoaderService } from '../instruments/instrument-config-loader.service';
import { InstrumentConfig } from '../instruments/entities/instrument.entity';
import { LedgerLockService } from '../position/ledger-lock.service';
import { InstrumentChangeError } from '../common/errors';
import { TradingMode, tradingConfig } from '../config/trading.config';

/**
 * One trading session: the active instrument, the executor it trades
 * through, and the shutdown export of simulated trades.
 *
 * Commands (orders, close-all, instrument change) run one at a time under
 * the session's own lock, so a check and the action taken on it cannot be
 * split by another command.
 */
@Injectable()
export class TradingSessionService implements OnApplicationShutdown {
  private readonly logger = new Logger(TradingSessionService.name);
  private instrument: InstrumentConfig | null = null;
  private readonly commandLock = new LedgerLockService();

  constructor(
    @Inject(tradingConfig.KEY) private readonly config: ConfigType<typeof tradingConfig>,
    @Inject(ORDER_EXECUTOR) private readonly executor: OrderExecutor,
    private readonly instruments: InstrumentConfigLoaderService,
    private readonly positionManager: PositionManagerService,
    private readonly marketPriceService: MarketPriceService,
  ) {}

  get mode(): TradingMode {
    return this.config.mode;
  }

  getInstrument(): InstrumentConfig {
    if (this.instrument === null) {
      this.instrument = this.instruments.resolveDefault(this.config.defaultInstrument);
      this.logger.log({ message: `Selected instrument: ${this.describe(this.instrument)}` });
    }
    return this.instrument;
  }

  listInstruments(): InstrumentConfig[] {
    return this.instruments.getInstruments();
  }

  placeOrder(request: OrderRequest): Promise<Order> {
    return this.commandLock.runExclusive(() => this.execute(request));
  }

  /** Sells every open lot. Null when already flat. */
  closeAll(): Promise<Order | null> {
    return this.commandLock.runExclusive(async () => {
      const lots = await this.positionManager.openLots();
      if (lots <= 0) {
        this.logger.warn({ message: 'No open positions to close' });
        return null;
      }
      this.logger.log({ message: `CLOSE ALL command: closing ${lots} lots` });
      return this.execute({ side: OrderSide.SELL, lots });
    });
  }

  /**
   * Switches the active instrument. Only allowed while flat; the ledger
   * is reset and the old instrument's quote dropped.
   */
  changeInstrument(symbol: string): Promise<InstrumentConfig> {
    return this.commandLock.runExclusive(async () => {
      const next = this.instruments.findBySymbol(symbol);
      if (!next) {
        throw new InstrumentChangeError(`Unknown instrument: ${symbol}`, { symbol });
      }
      if (await this.positionManager.hasOpenPosition()) {
        this.logger.warn({ message: 'Cannot change instrument with open positions', symbol });
        throw new InstrumentChangeError('Cannot change instrument with open positions', {
          current: this.getInstrument().symbol,
          requested: symbol,
        });
      }

      await this.positionManager.reset();
      this.marketPriceService.clear();
      this.instrument = next;
      this.logger.log({ message: `Instrument updated to: ${this.describe(next)}` });
      return next;
    });
  }

  async onApplicationShutdown(signal?: string): Promise<void> {
    if (!this.executor.simulated) {
      return;
    }
    this.logger.log({ message: 'Exporting session trades before shutdown', signal });
    const result = await this.positionManager.exportTrades();
    this.logExportResult(result);
  }

  // Caller holds commandLock
  private execute(request: OrderRequest): Promise<Order> {
    return this.executor.execute(request, this.getInstrument());
  }

  private logExportResult(result: ExportResult): void {
    switch (result.status) {
      case 'exported':
        this.logger.log({ message: `Trades exported: ${result.path}`, tradeCount: result.tradeCount });
        break;
      case 'empty':
        this.logger.log({ message: 'No trades to export at shutdown' });
        break;
      case 'failed':
        this.logger.error({ message: 'Failed to export trades', error: result.error.message });
        break;
    }
  }

  private describe(instrument: InstrumentConfig): string {
    return `${instrument.symbol} (${instrument.exchange}) [${instrument.product}]`;
  }
}
