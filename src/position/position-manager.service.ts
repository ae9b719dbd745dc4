import { Inject, Injectable, Logger } from '@nestjs/common';
import Decimal from 'decimal.js';
import { Order, OrderSide } from './entities/order.entity';
import { Trade } from './entities/trade.entity';
import { PendingBuyLot, Position, emptyPosition } from './entities/position.entity';
import { PositionResponseDto } from './dto/position-response.dto';
import { OrderResponseDto } from './dto/order-response.dto';
import { TradeResponseDto } from './dto/trade-response.dto';
import { SessionStatsDto } from './dto/session-stats.dto';
import { LEDGER_OPTIONS, LedgerOptions } from './ledger-options';
import { LedgerLockService } from './ledger-lock.service';
import { matchSellAgainstLots } from './lot-matcher';
import { computeSessionStats } from './session-reporter';
import { ExportResult, TradeExportService } from './trade-export.service';
import { toOrderResponse, toPositionResponse, toTradeResponse } from './ledger.mapper';
import { divide, toDecimal } from '../common/utils/decimal.util';

// Accounting engine: sole owner of the position, order and trade history,
// pending buy lots and the cost accumulators. Every public operation runs
// under LedgerLockService, so callers see one total order of mutations.
@Injectable()
export class PositionManagerService {
  private readonly logger = new Logger(PositionManagerService.name);

  private position: Position = emptyPosition();
  private orders: Order[] = [];
  private trades: Trade[] = [];
  private pendingBuyLots: PendingBuyLot[] = [];

  // cost basis of the currently open buy volume
  private totalBuyCost = new Decimal(0);
  private totalBuyUnits = 0;

  private sessionNetPnl = new Decimal(0);

  constructor(
    @Inject(LEDGER_OPTIONS) private readonly options: LedgerOptions,
    private readonly lock: LedgerLockService,
    private readonly exporter: TradeExportService,
  ) {}

  get simulationMode(): boolean {
    return this.options.simulationMode;
  }

  /** Appends to order history. No other effect. */
  recordOrder(order: Order): Promise<void> {
    return this.lock.runExclusive(() => {
      this.orders.push(order);
    });
  }

  /**
   * Applies one executed fill to the position.
   * Lots and side are validated by the caller; this never re-checks them.
   */
  applyFill(side: OrderSide, lots: number, price: number | Decimal, lotSize: number): Promise<void> {
    return this.lock.runExclusive(() => {
      this.applyFillLocked(side, lots, toDecimal(price), lotSize);
    });
  }

  /**
   * Records the order and applies its fill in one critical section, so no
   * reset or other fill can land between the two.
   */
  bookFill(order: Order, lotSize: number): Promise<void> {
    return this.lock.runExclusive(() => {
      this.orders.push(order);
      this.applyFillLocked(order.side, order.lots, order.price, lotSize);
    });
  }

  /**
   * Stores the latest market price. MTM is only recomputed from a
   * positive price while units are held.
   */
  applyPriceTick(price: number | Decimal): Promise<void> {
    return this.lock.runExclusive(() => {
      this.position.cmp = toDecimal(price);
      if (this.position.cmp.lessThanOrEqualTo(0)) {
        this.logger.warn({ message: 'Non-positive price tick stored without MTM update', price: String(price) });
        return;
      }
      if (this.position.qtyUnits > 0) {
        this.recalculateMtm();
      }
    });
  }

  snapshotPosition(): Promise<PositionResponseDto> {
    return this.lock.runExclusive(() => toPositionResponse(this.position));
  }

  snapshotOrders(): Promise<OrderResponseDto[]> {
    return this.lock.runExclusive(() => this.orders.map(toOrderResponse));
  }

  snapshotTrades(): Promise<TradeResponseDto[]> {
    return this.lock.runExclusive(() => this.trades.map(toTradeResponse));
  }

  sessionStats(): Promise<SessionStatsDto> {
    return this.lock.runExclusive(() => computeSessionStats(this.trades, this.sessionNetPnl));
  }

  openLots(): Promise<number> {
    return this.lock.runExclusive(() => this.position.qtyLots);
  }

  hasOpenPosition(): Promise<boolean> {
    return this.lock.runExclusive(() => this.position.qtyUnits !== 0);
  }

  /**
   * Zeroes the position and clears order history and pending lots.
   * Simulation keeps its trade ledger and session P&L across instrument
   * switches; live history belongs to the instrument being reset.
   */
  reset(): Promise<void> {
    return this.lock.runExclusive(() => {
      this.position = emptyPosition();
      this.orders = [];
      this.pendingBuyLots = [];
      this.totalBuyCost = new Decimal(0);
      this.totalBuyUnits = 0;
      if (!this.options.simulationMode) {
        this.trades = [];
        this.sessionNetPnl = new Decimal(0);
      }
      this.logger.log({ message: 'Ledger reset', simulationMode: this.options.simulationMode });
    });
  }

  /**
   * Writes the trade history to CSV. The history is copied under the lock
   * and written after it is released.
   */
  async exportTrades(filePath?: string): Promise<ExportResult> {
    const trades = await this.lock.runExclusive(() => [...this.trades]);
    return this.exporter.exportTrades(trades, filePath);
  }

  private applyFillLocked(side: OrderSide, lots: number, price: Decimal, lotSize: number): void {
    const units = lots * lotSize;
    if (side === OrderSide.BUY) {
      this.applyBuy(lots, units, price);
    } else {
      this.applySell(lots, units, price);
    }

    if (this.position.cmp.greaterThan(0) && this.position.qtyUnits > 0) {
      this.recalculateMtm();
    }
  }

  private applyBuy(lots: number, units: number, price: Decimal): void {
    this.totalBuyCost = this.totalBuyCost.plus(price.times(units));
    this.totalBuyUnits += units;

    this.position.qtyUnits += units;
    this.position.qtyLots += lots;
    if (this.totalBuyUnits > 0) {
      this.position.avgPrice = divide(this.totalBuyCost, this.totalBuyUnits);
    }
    this.position.totalValue = this.position.avgPrice.times(this.position.qtyUnits);

    if (this.options.simulationMode) {
      this.pendingBuyLots.push({ timestamp: new Date(), price, qty: units });
    }
  }

  private applySell(lots: number, units: number, price: Decimal): void {
    if (this.options.simulationMode) {
      const trade = matchSellAgainstLots(this.pendingBuyLots, units, price, new Date());
      if (trade) {
        this.trades.push(trade);
        this.sessionNetPnl = this.sessionNetPnl.plus(trade.pnl);
      }
    }

    this.position.qtyUnits -= units;
    this.position.qtyLots -= lots;

    // shrink cost basis by the sold share; avgPrice stays put
    if (this.totalBuyUnits > 0) {
      const costReduction = divide(this.totalBuyCost.times(units), this.totalBuyUnits);
      this.totalBuyCost = this.totalBuyCost.minus(costReduction);
      this.totalBuyUnits -= units;
    }

    if (this.position.qtyUnits <= 0) {
      this.flatten();
    } else {
      this.position.totalValue = this.position.avgPrice.times(this.position.qtyUnits);
    }
  }

  // Exact zero on close: no residual quantity, cost or MTM survives.
  private flatten(): void {
    const cmp = this.position.cmp;
    this.position = { ...emptyPosition(), cmp };
    this.totalBuyCost = new Decimal(0);
    this.totalBuyUnits = 0;
  }

  // Must be called with the lock held.
  private recalculateMtm(): void {
    if (this.position.qtyUnits <= 0) {
      this.position.mtm = new Decimal(0);
      this.position.mtmChangePercent = new Decimal(0);
      return;
    }

    const currentValue = this.position.cmp.times(this.position.qtyUnits);
    this.position.mtm = currentValue.minus(this.position.totalValue);
    this.position.mtmChangePercent = this.position.totalValue.greaterThan(0)
      ? divide(this.position.mtm, this.position.totalValue).times(100)
      : new Decimal(0);
  }
}
