import { Test, TestingModule } from '@nestjs/testing';
import * as path from 'path';
import { TradingController } from './trading.controller';
import { TradingSessionService } from './trading-session.service';
import { PaperOrderExecutor } from './paper-order-executor';
import { ORDER_EXECUTOR } from './order-executor';
import { PositionManagerService } from '../position/position-manager.service';
import { LedgerLockService } from '../position/ledger-lock.service';
import { TradeExportService } from '../position/trade-export.service';
import { LEDGER_OPTIONS } from '../position/ledger-options';
import { OrderSide } from '../position/entities/order.entity';
import { MarketPriceService } from '../market-price/market-price.service';
import { InstrumentConfigLoaderService } from '../instruments/instrument-config-loader.service';
import { tradingConfig } from '../config/trading.config';

describe('TradingController', () => {
  let controller: TradingController;
  let marketPriceService: MarketPriceService;

  beforeEach(async () => {
    const module: TestingModule = await Test.createTestingModule({
      controllers: [TradingController],
      providers: [
        TradingSessionService,
        PaperOrderExecutor,
        { provide: ORDER_EXECUTOR, useExisting: PaperOrderExecutor },
        InstrumentConfigLoaderService,
        MarketPriceService,
        LedgerLockService,
        TradeExportService,
        PositionManagerService,
        { provide: LEDGER_OPTIONS, useValue: { simulationMode: true, exportDir: 'unused' } },
        {
          provide: tradingConfig.KEY,
          useValue: {
            mode: 'paper',
            instrumentsConfigPath: path.join(__dirname, '../../test/fixtures/instruments.json'),
          },
        },
      ],
    }).compile();

    controller = module.get<TradingController>(TradingController);
    marketPriceService = module.get<MarketPriceService>(MarketPriceService);
  });

  describe('getState', () => {
    it('should describe an idle session', async () => {
      const state = await controller.getState();

      expect(state.mode).toBe('paper');
      expect(state.instrument.symbol).toBe('NSE:TESTIDX-FUT');
      expect(state.position.qtyLots).toBe(0);
      expect(state.orders).toEqual([]);
      expect(state.stats?.totalTrades).toBe(0);
      expect(state.quote).toEqual({ ltp: null, bid: null, ask: null, lastUpdated: null, source: 'manual' });
    });
  });

  describe('placeOrder', () => {
    it('should return the booked fill', async () => {
      marketPriceService.updateQuote({ ltp: 150, bid: 149.95, ask: 150.05 });

      const result = await controller.placeOrder({ side: OrderSide.BUY, lots: 2 });

      expect(result.side).toBe('BUY');
      expect(result.lots).toBe(2);
      expect(result.price).toBe(150.05);
      expect(result.orderId).toBe('PAPER000001');
      expect(result.status).toBe('Paper Executed');

      const state = await controller.getState();
      expect(state.position.qtyUnits).toBe(100);
      expect(state.orders).toHaveLength(1);
    });
  });

  describe('closeAll', () => {
    it('should report when there is nothing to close', async () => {
      expect(await controller.closeAll()).toEqual({ message: 'No open positions to close', order: null });
    });

    it('should close the open lots', async () => {
      marketPriceService.updateQuote({ ltp: 150 });
      await controller.placeOrder({ side: OrderSide.BUY, lots: 4 });

      const result = await controller.closeAll();

      expect(result.message).toBe('Closed 4 lots');
      expect(result.order?.side).toBe('SELL');
    });
  });

  describe('changeInstrument', () => {
    it('should switch while flat', async () => {
      const instrument = await controller.changeInstrument({ symbol: 'NSE:TESTCO-EQ' });

      expect(instrument.lotSize).toBe(1);
      expect(controller.getInstruments()).toHaveLength(2);
    });
  });
});
