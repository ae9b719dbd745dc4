import { Test, TestingModule } from '@nestjs/testing';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { PositionController } from './position.controller';
import { PositionManagerService } from './position-manager.service';
import { LedgerLockService } from './ledger-lock.service';
import { TradeExportService } from './trade-export.service';
import { LEDGER_OPTIONS } from './ledger-options';
import { OrderSide } from './entities/order.entity';

describe('PositionController', () => {
  let controller: PositionController;
  let positionManager: PositionManagerService;
  let tmpDir: string;

  const createController = async (simulationMode: boolean, exportDir: string) => {
    const module: TestingModule = await Test.createTestingModule({
      controllers: [PositionController],
      providers: [
        LedgerLockService,
        TradeExportService,
        PositionManagerService,
        { provide: LEDGER_OPTIONS, useValue: { simulationMode, exportDir } },
      ],
    }).compile();

    controller = module.get<PositionController>(PositionController);
    positionManager = module.get<PositionManagerService>(PositionManagerService);
  };

  beforeEach(async () => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'ledger-controller-'));
    await createController(true, path.join(tmpDir, 'exports'));
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  describe('getPosition', () => {
    it('should return the current position', async () => {
      await positionManager.applyFill(OrderSide.BUY, 2, 100, 75);

      const result = await controller.getPosition();

      expect(result.qtyLots).toBe(2);
      expect(result.qtyUnits).toBe(150);
      expect(result.avgPrice).toBe(100);
      expect(result.totalValue).toBe(15000);
    });
  });

  describe('getTrades', () => {
    it('should include session stats in simulation mode', async () => {
      await positionManager.applyFill(OrderSide.BUY, 1, 100, 10);
      await positionManager.applyFill(OrderSide.SELL, 1, 103, 10);

      const result = await controller.getTrades();

      expect(result.trades).toHaveLength(1);
      expect(result.trades[0].pnl).toBe(30);
      expect(result.stats?.netPnl).toBe(30);
      expect(result.stats?.winRate).toBe(100);
    });

    it('should omit stats in live mode', async () => {
      await createController(false, tmpDir);

      const result = await controller.getTrades();

      expect(result).toEqual({ trades: [], stats: null });
    });
  });

  describe('getStats', () => {
    it('should return zeroed stats for an empty session', async () => {
      const stats = await controller.getStats();
      expect(stats.totalTrades).toBe(0);
      expect(stats.avgPnl).toBe(0);
    });
  });

  describe('exportTrades', () => {
    it('should report that there is nothing to export', async () => {
      expect(await controller.exportTrades()).toEqual({
        status: 'empty',
        message: 'No trades to export',
      });
    });

    it('should return the written path and trade count', async () => {
      await positionManager.applyFill(OrderSide.BUY, 1, 100, 1);
      await positionManager.applyFill(OrderSide.SELL, 1, 101, 1);

      const result = await controller.exportTrades();

      expect(result.status).toBe('exported');
      expect(result.tradeCount).toBe(1);
      expect(result.path).toBeDefined();
      expect(result.message).toBe(`Trades exported to ${result.path}`);
      expect(fs.existsSync(result.path ?? '')).toBe(true);
    });
  });

  describe('reset', () => {
    it('should flatten the position', async () => {
      await positionManager.applyFill(OrderSide.BUY, 3, 100, 1);

      expect(await controller.reset()).toEqual({ message: 'Position reset successfully' });
      expect((await controller.getPosition()).qtyLots).toBe(0);
    });
  });
});
