import { Test, TestingModule } from '@nestjs/testing';
import Decimal from 'decimal.js';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import {
  TRADE_CSV_HEADER,
  TradeExportService,
  buildTradesCsv,
  formatTradeCsvRow,
} from './trade-export.service';
import { LEDGER_OPTIONS } from './ledger-options';
import { Trade, createTrade } from './entities/trade.entity';
import { TradeExportError } from '../common/errors';

describe('TradeExportService', () => {
  let service: TradeExportService;
  let tmpDir: string;
  let exportDir: string;

  const sampleTrade = (): Trade =>
    createTrade({
      entryTime: new Date(2025, 10, 14, 9, 15, 0),
      entryPrice: new Decimal(100),
      entryQty: 75,
      exitTime: new Date(2025, 10, 14, 9, 20, 30),
      exitPrice: new Decimal(102.5),
      exitQty: 75,
    });

  const expectedRow =
    '2025-11-14 09:15:00,100.00,75,2025-11-14 09:20:30,102.50,75,75,187.50,2.50,330,15187.50';

  beforeEach(async () => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'ledger-export-'));
    exportDir = path.join(tmpDir, 'exports');

    const module: TestingModule = await Test.createTestingModule({
      providers: [
        TradeExportService,
        { provide: LEDGER_OPTIONS, useValue: { simulationMode: true, exportDir } },
      ],
    }).compile();

    service = module.get<TradeExportService>(TradeExportService);
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  describe('CSV formatting', () => {
    it('should format one row per trade with 2dp amounts', () => {
      expect(formatTradeCsvRow(sampleTrade())).toBe(expectedRow);
    });

    it('should write the header first and end every line with CRLF', () => {
      const csv = buildTradesCsv([sampleTrade()]);
      expect(csv).toBe(`${TRADE_CSV_HEADER}\r\n${expectedRow}\r\n`);
    });
  });

  describe('exportTrades', () => {
    it('should report empty without touching the filesystem', async () => {
      const result = await service.exportTrades([]);

      expect(result).toEqual({ status: 'empty' });
      expect(fs.existsSync(exportDir)).toBe(false);
    });

    it('should write to an explicit path', async () => {
      const target = path.join(tmpDir, 'session.csv');

      const result = await service.exportTrades([sampleTrade(), sampleTrade()], target);

      expect(result).toEqual({ status: 'exported', path: target, tradeCount: 2 });
      const lines = fs.readFileSync(target, 'utf-8').split('\r\n');
      expect(lines).toEqual([TRADE_CSV_HEADER, expectedRow, expectedRow, '']);
    });

    it('should create the export directory and a timestamped file by default', async () => {
      const result = await service.exportTrades([sampleTrade()]);

      expect(result.status).toBe('exported');
      if (result.status !== 'exported') {
        return;
      }
      expect(path.dirname(result.path)).toBe(exportDir);
      expect(path.basename(result.path)).toMatch(/^paper_trades_\d{8}_\d{6}\.csv$/);
      expect(fs.readFileSync(result.path, 'utf-8')).toBe(`${TRADE_CSV_HEADER}\r\n${expectedRow}\r\n`);
    });

    it('should return a failed result instead of throwing on write errors', async () => {
      const target = path.join(tmpDir, 'missing', 'nested', 'session.csv');

      const result = await service.exportTrades([sampleTrade()], target);

      expect(result.status).toBe('failed');
      if (result.status !== 'failed') {
        return;
      }
      expect(result.error).toBeInstanceOf(TradeExportError);
      expect(result.error.code).toBe(2001);
      expect(result.error.message).toMatch(/^Failed to export trades: /);
      expect(result.error.metadata).toEqual({ path: target, tradeCount: 1 });
    });
  });
});
