import { Inject, Injectable, Logger } from '@nestjs/common';
import * as fs from 'fs/promises';
import * as path from 'path';
import { Trade } from './entities/trade.entity';
import { LEDGER_OPTIONS, LedgerOptions } from './ledger-options';
import { TradeExportError } from '../common/errors';
import { formatAmount } from '../common/utils/decimal.util';
import { formatDateTime, formatFileStamp } from '../common/utils/time.util';

export type ExportResult =
  | { status: 'exported'; path: string; tradeCount: number }
  | { status: 'empty' }
  | { status: 'failed'; error: TradeExportError };

export const TRADE_CSV_HEADER =
  'entry_time,entry_price,entry_qty,exit_time,exit_price,exit_qty,qty,pnl,pnl_percent,duration_seconds,turnover';

const CSV_LINE_END = '\r\n';

export function formatTradeCsvRow(trade: Trade): string {
  return [
    formatDateTime(trade.entryTime),
    formatAmount(trade.entryPrice),
    String(trade.entryQty),
    formatDateTime(trade.exitTime),
    formatAmount(trade.exitPrice),
    String(trade.exitQty),
    String(trade.qty),
    formatAmount(trade.pnl),
    formatAmount(trade.pnlPercent),
    String(Math.trunc(trade.durationSeconds)),
    formatAmount(trade.turnover),
  ].join(',');
}

export function buildTradesCsv(trades: readonly Trade[]): string {
  const lines = [TRADE_CSV_HEADER, ...trades.map(formatTradeCsvRow)];
  return lines.join(CSV_LINE_END) + CSV_LINE_END;
}

/**
 * Writes trade history to CSV. Callers hand in a copy taken under the
 * ledger lock; nothing here touches ledger state, so disk I/O never
 * runs inside the critical section.
 */
@Injectable()
export class TradeExportService {
  private readonly logger = new Logger(TradeExportService.name);

  constructor(@Inject(LEDGER_OPTIONS) private readonly options: LedgerOptions) {}

  async exportTrades(trades: readonly Trade[], filePath?: string): Promise<ExportResult> {
    if (trades.length === 0) {
      this.logger.log({ message: 'No trades to export' });
      return { status: 'empty' };
    }

    try {
      const target = filePath ?? (await this.defaultExportPath());
      await fs.writeFile(target, buildTradesCsv(trades), 'utf-8');
      this.logger.log({ message: 'Trades exported', path: target, tradeCount: trades.length });
      return { status: 'exported', path: target, tradeCount: trades.length };
    } catch (error) {
      const exportError = new TradeExportError(
        `Failed to export trades: ${error instanceof Error ? error.message : String(error)}`,
        { path: filePath ?? this.options.exportDir, tradeCount: trades.length },
      );
      this.logger.error({
        message: exportError.message,
        code: exportError.code,
        metadata: exportError.metadata,
      });
      return { status: 'failed', error: exportError };
    }
  }

  private async defaultExportPath(): Promise<string> {
    await fs.mkdir(this.options.exportDir, { recursive: true });
    return path.join(this.options.exportDir, `paper_trades_${formatFileStamp(new Date())}.csv`);
  }
}
