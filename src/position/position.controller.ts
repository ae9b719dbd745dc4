import { Controller, Get, HttpCode, HttpStatus, Post } from '@nestjs/common';
import { PositionManagerService } from './position-manager.service';
import { PositionResponseDto } from './dto/position-response.dto';
import { OrderResponseDto } from './dto/order-response.dto';
import { TradeHistoryResponseDto } from './dto/trade-response.dto';
import { SessionStatsDto } from './dto/session-stats.dto';
import { ExportResponseDto } from './dto/export-response.dto';

@Controller('position')
export class PositionController {
  constructor(private readonly positionManager: PositionManagerService) {}

  /**
   * Current position with MTM.
   *
   * GET /position
   */
  @Get()
  getPosition(): Promise<PositionResponseDto> {
    return this.positionManager.snapshotPosition();
  }

  /**
   * Fills recorded for the active instrument, oldest first.
   *
   * GET /position/orders
   */
  @Get('orders')
  getOrders(): Promise<OrderResponseDto[]> {
    return this.positionManager.snapshotOrders();
  }

  /**
   * Closed round trips, plus session stats when simulating.
   *
   * GET /position/trades
   */
  @Get('trades')
  async getTrades(): Promise<TradeHistoryResponseDto> {
    const trades = await this.positionManager.snapshotTrades();
    const stats = this.positionManager.simulationMode
      ? await this.positionManager.sessionStats()
      : null;
    return { trades, stats };
  }

  @Get('stats')
  getStats(): Promise<SessionStatsDto> {
    return this.positionManager.sessionStats();
  }

  /**
   * Exports the trade history to a timestamped CSV under the export dir.
   *
   * POST /position/export
   */
  @Post('export')
  @HttpCode(HttpStatus.OK)
  async exportTrades(): Promise<ExportResponseDto> {
    const result = await this.positionManager.exportTrades();
    switch (result.status) {
      case 'exported':
        return {
          status: result.status,
          message: `Trades exported to ${result.path}`,
          path: result.path,
          tradeCount: result.tradeCount,
        };
      case 'empty':
        return { status: result.status, message: 'No trades to export' };
      case 'failed':
        return { status: result.status, message: result.error.message };
    }
  }

  /**
   * Clears position and history - test harness only.
   *
   * POST /position/reset
   */
  @Post('reset')
  @HttpCode(HttpStatus.OK)
  async reset(): Promise<{ message: string }> {
    await this.positionManager.reset();
    return { message: 'Position reset successfully' };
  }
}
