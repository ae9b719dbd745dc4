import { Controller, Get, Inject } from '@nestjs/common';
import { ConfigType } from '@nestjs/config';
import { HealthResponse } from './common/interfaces/health.interface';
import { tradingConfig } from './config/trading.config';

@Controller()
export class AppController {
  constructor(
    @Inject(tradingConfig.KEY) private readonly config: ConfigType<typeof tradingConfig>,
  ) {}

  /**
   * Health check for load balancers and monitoring.
   *
   * GET /health
   */
  @Get('health')
  getHealth(): HealthResponse {
    return {
      status: 'ok',
      timestamp: new Date().toISOString(),
      uptime: process.uptime(),
      service: 'intraday-position-ledger',
      mode: this.config.mode,
    };
  }

  /**
   * API root - returns service info and available endpoints.
   *
   * GET /
   */
  @Get()
  getRoot() {
    return {
      message: 'Intraday Position Ledger API',
      version: '1.0.0',
      endpoints: {
        health: '/health',
        state: '/trading/state',
        orders: '/trading/orders',
        position: '/position',
        trades: '/position/trades',
        export: '/position/export',
        quote: '/market/quote',
      },
    };
  }
}
