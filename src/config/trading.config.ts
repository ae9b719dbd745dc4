import { registerAs } from '@nestjs/config';
import { ConfigValidationError } from '../common/errors';

export type TradingMode = 'paper' | 'live';

export interface TradingConfig {
  mode: TradingMode;
  port: number;
  pricePollIntervalMs: number;
  exportDir: string;
  instrumentsConfigPath: string;
  defaultInstrument?: string;
  logLevel: string;
}

function parseMode(raw: string | undefined): TradingMode {
  const value = (raw ?? 'paper').trim().toLowerCase();
  if (value === 'paper' || value === 'live') {
    return value;
  }
  throw new ConfigValidationError(`Invalid TRADING_MODE: ${raw}`, [
    'TRADING_MODE must be "paper" or "live"',
  ]);
}

function parsePositiveInt(name: string, raw: string | undefined, fallback: number): number {
  if (raw === undefined || raw.trim() === '') {
    return fallback;
  }
  const value = Number(raw);
  if (!Number.isInteger(value) || value <= 0) {
    throw new ConfigValidationError(`Invalid ${name}: ${raw}`, [
      `${name} must be a positive integer`,
    ]);
  }
  return value;
}

export function buildTradingConfig(env: NodeJS.ProcessEnv): TradingConfig {
  const defaultInstrument = env.DEFAULT_INSTRUMENT?.trim();
  return {
    mode: parseMode(env.TRADING_MODE),
    port: parsePositiveInt('PORT', env.PORT, 8080),
    pricePollIntervalMs: parsePositiveInt('PRICE_POLL_INTERVAL_MS', env.PRICE_POLL_INTERVAL_MS, 5000),
    exportDir: env.TRADES_EXPORT_DIR || 'trades',
    instrumentsConfigPath: env.INSTRUMENTS_CONFIG_PATH || 'config/instruments.json',
    defaultInstrument: defaultInstrument ? defaultInstrument : undefined,
    logLevel: env.LOG_LEVEL || 'info',
  };
}

export const tradingConfig = registerAs('trading', (): TradingConfig => buildTradingConfig(process.env));
