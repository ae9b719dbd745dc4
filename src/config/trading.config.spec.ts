import { buildTradingConfig } from './trading.config';
import { ConfigValidationError } from '../common/errors';

describe('buildTradingConfig', () => {
  it('should fall back to paper-mode defaults', () => {
    expect(buildTradingConfig({})).toEqual({
      mode: 'paper',
      port: 8080,
      pricePollIntervalMs: 5000,
      exportDir: 'trades',
      instrumentsConfigPath: 'config/instruments.json',
      defaultInstrument: undefined,
      logLevel: 'info',
    });
  });

  it('should read explicit values', () => {
    const config = buildTradingConfig({
      TRADING_MODE: 'LIVE',
      PORT: '9090',
      PRICE_POLL_INTERVAL_MS: '2500',
      TRADES_EXPORT_DIR: '/var/ledger/trades',
      DEFAULT_INSTRUMENT: ' NSE:SBIN-EQ ',
      LOG_LEVEL: 'debug',
    });

    expect(config.mode).toBe('live');
    expect(config.port).toBe(9090);
    expect(config.pricePollIntervalMs).toBe(2500);
    expect(config.exportDir).toBe('/var/ledger/trades');
    expect(config.defaultInstrument).toBe('NSE:SBIN-EQ');
    expect(config.logLevel).toBe('debug');
  });

  it('should reject an unknown trading mode', () => {
    expect(() => buildTradingConfig({ TRADING_MODE: 'margin' })).toThrow(ConfigValidationError);
  });

  it('should reject a non-positive poll interval', () => {
    expect(() => buildTradingConfig({ PRICE_POLL_INTERVAL_MS: '0' })).toThrow(
      'Invalid PRICE_POLL_INTERVAL_MS: 0',
    );
  });
});
