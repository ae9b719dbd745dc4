import { Test, TestingModule } from '@nestjs/testing';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { InstrumentConfigLoaderService } from './instrument-config-loader.service';
import { tradingConfig } from '../config/trading.config';
import { ConfigValidationError } from '../common/errors';

const FIXTURE_PATH = path.join(__dirname, '../../test/fixtures/instruments.json');

describe('InstrumentConfigLoaderService', () => {
  let tmpDir: string;

  const createLoader = async (instrumentsConfigPath: string): Promise<InstrumentConfigLoaderService> => {
    const module: TestingModule = await Test.createTestingModule({
      providers: [
        InstrumentConfigLoaderService,
        { provide: tradingConfig.KEY, useValue: { instrumentsConfigPath } },
      ],
    }).compile();

    return module.get<InstrumentConfigLoaderService>(InstrumentConfigLoaderService);
  };

  const writeConfig = (name: string, content: string): string => {
    const filePath = path.join(tmpDir, name);
    fs.writeFileSync(filePath, content, 'utf-8');
    return filePath;
  };

  const loadError = async (configPath: string): Promise<ConfigValidationError> => {
    const loader = await createLoader(configPath);
    try {
      loader.getInstruments();
    } catch (error) {
      if (error instanceof ConfigValidationError) {
        return error;
      }
      throw error;
    }
    throw new Error('Expected ConfigValidationError');
  };

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'ledger-instruments-'));
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  describe('valid config', () => {
    let loader: InstrumentConfigLoaderService;

    beforeEach(async () => {
      loader = await createLoader(FIXTURE_PATH);
    });

    it('should load every instrument, defaulting the product', () => {
      expect(loader.getInstruments()).toEqual([
        { symbol: 'NSE:TESTIDX-FUT', exchange: 'NSE', lotSize: 50, product: 'INTRADAY' },
        { symbol: 'NSE:TESTCO-EQ', exchange: 'NSE', lotSize: 1, product: 'INTRADAY' },
      ]);
    });

    it('should load eagerly on module init', () => {
      expect(() => loader.onModuleInit()).not.toThrow();
    });

    it('should find by symbol', () => {
      expect(loader.findBySymbol('NSE:TESTCO-EQ')?.lotSize).toBe(1);
      expect(loader.findBySymbol('NSE:MISSING')).toBeUndefined();
    });

    it('should resolve the default instrument', () => {
      expect(loader.resolveDefault().symbol).toBe('NSE:TESTIDX-FUT');
      expect(loader.resolveDefault('NSE:TESTCO-EQ').symbol).toBe('NSE:TESTCO-EQ');
    });

    it('should reject a default that is not configured', () => {
      expect(() => loader.resolveDefault('NSE:MISSING')).toThrow(
        new ConfigValidationError('Default instrument not configured: NSE:MISSING', []),
      );
    });

    it('should return copies of the instrument list', () => {
      loader.getInstruments().pop();
      expect(loader.getInstruments()).toHaveLength(2);
    });
  });

  describe('invalid config', () => {
    it('should fail when the file is missing', async () => {
      const missing = path.join(tmpDir, 'nope.json');

      const error = await loadError(missing);

      expect(error.message).toBe(`Instruments config file not found: ${missing}`);
      expect(error.severity).toBe('critical');
      expect(error.code).toBe(3001);
    });

    it('should fail on malformed JSON', async () => {
      const configPath = writeConfig('broken.json', '{ "instruments": [');

      const error = await loadError(configPath);

      expect(error.message.startsWith(`Error decoding ${configPath}: `)).toBe(true);
    });

    it('should fail when the top level is not an object', async () => {
      const error = await loadError(writeConfig('array.json', '[]'));

      expect(error.metadata).toEqual({
        validationErrors: ['Expected an object with an "instruments" array'],
      });
    });

    it('should require at least one instrument', async () => {
      const error = await loadError(writeConfig('empty.json', '{ "instruments": [] }'));

      expect(error.metadata).toEqual({
        validationErrors: ['instruments: At least one instrument is required'],
      });
    });

    it('should report nested field paths', async () => {
      const configPath = writeConfig(
        'bad-lot.json',
        JSON.stringify({ instruments: [{ symbol: 'NSE:X', exchange: 'NSE', lotSize: 0 }] }),
      );

      const error = await loadError(configPath);

      expect(error.metadata).toEqual({
        validationErrors: ['instruments.0.lotSize: lotSize must be a positive number'],
      });
    });
  });
});
