import { Inject, Injectable, Logger, OnModuleInit } from '@nestjs/common';
import { ConfigType } from '@nestjs/config';
import { plainToInstance } from 'class-transformer';
import { ValidationError, validateSync } from 'class-validator';
import * as fs from 'fs';
import * as path from 'path';
import { InstrumentsFileDto } from './dto/instruments-file.dto';
import { InstrumentConfig } from './entities/instrument.entity';
import { ConfigValidationError } from '../common/errors';
import { tradingConfig } from '../config/trading.config';

const DEFAULT_PRODUCT = 'INTRADAY';

function flattenValidationErrors(errors: ValidationError[], parentPath = ''): string[] {
  return errors.flatMap((error) => {
    const propertyPath = parentPath ? `${parentPath}.${error.property}` : error.property;
    const own = Object.values(error.constraints ?? {}).map((message) => `${propertyPath}: ${message}`);
    return [...own, ...flattenValidationErrors(error.children ?? [], propertyPath)];
  });
}

@Injectable()
export class InstrumentConfigLoaderService implements OnModuleInit {
  private readonly logger = new Logger(InstrumentConfigLoaderService.name);
  private instruments: InstrumentConfig[] | null = null;

  constructor(
    @Inject(tradingConfig.KEY) private readonly config: ConfigType<typeof tradingConfig>,
  ) {}

  // Fail fast at startup rather than on the first order
  onModuleInit(): void {
    this.getInstruments();
  }

  getInstruments(): InstrumentConfig[] {
    if (this.instruments === null) {
      this.instruments = this.load();
    }
    return [...this.instruments];
  }

  findBySymbol(symbol: string): InstrumentConfig | undefined {
    return this.getInstruments().find((instrument) => instrument.symbol === symbol);
  }

  /** Named default if configured, else the first instrument in the file. */
  resolveDefault(symbol?: string): InstrumentConfig {
    const instruments = this.getInstruments();
    if (!symbol) {
      return instruments[0];
    }
    const match = instruments.find((instrument) => instrument.symbol === symbol);
    if (!match) {
      throw new ConfigValidationError(`Default instrument not configured: ${symbol}`, [
        `DEFAULT_INSTRUMENT must be one of: ${instruments.map((i) => i.symbol).join(', ')}`,
      ]);
    }
    return match;
  }

  private load(): InstrumentConfig[] {
    const configPath = path.resolve(process.cwd(), this.config.instrumentsConfigPath);
    const parsed = this.readJson(configPath);

    const dto = plainToInstance(InstrumentsFileDto, parsed);
    const errors = validateSync(dto);
    if (errors.length > 0) {
      const messages = flattenValidationErrors(errors);
      throw new ConfigValidationError(
        `Instruments config validation failed: ${messages.join('; ')}`,
        messages,
      );
    }

    const instruments = dto.instruments.map((entry) => ({
      symbol: entry.symbol,
      exchange: entry.exchange,
      lotSize: entry.lotSize,
      product: entry.product ?? DEFAULT_PRODUCT,
    }));
    this.logger.log({
      message: `Instruments loaded: ${instruments.length} from ${configPath}`,
      symbols: instruments.map((instrument) => instrument.symbol),
    });
    return instruments;
  }

  private readJson(configPath: string): object {
    if (!fs.existsSync(configPath)) {
      throw new ConfigValidationError(`Instruments config file not found: ${configPath}`, [
        `File not found: ${configPath}`,
      ]);
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(fs.readFileSync(configPath, 'utf-8'));
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new ConfigValidationError(`Error decoding ${configPath}: ${reason}`, [reason]);
    }

    if (parsed === null || typeof parsed !== 'object' || Array.isArray(parsed)) {
      throw new ConfigValidationError(`Instruments config at ${configPath} is not a JSON object`, [
        'Expected an object with an "instruments" array',
      ]);
    }
    return parsed;
  }
}
