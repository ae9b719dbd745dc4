import { Module } from '@nestjs/common';
import { ConfigType } from '@nestjs/config';
import { PositionController } from './position.controller';
import { PositionManagerService } from './position-manager.service';
import { LedgerLockService } from './ledger-lock.service';
import { TradeExportService } from './trade-export.service';
import { LEDGER_OPTIONS, LedgerOptions } from './ledger-options';
import { tradingConfig } from '../config/trading.config';

@Module({
  controllers: [PositionController],
  providers: [
    {
      provide: LEDGER_OPTIONS,
      inject: [tradingConfig.KEY],
      useFactory: (config: ConfigType<typeof tradingConfig>): LedgerOptions => ({
        simulationMode: config.mode === 'paper',
        exportDir: config.exportDir,
      }),
    },
    LedgerLockService,
    TradeExportService,
    PositionManagerService, // sole owner of ledger state
  ],
  exports: [PositionManagerService],
})
export class PositionModule {}
