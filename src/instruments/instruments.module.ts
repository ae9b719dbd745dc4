import { Module } from '@nestjs/common';
import { InstrumentConfigLoaderService } from './instrument-config-loader.service';

@Module({
  providers: [InstrumentConfigLoaderService],
  exports: [InstrumentConfigLoaderService],
})
export class InstrumentsModule {}
