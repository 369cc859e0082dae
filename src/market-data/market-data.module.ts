import { Module } from '@nestjs/common';
import { MarketDataService } from './market-data.service';
import { randomSourceProvider } from './random.provider';

@Module({
  providers: [randomSourceProvider, MarketDataService],
  exports: [MarketDataService],
})
export class MarketDataModule {}
