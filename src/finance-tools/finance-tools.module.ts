import { Module } from '@nestjs/common';
import { MarketDataModule } from '../market-data/market-data.module';
import { FinanceToolsController } from './finance-tools.controller';
import { FinanceToolsService } from './finance-tools.service';
import { ToolRegistryService } from './tool-registry.service';

@Module({
  imports: [MarketDataModule],
  controllers: [FinanceToolsController],
  providers: [FinanceToolsService, ToolRegistryService],
  exports: [FinanceToolsService, ToolRegistryService],
})
export class FinanceToolsModule {}
