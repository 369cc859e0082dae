import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { AgentRuntimeModule } from './agent-runtime/agent-runtime.module';
import { AppController } from './app.controller';
import { assistantConfig } from './config/assistant.config';
import { ConversationModule } from './conversation/conversation.module';
import { FinanceToolsModule } from './finance-tools/finance-tools.module';
import { MarketDataModule } from './market-data/market-data.module';

@Module({
  imports: [
    ConfigModule.forRoot({ isGlobal: true, load: [assistantConfig] }),
    MarketDataModule,
    FinanceToolsModule,
    AgentRuntimeModule,
    ConversationModule,
  ],
  controllers: [AppController],
})
export class AppModule {}
