import { Module } from '@nestjs/common';
import { ConfigModule, ConfigType } from '@nestjs/config';
import { assistantConfig } from '../config/assistant.config';
import { FinanceToolsModule } from '../finance-tools/finance-tools.module';
import { MarketDataModule } from '../market-data/market-data.module';
import { AGENT_RUNTIME, AgentRuntime } from './agent-runtime.interface';
import { CHAT_COMPLETION_CLIENT } from './chat-completion.client';
import { HostedAgentRuntime } from './hosted-agent.runtime';
import { LocalAgentRuntime } from './local-agent.runtime';
import { OpenAiChatClient } from './openai-chat.client';

@Module({
  imports: [ConfigModule.forFeature(assistantConfig), FinanceToolsModule, MarketDataModule],
  providers: [
    LocalAgentRuntime,
    HostedAgentRuntime,
    { provide: CHAT_COMPLETION_CLIENT, useClass: OpenAiChatClient },
    {
      provide: AGENT_RUNTIME,
      useFactory: (
        config: ConfigType<typeof assistantConfig>,
        local: LocalAgentRuntime,
        hosted: HostedAgentRuntime,
      ): AgentRuntime => (config.runtime === 'hosted' ? hosted : local),
      inject: [assistantConfig.KEY, LocalAgentRuntime, HostedAgentRuntime],
    },
  ],
  exports: [AGENT_RUNTIME],
})
export class AgentRuntimeModule {}
