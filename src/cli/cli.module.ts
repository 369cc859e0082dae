import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { AgentRuntimeModule } from '../agent-runtime/agent-runtime.module';
import { assistantConfig } from '../config/assistant.config';

// No HTTP layer: just config and the agent runtime.
@Module({
  imports: [ConfigModule.forRoot({ isGlobal: true, load: [assistantConfig] }), AgentRuntimeModule],
})
export class CliModule {}
