import { Module } from '@nestjs/common';
import { AgentRuntimeModule } from '../agent-runtime/agent-runtime.module';
import { ChatController } from './chat.controller';
import { SessionStoreService } from './session-store.service';

@Module({
  imports: [AgentRuntimeModule],
  controllers: [ChatController],
  providers: [SessionStoreService],
  exports: [SessionStoreService],
})
export class ConversationModule {}
