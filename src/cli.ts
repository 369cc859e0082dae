#!/usr/bin/env node
import 'reflect-metadata';
import { Logger } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { AGENT_RUNTIME, AgentRuntime } from './agent-runtime/agent-runtime.interface';
import { ChatRepl } from './cli/chat-repl';
import { CliModule } from './cli/cli.module';
import { ConversationSession } from './conversation/conversation-session';

async function bootstrap(): Promise<number> {
  const app = await NestFactory.createApplicationContext(CliModule, { logger: ['error', 'warn'] });
  try {
    const runtime = app.get<AgentRuntime>(AGENT_RUNTIME);
    const repl = new ChatRepl(new ConversationSession(runtime), process.stdin, process.stdout);
    return await repl.run();
  } finally {
    await app.close();
  }
}

bootstrap()
  .then((code) => process.exit(code))
  .catch((error: unknown) => {
    Logger.error(error instanceof Error ? error.stack : String(error), 'Cli');
    process.exit(1);
  });
