import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigType } from '@nestjs/config';
import { InputValidationError } from '../common/errors/assistant.errors';
import { assistantConfig } from '../config/assistant.config';
import { Turn } from '../conversation/entities/turn.entity';
import { ToolRegistryService } from '../finance-tools/tool-registry.service';
import { AgentRuntime } from './agent-runtime.interface';
import {
  CHAT_COMPLETION_CLIENT,
  ChatCompletionClient,
  ChatMessage,
  ToolCallRequest,
} from './chat-completion.client';

export const SYSTEM_PROMPT = [
  'You are a helpful financial assistant.',
  'Use the available tools for stock prices, portfolio analysis, investment returns,',
  'risk assessment, market news and currency conversion.',
  'Resolve follow-up questions such as "convert that to PKR" from the earlier conversation.',
  'All market data is simulated; say so when quoting prices or news.',
].join(' ');

/**
 * Runtime backed by an OpenAI-compatible chat-completions API with
 * function calling over the tool registry.
 */
@Injectable()
export class HostedAgentRuntime implements AgentRuntime {
  readonly name = 'hosted';
  private readonly logger = new Logger(HostedAgentRuntime.name);

  constructor(
    @Inject(CHAT_COMPLETION_CLIENT) private readonly client: ChatCompletionClient,
    private readonly registry: ToolRegistryService,
    @Inject(assistantConfig.KEY)
    private readonly config: ConfigType<typeof assistantConfig>,
  ) {}

  async respond(history: readonly Turn[]): Promise<string> {
    if (history.length === 0) {
      throw new Error('History must end with a user turn');
    }

    const messages: ChatMessage[] = [
      { role: 'system', content: SYSTEM_PROMPT },
      ...history.map((turn): ChatMessage => ({ role: turn.role, content: turn.text })),
    ];
    const tools = this.registry.getDefinitions();

    for (let round = 0; round < this.config.maxToolRounds; round++) {
      const reply = await this.client.complete(messages, tools);

      if (reply.toolCalls.length === 0) {
        const text = reply.content?.trim();
        if (!text) {
          throw new Error('Model returned an empty reply');
        }
        return text;
      }

      messages.push({ role: 'assistant', content: reply.content, toolCalls: reply.toolCalls });
      for (const call of reply.toolCalls) {
        messages.push({ role: 'tool', toolCallId: call.id, content: this.runTool(call) });
      }
    }

    throw new Error(`No final answer after ${this.config.maxToolRounds} tool rounds`);
  }

  // Validation failures go back to the model so it can correct itself.
  private runTool(call: ToolCallRequest): string {
    this.logger.debug(`Tool call ${call.name} ${call.arguments}`);

    let args: unknown;
    try {
      args = call.arguments.trim() === '' ? {} : JSON.parse(call.arguments);
    } catch {
      return JSON.stringify({ error: `Arguments for ${call.name} are not valid JSON` });
    }

    try {
      return JSON.stringify(this.registry.invoke(call.name, args));
    } catch (error) {
      if (error instanceof InputValidationError) {
        return JSON.stringify({ error: error.message });
      }
      throw error;
    }
  }
}
