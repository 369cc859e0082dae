import { Inject, Injectable } from '@nestjs/common';
import { ConfigType } from '@nestjs/config';
import OpenAI from 'openai';
import { assistantConfig } from '../config/assistant.config';
import { ToolDefinition } from '../finance-tools/tool-registry.service';
import { ChatCompletionClient, ChatMessage, CompletionReply } from './chat-completion.client';

const MAX_TOKENS = 2000;

function toOpenAiMessage(message: ChatMessage): OpenAI.Chat.ChatCompletionMessageParam {
  switch (message.role) {
    case 'tool':
      return { role: 'tool', tool_call_id: message.toolCallId, content: message.content };
    case 'assistant':
      return {
        role: 'assistant',
        content: message.content,
        tool_calls: message.toolCalls?.map((call) => ({
          id: call.id,
          type: 'function' as const,
          function: { name: call.name, arguments: call.arguments },
        })),
      };
    default:
      return { role: message.role, content: message.content };
  }
}

/**
 * OpenAI-compatible chat completions (OpenAI, OpenRouter, ...).
 * API key and base URL are handed to the SDK unchanged. The SDK client is
 * created on first use so a missing key fails the call, not the boot.
 */
@Injectable()
export class OpenAiChatClient implements ChatCompletionClient {
  private client?: OpenAI;

  constructor(
    @Inject(assistantConfig.KEY)
    private readonly config: ConfigType<typeof assistantConfig>,
  ) {}

  async complete(messages: ChatMessage[], tools: ToolDefinition[]): Promise<CompletionReply> {
    const completion = await this.getClient().chat.completions.create({
      model: this.config.model,
      max_tokens: MAX_TOKENS,
      messages: messages.map(toOpenAiMessage),
      tools: tools.map((tool) => ({
        type: 'function' as const,
        function: { name: tool.name, description: tool.description, parameters: tool.parameters },
      })),
    });

    const message = completion.choices[0]?.message;
    if (!message) {
      throw new Error('Completion returned no choices');
    }

    return {
      content: message.content,
      toolCalls: (message.tool_calls ?? []).map((call) => ({
        id: call.id,
        name: call.function.name,
        arguments: call.function.arguments,
      })),
    };
  }

  private getClient(): OpenAI {
    if (!this.client) {
      this.client = new OpenAI({ apiKey: this.config.apiKey, baseURL: this.config.baseUrl });
    }
    return this.client;
  }
}
