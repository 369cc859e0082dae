import { ToolDefinition } from '../finance-tools/tool-registry.service';

export const CHAT_COMPLETION_CLIENT = Symbol('CHAT_COMPLETION_CLIENT');

export interface ToolCallRequest {
  id: string;
  name: string;
  arguments: string;   // raw JSON from the model
}

export type ChatMessage =
  | { role: 'system' | 'user'; content: string }
  | { role: 'assistant'; content: string | null; toolCalls?: ToolCallRequest[] }
  | { role: 'tool'; toolCallId: string; content: string };

export interface CompletionReply {
  content: string | null;
  toolCalls: ToolCallRequest[];
}

/** One chat-completion round trip against a hosted model. */
export interface ChatCompletionClient {
  complete(messages: ChatMessage[], tools: ToolDefinition[]): Promise<CompletionReply>;
}
