import { Turn } from '../conversation/entities/turn.entity';

export const AGENT_RUNTIME = Symbol('AGENT_RUNTIME');

/**
 * Produces the assistant reply for a conversation.
 * `history` is the full, ordered turn list; its last entry is the new user turn.
 *
 * Implementations throw InputValidationError for malformed tool input and
 * anything else for a failed call.
 */
export interface AgentRuntime {
  readonly name: string;
  respond(history: readonly Turn[]): Promise<string>;
}
