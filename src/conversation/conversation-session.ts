import { Logger } from '@nestjs/common';
import {
  GENERIC_FAILURE_REPLY,
  InputValidationError,
  RuntimeCallError,
  describeError,
} from '../common/errors/assistant.errors';
import { AgentRuntime } from '../agent-runtime/agent-runtime.interface';
import { Turn, createTurn } from './entities/turn.entity';

/**
 * One conversation: an append-only turn list replayed to the agent runtime
 * on every submit. Submits are processed one at a time, in call order.
 */
export class ConversationSession {
  private readonly turns: Turn[] = [];
  private queue: Promise<unknown> = Promise.resolve();

  constructor(
    private readonly runtime: AgentRuntime,
    private readonly logger: Logger = new Logger(ConversationSession.name),
  ) {}

  /**
   * Sends one user message and returns the assistant reply.
   * Appends exactly two turns unless the input is rejected.
   * @throws InputValidationError for blank text or invalid tool input; nothing is appended
   */
  submit(text: string): Promise<string> {
    const result = this.queue.then(() => this.exchange(text));
    // Keep the chain alive after a rejected submit; the caller still gets the rejection.
    this.queue = result.catch(() => undefined);
    return result;
  }

  getTurns(): readonly Turn[] {
    return [...this.turns];
  }

  get size(): number {
    return this.turns.length;
  }

  clear(): void {
    this.turns.length = 0;
  }

  private async exchange(text: string): Promise<string> {
    const message = text.trim();
    if (message === '') {
      throw new InputValidationError('Message must not be empty');
    }

    const userTurn = createTurn('user', message);
    let reply: string;

    try {
      reply = await this.runtime.respond([...this.turns, userTurn]);
    } catch (error) {
      if (error instanceof InputValidationError) {
        throw error;
      }
      const failure = new RuntimeCallError(
        `Agent runtime "${this.runtime.name}" failed: ${describeError(error)}`,
        error,
      );
      this.logger.error(failure, error instanceof Error ? error.stack : undefined);
      reply = GENERIC_FAILURE_REPLY;
    }

    this.turns.push(userTurn, createTurn('assistant', reply));
    return reply;
  }
}
