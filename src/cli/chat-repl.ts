import { createInterface } from 'node:readline';
import { Readable, Writable } from 'node:stream';
import { describeError } from '../common/errors/assistant.errors';
import { ConversationSession } from '../conversation/conversation-session';

const EXIT_WORDS = new Set(['quit', 'exit', 'bye']);
const PROMPT = '\nYou: ';

export const BANNER = [
  'Finance Assistant',
  '='.repeat(50),
  'I can help you with:',
  '- Stock analysis and prices',
  '- Portfolio management and performance',
  '- Market news and trends',
  '- Currency conversion',
  '- Risk assessment',
  '',
  'Conversation memory is enabled for this session.',
  "Type 'quit' to exit or ask your financial question!",
  '='.repeat(50),
].join('\n');

/**
 * Line-oriented chat loop over one conversation session.
 * Resolves with the process exit code once the user quits or input ends.
 */
export class ChatRepl {
  constructor(
    private readonly session: ConversationSession,
    private readonly input: Readable,
    private readonly output: Writable,
  ) {}

  async run(): Promise<number> {
    this.writeLine(BANNER);
    const rl = createInterface({ input: this.input, terminal: false, crlfDelay: Infinity });

    try {
      this.output.write(PROMPT);
      for await (const raw of rl) {
        const line = raw.trim();
        if (line === '') {
          this.output.write(PROMPT);
          continue;
        }
        if (EXIT_WORDS.has(line.toLowerCase())) {
          this.writeLine('Goodbye!');
          return 0;
        }

        try {
          const reply = await this.session.submit(line);
          this.writeLine(`Assistant: ${reply}`);
        } catch (error) {
          this.writeLine(`Error: ${describeError(error)}`);
        }
        this.output.write(PROMPT);
      }

      // end of input (Ctrl-D or a closed pipe)
      this.writeLine('\nGoodbye!');
      return 0;
    } finally {
      rl.close();
    }
  }

  private writeLine(text: string): void {
    this.output.write(`${text}\n`);
  }
}
