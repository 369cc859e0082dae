import { Test, TestingModule } from '@nestjs/testing';
import { assistantConfig } from '../config/assistant.config';
import { createTurn } from '../conversation/entities/turn.entity';
import { FinanceToolsService } from '../finance-tools/finance-tools.service';
import { ToolDefinition, ToolRegistryService } from '../finance-tools/tool-registry.service';
import { MarketDataService } from '../market-data/market-data.service';
import { RANDOM_SOURCE } from '../market-data/random.provider';
import {
  CHAT_COMPLETION_CLIENT,
  ChatCompletionClient,
  ChatMessage,
  CompletionReply,
} from './chat-completion.client';
import { HostedAgentRuntime, SYSTEM_PROMPT } from './hosted-agent.runtime';

class FakeCompletionClient implements ChatCompletionClient {
  readonly requests: ChatMessage[][] = [];
  toolNames: string[] = [];

  constructor(private readonly replies: CompletionReply[]) {}

  async complete(messages: ChatMessage[], tools: ToolDefinition[]): Promise<CompletionReply> {
    this.requests.push([...messages]);
    this.toolNames = tools.map((tool) => tool.name);
    const reply = this.replies.shift();
    if (!reply) {
      throw new Error('No scripted reply left');
    }
    return reply;
  }
}

const toolCall = (name: string, args: string): CompletionReply => ({
  content: null,
  toolCalls: [{ id: `call_${name}`, name, arguments: args }],
});

const answer = (content: string): CompletionReply => ({ content, toolCalls: [] });

describe('HostedAgentRuntime', () => {
  async function createRuntime(replies: CompletionReply[], maxToolRounds = 5) {
    const client = new FakeCompletionClient(replies);
    const module: TestingModule = await Test.createTestingModule({
      providers: [
        HostedAgentRuntime,
        ToolRegistryService,
        FinanceToolsService,
        MarketDataService,
        { provide: RANDOM_SOURCE, useValue: () => 0.5 },
        { provide: CHAT_COMPLETION_CLIENT, useValue: client },
        {
          provide: assistantConfig.KEY,
          useValue: { baseUrl: 'http://localhost', model: 'test-model', runtime: 'hosted', maxToolRounds, port: 3000 },
        },
      ],
    }).compile();

    return { runtime: module.get<HostedAgentRuntime>(HostedAgentRuntime), client };
  }

  it('should send the system prompt, replayed history and tool definitions', async () => {
    const { runtime, client } = await createRuntime([answer('Hello!')]);
    const history = [
      createTurn('user', 'Convert 1000 USD to EUR'),
      createTurn('assistant', '1,000.00 USD = 920.00 EUR'),
      createTurn('user', 'convert that to PKR'),
    ];

    await expect(runtime.respond(history)).resolves.toBe('Hello!');
    expect(client.requests[0]).toEqual([
      { role: 'system', content: SYSTEM_PROMPT },
      { role: 'user', content: 'Convert 1000 USD to EUR' },
      { role: 'assistant', content: '1,000.00 USD = 920.00 EUR' },
      { role: 'user', content: 'convert that to PKR' },
    ]);
    expect(client.toolNames).toContain('currency_converter');
  });

  it('should execute tool calls and feed the results back to the model', async () => {
    const { runtime, client } = await createRuntime([
      toolCall('calculate_returns', '{"initialInvestment":10000,"finalValue":15000,"periodYears":3}'),
      answer('Your CAGR is 14.47%.'),
    ]);

    const reply = await runtime.respond([createTurn('user', 'I invested 10000, now 15000 after 3 years')]);

    expect(reply).toBe('Your CAGR is 14.47%.');
    expect(client.requests).toHaveLength(2);

    const followUp = client.requests[1];
    expect(followUp[2]).toEqual({
      role: 'assistant',
      content: null,
      toolCalls: [{ id: 'call_calculate_returns', name: 'calculate_returns', arguments: expect.any(String) }],
    });
    const toolMessage = followUp[3];
    expect(toolMessage.role).toBe('tool');
    expect(JSON.parse(toolMessage.content ?? '')).toMatchObject({ metric: 'CAGR', value: 14.47 });
  });

  it('should return tool validation errors to the model', async () => {
    const { runtime, client } = await createRuntime([
      toolCall('place_order', '{}'),
      answer('That tool does not exist.'),
    ]);

    await runtime.respond([createTurn('user', 'buy AAPL')]);

    expect(client.requests[1][3]).toEqual({
      role: 'tool',
      toolCallId: 'call_place_order',
      content: JSON.stringify({ error: 'Unknown tool "place_order"' }),
    });
  });

  it('should report malformed tool arguments to the model', async () => {
    const { runtime, client } = await createRuntime([
      toolCall('get_stock_price', '{symbol:'),
      answer('Retrying.'),
    ]);

    await runtime.respond([createTurn('user', 'AAPL?')]);

    expect(client.requests[1][3]).toEqual({
      role: 'tool',
      toolCallId: 'call_get_stock_price',
      content: JSON.stringify({ error: 'Arguments for get_stock_price are not valid JSON' }),
    });
  });

  it('should stop after the configured number of tool rounds', async () => {
    const { runtime, client } = await createRuntime(
      [toolCall('get_stock_price', '{"symbol":"AAPL"}'), toolCall('get_stock_price', '{"symbol":"AAPL"}')],
      2,
    );

    await expect(runtime.respond([createTurn('user', 'AAPL?')])).rejects.toThrow(
      'No final answer after 2 tool rounds',
    );
    expect(client.requests).toHaveLength(2);
  });

  it('should reject an empty model reply', async () => {
    const { runtime } = await createRuntime([answer('   ')]);

    await expect(runtime.respond([createTurn('user', 'hi')])).rejects.toThrow('Model returned an empty reply');
  });

  it('should propagate client failures', async () => {
    const { runtime } = await createRuntime([]);

    await expect(runtime.respond([createTurn('user', 'hi')])).rejects.toThrow('No scripted reply left');
  });
});
