import { Test, TestingModule } from '@nestjs/testing';
import { AGENT_RUNTIME, AgentRuntime } from './agent-runtime/agent-runtime.interface';
import { AppController } from './app.controller';

describe('AppController', () => {
  let controller: AppController;

  const runtime: AgentRuntime = { name: 'local', respond: async () => 'ok' };

  beforeEach(async () => {
    const module: TestingModule = await Test.createTestingModule({
      controllers: [AppController],
      providers: [{ provide: AGENT_RUNTIME, useValue: runtime }],
    }).compile();

    controller = module.get<AppController>(AppController);
  });

  it('should report health with the active runtime', () => {
    const health = controller.getHealth();

    expect(health).toMatchObject({ status: 'ok', service: 'finance-assistant', runtime: 'local' });
    expect(new Date(health.timestamp).toISOString()).toBe(health.timestamp);
    expect(health.uptime).toBeGreaterThanOrEqual(0);
  });

  it('should list the public endpoints', () => {
    const root = controller.getRoot();

    expect(root.runtime).toBe('local');
    expect(root.endpoints).toMatchObject({ chat: '/chat', tools: '/tools' });
  });
});
