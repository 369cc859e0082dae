import { Controller, Get, Inject } from '@nestjs/common';
import { AGENT_RUNTIME, AgentRuntime } from './agent-runtime/agent-runtime.interface';
import { HealthResponse } from './common/interfaces/health.interface';

@Controller()
export class AppController {
  constructor(@Inject(AGENT_RUNTIME) private readonly runtime: AgentRuntime) {}

  /**
   * Health check for load balancers and monitoring.
   *
   * GET /health
   */
  @Get('health')
  getHealth(): HealthResponse {
    return {
      status: 'ok',
      timestamp: new Date().toISOString(),
      uptime: process.uptime(),
      service: 'finance-assistant',
      runtime: this.runtime.name,
    };
  }

  /**
   * API root - returns service info and available endpoints.
   *
   * GET /
   */
  @Get()
  getRoot() {
    return {
      message: 'Finance Assistant API (simulated market data)',
      version: '1.0.0',
      runtime: this.runtime.name,
      endpoints: {
        health: '/health',
        chat: '/chat',
        sessions: '/chat/sessions',
        messages: '/chat/sessions/:id/messages',
        examples: '/chat/examples',
        tools: '/tools',
      },
    };
  }
}
