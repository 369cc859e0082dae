import { Body, Controller, Get, HttpCode, HttpStatus, NotFoundException, Param, Post } from '@nestjs/common';
import { ToolDefinition, ToolOutput, ToolRegistryService } from './tool-registry.service';

@Controller('tools')
export class FinanceToolsController {
  constructor(private readonly registry: ToolRegistryService) {}

  /**
   * Lists tool names, descriptions and parameter schemas.
   *
   * GET /tools
   */
  @Get()
  @HttpCode(HttpStatus.OK)
  listTools(): ToolDefinition[] {
    return this.registry.getDefinitions();
  }

  /**
   * Calls a mock tool directly, bypassing the agent runtime.
   *
   * POST /tools/currency_converter  { "amount": 100, "fromCurrency": "USD", "toCurrency": "EUR" }
   * @returns 404 on unknown tool, 400 on invalid arguments
   */
  @Post(':name')
  @HttpCode(HttpStatus.OK)
  invokeTool(@Param('name') name: string, @Body() args: unknown): { tool: string; result: ToolOutput } {
    if (!this.registry.hasTool(name)) {
      throw new NotFoundException(`Unknown tool "${name}"`);
    }
    return { tool: name, result: this.registry.invoke(name, args) };
  }
}
