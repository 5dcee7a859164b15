import { FinancialStatementData, MarketQuote, ZScoreRequest, ZScoreResponse, ZScoreResult } from '@zscore/schemas';
import type { Logger } from 'pino';
import { z } from 'zod';
import { InvalidRequest, describeIssues } from './errors';
import type { ZScoreService } from './service';

export interface ToolContext {
  log: Logger;
}

export type Tool<I, O> = {
  name: string;
  input: z.ZodType<I, z.ZodTypeDef, unknown>;
  output: z.ZodType<O, z.ZodTypeDef, unknown>;
  handler: (input: I, ctx: ToolContext) => Promise<O> | O;
};

type Invoke = (input: unknown, ctx: ToolContext) => Promise<unknown>;

// Tools are stored type-erased; each keeps its own schemas for validating both ends.
export class ToolRegistry {
  private readonly tools = new Map<string, Invoke>();
  private readonly log: Logger;

  constructor(log: Logger) {
    this.log = log;
  }

  register<I, O>(tool: Tool<I, O>): void {
    this.tools.set(tool.name, async (raw, ctx) => {
      const input = tool.input.safeParse(raw);
      if (!input.success) throw new InvalidRequest(describeIssues(input.error));
      const output = await tool.handler(input.data, ctx);
      return tool.output.parse(output);
    });
    this.log.info({ tool: tool.name }, 'registered tool');
  }

  has(name: string): boolean {
    return this.tools.has(name);
  }

  names(): string[] {
    return [...this.tools.keys()];
  }

  async invoke(name: string, input: unknown, ctx: ToolContext): Promise<unknown> {
    const tool = this.tools.get(name);
    if (!tool) throw new Error(`tool not registered: ${name}`);
    return tool(input, ctx);
  }
}

export const CalculateInput = z.object({ statement: FinancialStatementData, quote: MarketQuote });

export function registerZScoreTools(registry: ToolRegistry, service: ZScoreService): void {
  registry.register({
    name: 'zscore.evaluate',
    input: ZScoreRequest,
    output: ZScoreResponse,
    handler: ({ company }, ctx) => service.evaluate(company, ctx.log)
  });

  registry.register({
    name: 'zscore.calculate',
    input: CalculateInput,
    output: ZScoreResult,
    handler: ({ statement, quote }) => service.calculate(statement, quote)
  });
}
