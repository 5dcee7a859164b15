import pino from 'pino';
import { describe, expect, it, vi } from 'vitest';
import { z } from 'zod';
import { InvalidRequest } from './errors';
import { ZScoreService } from './service';
import { ToolRegistry, registerZScoreTools } from './tools';

const log = pino({ level: 'silent' });
const ctx = { log };

const statement = {
  current_assets: 500,
  current_liabilities: 200,
  total_assets: 1000,
  retained_earnings: 150,
  operating_income: 100,
  total_liabilities: 400,
  sales: 300,
  filing_date: '2024-08-01'
};

function registry() {
  const service = new ZScoreService({
    companies: { resolveCompany: vi.fn(async () => null) },
    filings: { fetchLatestFiling: vi.fn(async () => Promise.reject(new Error('unused'))) },
    quotes: { getQuote: vi.fn(async () => Promise.reject(new Error('unused'))) },
    logger: log
  });
  const tools = new ToolRegistry(log);
  registerZScoreTools(tools, service);
  return tools;
}

describe('ToolRegistry', () => {
  it('validates input before calling the handler', async () => {
    const tools = new ToolRegistry(log);
    const handler = vi.fn((input: { n: number }) => input.n * 2);
    tools.register({ name: 'double', input: z.object({ n: z.number() }), output: z.number(), handler });

    await expect(tools.invoke('double', { n: 4 }, ctx)).resolves.toBe(8);
    await expect(tools.invoke('double', { n: 'four' }, ctx)).rejects.toThrow('n: Expected number, received string');
    expect(handler).toHaveBeenCalledTimes(1);
  });

  it('validates handler output', async () => {
    const tools = new ToolRegistry(log);
    tools.register({ name: 'bad', input: z.unknown(), output: z.string(), handler: () => 'ok' });
    tools.register({ name: 'worse', input: z.unknown(), output: z.number().positive(), handler: () => -1 });
    await expect(tools.invoke('bad', null, ctx)).resolves.toBe('ok');
    await expect(tools.invoke('worse', null, ctx)).rejects.toBeInstanceOf(z.ZodError);
  });

  it('refuses unregistered tools', async () => {
    const tools = new ToolRegistry(log);
    expect(tools.has('missing')).toBe(false);
    await expect(tools.invoke('missing', {}, ctx)).rejects.toThrow('tool not registered: missing');
  });
});

describe('registerZScoreTools', () => {
  it('registers the evaluate and calculate tools', () => {
    expect(registry().names()).toEqual(['zscore.evaluate', 'zscore.calculate']);
  });

  it('calculates from a statement and quote', async () => {
    const result = await registry().invoke('zscore.calculate', { statement, quote: { stock_price: 10, shares_outstanding: 50 } }, ctx);
    expect(result).toMatchObject({ working_capital: 300, market_value_equity: 500, z_score: 1.95, zone: 'GREY' });
  });

  it('rejects a calculate call without a quote', async () => {
    const err = await registry().invoke('zscore.calculate', { statement }, ctx).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(InvalidRequest);
    if (err instanceof InvalidRequest) expect(err.message).toBe('quote: Required');
  });

  it('rejects an evaluate call without a company', async () => {
    await expect(registry().invoke('zscore.evaluate', { company: ' ' }, ctx)).rejects.toThrow('company: company is required');
  });
});
