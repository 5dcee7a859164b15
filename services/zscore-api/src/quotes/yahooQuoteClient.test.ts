import type { FetchLike } from '@zscore/edgar';
import { describe, expect, it, vi } from 'vitest';
import { QuoteUnavailable, UpstreamUnavailable } from '../errors';
import { YahooQuoteClient } from './yahooQuoteClient';

const BASE = 'https://quotes.test';
const json = (body: unknown, init: ResponseInit = {}) => new Response(JSON.stringify(body), { status: 200, headers: { 'content-type': 'application/json' }, ...init });
const quote = (fields: Record<string, number | string | null>) => json({ quoteResponse: { result: [{ symbol: 'ACME', ...fields }] } });

const client = (fetchImpl: FetchLike) => new YahooQuoteClient({ baseUrl: `${BASE}/`, fetch: fetchImpl });

describe('YahooQuoteClient', () => {
  it('reads price and shares from the quote', async () => {
    const fetchImpl = vi.fn<FetchLike>().mockResolvedValueOnce(quote({ regularMarketPrice: 10, sharesOutstanding: 50 }));
    await expect(client(fetchImpl).getQuote('ACME')).resolves.toEqual({ stock_price: 10, shares_outstanding: 50 });
    expect(fetchImpl.mock.calls[0]?.[0]).toBe(`${BASE}/v7/finance/quote?symbols=ACME`);
  });

  it('falls back to implied shares outstanding', async () => {
    const fetchImpl = vi.fn<FetchLike>().mockResolvedValueOnce(quote({ regularMarketPrice: 12.5, sharesOutstanding: null, impliedSharesOutstanding: 80 }));
    await expect(client(fetchImpl).getQuote('ACME')).resolves.toEqual({ stock_price: 12.5, shares_outstanding: 80 });
  });

  it('reads the chart when the quote has no price', async () => {
    const fetchImpl = vi.fn<FetchLike>()
      .mockResolvedValueOnce(quote({ sharesOutstanding: 50 }))
      .mockResolvedValueOnce(json({ chart: { result: [{ meta: { regularMarketPrice: null, chartPreviousClose: 9.75 } }] } }));
    await expect(client(fetchImpl).getQuote('BRK-B')).resolves.toEqual({ stock_price: 9.75, shares_outstanding: 50 });
    expect(fetchImpl.mock.calls[1]?.[0]).toBe(`${BASE}/v8/finance/chart/BRK-B?range=1d&interval=1d`);
  });

  it('reports missing data as an unavailable quote', async () => {
    const empty = vi.fn<FetchLike>().mockResolvedValueOnce(json({ quoteResponse: { result: [] } }));
    await expect(client(empty).getQuote('ACME')).rejects.toThrow("Could not retrieve stock price data for ticker 'ACME': no quote returned");

    const noShares = vi.fn<FetchLike>().mockResolvedValueOnce(quote({ regularMarketPrice: 10 }));
    await expect(client(noShares).getQuote('ACME')).rejects.toThrow('shares outstanding unavailable');

    const noPrice = vi.fn<FetchLike>()
      .mockResolvedValueOnce(quote({ sharesOutstanding: 50 }))
      .mockResolvedValueOnce(json({ chart: { result: null } }));
    await expect(client(noPrice).getQuote('ACME')).rejects.toThrow('price unavailable');
  });

  it('reports a 404 as an unavailable quote', async () => {
    const fetchImpl = vi.fn<FetchLike>().mockResolvedValueOnce(new Response('missing', { status: 404 }));
    const err = await client(fetchImpl).getQuote('ACME').catch((e: unknown) => e);
    expect(err).toBeInstanceOf(QuoteUnavailable);
  });

  it('reports an unexpected body as an unavailable quote', async () => {
    const fetchImpl = vi.fn<FetchLike>().mockResolvedValueOnce(new Response('<html>', { status: 200 }));
    await expect(client(fetchImpl).getQuote('ACME')).rejects.toBeInstanceOf(QuoteUnavailable);
  });

  it('reports refusals, throttling, outages and network failures as retryable', async () => {
    for (const status of [401, 403, 429, 502]) {
      const response = new Response('{"finance":{"error":{"code":"Unauthorized"}}}', { status });
      const fetchImpl = vi.fn<FetchLike>().mockResolvedValueOnce(response);
      const err = await client(fetchImpl).getQuote('ACME').catch((e: unknown) => e);
      expect(err).toBeInstanceOf(UpstreamUnavailable);
      if (err instanceof UpstreamUnavailable) expect(err.retryable).toBe(true);
    }

    const offline = vi.fn<FetchLike>().mockRejectedValueOnce(new TypeError('fetch failed'));
    await expect(client(offline).getQuote('ACME')).rejects.toThrow('Quote source request failed: fetch failed');
  });
});
