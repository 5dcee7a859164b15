import type { FetchLike } from '@zscore/edgar';
import type { MarketQuote } from '@zscore/schemas';
import type { Logger } from 'pino';
import { z } from 'zod';
import { QuoteUnavailable, UpstreamUnavailable } from '../errors';

export interface QuoteSource {
  getQuote(ticker: string): Promise<MarketQuote>;
}

export interface YahooQuoteClientOptions {
  baseUrl?: string;
  timeoutMs?: number;
  fetch?: FetchLike;
  logger?: Logger;
}

const Price = z.number().nullish();

const QuoteResponse = z.object({
  quoteResponse: z.object({
    result: z.array(z.object({
      symbol: z.string().optional(),
      regularMarketPrice: Price,
      currentPrice: Price,
      sharesOutstanding: Price,
      impliedSharesOutstanding: Price
    }).passthrough()).nullish()
  })
});

const ChartResponse = z.object({
  chart: z.object({
    result: z.array(z.object({
      meta: z.object({ regularMarketPrice: Price, chartPreviousClose: Price }).passthrough()
    })).nullish()
  })
});

const firstPositive = (...values: Array<number | null | undefined>): number | undefined =>
  values.find((v): v is number => typeof v === 'number' && Number.isFinite(v) && v > 0);

const REFUSED = new Set([401, 403, 429]);

const errorMessage = (err: unknown): string => (err instanceof Error ? err.message : String(err));

/**
 * Price and shares outstanding from Yahoo Finance. When the quote carries no price
 * the daily chart's last price is used instead.
 */
export class YahooQuoteClient implements QuoteSource {
  private readonly baseUrl: string;
  private readonly timeoutMs: number;
  private readonly fetchImpl: FetchLike;
  private readonly log?: Logger;

  constructor(options: YahooQuoteClientOptions = {}) {
    this.baseUrl = (options.baseUrl ?? 'https://query1.finance.yahoo.com').replace(/\/+$/, '');
    this.timeoutMs = options.timeoutMs ?? 10_000;
    this.fetchImpl = options.fetch ?? ((input, init) => fetch(input, init));
    this.log = options.logger;
  }

  async getQuote(ticker: string): Promise<MarketQuote> {
    const symbol = encodeURIComponent(ticker);
    const quote = await this.getJson(`${this.baseUrl}/v7/finance/quote?symbols=${symbol}`, QuoteResponse, ticker);
    const results = quote.quoteResponse.result ?? [];
    const result = results.find((r) => r.symbol?.toUpperCase() === ticker.toUpperCase()) ?? results[0];
    if (!result) throw new QuoteUnavailable(ticker, 'no quote returned');

    let price = firstPositive(result.regularMarketPrice, result.currentPrice);
    if (price === undefined) {
      this.log?.debug({ ticker }, 'quote has no price, reading chart');
      const chart = await this.getJson(`${this.baseUrl}/v8/finance/chart/${symbol}?range=1d&interval=1d`, ChartResponse, ticker);
      const meta = chart.chart.result?.[0]?.meta;
      price = firstPositive(meta?.regularMarketPrice, meta?.chartPreviousClose);
    }
    if (price === undefined) throw new QuoteUnavailable(ticker, 'price unavailable');

    const shares = firstPositive(result.sharesOutstanding, result.impliedSharesOutstanding);
    if (shares === undefined) throw new QuoteUnavailable(ticker, 'shares outstanding unavailable');

    return Object.freeze({ stock_price: price, shares_outstanding: shares });
  }

  private async getJson<T>(url: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>, ticker: string): Promise<T> {
    let response: Response;
    try {
      response = await this.fetchImpl(url, {
        headers: { Accept: 'application/json' },
        signal: AbortSignal.timeout(this.timeoutMs)
      });
    } catch (err) {
      throw new UpstreamUnavailable('quotes', `Quote source request failed: ${errorMessage(err)}`);
    }

    // 401/403 ("Invalid Crumb") and 429 are the source refusing the call, not a missing quote
    if (REFUSED.has(response.status) || response.status >= 500) {
      throw new UpstreamUnavailable('quotes', `Quote source responded ${response.status}`);
    }
    if (!response.ok) {
      throw new QuoteUnavailable(ticker, `quote source responded ${response.status}`);
    }

    let body: unknown;
    try {
      body = await response.json();
    } catch (err) {
      throw new QuoteUnavailable(ticker, `quote source returned invalid JSON: ${errorMessage(err)}`);
    }
    const parsed = schema.safeParse(body);
    if (!parsed.success) throw new QuoteUnavailable(ticker, 'unexpected quote response shape');
    return parsed.data;
  }
}
