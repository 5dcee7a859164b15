import pino, { type Logger } from 'pino';
import type { z } from 'zod';

/**
 * Rate-limited HTTP client for SEC endpoints. Requests are spaced by `baseDelayMs`;
 * 429 and 5xx responses and network failures are retried at most `maxRetries` times.
 */
export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

export interface SecHttpClientOptions {
  userAgent: string;
  baseDelayMs?: number;
  maxRetries?: number;
  timeoutMs?: number;
  fetch?: FetchLike;
  logger?: Logger;
}

export class SecHttpError extends Error {
  status?: number;
  statusText?: string;
  url: string;
  bodySnippet?: string;

  constructor(opts: { message: string; url: string; status?: number; statusText?: string; bodySnippet?: string }) {
    super(opts.message);
    this.name = 'SecHttpError';
    this.url = opts.url;
    this.status = opts.status;
    this.statusText = opts.statusText;
    this.bodySnippet = opts.bodySnippet;
  }
}

const errorMessage = (err: unknown): string => (err instanceof Error ? err.message : String(err));

const retryAfterMs = (header: string | null, fallback: number): number => {
  if (!header) return fallback;
  const seconds = Number(header);
  return Number.isFinite(seconds) && seconds >= 0 ? seconds * 1000 : fallback;
};

export class SecHttpClient {
  private readonly userAgent: string;
  private readonly baseDelayMs: number;
  private readonly maxRetries: number;
  private readonly timeoutMs: number;
  private readonly fetchImpl: FetchLike;
  private readonly log: Logger;
  private lastRequestTime = 0;

  constructor(options: SecHttpClientOptions) {
    if (!options.userAgent || options.userAgent.length < 6) {
      throw new Error('userAgent is required and should include contact info');
    }
    this.userAgent = options.userAgent;
    this.baseDelayMs = options.baseDelayMs ?? 200;
    this.maxRetries = options.maxRetries ?? 3;
    this.timeoutMs = options.timeoutMs ?? 10_000;
    this.fetchImpl = options.fetch ?? ((input, init) => fetch(input, init));
    this.log = options.logger ?? pino({ name: '@zscore/edgar' });
  }

  private async sleep(ms: number): Promise<void> {
    if (ms <= 0) return;
    await new Promise((resolve) => setTimeout(resolve, ms));
  }

  // The slot is reserved before sleeping so concurrent callers queue behind each other.
  private async enforceRateLimit(): Promise<void> {
    const now = Date.now();
    const wait = Math.max(0, this.lastRequestTime + this.baseDelayMs - now);
    this.lastRequestTime = now + wait;
    await this.sleep(wait);
  }

  async getJson<T>(url: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>): Promise<T> {
    const response = await this.request(url, 'application/json');
    let body: unknown;
    try {
      body = await response.json();
    } catch (err) {
      throw new SecHttpError({ message: `SEC response was not JSON: ${errorMessage(err)}`, url, status: response.status });
    }
    const parsed = schema.safeParse(body);
    if (!parsed.success) {
      throw new SecHttpError({ message: `SEC response had an unexpected shape: ${parsed.error.issues[0]?.message ?? 'invalid'}`, url, status: response.status });
    }
    return parsed.data;
  }

  async getText(url: string): Promise<string> {
    const response = await this.request(url, 'text/html, text/plain');
    return response.text();
  }

  private async request(url: string, accept: string): Promise<Response> {
    let attempt = 0;
    let backoff = this.baseDelayMs;

    for (;;) {
      await this.enforceRateLimit();
      let response: Response;
      try {
        response = await this.fetchImpl(url, {
          method: 'GET',
          headers: {
            'User-Agent': this.userAgent,
            Accept: accept,
            'Accept-Encoding': 'gzip, deflate'
          },
          signal: AbortSignal.timeout(this.timeoutMs)
        });
      } catch (err) {
        if (attempt < this.maxRetries) {
          attempt += 1;
          this.log.warn({ url, attempt, err: errorMessage(err) }, 'SEC request error, retrying');
          await this.sleep(backoff);
          backoff *= 2;
          continue;
        }
        throw new SecHttpError({ message: `SEC request error: ${errorMessage(err)}`, url });
      }

      if (response.ok) {
        return response;
      }

      const { status, statusText } = response;
      const bodySnippet = (await response.text()).slice(0, 500);
      const retryable = status === 429 || status >= 500;

      if (retryable && attempt < this.maxRetries) {
        attempt += 1;
        const waitMs = status === 429 ? retryAfterMs(response.headers.get('retry-after'), backoff * 2) : backoff;
        this.log.warn({ url, status, attempt, waitMs }, 'SEC request throttled, backing off');
        await this.sleep(waitMs);
        backoff *= 2;
        continue;
      }

      throw new SecHttpError({
        message: retryable ? `SEC request failed after retries: ${status} ${statusText}` : `SEC request failed: ${status} ${statusText}`,
        url,
        status,
        statusText,
        bodySnippet
      });
    }
  }
}
