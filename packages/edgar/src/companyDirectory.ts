import type { SecHttpClient } from './httpClient';
import { type CompanyDirectoryEntry, CompanyDirectoryResponse } from './types';

export const COMPANY_TICKERS_URL = 'https://www.sec.gov/files/company_tickers_exchange.json';

export const normalizeCik = (cik: string | number): string => {
  const numeric = String(cik).replace(/\D/g, '');
  return numeric.padStart(10, '0');
};

// SEC lists share classes with a dash (BRK-B); callers often type a dot.
export const normalizeTicker = (ticker: string): string => ticker.trim().toUpperCase().replace(/\./g, '-');

/**
 * Ticker/CIK/name lookup over the SEC company ticker file. The file is read on
 * every call; nothing is cached between requests.
 */
export class CompanyDirectory {
  private client: SecHttpClient;
  private url: string;

  constructor(client: SecHttpClient, url: string = COMPANY_TICKERS_URL) {
    this.client = client;
    this.url = url;
  }

  async load(): Promise<CompanyDirectoryEntry[]> {
    const raw = await this.client.getJson(this.url, CompanyDirectoryResponse);
    const entries: CompanyDirectoryEntry[] = [];

    const cikIdx = raw.fields.indexOf('cik');
    const nameIdx = raw.fields.indexOf('name');
    const tickerIdx = raw.fields.indexOf('ticker');
    const exchangeIdx = raw.fields.indexOf('exchange');

    for (const row of raw.data) {
      const cik = row[cikIdx];
      const name = row[nameIdx];
      const ticker = row[tickerIdx];
      const exchange = exchangeIdx >= 0 ? row[exchangeIdx] : null;

      if (cik == null || name == null || ticker == null) continue;
      if (!String(name).trim() || !String(ticker).trim()) continue;
      entries.push({
        cik: normalizeCik(cik),
        name: String(name),
        ticker: normalizeTicker(String(ticker)),
        exchange: exchange == null ? null : String(exchange)
      });
    }

    return entries;
  }

  /**
   * Resolves a ticker or company name. Ticker match wins, then an exact name,
   * then the first name that contains the query or is contained in it.
   */
  async resolve(identifier: string): Promise<CompanyDirectoryEntry | null> {
    const query = identifier.trim();
    if (!query) return null;
    const entries = await this.load();
    const ticker = normalizeTicker(query);
    const lower = query.toLowerCase();

    return (
      entries.find((entry) => entry.ticker === ticker) ??
      entries.find((entry) => entry.name.toLowerCase() === lower) ??
      entries.find((entry) => {
        const name = entry.name.toLowerCase();
        return name.includes(lower) || lower.includes(name);
      }) ??
      null
    );
  }
}
