import { SecHttpError } from '@zscore/edgar';
import { type FinancialStatementData, type MarketQuote, ZScoreResponse, type ZScoreResult } from '@zscore/schemas';
import type { Logger } from 'pino';
import { computeZScore } from './calc/zscore';
import { CompanyNotFound, InvalidRequest, UpstreamUnavailable } from './errors';
import { extractStatement } from './extract/extractor';
import type { FilingSource } from './filings';
import type { QuoteSource } from './quotes/yahooQuoteClient';

export interface ResolvedCompany {
  cik: string;
  ticker: string;
  name: string;
}

export interface CompanyResolver {
  resolveCompany(identifier: string): Promise<ResolvedCompany | null>;
}

export interface ZScoreServiceDeps {
  companies: CompanyResolver;
  filings: FilingSource;
  quotes: QuoteSource;
  logger: Logger;
}

// SEC transport failures mean "try again later", not "this filing is unusable".
async function upstream<T>(call: () => Promise<T>): Promise<T> {
  try {
    return await call();
  } catch (err) {
    if (err instanceof SecHttpError) throw new UpstreamUnavailable('sec', err.message);
    throw err;
  }
}

export function toResponse(company: string, ticker: string, result: ZScoreResult): ZScoreResponse {
  return ZScoreResponse.parse({
    company,
    ticker,
    z_score: result.z_score,
    zone: result.zone,
    x1: result.x1,
    x2: result.x2,
    x3: result.x3,
    x4: result.x4,
    x5: result.x5,
    working_capital: result.working_capital,
    total_assets: result.total_assets,
    retained_earnings: result.retained_earnings,
    operating_income: result.operating_income,
    market_value_equity: result.market_value_equity,
    total_liabilities: result.total_liabilities,
    sales: result.sales,
    filing_date: result.filing_date,
    stock_price: result.stock_price,
    shares_outstanding: result.shares_outstanding
  });
}

export class ZScoreService {
  private readonly deps: ZScoreServiceDeps;

  constructor(deps: ZScoreServiceDeps) {
    this.deps = deps;
  }

  /**
   * company -> CIK/ticker -> (latest filing, quote) -> statement -> Z-Score.
   * The filing and the quote are fetched concurrently.
   */
  async evaluate(company: string, log: Logger = this.deps.logger): Promise<ZScoreResponse> {
    const identifier = company.trim();
    if (!identifier) throw new InvalidRequest('company is required');

    const match = await upstream(() => this.deps.companies.resolveCompany(identifier));
    if (!match) throw new CompanyNotFound(identifier);
    log.debug({ cik: match.cik, ticker: match.ticker }, 'resolved company');

    const [document, quote] = await Promise.all([
      upstream(() => this.deps.filings.fetchLatestFiling(match.cik)),
      upstream(() => this.deps.quotes.getQuote(match.ticker))
    ]);

    const statement = extractStatement(document);
    const result = computeZScore(statement, quote);
    log.info({ ticker: match.ticker, accession: statement.accession_number, z_score: result.z_score, zone: result.zone }, 'computed z-score');
    return toResponse(identifier, match.ticker, result);
  }

  calculate(statement: FinancialStatementData, quote: MarketQuote): ZScoreResult {
    return computeZScore(statement, quote);
  }
}
