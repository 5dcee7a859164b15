import { EdgarClient } from '@zscore/edgar';
import type { Logger } from 'pino';
import type { Config } from './config';
import { EdgarFilingSource } from './filings';
import { YahooQuoteClient } from './quotes/yahooQuoteClient';
import { ZScoreService } from './service';

export function buildService(config: Config, logger: Logger): ZScoreService {
  const edgar = new EdgarClient({
    userAgent: config.SEC_USER_AGENT,
    baseDelayMs: config.SEC_BASE_DELAY_MS,
    maxRetries: config.SEC_MAX_RETRIES,
    timeoutMs: config.SEC_TIMEOUT_MS,
    logger: logger.child({ component: 'edgar' })
  });

  return new ZScoreService({
    companies: edgar,
    filings: new EdgarFilingSource(edgar, { form: config.FILING_FORM, logger: logger.child({ component: 'edgar' }) }),
    quotes: new YahooQuoteClient({
      baseUrl: config.QUOTE_BASE_URL,
      timeoutMs: config.QUOTE_TIMEOUT_MS,
      logger: logger.child({ component: 'quotes' })
    }),
    logger
  });
}
