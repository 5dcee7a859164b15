import { z } from 'zod';

const IsoDate = z.string().regex(/^\d{4}-\d{2}-\d{2}$/, 'expected YYYY-MM-DD').refine((s) => !Number.isNaN(Date.parse(s)), 'invalid calendar date');
const Amount = z.number().finite();

export const Zone = z.enum(['SAFE', 'GREY', 'DISTRESS']);
export type Zone = z.infer<typeof Zone>;

export const Scale = z.union([z.number().positive().finite(), z.enum(['units', 'ones', 'thousands', 'millions', 'billions'])]);
export type Scale = z.infer<typeof Scale>;

// One filing as handed to the extractor. `facts` keys are XBRL tags or statement labels.
export const RawFilingDocument = z.object({
  accessionNumber: z.string().min(1),
  form: z.string().min(1),
  filingDate: IsoDate,
  scale: Scale.optional(),
  facts: z.record(z.union([z.number(), z.string(), z.null()]))
});
export type RawFilingDocument = z.infer<typeof RawFilingDocument>;

export const FinancialStatementData = z.object({
  current_assets: Amount,
  current_liabilities: Amount,
  total_assets: Amount,
  retained_earnings: Amount,
  operating_income: Amount,
  total_liabilities: Amount,
  sales: Amount,
  filing_date: IsoDate,
  accession_number: z.string().optional()
});
export type FinancialStatementData = z.infer<typeof FinancialStatementData>;

export const MarketQuote = z.object({
  stock_price: z.number().positive().finite(),
  shares_outstanding: z.number().positive().finite()
});
export type MarketQuote = z.infer<typeof MarketQuote>;

export const ZScoreResult = FinancialStatementData.merge(MarketQuote).extend({
  working_capital: Amount,
  market_value_equity: Amount,
  x1: Amount,
  x2: Amount,
  x3: Amount,
  x4: Amount,
  x5: Amount,
  z_score: Amount,
  zone: Zone
});
export type ZScoreResult = z.infer<typeof ZScoreResult>;

export const ZScoreRequest = z.object({
  company: z.string().trim().min(1, 'company is required')
});
export type ZScoreRequest = z.infer<typeof ZScoreRequest>;

export const ZScoreResponse = z.object({
  company: z.string(),
  ticker: z.string(),
  z_score: Amount,
  zone: Zone,
  x1: Amount,
  x2: Amount,
  x3: Amount,
  x4: Amount,
  x5: Amount,
  working_capital: Amount,
  total_assets: Amount,
  retained_earnings: Amount,
  operating_income: Amount,
  market_value_equity: Amount,
  total_liabilities: Amount,
  sales: Amount,
  filing_date: IsoDate,
  stock_price: Amount,
  shares_outstanding: Amount
}).strict();
export type ZScoreResponse = z.infer<typeof ZScoreResponse>;

export const ErrorResponse = z.object({
  error: z.string(),
  message: z.string(),
  retryable: z.boolean().default(false)
});
export type ErrorResponse = z.infer<typeof ErrorResponse>;
