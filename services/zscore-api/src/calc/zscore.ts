import type { FinancialStatementData, MarketQuote, Zone, ZScoreResult } from '@zscore/schemas';
import { DivisionUndefined } from '../errors';

export const WEIGHTS = { x1: 1.2, x2: 1.4, x3: 3.3, x4: 0.6, x5: 1.0 } as const;
export const SAFE_ABOVE = 2.99;
export const DISTRESS_BELOW = 1.81;

export const roundTo = (value: number, decimals: number): number => {
  const factor = 10 ** decimals;
  const rounded = Math.round(value * factor) / factor;
  return rounded === 0 ? 0 : rounded;
};

// Both cut-offs belong to GREY: 2.99 and 1.81 are grey, 2.9901 safe, 1.8099 distress.
export function classifyZone(zScore: number): Zone {
  if (zScore > SAFE_ABOVE) return 'SAFE';
  if (zScore >= DISTRESS_BELOW) return 'GREY';
  return 'DISTRESS';
}

/**
 * Altman Z-Score (public manufacturer model):
 *   Z = 1.2·X1 + 1.4·X2 + 3.3·X3 + 0.6·X4 + 1.0·X5
 * with X1 working capital, X2 retained earnings, X3 EBIT and X5 sales over total
 * assets, and X4 market value of equity over total liabilities. Zero liabilities
 * contribute nothing through X4. Ratios are rounded to 6 places and the score to 4;
 * the zone is read from the rounded score.
 */
export function computeZScore(stmt: FinancialStatementData, quote: MarketQuote): ZScoreResult {
  const totalAssets = stmt.total_assets;
  if (!Number.isFinite(totalAssets) || totalAssets <= 0) {
    throw new DivisionUndefined(`total_assets must be positive to compute the Z-Score (got ${totalAssets})`);
  }

  const workingCapital = stmt.current_assets - stmt.current_liabilities;
  const marketValueEquity = quote.stock_price * quote.shares_outstanding;

  const x1 = workingCapital / totalAssets;
  const x2 = stmt.retained_earnings / totalAssets;
  const x3 = stmt.operating_income / totalAssets;
  const x4 = stmt.total_liabilities === 0 ? 0 : marketValueEquity / stmt.total_liabilities;
  const x5 = stmt.sales / totalAssets;

  const z = WEIGHTS.x1 * x1 + WEIGHTS.x2 * x2 + WEIGHTS.x3 * x3 + WEIGHTS.x4 * x4 + WEIGHTS.x5 * x5;
  if (!Number.isFinite(z)) {
    throw new DivisionUndefined('Z-Score is not finite for the supplied figures');
  }
  const zScore = roundTo(z, 4);

  return Object.freeze({
    ...stmt,
    ...quote,
    working_capital: workingCapital,
    market_value_equity: marketValueEquity,
    x1: roundTo(x1, 6),
    x2: roundTo(x2, 6),
    x3: roundTo(x3, 6),
    x4: roundTo(x4, 6),
    x5: roundTo(x5, 6),
    z_score: zScore,
    zone: classifyZone(zScore)
  });
}
