import { normalizeCik } from './companyDirectory';
import type { SecHttpClient } from './httpClient';
import { CompanyFacts, type FactUnit } from './types';

const XBRL_BASE = 'https://data.sec.gov/api/xbrl/';

export class XbrlClient {
  private client: SecHttpClient;

  constructor(client: SecHttpClient) {
    this.client = client;
  }

  async getCompanyFacts(cik: string | number): Promise<CompanyFacts> {
    const url = `${XBRL_BASE}companyfacts/CIK${normalizeCik(cik)}.json`;
    return this.client.getJson(url, CompanyFacts);
  }
}

export interface AccessionFactOptions {
  taxonomies?: string[];
  unit?: string;
}

const byPeriodDesc = (a: FactUnit, b: FactUnit): number => {
  const aEnd = a.end ?? '';
  const bEnd = b.end ?? '';
  if (aEnd !== bEnd) return aEnd < bEnd ? 1 : -1;
  const aStart = a.start ?? '';
  const bStart = b.start ?? '';
  if (aStart !== bStart) return aStart < bStart ? 1 : -1;
  return 0;
};

/**
 * Collapses company facts to one value per tag for a single filing. A filing also
 * reports comparative periods, so the latest period end wins, then the latest start
 * (the quarter rather than the year to date).
 */
export const factsForAccession = (
  companyFacts: CompanyFacts,
  accessionNumber: string,
  opts: AccessionFactOptions = {},
): Record<string, number> => {
  const taxonomies = opts.taxonomies ?? ['us-gaap', 'ifrs-full'];
  const unit = opts.unit ?? 'USD';
  const out: Record<string, number> = {};

  for (const taxonomy of taxonomies) {
    const items = companyFacts.facts?.[taxonomy];
    if (!items) continue;
    for (const [tag, item] of Object.entries(items)) {
      if (tag in out) continue;
      const candidates = (item.units?.[unit] ?? []).filter(
        (u) => u.accn === accessionNumber && typeof u.val === 'number' && Number.isFinite(u.val),
      );
      const best = [...candidates].sort(byPeriodDesc)[0];
      if (best?.val !== undefined) out[tag] = best.val;
    }
  }

  return out;
};
