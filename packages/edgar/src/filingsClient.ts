import { normalizeCik } from './companyDirectory';
import type { SecHttpClient } from './httpClient';
import {
  type FilingFilterOptions,
  type RecentFiling,
  type RecentFilingsRaw,
  SubmissionsJson,
} from './types';

const SUBMISSIONS_BASE = 'https://data.sec.gov/submissions/CIK';
const ARCHIVES_BASE = 'https://www.sec.gov/Archives/edgar/data/';

export class FilingsClient {
  private client: SecHttpClient;

  constructor(client: SecHttpClient) {
    this.client = client;
  }

  async getSubmissionsByCik(cik: string | number): Promise<SubmissionsJson> {
    const url = `${SUBMISSIONS_BASE}${normalizeCik(cik)}.json`;
    return this.client.getJson(url, SubmissionsJson);
  }

  async getRecentFilingsByCik(cik: string | number, options: FilingFilterOptions = {}): Promise<RecentFiling[]> {
    const submissions = await this.getSubmissionsByCik(cik);
    return filterRecentFilings(buildRecentFilings(submissions.filings?.recent), options);
  }

  async getDocument(cik: string | number, accessionNumber: string, documentName: string): Promise<string> {
    return this.client.getText(documentUrl(cik, accessionNumber, documentName));
  }
}

export const documentUrl = (cik: string | number, accessionNumber: string, documentName: string): string => {
  const cikPath = normalizeCik(cik).replace(/^0+/, '') || '0';
  const accessionNoDashes = accessionNumber.replace(/-/g, '');
  return `${ARCHIVES_BASE}${cikPath}/${accessionNoDashes}/${encodeURIComponent(documentName)}`;
};

export const buildRecentFilings = (recent?: RecentFilingsRaw): RecentFiling[] => {
  if (!recent) return [];
  const filings: RecentFiling[] = [];
  const maxLen = Math.max(
    recent.accessionNumber?.length ?? 0,
    recent.filingDate?.length ?? 0,
    recent.form?.length ?? 0,
  );

  for (let i = 0; i < maxLen; i += 1) {
    filings.push({
      accessionNumber: recent.accessionNumber?.[i] ?? '',
      filingDate: recent.filingDate?.[i] ?? '',
      form: recent.form?.[i],
      reportDate: recent.reportDate?.[i],
      acceptanceDateTime: recent.acceptanceDateTime?.[i],
      primaryDocument: recent.primaryDocument?.[i],
      primaryDocDescription: recent.primaryDocDescription?.[i],
    });
  }

  return filings;
};

export const filterRecentFilings = (recent: RecentFiling[], opts: FilingFilterOptions = {}): RecentFiling[] => {
  const forms = opts.forms?.map((f) => f.toUpperCase());
  let result = recent;

  if (forms?.length) {
    result = result.filter((f) => (f.form ? forms.includes(f.form.toUpperCase()) : false));
  }

  if (opts.from) {
    const from = opts.from;
    result = result.filter((f) => !f.filingDate || f.filingDate >= from);
  }

  if (opts.to) {
    const to = opts.to;
    result = result.filter((f) => !f.filingDate || f.filingDate <= to);
  }

  if (opts.limit && opts.limit > 0) {
    result = result.slice(0, opts.limit);
  }

  return result;
};
