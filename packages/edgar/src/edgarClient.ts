import type { Logger } from 'pino';
import { CompanyDirectory } from './companyDirectory';
import { FilingsClient } from './filingsClient';
import { type FetchLike, SecHttpClient } from './httpClient';
import type { CompanyDirectoryEntry, CompanyFacts, FilingFilterOptions, RecentFiling } from './types';
import { XbrlClient } from './xbrlClient';

export interface EdgarClientOptions {
  userAgent: string;
  baseDelayMs?: number;
  maxRetries?: number;
  timeoutMs?: number;
  fetch?: FetchLike;
  logger?: Logger;
}

export class EdgarClient {
  private http: SecHttpClient;
  private directory: CompanyDirectory;
  private filings: FilingsClient;
  private xbrl: XbrlClient;

  constructor(options: EdgarClientOptions) {
    this.http = new SecHttpClient(options);
    this.directory = new CompanyDirectory(this.http);
    this.filings = new FilingsClient(this.http);
    this.xbrl = new XbrlClient(this.http);
  }

  async resolveCompany(identifier: string): Promise<CompanyDirectoryEntry | null> {
    return this.directory.resolve(identifier);
  }

  async getRecentFilingsByCik(cik: string | number, options: FilingFilterOptions = {}): Promise<RecentFiling[]> {
    return this.filings.getRecentFilingsByCik(cik, options);
  }

  async getCompanyFactsByCik(cik: string | number): Promise<CompanyFacts> {
    return this.xbrl.getCompanyFacts(cik);
  }

  async getDocument(cik: string | number, accessionNumber: string, documentName: string): Promise<string> {
    return this.filings.getDocument(cik, accessionNumber, documentName);
  }
}
