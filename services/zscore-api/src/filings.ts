import { type EdgarClient, type RecentFiling, SecHttpError, factsForAccession } from '@zscore/edgar';
import type { RawFilingDocument } from '@zscore/schemas';
import type { Logger } from 'pino';
import { FilingUnavailable } from './errors';
import { selectLatestFiling } from './extract/extractor';
import { parseStatementText } from './extract/statementText';

export interface FilingSource {
  fetchLatestFiling(cik: string): Promise<RawFilingDocument>;
}

export type EdgarApi = Pick<EdgarClient, 'getRecentFilingsByCik' | 'getCompanyFactsByCik' | 'getDocument'>;

const isNotFound = (err: unknown): boolean => err instanceof SecHttpError && err.status === 404;

/**
 * Latest periodic filing for a filer as a raw document. XBRL company facts are
 * preferred; a filing without them is read from its primary document.
 */
export class EdgarFilingSource implements FilingSource {
  private readonly edgar: EdgarApi;
  private readonly form: string;
  private readonly log?: Logger;

  constructor(edgar: EdgarApi, options: { form?: string; logger?: Logger } = {}) {
    this.edgar = edgar;
    this.form = options.form ?? '10-Q';
    this.log = options.logger;
  }

  async fetchLatestFiling(cik: string): Promise<RawFilingDocument> {
    const filing = selectLatestFiling(await this.recentFilings(cik), this.form);
    if (!filing) {
      throw new FilingUnavailable(`No ${this.form} filing found for CIK ${cik}. The company may not have filed a ${this.form} recently.`);
    }
    const form = filing.form ?? this.form;
    this.log?.debug({ cik, accession: filing.accessionNumber, filingDate: filing.filingDate }, 'selected filing');

    const facts = await this.xbrlFacts(cik, filing);
    if (Object.keys(facts).length > 0) {
      return { accessionNumber: filing.accessionNumber, form, filingDate: filing.filingDate, facts };
    }

    if (!filing.primaryDocument) {
      throw new FilingUnavailable(`${form} ${filing.accessionNumber} has neither XBRL data nor a primary document`);
    }
    this.log?.info({ cik, accession: filing.accessionNumber }, 'no XBRL facts for filing, parsing primary document');
    const text = await this.edgar.getDocument(cik, filing.accessionNumber, filing.primaryDocument);
    const statement = parseStatementText(text);
    return { accessionNumber: filing.accessionNumber, form, filingDate: filing.filingDate, scale: statement.scale, facts: statement.facts };
  }

  private async recentFilings(cik: string): Promise<RecentFiling[]> {
    try {
      return await this.edgar.getRecentFilingsByCik(cik);
    } catch (err) {
      if (isNotFound(err)) throw new FilingUnavailable(`No filing history found for CIK ${cik}`);
      throw err;
    }
  }

  private async xbrlFacts(cik: string, filing: RecentFiling): Promise<Record<string, number>> {
    try {
      const companyFacts = await this.edgar.getCompanyFactsByCik(cik);
      return factsForAccession(companyFacts, filing.accessionNumber);
    } catch (err) {
      if (isNotFound(err)) return {};
      throw err;
    }
  }
}
