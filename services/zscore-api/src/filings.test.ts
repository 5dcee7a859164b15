import { type CompanyFacts, type RecentFiling, SecHttpError } from '@zscore/edgar';
import { describe, expect, it, vi } from 'vitest';
import { FilingUnavailable } from './errors';
import { type EdgarApi, EdgarFilingSource } from './filings';

const CIK = '0000000001';
const ACCN = '0000000001-24-000010';

const recent: RecentFiling[] = [
  { accessionNumber: '0000000001-24-000005', filingDate: '2024-05-02', form: '10-Q', primaryDocument: 'q1.htm' },
  { accessionNumber: ACCN, filingDate: '2024-08-01', form: '10-Q', primaryDocument: 'q2.htm' },
  { accessionNumber: '0000000001-24-000020', filingDate: '2024-11-01', form: '10-K', primaryDocument: 'k.htm' }
];

const companyFacts: CompanyFacts = {
  facts: {
    'us-gaap': {
      Assets: { units: { USD: [{ end: '2024-06-30', val: 1000, accn: ACCN }, { end: '2024-03-31', val: 900, accn: '0000000001-24-000005' }] } },
      Liabilities: { units: { USD: [{ end: '2024-06-30', val: 400, accn: ACCN }] } }
    }
  }
};

const notFound = (url: string) => new SecHttpError({ message: 'SEC request failed: 404 Not Found', url, status: 404, statusText: 'Not Found' });

function fakeEdgar(overrides: Partial<EdgarApi> = {}): EdgarApi {
  return {
    getRecentFilingsByCik: vi.fn(async () => recent),
    getCompanyFactsByCik: vi.fn(async () => companyFacts),
    getDocument: vi.fn(async () => '<p>(in millions)</p><table><tr><td>Total assets</td><td>12</td></tr></table>'),
    ...overrides
  };
}

describe('EdgarFilingSource', () => {
  it('builds the document from the latest 10-Q XBRL facts', async () => {
    const edgar = fakeEdgar();
    const doc = await new EdgarFilingSource(edgar).fetchLatestFiling(CIK);
    expect(doc).toEqual({ accessionNumber: ACCN, form: '10-Q', filingDate: '2024-08-01', facts: { Assets: 1000, Liabilities: 400 } });
    expect(edgar.getDocument).not.toHaveBeenCalled();
  });

  it('honours the configured form', async () => {
    const doc = await new EdgarFilingSource(fakeEdgar(), { form: '10-K' }).fetchLatestFiling(CIK);
    expect(doc.accessionNumber).toBe('0000000001-24-000020');
    expect(doc.scale).toBe('millions');
    expect(doc.facts).toEqual({ 'Total assets': '12' });
  });

  it('parses the primary document when the filing has no XBRL facts', async () => {
    const edgar = fakeEdgar({ getCompanyFactsByCik: vi.fn(async () => Promise.reject(notFound('https://data.sec.gov/api/xbrl/companyfacts/CIK0000000001.json'))) });
    const doc = await new EdgarFilingSource(edgar).fetchLatestFiling(CIK);
    expect(edgar.getDocument).toHaveBeenCalledWith(CIK, ACCN, 'q2.htm');
    expect(doc).toEqual({ accessionNumber: ACCN, form: '10-Q', filingDate: '2024-08-01', scale: 'millions', facts: { 'Total assets': '12' } });
  });

  it('reports a filer with no 10-Q', async () => {
    const edgar = fakeEdgar({ getRecentFilingsByCik: vi.fn(async () => recent.filter((f) => f.form === '10-K')) });
    await expect(new EdgarFilingSource(edgar).fetchLatestFiling(CIK)).rejects.toThrow(`No 10-Q filing found for CIK ${CIK}`);
  });

  it('reports a filer with no submissions', async () => {
    const edgar = fakeEdgar({ getRecentFilingsByCik: vi.fn(async () => Promise.reject(notFound('https://data.sec.gov/submissions/CIK0000000001.json'))) });
    await expect(new EdgarFilingSource(edgar).fetchLatestFiling(CIK)).rejects.toBeInstanceOf(FilingUnavailable);
  });

  it('reports a filing with neither facts nor a document', async () => {
    const edgar = fakeEdgar({
      getRecentFilingsByCik: vi.fn(async () => [{ accessionNumber: '0000000001-24-000099', filingDate: '2024-08-01', form: '10-Q' }]),
      getCompanyFactsByCik: vi.fn(async () => ({}))
    });
    await expect(new EdgarFilingSource(edgar).fetchLatestFiling(CIK)).rejects.toThrow(/neither XBRL data nor a primary document/);
  });

  it('passes other SEC failures through', async () => {
    const outage = new SecHttpError({ message: 'SEC request failed after retries: 503 Service Unavailable', url: 'u', status: 503 });
    const edgar = fakeEdgar({ getCompanyFactsByCik: vi.fn(async () => Promise.reject(outage)) });
    await expect(new EdgarFilingSource(edgar).fetchLatestFiling(CIK)).rejects.toBe(outage);
  });
});
