export { SecHttpClient, SecHttpError, type FetchLike, type SecHttpClientOptions } from './httpClient';
export { CompanyDirectory, COMPANY_TICKERS_URL, normalizeCik, normalizeTicker } from './companyDirectory';
export { FilingsClient, buildRecentFilings, documentUrl, filterRecentFilings } from './filingsClient';
export { XbrlClient, factsForAccession, type AccessionFactOptions } from './xbrlClient';
export { EdgarClient, type EdgarClientOptions } from './edgarClient';
export {
  CompanyDirectoryResponse,
  CompanyFactItem,
  CompanyFacts,
  FactUnit,
  RecentFilingsRaw,
  SubmissionsJson,
  type CompanyDirectoryEntry,
  type FilingFilterOptions,
  type RecentFiling,
} from './types';
