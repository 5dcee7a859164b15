import { z } from 'zod';

const Cell = z.union([z.string(), z.number(), z.null()]);

export const CompanyDirectoryResponse = z.object({
  fields: z.array(z.string()),
  data: z.array(z.array(Cell))
});
export type CompanyDirectoryResponse = z.infer<typeof CompanyDirectoryResponse>;

export interface CompanyDirectoryEntry {
  cik: string;
  name: string;
  ticker: string;
  exchange: string | null;
}

const Column = z.array(z.string()).optional();

export const RecentFilingsRaw = z.object({
  accessionNumber: Column,
  filingDate: Column,
  reportDate: Column,
  acceptanceDateTime: Column,
  form: Column,
  primaryDocument: Column,
  primaryDocDescription: Column
}).passthrough();
export type RecentFilingsRaw = z.infer<typeof RecentFilingsRaw>;

export const SubmissionsJson = z.object({
  cik: z.union([z.string(), z.number()]).optional(),
  name: z.string().optional(),
  tickers: z.array(z.string()).optional(),
  filings: z.object({
    recent: RecentFilingsRaw.optional()
  }).passthrough().optional()
}).passthrough();
export type SubmissionsJson = z.infer<typeof SubmissionsJson>;

export interface RecentFiling {
  accessionNumber: string;
  filingDate: string;
  form?: string;
  reportDate?: string;
  acceptanceDateTime?: string;
  primaryDocument?: string;
  primaryDocDescription?: string;
}

export interface FilingFilterOptions {
  forms?: string[];
  from?: string;
  to?: string;
  limit?: number;
}

export const FactUnit = z.object({
  start: z.string().optional(),
  end: z.string().optional(),
  val: z.number().optional(),
  accn: z.string().optional(),
  fy: z.number().nullish(),
  fp: z.string().nullish(),
  form: z.string().optional(),
  filed: z.string().optional(),
  frame: z.string().optional()
}).passthrough();
export type FactUnit = z.infer<typeof FactUnit>;

export const CompanyFactItem = z.object({
  label: z.string().nullish(),
  description: z.string().nullish(),
  units: z.record(z.array(FactUnit)).optional()
}).passthrough();
export type CompanyFactItem = z.infer<typeof CompanyFactItem>;

export const CompanyFacts = z.object({
  cik: z.union([z.string(), z.number()]).optional(),
  entityName: z.string().optional(),
  facts: z.record(z.record(CompanyFactItem)).optional()
}).passthrough();
export type CompanyFacts = z.infer<typeof CompanyFacts>;
