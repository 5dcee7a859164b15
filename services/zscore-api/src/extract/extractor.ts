import { filterRecentFilings, type RecentFiling } from '@zscore/edgar';
import { FinancialStatementData, RawFilingDocument } from '@zscore/schemas';
import { MalformedFiling, MissingLineItem, describeIssues } from '../errors';
import { parseMonetary, scaleMultiplier } from './coerce';
import { type CanonicalField, LINE_ITEMS, type LineItemTable, describeDerivation, synonymsFor } from './lineItems';

// Filers vary case, spacing and apostrophes between periods; keys compare on this form.
export const normalizeKey = (key: string): string =>
  key.replace(/[’‘`]/g, "'").replace(/\s+/g, ' ').trim().replace(/:$/, '').trim().toLowerCase();

class ConceptResolver {
  private readonly index = new Map<string, { key: string; value: number | string }>();

  constructor(private readonly table: LineItemTable, facts: RawFilingDocument['facts'], private readonly scale: number) {
    for (const [key, value] of Object.entries(facts)) {
      if (value === null) continue;
      const normalized = normalizeKey(key);
      if (!this.index.has(normalized)) this.index.set(normalized, { key, value });
    }
  }

  require(field: CanonicalField): number {
    const value = this.resolve(field, new Set());
    if (value === undefined) {
      const derived = (this.table.derivations[field] ?? []).map(describeDerivation);
      throw new MissingLineItem(field, [...synonymsFor(this.table, field), ...derived]);
    }
    return value;
  }

  private resolve(concept: string, visiting: Set<string>): number | undefined {
    if (visiting.has(concept)) return undefined;
    const direct = this.lookup(concept);
    if (direct !== undefined) return direct;

    visiting.add(concept);
    try {
      for (const derivation of this.table.derivations[concept] ?? []) {
        const plus = derivation.plus.map((c) => this.resolve(c, visiting));
        const minus = derivation.minus.map((c) => this.resolve(c, visiting));
        if ([...plus, ...minus].some((v) => v === undefined)) continue;
        const sum = (values: Array<number | undefined>) => values.reduce<number>((s, v) => s + (v ?? 0), 0);
        const value = sum(plus) - sum(minus);
        return value === 0 ? 0 : value;
      }
    } finally {
      visiting.delete(concept);
    }
    return undefined;
  }

  private lookup(concept: string): number | undefined {
    for (const candidate of synonymsFor(this.table, concept)) {
      const hit = this.index.get(normalizeKey(candidate));
      if (!hit) continue;
      const amount = parseMonetary(hit.value, this.scale);
      if (amount === null) {
        throw new MalformedFiling(`Value for '${hit.key}' is not a monetary amount: ${JSON.stringify(hit.value)}`);
      }
      return amount;
    }
    return undefined;
  }
}

/**
 * Maps one filing's facts onto the seven Z-Score inputs. Each field takes the first
 * synonym present in the document, then the first derivation whose operands all
 * resolve. Pure: the same document always yields the same statement.
 */
export function extractStatement(raw: unknown, table: LineItemTable = LINE_ITEMS): FinancialStatementData {
  const parsed = RawFilingDocument.safeParse(raw);
  if (!parsed.success) {
    throw new MalformedFiling(`Filing document could not be parsed: ${describeIssues(parsed.error)}`);
  }
  const doc = parsed.data;
  const resolver = new ConceptResolver(table, doc.facts, scaleMultiplier(doc.scale));

  const statement = FinancialStatementData.safeParse({
    current_assets: resolver.require('current_assets'),
    current_liabilities: resolver.require('current_liabilities'),
    total_assets: resolver.require('total_assets'),
    retained_earnings: resolver.require('retained_earnings'),
    operating_income: resolver.require('operating_income'),
    total_liabilities: resolver.require('total_liabilities'),
    sales: resolver.require('sales'),
    filing_date: doc.filingDate,
    accession_number: doc.accessionNumber
  });
  if (!statement.success) {
    throw new MalformedFiling(`Filing produced an invalid statement: ${describeIssues(statement.error)}`);
  }
  return Object.freeze(statement.data);
}

const desc = (a: string, b: string): number => (a === b ? 0 : a < b ? 1 : -1);

/**
 * Most recent filing of `form`: latest filing date, ties broken by the higher
 * accession number.
 */
export function selectLatestFiling(filings: readonly RecentFiling[], form: string): RecentFiling | null {
  const candidates = filterRecentFilings([...filings], { forms: [form] }).filter((f) => f.accessionNumber);
  const sorted = [...candidates].sort((a, b) => desc(a.filingDate, b.filingDate) || desc(a.accessionNumber, b.accessionNumber));
  return sorted[0] ?? null;
}
