import { z } from 'zod';
import table from './line-items.json';

const Synonyms = z.array(z.string().min(1)).min(1);

const Fields = z.object({
  current_assets: Synonyms,
  current_liabilities: Synonyms,
  total_assets: Synonyms,
  retained_earnings: Synonyms,
  operating_income: Synonyms,
  total_liabilities: Synonyms,
  sales: Synonyms
});
export type CanonicalField = keyof z.infer<typeof Fields>;
export const CANONICAL_FIELDS: readonly CanonicalField[] = Fields.keyof().options;

// value = sum(plus) - sum(minus), each operand a canonical field or auxiliary concept
const Derivation = z.object({ plus: z.array(z.string()).min(1), minus: z.array(z.string()) });
export type Derivation = z.infer<typeof Derivation>;

export const LineItemTable = z.object({
  fields: Fields,
  auxiliary: z.record(Synonyms),
  derivations: z.record(z.array(Derivation))
}).superRefine((t, ctx) => {
  const known = new Set<string>([...CANONICAL_FIELDS, ...Object.keys(t.auxiliary)]);
  for (const [target, derivations] of Object.entries(t.derivations)) {
    if (!known.has(target)) ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['derivations', target], message: `unknown concept ${target}` });
    for (const d of derivations) {
      for (const operand of [...d.plus, ...d.minus]) {
        if (!known.has(operand)) ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['derivations', target], message: `unknown operand ${operand}` });
      }
    }
  }
});
export type LineItemTable = z.infer<typeof LineItemTable>;

export const LINE_ITEMS: LineItemTable = LineItemTable.parse(table);

export function synonymsFor(t: LineItemTable, concept: string): readonly string[] {
  const fields: Record<string, string[]> = t.fields;
  return fields[concept] ?? t.auxiliary[concept] ?? [];
}

export function describeDerivation(d: Derivation): string {
  const minus = d.minus.map((m) => ` - ${m}`).join('');
  return `${d.plus.join(' + ')}${minus}`;
}
