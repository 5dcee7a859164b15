import type { Scale } from '@zscore/schemas';
import { load } from 'cheerio';
import { parseMonetary } from './coerce';

export interface StatementText {
  scale: Scale;
  facts: Record<string, string>;
}

// "(In thousands, except per share data)" or "Dollars in millions"
const SCALE_MARKER = /(?:\(|\b(?:dollars|amounts|usd)\b)[^)\n]*?\bin\s+(thousands|millions|billions)\b/i;
// 1,250 or 1250.5; a grouped number ends at its last group, so "30," in "June 30, 2024" is not one
const NUM = String.raw`(?:[0-9]{1,3}(?:,[0-9]{3})+|[0-9]+)(?:\.[0-9]+)?(?![0-9.,]|\s*%)`;
// sign and nil characters match coerce.ts
const AMOUNT = String.raw`(?:\$\s*)?(?:\(\s*(?:\$\s*)?${NUM}\s*\)|[-−–]\s*(?:\$\s*)?${NUM}|${NUM}|[-‒–—―−]+(?=\s|$))`;
const LEADING_AMOUNT = new RegExp(`^${AMOUNT}`);
const TEXT_ROW = new RegExp(String.raw`^([A-Za-z][A-Za-z ,'’&()/]*?)[\s.:]*(${AMOUNT})`);

const squash = (text: string): string => text.replace(/\s+/g, ' ').trim();
const cleanLabel = (label: string): string => label.replace(/[\s.,:(]+$/, '').trim();

const declaredScale = (text: string): Scale => {
  const marker = SCALE_MARKER.exec(text)?.[1]?.toLowerCase();
  switch (marker) {
    case 'thousands':
    case 'millions':
    case 'billions':
      return marker;
    default:
      return 'units';
  }
};

// first amount at the start of the text, provided the coercer reads it the same way
const leadingAmount = (text: string): string | null => {
  const token = LEADING_AMOUNT.exec(text)?.[0];
  if (!token) return null;
  const amount = squash(token);
  return parseMonetary(amount) === null ? null : amount;
};

function tableRows(html: string): { text: string; rows: Array<[string, string]> } {
  const $ = load(html);
  $('script, style').remove();
  const rows: Array<[string, string]> = [];

  for (const tr of $('tr').toArray()) {
    const cells = $(tr).find('td, th').toArray().map((cell) => squash($(cell).text()));
    const labelAt = cells.findIndex((cell) => cell !== '');
    if (labelAt < 0) continue;
    const label = cleanLabel(cells[labelAt]);
    if (!/[A-Za-z]/.test(label)) continue;
    // "$" and ")" often sit in cells of their own, so the rest of the row is read as one string
    const amount = leadingAmount(cells.slice(labelAt + 1).filter(Boolean).join(' '));
    if (amount !== null) rows.push([label, amount]);
  }

  return { text: $.root().text(), rows };
}

function textRows(text: string): Array<[string, string]> {
  const rows: Array<[string, string]> = [];
  for (const line of text.split(/\r?\n/)) {
    const m = TEXT_ROW.exec(squash(line));
    if (!m) continue;
    const amount = leadingAmount(m[2]);
    if (amount !== null) rows.push([cleanLabel(m[1]), amount]);
  }
  return rows;
}

/**
 * Reads a rendered financial statement into label -> amount pairs. Table rows are
 * read as a label cell followed by amount cells; a document without table rows is
 * read line by line. The first amount is the current period and the first
 * occurrence of a label wins.
 */
export function parseStatementText(document: string): StatementText {
  const table = tableRows(document);
  const rows = table.rows.length > 0 ? table.rows : textRows(table.text);

  const facts = new Map<string, string>();
  for (const [label, amount] of rows) {
    if (label.length < 3 || facts.has(label)) continue;
    facts.set(label, amount);
  }
  return { scale: declaredScale(table.text), facts: Object.fromEntries(facts) };
}
