import type { Scale } from '@zscore/schemas';

const SCALE_WORDS: Record<string, number> = {
  thousand: 1e3,
  thousands: 1e3,
  k: 1e3,
  million: 1e6,
  millions: 1e6,
  m: 1e6,
  mm: 1e6,
  mn: 1e6,
  billion: 1e9,
  billions: 1e9,
  b: 1e9,
  bn: 1e9
};

const NIL = /^[-‒–—―−]+$/;
const AMOUNT = /^([0-9][0-9,]*(?:\.[0-9]*)?|\.[0-9]+)(?:\s*([a-z]+)\.?)?$/i;

export function scaleMultiplier(scale: Scale | undefined): number {
  if (scale === undefined) return 1;
  if (typeof scale === 'number') return scale;
  switch (scale) {
    case 'units':
    case 'ones':
      return 1;
    case 'thousands':
      return 1e3;
    case 'millions':
      return 1e6;
    case 'billions':
      return 1e9;
  }
}

const noNegativeZero = (n: number): number => (n === 0 ? 0 : n);

/**
 * Coerces a filing value to a plain monetary amount. Accepts `$`, thousands
 * separators, `(123)` or a leading minus for negatives, a lone dash for nil, and an
 * inline scale word ("1.2 million") that takes precedence over `scale`.
 * Returns null when the value is not an amount.
 */
export function parseMonetary(raw: number | string, scale = 1): number | null {
  if (typeof raw === 'number') {
    return Number.isFinite(raw) ? noNegativeZero(raw * scale) : null;
  }

  let s = raw.trim().replace(/\s+/g, ' ');
  if (!s) return null;
  if (NIL.test(s)) return 0;

  let negative = false;
  s = s.replace(/^\$\s*/, '');
  const paren = /^\((.*)\)$/.exec(s);
  if (paren) {
    negative = true;
    s = paren[1].trim().replace(/^\$\s*/, '');
  }
  const sign = /^[-−–]\s*(.*)$/.exec(s);
  if (sign) {
    negative = !negative;
    s = sign[1].replace(/^\$\s*/, '');
  }

  const m = AMOUNT.exec(s);
  if (!m) return null;
  const [, digits, unit] = m;

  let multiplier = scale;
  if (unit) {
    const word = SCALE_WORDS[unit.toLowerCase()];
    if (word === undefined) return null;
    multiplier = word;
  }

  const value = Number(digits.replace(/,/g, '')) * multiplier;
  if (!Number.isFinite(value)) return null;
  return noNegativeZero(negative ? -value : value);
}
