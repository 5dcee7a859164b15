import { describe, expect, it } from 'vitest';
import { parseMonetary, scaleMultiplier } from './coerce';

describe('parseMonetary', () => {
  it('reads plain and formatted amounts', () => {
    expect(parseMonetary(1250)).toBe(1250);
    expect(parseMonetary('1,250')).toBe(1250);
    expect(parseMonetary('$ 1,250.50')).toBe(1250.5);
  });

  it('reads parentheses and a leading minus as negative', () => {
    expect(parseMonetary('(300)')).toBe(-300);
    expect(parseMonetary('($ 42)')).toBe(-42);
    expect(parseMonetary('-1,000')).toBe(-1000);
    expect(parseMonetary('$-7')).toBe(-7);
  });

  it('treats a lone dash as zero', () => {
    expect(parseMonetary('—')).toBe(0);
    expect(parseMonetary('-')).toBe(0);
  });

  it('applies the document scale', () => {
    expect(parseMonetary('1,250', 1000)).toBe(1_250_000);
    expect(parseMonetary(2, 1e6)).toBe(2_000_000);
  });

  it('lets an inline scale word override the document scale', () => {
    expect(parseMonetary('1.5 million', 1000)).toBe(1_500_000);
    expect(parseMonetary('$2bn')).toBe(2_000_000_000);
    expect(parseMonetary('(3 thousand)')).toBe(-3000);
    expect(parseMonetary('12mm')).toBe(12_000_000);
  });

  it('returns null for values that are not amounts', () => {
    expect(parseMonetary('')).toBeNull();
    expect(parseMonetary('n/a')).toBeNull();
    expect(parseMonetary('12 apples')).toBeNull();
    expect(parseMonetary(Number.NaN)).toBeNull();
    expect(parseMonetary(Number.POSITIVE_INFINITY)).toBeNull();
  });

  it('never returns negative zero', () => {
    expect(Object.is(parseMonetary('(0)'), 0)).toBe(true);
  });
});

describe('scaleMultiplier', () => {
  it('maps scale names and numbers', () => {
    expect(scaleMultiplier(undefined)).toBe(1);
    expect(scaleMultiplier('units')).toBe(1);
    expect(scaleMultiplier('thousands')).toBe(1e3);
    expect(scaleMultiplier('millions')).toBe(1e6);
    expect(scaleMultiplier('billions')).toBe(1e9);
    expect(scaleMultiplier(100)).toBe(100);
  });
});
