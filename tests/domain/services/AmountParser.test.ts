import { describe, expect, it } from 'vitest';
import { parseAmount } from '../../../src/domain/services/AmountParser.js';

describe('parseAmount', () => {
  it('strips grouping separators', () => {
    expect(parseAmount('1,250.00')).toBe(1250);
    expect(parseAmount(' 12 000 ')).toBe(12000);
  });

  it('understands Arabic digits and separators', () => {
    expect(parseAmount('١٥٠٫٥٠')).toBe(150.5);
    expect(parseAmount('١٬٠٠٠')).toBe(1000);
  });

  it('passes finite numbers through', () => {
    expect(parseAmount(42)).toBe(42);
    expect(parseAmount(Number.NaN)).toBeNull();
  });

  it('rejects anything that is not a plain number', () => {
    expect(parseAmount('abc')).toBeNull();
    expect(parseAmount('12.5.3')).toBeNull();
    expect(parseAmount(null)).toBeNull();
  });
});
