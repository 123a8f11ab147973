import { describe, expect, it } from 'vitest';
import {
  convertArabicIndicDigits,
  normalizeMessageText,
  repairMojibake,
} from '../../../src/domain/services/TextNormalizer.js';

const garble = (text: string): string => Buffer.from(text, 'utf8').toString('latin1');

describe('TextNormalizer', () => {
  // ─── Digits ───

  it('converts Arabic-Indic digits to ASCII and leaves the rest alone', () => {
    expect(convertArabicIndicDigits('المبلغ ١٢٣٫٤٥')).toBe('المبلغ 123٫45');
    expect(convertArabicIndicDigits('EGP 250')).toBe('EGP 250');
  });

  it('decodes byte input as UTF-8', () => {
    const bytes = new TextEncoder().encode('Card ending ١٢٣٤');

    expect(normalizeMessageText(bytes)).toEqual({ text: 'Card ending 1234', repaired: false });
  });

  // ─── Mojibake ───

  it('repairs UTF-8 text that was decoded as Latin-1', () => {
    const original = 'تم خصم 100 جنيه';

    expect(repairMojibake(garble(original))).toBe(original);
    expect(normalizeMessageText(garble(original))).toEqual({ text: original, repaired: true });
  });

  it('leaves genuine accented Latin text untouched', () => {
    expect(repairMojibake('D\u00e9j\u00e0 vu')).toBe('D\u00e9j\u00e0 vu');
    expect(normalizeMessageText('D\u00e9j\u00e0 vu')).toEqual({ text: 'D\u00e9j\u00e0 vu', repaired: false });
  });

  it('composes decomposed characters', () => {
    expect(normalizeMessageText('Cafe\u0301')).toEqual({ text: 'Caf\u00e9', repaired: true });
  });

  // ─── Idempotence ───

  it('is idempotent', () => {
    const samples = [
      '  Paid ٥٠٠ EGP  ',
      garble('مبلغ ٢٥٠ جنيه لدى كارفور'),
      'Your HSBC card ending 1234 was charged EGP 1,250.00',
      'Café Riche',
      '',
    ];

    for (const sample of samples) {
      const once = normalizeMessageText(sample).text;
      expect(normalizeMessageText(once).text).toBe(once);
    }
  });

  it('unwinds mojibake nested many times over', () => {
    let layered = 'Paid 50 EGP at Caf\u00e9';
    for (let layer = 0; layer < 6; layer += 1) {
      layered = garble(layered);
    }

    const once = normalizeMessageText(layered);

    expect(once).toEqual({ text: 'Paid 50 EGP at Caf\u00e9', repaired: true });
    expect(normalizeMessageText(once.text).text).toBe(once.text);
  });

  it('only reports a repair when more than digits and outer whitespace changed', () => {
    expect(normalizeMessageText('  Paid ٥٠٠ EGP  ')).toEqual({ text: 'Paid 500 EGP', repaired: false });
  });
});
