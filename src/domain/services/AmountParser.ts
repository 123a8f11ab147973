import { convertArabicIndicDigits } from './TextNormalizer.js';

const ARABIC_DECIMAL_SEPARATOR = /٫/g;
const groupingSeparators = /[,٬\s]/g;
const numericAmount = /^-?\d+(?:\.\d+)?$/;

export const parseAmount = (input: number | string | null | undefined): number | null => {
  if (input === null || input === undefined) {
    return null;
  }

  if (typeof input === 'number') {
    return Number.isFinite(input) ? input : null;
  }

  const cleaned = convertArabicIndicDigits(input.trim()).replace(ARABIC_DECIMAL_SEPARATOR, '.').replace(groupingSeparators, '');

  if (!numericAmount.test(cleaned)) {
    return null;
  }

  return Number.parseFloat(cleaned);
};
