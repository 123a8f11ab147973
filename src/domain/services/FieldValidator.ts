import type { AccountType } from '../entities/AccountMetadata.js';
import type { ExtractedFields } from '../entities/ExtractionTemplate.js';
import type { Urgency } from '../entities/Transaction.js';
import { parseAmount } from './AmountParser.js';

const KNOWN_CURRENCIES = new Set([
  'EGP', 'USD', 'EUR', 'GBP', 'SAR', 'AED', 'KWD', 'QAR', 'BHD', 'OMR', 'JOD', 'LBP', 'IQD',
  'SYP', 'YER', 'TND', 'MAD', 'DZD', 'SDG', 'LYD',
  'جنيه', 'دولار', 'يورو', 'ريال', 'درهم', 'دينار',
]);

const HIGH_URGENCY_AMOUNT = 10_000;
const CREDIT_MEDIUM_URGENCY_AMOUNT = 5_000;

export const validateExtractedFields = (fields: ExtractedFields): string[] => {
  const warnings: string[] = [];

  if (fields.amount !== null && parseAmount(fields.amount) === null) {
    warnings.push(`Amount is not numeric: ${fields.amount}`);
  }

  if (fields.currency !== null && !KNOWN_CURRENCIES.has(fields.currency.toUpperCase())) {
    warnings.push(`Unknown currency: ${fields.currency}`);
  }

  return warnings;
};

export const assessUrgency = (amount: string | null, accountType: AccountType): Urgency => {
  const value = parseAmount(amount);
  if (value === null) {
    return 'normal';
  }

  if (value >= HIGH_URGENCY_AMOUNT) {
    return 'high';
  }

  return accountType === 'Credit' && value >= CREDIT_MEDIUM_URGENCY_AMOUNT ? 'medium' : 'normal';
};
