import crypto from 'node:crypto';
import type { TransactionState } from '../entities/Transaction.js';
import { InvariantViolationError } from '../errors/InvariantViolationError.js';
import { parseAmount } from './AmountParser.js';
import { normalizePayee } from './PayeeNormalizer.js';

export type NaturalKeyInput = Pick<ContentHashInput, 'resolvedDate' | 'amount' | 'payee' | 'accountId'>;

export interface ContentHashInput {
  resolvedDate: string | null;
  amount: string | null;
  payee: string | null;
  accountId: string;
  transactionState: TransactionState;
}

const canonicalAmount = (amount: string | null): string => {
  if (amount === null) {
    return '';
  }

  const parsed = parseAmount(amount);

  return parsed === null ? amount.trim() : parsed.toFixed(2);
};

// Date, payee, amount and account; a transaction missing any of them has no natural key.
export const buildNaturalKey = (input: NaturalKeyInput): string | null => {
  const payee = normalizePayee(input.payee);
  const amount = parseAmount(input.amount);

  if (input.resolvedDate === null || payee === null || amount === null || !input.accountId.trim()) {
    return null;
  }

  return [input.resolvedDate, payee, amount.toFixed(2), input.accountId.trim()].join('|');
};

export const buildContentHash = (input: ContentHashInput): string => {
  if (!input.accountId.trim()) {
    throw new InvariantViolationError('Content hash requires an account id');
  }

  if (input.transactionState === 'MONETARY' && (input.amount === null || !input.amount.trim())) {
    throw new InvariantViolationError('Content hash of a monetary transaction requires an amount');
  }

  const serialized = [
    input.resolvedDate ?? '',
    canonicalAmount(input.amount),
    normalizePayee(input.payee) ?? '',
    input.accountId.trim(),
    input.transactionState,
  ].join('|');

  return crypto.createHash('sha256').update(serialized).digest('hex');
};
