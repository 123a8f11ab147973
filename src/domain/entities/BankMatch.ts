export const UNKNOWN_BANK = 'unknown_bank';

export type BankMatchKind = 'exact' | 'fuzzy' | 'none';

export interface BankMatch {
  bankId: string;
  confidenceScore: number; // 0..100
  matchKind: BankMatchKind;
  unmatched: boolean;
}

export const unmatchedBank = (): BankMatch => ({
  bankId: UNKNOWN_BANK,
  confidenceScore: 0,
  matchKind: 'none',
  unmatched: true,
});
