export type AccountType = 'Credit' | 'Debit' | 'Prepaid' | 'Unknown';

export interface AccountMetadata {
  accountId: string;
  accountType: AccountType;
  interestRate: number | null;
  creditLimit: number | null;
  billingCycle: number | null;
  label: string;
  isKnown: boolean;
}
