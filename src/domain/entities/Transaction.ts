import type { AccountMetadata } from './AccountMetadata.js';
import type { AnomalyFlag } from './Anomaly.js';
import type { BankMatch } from './BankMatch.js';
import type { CategoryAssignment } from './CategoryAssignment.js';
import type { ExtractedFields } from './ExtractionTemplate.js';

export const TRANSACTION_STATES = ['MONETARY', 'PROMO', 'OTP', 'DECLINED', 'UNKNOWN'] as const;

export type TransactionState = (typeof TRANSACTION_STATES)[number];

export type Urgency = 'high' | 'medium' | 'normal';

export interface TransactionRecord extends ExtractedFields, AccountMetadata, Omit<CategoryAssignment, 'matchScore'> {
  id: string;
  sourceText: string;
  normalizedText: string;
  textRepaired: boolean;
  bankMatch: BankMatch;
  normalizedMerchant: string | null;
  resolvedDate: string | null; // YYYY-MM-DD
  occurredAt: string | null; // ISO timestamp when the message carried one, else resolvedDate
  transactionState: TransactionState;
  anomalies: AnomalyFlag[];
  urgency: Urgency;
  warnings: string[];
  needsReview: boolean;
  contentHash: string;
  processedAt: string;
}

// Only settled money movements feed expense aggregation and anomaly history.
export const isMonetary = (record: Pick<TransactionRecord, 'transactionState'>): boolean =>
  record.transactionState === 'MONETARY';
