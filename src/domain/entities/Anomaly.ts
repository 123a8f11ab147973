export const ANOMALY_RULES = ['high_value', 'burst_frequency', 'unknown_merchant'] as const;

export type AnomalyFlag = (typeof ANOMALY_RULES)[number];

export interface HistoryEntry {
  amount: number | string | null;
  payee: string | null;
  occurredAt: string | Date | null;
  // Identity of the stored transaction, used to keep a message out of its own history.
  contentHash?: string;
  naturalKey?: string | null;
}
