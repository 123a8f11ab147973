import type { TransactionRecord } from '../../domain/entities/Transaction.js';
import type { StoreMode } from '../dto/ProcessMessagesDTO.js';

export type StoreOutcomeStatus = 'inserted' | 'updated' | 'skipped' | 'failed';

export interface StoreOutcome {
  contentHash: string;
  status: StoreOutcomeStatus;
  recordId: string | null;
  error?: string;
}

export interface StoragePort {
  saveBatch(records: readonly TransactionRecord[], mode: StoreMode): Promise<StoreOutcome[]>;
  findByHash(contentHash: string): Promise<TransactionRecord | null>;
  listRecords(params?: { state?: TransactionRecord['transactionState']; bankId?: string }): Promise<TransactionRecord[]>;
  count(): Promise<number>;
}
