import type { StoreMode } from '../../../application/dto/ProcessMessagesDTO.js';
import { TransactionRecordSchema } from '../../../application/dto/TransactionRecordDTO.js';
import type { LoggerPort } from '../../../application/ports/LoggerPort.js';
import type { StoragePort, StoreOutcome } from '../../../application/ports/StoragePort.js';
import type { TransactionRecord } from '../../../domain/entities/Transaction.js';
import { buildNaturalKey } from '../../../domain/services/TransactionHasher.js';

export const naturalKeyOf = (record: TransactionRecord): string | null => buildNaturalKey(record);

interface StoreState {
  records: Map<string, TransactionRecord>;
  byHash: Map<string, string>;
  byNaturalKey: Map<string, string>;
}

const cloneState = (state: StoreState): StoreState => ({
  records: new Map(state.records),
  byHash: new Map(state.byHash),
  byNaturalKey: new Map(state.byNaturalKey),
});

export class InMemoryStorageAdapter implements StoragePort {
  private state: StoreState = { records: new Map(), byHash: new Map(), byNaturalKey: new Map() };

  constructor(private readonly logger: LoggerPort = console) {}

  async saveBatch(records: readonly TransactionRecord[], mode: StoreMode): Promise<StoreOutcome[]> {
    const reasons = new Map<number, string>();
    records.forEach((record, index) => {
      const result = TransactionRecordSchema.safeParse(record);
      if (!result.success) {
        reasons.set(index, result.error.issues.map((issue) => issue.path.join('.')).join(', '));
      }
    });

    if (reasons.size > 0) {
      this.logger.error(`❌ Rolled back batch of ${records.length}: ${reasons.size} invalid record(s)`);

      return records.map(
        (record, index): StoreOutcome => ({
          contentHash: record.contentHash,
          status: 'failed',
          recordId: null,
          error: reasons.has(index) ? `Invalid record: ${reasons.get(index)}` : 'Batch rolled back',
        }),
      );
    }

    // Work on a copy and publish it in one assignment so a batch is all-or-nothing.
    const staged = cloneState(this.state);
    const outcomes = records.map((record) => this.apply(staged, record, mode));
    this.state = staged;

    return outcomes;
  }

  async findByHash(contentHash: string): Promise<TransactionRecord | null> {
    const id = this.state.byHash.get(contentHash);
    return id === undefined ? null : (this.state.records.get(id) ?? null);
  }

  async listRecords(
    params: { state?: TransactionRecord['transactionState']; bankId?: string } = {},
  ): Promise<TransactionRecord[]> {
    return Array.from(this.state.records.values()).filter((record) => {
      const stateMatches = params.state ? record.transactionState === params.state : true;
      const bankMatches = params.bankId ? record.bankMatch.bankId === params.bankId : true;
      return stateMatches && bankMatches;
    });
  }

  async count(): Promise<number> {
    return this.state.records.size;
  }

  private apply(state: StoreState, record: TransactionRecord, mode: StoreMode): StoreOutcome {
    const naturalKey = naturalKeyOf(record);
    const existingId =
      state.byHash.get(record.contentHash) ?? (naturalKey === null ? undefined : state.byNaturalKey.get(naturalKey));

    if (existingId === undefined) {
      state.records.set(record.id, record);
      this.index(state, record.id, record);
      return { contentHash: record.contentHash, status: 'inserted', recordId: record.id };
    }

    if (mode === 'skip') {
      return { contentHash: record.contentHash, status: 'skipped', recordId: existingId };
    }

    const previous = state.records.get(existingId);
    if (previous) {
      state.byHash.delete(previous.contentHash);
      const previousKey = naturalKeyOf(previous);
      if (previousKey !== null) {
        state.byNaturalKey.delete(previousKey);
      }
    }

    const updated: TransactionRecord = { ...record, id: existingId };
    state.records.set(existingId, updated);
    this.index(state, existingId, updated);

    return { contentHash: record.contentHash, status: 'updated', recordId: existingId };
  }

  private index(state: StoreState, id: string, record: TransactionRecord): void {
    state.byHash.set(record.contentHash, id);
    const naturalKey = naturalKeyOf(record);
    if (naturalKey !== null) {
      state.byNaturalKey.set(naturalKey, id);
    }
  }
}
