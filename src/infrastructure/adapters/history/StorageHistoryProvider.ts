import type { HistoryProviderPort } from '../../../application/ports/HistoryProviderPort.js';
import type { StoragePort } from '../../../application/ports/StoragePort.js';
import type { HistoryEntry } from '../../../domain/entities/Anomaly.js';
import { parseTimestamp } from '../../../domain/services/DateResolver.js';
import { buildNaturalKey } from '../../../domain/services/TransactionHasher.js';

export class StorageHistoryProvider implements HistoryProviderPort {
  constructor(private readonly storage: StoragePort) {}

  async historyBefore(asOf: string | null): Promise<HistoryEntry[]> {
    const records = await this.storage.listRecords({ state: 'MONETARY' });
    const entries = records.map((record) => ({
      entry: {
        amount: record.amount,
        payee: record.normalizedMerchant ?? record.payee,
        occurredAt: record.occurredAt,
        contentHash: record.contentHash,
        naturalKey: buildNaturalKey(record),
      },
      time: parseTimestamp(record.occurredAt),
    }));

    const cutoff = parseTimestamp(asOf);
    if (cutoff === null) {
      return entries.map(({ entry }) => entry);
    }

    // Undated entries cannot be placed in time; they still count towards amount and merchant history.
    const undated = entries.filter(({ time }) => time === null).map(({ entry }) => entry);
    const dated = entries
      .flatMap(({ entry, time }) => (time !== null && time.isBefore(cutoff) ? [{ entry, at: time.valueOf() }] : []))
      .sort((a, b) => a.at - b.at)
      .map(({ entry }) => entry);

    return [...undated, ...dated];
  }
}
