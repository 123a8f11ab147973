import type { HistoryEntry } from '../../domain/entities/Anomaly.js';

export interface HistoryProviderPort {
  // Entries strictly before `asOf` (all entries when null), oldest first.
  historyBefore(asOf: string | null): Promise<HistoryEntry[]>;
}
