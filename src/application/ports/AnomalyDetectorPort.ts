import type { AnomalyFlag, HistoryEntry } from '../../domain/entities/Anomaly.js';

export interface AnomalyDetectorPort {
  detect(transaction: HistoryEntry, history: readonly HistoryEntry[]): AnomalyFlag[];
}
