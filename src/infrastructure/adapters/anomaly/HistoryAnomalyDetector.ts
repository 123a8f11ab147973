import { AnomalyConfigSchema, type AnomalyConfigDTO } from '../../../application/dto/AnomalyConfigDTO.js';
import type { AnomalyDetectorPort } from '../../../application/ports/AnomalyDetectorPort.js';
import type { LoggerPort } from '../../../application/ports/LoggerPort.js';
import { ANOMALY_RULES, type AnomalyFlag, type HistoryEntry } from '../../../domain/entities/Anomaly.js';
import { parseAmount } from '../../../domain/services/AmountParser.js';
import { parseTimestamp } from '../../../domain/services/DateResolver.js';
import { normalizePayee } from '../../../domain/services/PayeeNormalizer.js';
import { defineConfig, ReloadableConfig } from '../../config/ReloadableConfig.js';

export interface AnomalySnapshot {
  readonly enabledRules: ReadonlySet<AnomalyFlag>;
  readonly percentile: number;
  readonly minHistory: number;
  readonly burstCount: number;
  readonly burstWindowHours: number;
  readonly unknownMerchantWindow: number;
}

const buildSnapshot = (dto: AnomalyConfigDTO): AnomalySnapshot => ({
  enabledRules: new Set(dto.enabledRules),
  percentile: dto.highValue.percentile,
  minHistory: dto.highValue.minHistory,
  burstCount: dto.burst.count,
  burstWindowHours: dto.burst.windowHours,
  unknownMerchantWindow: dto.unknownMerchant.window,
});

export const anomalyRulesConfig = defineConfig({
  source: 'anomalyRules',
  schema: AnomalyConfigSchema,
  build: buildSnapshot,
  defaults: {},
});

// Linear interpolation between closest ranks.
export const percentileOf = (values: readonly number[], percentile: number): number => {
  const sorted = [...values].sort((a, b) => a - b);
  const position = ((sorted.length - 1) * percentile) / 100;
  const lower = Math.floor(position);
  const upper = Math.ceil(position);

  return sorted[lower] + (sorted[upper] - sorted[lower]) * (position - lower);
};

type RuleCheck = (transaction: HistoryEntry, history: readonly HistoryEntry[], snapshot: AnomalySnapshot) => boolean;

export interface AnomalyReport {
  total: number;
  flagged: number;
  anomalyRate: number;
  byRule: Record<AnomalyFlag, number>;
  flags: AnomalyFlag[][];
}

export class HistoryAnomalyDetector implements AnomalyDetectorPort {
  private readonly checks: Record<AnomalyFlag, RuleCheck> = {
    high_value: (transaction, history, snapshot) => this.isHighValue(transaction, history, snapshot),
    burst_frequency: (transaction, history, snapshot) => this.isBurst(transaction, history, snapshot),
    unknown_merchant: (transaction, history, snapshot) => this.isUnknownMerchant(transaction, history, snapshot),
  };

  constructor(
    private readonly config: ReloadableConfig<AnomalySnapshot>,
    private readonly logger: LoggerPort = console,
  ) {}

  detect(transaction: HistoryEntry, history: readonly HistoryEntry[]): AnomalyFlag[] {
    const snapshot = this.config.current;

    return ANOMALY_RULES.filter((rule) => snapshot.enabledRules.has(rule) && this.checks[rule](transaction, history, snapshot));
  }

  /** Each transaction is checked against the ones before it. */
  detectBatch(transactions: readonly HistoryEntry[]): AnomalyFlag[][] {
    return transactions.map((transaction, index) => this.detect(transaction, transactions.slice(0, index)));
  }

  report(transactions: readonly HistoryEntry[]): AnomalyReport {
    const flags = this.detectBatch(transactions);
    const byRule: Record<AnomalyFlag, number> = { high_value: 0, burst_frequency: 0, unknown_merchant: 0 };

    for (const flag of flags.flat()) {
      byRule[flag] += 1;
    }

    const flagged = flags.filter((entry) => entry.length > 0).length;

    return {
      total: transactions.length,
      flagged,
      anomalyRate: transactions.length === 0 ? 0 : flagged / transactions.length,
      byRule,
      flags,
    };
  }

  private isHighValue(transaction: HistoryEntry, history: readonly HistoryEntry[], snapshot: AnomalySnapshot): boolean {
    const amount = parseAmount(transaction.amount);
    if (amount === null) {
      return false;
    }

    const amounts = history.map((entry) => parseAmount(entry.amount)).filter((value): value is number => value !== null);

    // Too little history to know what "normal" is.
    if (amounts.length < snapshot.minHistory) {
      return false;
    }

    return amount > percentileOf(amounts, snapshot.percentile);
  }

  private isBurst(transaction: HistoryEntry, history: readonly HistoryEntry[], snapshot: AnomalySnapshot): boolean {
    const payee = normalizePayee(transaction.payee);
    const occurredAt = parseTimestamp(transaction.occurredAt);
    if (payee === null || occurredAt === null) {
      return false;
    }

    const windowStart = occurredAt.subtract(snapshot.burstWindowHours, 'hour');
    let unparseable = 0;
    let count = 1;

    for (const entry of history) {
      if (normalizePayee(entry.payee) !== payee) {
        continue;
      }

      const entryTime = parseTimestamp(entry.occurredAt);
      if (entryTime === null) {
        unparseable += 1;
        continue;
      }

      if (!entryTime.isBefore(windowStart) && !entryTime.isAfter(occurredAt)) {
        count += 1;
      }
    }

    if (unparseable > 0) {
      this.logger.warn(`⚠️ Skipped ${unparseable} history entries with unparseable timestamps for burst detection`);
    }

    return count >= snapshot.burstCount;
  }

  private isUnknownMerchant(
    transaction: HistoryEntry,
    history: readonly HistoryEntry[],
    snapshot: AnomalySnapshot,
  ): boolean {
    const payee = normalizePayee(transaction.payee);
    if (payee === null) {
      return false;
    }

    const recent = history.slice(-snapshot.unknownMerchantWindow);

    return !recent.some((entry) => normalizePayee(entry.payee) === payee);
  }
}
