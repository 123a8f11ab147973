import type { AnomalyFlag, HistoryEntry } from '../../domain/entities/Anomaly.js';
import { UNKNOWN_BANK, unmatchedBank } from '../../domain/entities/BankMatch.js';
import { emptyExtraction, type BankSelection } from '../../domain/entities/ExtractionTemplate.js';
import type { RawMessage } from '../../domain/entities/RawMessage.js';
import { isMonetary, type TransactionRecord, type TransactionState } from '../../domain/entities/Transaction.js';
import { parseTimestamp, resolveTransactionDate } from '../../domain/services/DateResolver.js';
import { assessUrgency, validateExtractedFields } from '../../domain/services/FieldValidator.js';
import { normalizeMessageText } from '../../domain/services/TextNormalizer.js';
import { buildContentHash, buildNaturalKey } from '../../domain/services/TransactionHasher.js';
import { classifyTransactionState } from '../../domain/services/TransactionStateClassifier.js';
import type { StoreMode } from '../dto/ProcessMessagesDTO.js';
import type { AccountResolverPort } from '../ports/AccountResolverPort.js';
import type { AnomalyDetectorPort } from '../ports/AnomalyDetectorPort.js';
import type { BankIdentifierPort } from '../ports/BankIdentifierPort.js';
import type { CategorizerPort } from '../ports/CategorizerPort.js';
import type { FieldExtractorPort } from '../ports/FieldExtractorPort.js';
import type { HistoryProviderPort } from '../ports/HistoryProviderPort.js';
import type { LoggerPort } from '../ports/LoggerPort.js';
import type { MerchantResolverPort } from '../ports/MerchantResolverPort.js';
import type { PromoFilterPort } from '../ports/PromoFilterPort.js';
import type { StoragePort, StoreOutcomeStatus } from '../ports/StoragePort.js';

export interface MessageProcessingPorts {
  promoFilter: PromoFilterPort;
  bankIdentifier: BankIdentifierPort;
  fieldExtractor: FieldExtractorPort;
  accountResolver: AccountResolverPort;
  merchantResolver: MerchantResolverPort;
  categorizer: CategorizerPort;
  anomalyDetector: AnomalyDetectorPort;
  historyProvider: HistoryProviderPort;
  storage: StoragePort;
  logger?: LoggerPort;
  clock?: () => Date;
}

export interface ProcessedMessage {
  record: TransactionRecord | null;
  status: StoreOutcomeStatus;
  recordId: string | null;
  error?: string;
}

export interface BatchSummary {
  total: number;
  processed: number;
  failed: number;
  promoFiltered: number;
  unknownBank: number;
  lowConfidence: number;
  needsReview: number;
  byState: Record<TransactionState, number>;
  store: Record<StoreOutcomeStatus, number>;
}

export interface BatchResult {
  summary: BatchSummary;
  results: ProcessedMessage[];
}

const toHistoryEntry = (record: TransactionRecord): HistoryEntry => ({
  amount: record.amount,
  payee: record.normalizedMerchant ?? record.payee,
  occurredAt: record.occurredAt,
  contentHash: record.contentHash,
  naturalKey: buildNaturalKey(record),
});

// A re-ingested message must not count as its own history.
const isSameTransaction = (entry: HistoryEntry, contentHash: string, naturalKey: string | null): boolean =>
  entry.contentHash === contentHash || (naturalKey !== null && entry.naturalKey === naturalKey);

const errorMessage = (error: unknown): string => (error instanceof Error ? error.message : 'Unknown error');

export class MessageProcessingService {
  private readonly logger: LoggerPort;
  private readonly clock: () => Date;

  constructor(private readonly ports: MessageProcessingPorts) {
    this.logger = ports.logger ?? console;
    this.clock = ports.clock ?? (() => new Date());
  }

  /**
   * Runs one message through every stage against the given history. Pure
   * apart from reading the current configuration snapshots; nothing is stored.
   */
  processMessage(raw: RawMessage, history: readonly HistoryEntry[] = []): TransactionRecord {
    const { promoFilter, bankIdentifier, fieldExtractor, accountResolver, merchantResolver, categorizer } = this.ports;

    const normalized = normalizeMessageText(raw.text);
    const text = normalized.text;
    const base = {
      sourceText: raw.text,
      normalizedText: text,
      textRepaired: normalized.repaired,
      processedAt: this.clock().toISOString(),
    };

    const promo = promoFilter.classify(text);

    if (promo.skip) {
      const account = accountResolver.lookupAccount(null);
      const category = categorizer.categorize({ payee: null });
      const date = resolveTransactionDate(null, raw);
      const contentHash = buildContentHash({
        resolvedDate: date.resolvedDate,
        amount: null,
        payee: null,
        accountId: account.accountId,
        transactionState: 'PROMO',
      });

      return {
        ...base,
        id: contentHash,
        bankMatch: unmatchedBank(),
        ...emptyExtraction(UNKNOWN_BANK),
        ...account,
        normalizedMerchant: null,
        category: category.category,
        subcategory: category.subcategory,
        tags: category.tags,
        matchPriority: category.matchPriority,
        resolvedDate: date.resolvedDate,
        occurredAt: date.occurredAt,
        transactionState: 'PROMO',
        anomalies: [],
        urgency: 'normal',
        warnings: [promo.reason],
        needsReview: true,
        contentHash,
      };
    }

    const bankMatch = bankIdentifier.identify(text);
    const selection: BankSelection =
      !bankMatch.unmatched && fieldExtractor.supportedBanks().includes(bankMatch.bankId)
        ? { kind: 'specified', bankId: bankMatch.bankId }
        : { kind: 'auto' };
    const extracted = fieldExtractor.extract(text, selection);

    const cardSuffix = extracted.cardSuffix ?? accountResolver.extractCardSuffix(text);
    const account = accountResolver.lookupAccount(cardSuffix);

    const merchant = merchantResolver.resolve(extracted.payee);
    const category = categorizer.categorize({ payee: extracted.payee, normalizedMerchant: merchant.merchant });

    const transactionState = classifyTransactionState({ text, promotional: false, amount: extracted.amount });
    const date = resolveTransactionDate(extracted.dateRaw, raw);

    const identity = {
      resolvedDate: date.resolvedDate,
      amount: extracted.amount,
      payee: extracted.payee,
      accountId: account.accountId,
    };
    const contentHash = buildContentHash({ ...identity, transactionState });
    const naturalKey = buildNaturalKey(identity);

    const anomalies: AnomalyFlag[] =
      transactionState === 'MONETARY'
        ? this.ports.anomalyDetector.detect(
            { amount: extracted.amount, payee: merchant.merchant ?? extracted.payee, occurredAt: date.occurredAt },
            history.filter((entry) => !isSameTransaction(entry, contentHash, naturalKey)),
          )
        : [];

    const warnings = validateExtractedFields(extracted);
    if (date.warning) {
      warnings.push(date.warning);
    }

    return {
      ...base,
      id: contentHash,
      bankMatch,
      ...extracted,
      ...account,
      cardSuffix,
      normalizedMerchant: merchant.merchant,
      category: category.category,
      subcategory: category.subcategory,
      tags: category.tags,
      matchPriority: category.matchPriority,
      resolvedDate: date.resolvedDate,
      occurredAt: date.occurredAt,
      transactionState,
      anomalies,
      urgency: assessUrgency(extracted.amount, account.accountType),
      warnings,
      needsReview: extracted.confidence === 'low' || transactionState !== 'MONETARY',
      contentHash,
    };
  }

  /**
   * Messages must arrive in chronological order: each one sees the stored
   * history plus the monetary records produced earlier in the same batch.
   */
  async processBatch(messages: readonly RawMessage[], mode: StoreMode): Promise<BatchResult> {
    const results: ProcessedMessage[] = [];
    const batchHistory: HistoryEntry[] = [];

    for (const raw of messages) {
      try {
        const asOf = parseTimestamp(raw.sourceTimestamp ?? raw.fileCreatedAt);
        const storedHistory = await this.ports.historyProvider.historyBefore(asOf ? asOf.toISOString() : null);
        const record = this.processMessage(raw, [...storedHistory, ...batchHistory]);

        if (isMonetary(record)) {
          batchHistory.push(toHistoryEntry(record));
        }

        results.push({ record, status: 'inserted', recordId: null });
      } catch (error) {
        this.logger.error(`❌ Failed to process message: ${errorMessage(error)}`);
        results.push({ record: null, status: 'failed', recordId: null, error: errorMessage(error) });
      }
    }

    const processed = results.filter(
      (result): result is ProcessedMessage & { record: TransactionRecord } => result.record !== null,
    );
    const outcomes = await this.ports.storage.saveBatch(
      processed.map((result) => result.record),
      mode,
    );

    processed.forEach((result, index) => {
      const outcome = outcomes[index];
      result.status = outcome.status;
      result.recordId = outcome.recordId;
      if (outcome.error) {
        result.error = outcome.error;
      }
    });

    const summary = this.summarize(results);
    this.logger.info(
      `📨 Processed ${summary.total} message(s): ${summary.store.inserted} inserted, ${summary.store.updated} updated, ${summary.store.skipped} skipped, ${summary.failed + summary.store.failed} failed`,
    );

    return { summary, results };
  }

  async process(raw: RawMessage, mode: StoreMode): Promise<ProcessedMessage> {
    const { results } = await this.processBatch([raw], mode);
    return results[0];
  }

  private summarize(results: readonly ProcessedMessage[]): BatchSummary {
    const byState: Record<TransactionState, number> = { MONETARY: 0, PROMO: 0, OTP: 0, DECLINED: 0, UNKNOWN: 0 };
    const store: Record<StoreOutcomeStatus, number> = { inserted: 0, updated: 0, skipped: 0, failed: 0 };
    const summary: BatchSummary = {
      total: results.length,
      processed: 0,
      failed: 0,
      promoFiltered: 0,
      unknownBank: 0,
      lowConfidence: 0,
      needsReview: 0,
      byState,
      store,
    };

    for (const { record, status } of results) {
      if (record === null) {
        summary.failed += 1;
        continue;
      }

      summary.processed += 1;
      store[status] += 1;
      byState[record.transactionState] += 1;

      if (record.transactionState === 'PROMO') {
        summary.promoFiltered += 1;
      } else if (record.bankMatch.unmatched) {
        summary.unknownBank += 1;
      }

      if (record.confidence === 'low') {
        summary.lowConfidence += 1;
      }

      if (record.needsReview) {
        summary.needsReview += 1;
      }
    }

    return summary;
  }
}
