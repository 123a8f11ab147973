import { beforeEach, describe, expect, it } from 'vitest';
import type { CategorizerPort } from '../../../src/application/ports/CategorizerPort.js';
import { MessageProcessingService } from '../../../src/application/services/MessageProcessingService.js';
import type { RawMessage } from '../../../src/domain/entities/RawMessage.js';
import { buildContentHash } from '../../../src/domain/services/TransactionHasher.js';
import type { AppContainer } from '../../../src/infrastructure/bootstrap/AppContainer.js';
import { createTestContainer } from '../../helpers/container.js';
import type { TestLogger } from '../../helpers/logger.js';

// ─── Messages ───

const hsbcPurchase: RawMessage = {
  text: 'Your HSBC card ending 1234 was charged EGP 1,250.00 at Carrefour Maadi on 15/03/2024. POS transaction.',
  sourceTimestamp: '2024-03-15T18:45:00Z',
};

const promotion: RawMessage = { text: 'Enjoy 20% cashback on all purchases! Limited time offer from HSBC.' };

const otp: RawMessage = { text: 'Your HSBC OTP code is 482913. Do not share it.' };

const declined: RawMessage = { text: 'CIB: purchase of EGP 300.00 at Zara, card ***5678 declined.' };

const arabicPurchase: RawMessage = {
  text: 'HSBC: تم خصم مبلغ ٢٥٠ جنيه من بطاقتك رقم ١٢٣٤ لدى كارفور بتاريخ ١٥/٠٣/٢٠٢٤',
};

const talabatOrder = (amount: string, time: string): RawMessage => ({
  text: `Purchase of ${amount} EGP at Talabat Egypt on 16/03/2024`,
  sourceTimestamp: `2024-03-16T${time}:00Z`,
});

describe('MessageProcessingService', () => {
  let container: AppContainer;
  let logger: TestLogger;

  beforeEach(() => {
    ({ container, logger } = createTestContainer());
  });

  // ─── Single message ───

  describe('processMessage', () => {
    it('turns a bank SMS into a complete transaction record', () => {
      const record = container.processingService.processMessage(hsbcPurchase);
      const contentHash = buildContentHash({
        resolvedDate: '2024-03-15',
        amount: '1,250.00',
        payee: 'Carrefour Maadi',
        accountId: 'hsbc_credit_1234',
        transactionState: 'MONETARY',
      });

      expect(record).toMatchObject({
        id: contentHash,
        contentHash,
        textRepaired: false,
        bankMatch: { bankId: 'HSBC', confidenceScore: 100, matchKind: 'exact', unmatched: false },
        amount: '1,250.00',
        currency: 'EGP',
        dateRaw: '15/03/2024',
        payee: 'Carrefour Maadi',
        transactionType: 'POS',
        cardSuffix: '1234',
        confidence: 'high',
        matchedBank: 'HSBC',
        matchedTemplate: 'HSBC Standard',
        accountId: 'hsbc_credit_1234',
        accountType: 'Credit',
        interestRate: 0.235,
        creditLimit: 50000,
        billingCycle: 25,
        label: 'HSBC Platinum Credit',
        isKnown: true,
        normalizedMerchant: 'Carrefour',
        category: 'Food & Dining',
        subcategory: 'Groceries',
        tags: ['essentials', 'food'],
        matchPriority: 'exact',
        resolvedDate: '2024-03-15',
        occurredAt: '2024-03-15T18:45:00.000Z',
        transactionState: 'MONETARY',
        anomalies: ['unknown_merchant'],
        urgency: 'normal',
        warnings: [],
        needsReview: false,
        processedAt: '2024-03-20T00:00:00.000Z',
      });
    });

    it('does not store anything', async () => {
      container.processingService.processMessage(hsbcPurchase);

      expect(await container.storage.count()).toBe(0);
    });

    it('reads Arabic messages with Arabic-Indic digits', () => {
      const record = container.processingService.processMessage(arabicPurchase);

      expect(record).toMatchObject({
        normalizedText: 'HSBC: تم خصم مبلغ 250 جنيه من بطاقتك رقم 1234 لدى كارفور بتاريخ 15/03/2024',
        amount: '250',
        currency: 'جنيه',
        payee: 'كارفور',
        cardSuffix: '1234',
        matchedTemplate: 'HSBC Arabic',
        confidence: 'high',
        accountId: 'hsbc_credit_1234',
        normalizedMerchant: 'Carrefour',
        subcategory: 'Groceries',
        resolvedDate: '2024-03-15',
        transactionState: 'MONETARY',
        warnings: [],
      });
    });

    it('records promotions without extracting anything', () => {
      const record = container.processingService.processMessage(promotion);

      expect(record).toMatchObject({
        transactionState: 'PROMO',
        bankMatch: { bankId: 'unknown_bank', unmatched: true },
        amount: null,
        matchedTemplate: null,
        confidence: 'low',
        accountId: 'unknown',
        category: 'Uncategorized',
        matchPriority: 'fallback',
        resolvedDate: null,
        anomalies: [],
        warnings: ['Promotional message detected (keywords: offer, enjoy, limited time (and 1 more))'],
        needsReview: true,
      });
    });

    it('classifies one-time passwords', () => {
      expect(container.processingService.processMessage(otp)).toMatchObject({
        transactionState: 'OTP',
        bankMatch: { bankId: 'HSBC' },
        amount: null,
        confidence: 'low',
        matchedBank: 'HSBC',
        accountId: 'unknown',
        anomalies: [],
        needsReview: true,
      });
    });

    it('keeps declined transactions out of anomaly detection', () => {
      expect(container.processingService.processMessage(declined)).toMatchObject({
        transactionState: 'DECLINED',
        bankMatch: { bankId: 'CIB', matchKind: 'exact' },
        amount: '300.00',
        payee: 'Zara',
        cardSuffix: '5678',
        accountId: 'cib_debit_5678',
        normalizedMerchant: 'Zara',
        category: 'Shopping',
        subcategory: 'Clothing',
        anomalies: [],
        needsReview: true,
      });
    });

    it('tries every template when the sender is unknown', () => {
      expect(container.processingService.processMessage(talabatOrder('450.00', '12:00'))).toMatchObject({
        bankMatch: { bankId: 'unknown_bank', unmatched: true },
        matchedBank: 'HSBC',
        matchedTemplate: 'HSBC Standard',
        amount: '450.00',
        payee: 'Talabat Egypt',
        normalizedMerchant: 'Talabat',
        subcategory: 'Food Delivery',
        accountId: 'unknown',
        occurredAt: '2024-03-16T12:00:00.000Z',
        needsReview: false,
      });
    });
  });

  // ─── Batches ───

  describe('processBatch', () => {
    it('stores a mixed batch and summarizes it', async () => {
      const { summary, results } = await container.processingService.processBatch([hsbcPurchase, promotion, otp], 'skip');

      expect(results.map((result) => result.status)).toEqual(['inserted', 'inserted', 'inserted']);
      expect(summary).toEqual({
        total: 3,
        processed: 3,
        failed: 0,
        promoFiltered: 1,
        unknownBank: 0,
        lowConfidence: 2,
        needsReview: 2,
        byState: { MONETARY: 1, PROMO: 1, OTP: 1, DECLINED: 0, UNKNOWN: 0 },
        store: { inserted: 3, updated: 0, skipped: 0, failed: 0 },
      });
      expect(await container.storage.count()).toBe(3);
    });

    it('skips a message it has already stored', async () => {
      const first = await container.processingService.process(hsbcPurchase, 'skip');
      const second = await container.processingService.process(hsbcPurchase, 'skip');

      expect(second.status).toBe('skipped');
      expect(second.recordId).toBe(first.recordId);
      expect(second.record?.contentHash).toBe(first.record?.contentHash);
      expect(await container.storage.count()).toBe(1);
    });

    it('updates a stored message in upsert mode without adding a row', async () => {
      const first = await container.processingService.process(hsbcPurchase, 'skip');
      const second = await container.processingService.process(hsbcPurchase, 'upsert');

      expect(second.status).toBe('updated');
      expect(second.recordId).toBe(first.recordId);
      expect(await container.storage.count()).toBe(1);
    });

    it.each([
      ['an undated message', { text: 'Your HSBC card ending 1234 was charged EGP 250.00 at Zara on 15/03/2024.' }],
      [
        'a message received the day after its printed date',
        {
          text: 'Your HSBC card ending 1234 was charged EGP 250.00 at Zara on 14/03/2024.',
          sourceTimestamp: '2024-03-15T09:00:00Z',
        },
      ],
    ])('keeps the stored copy of %s out of its own anomaly history', async (_label, message: RawMessage) => {
      const first = await container.processingService.process(message, 'skip');
      const second = await container.processingService.process(message, 'upsert');

      expect(first.record?.anomalies).toEqual(['unknown_merchant']);
      expect(second.record?.anomalies).toEqual(['unknown_merchant']);
      expect(second.status).toBe('updated');
      expect((await container.storage.listRecords()).map((record) => record.anomalies)).toEqual([['unknown_merchant']]);
    });

    it('feeds earlier messages of the batch into anomaly history', async () => {
      const { results } = await container.processingService.processBatch(
        [talabatOrder('120.00', '10:00'), talabatOrder('85.50', '13:00'), talabatOrder('60.00', '19:00')],
        'skip',
      );

      expect(results.map((result) => result.record?.anomalies)).toEqual([['unknown_merchant'], [], ['burst_frequency']]);
    });

    it('isolates a message that fails to process', async () => {
      const categorizer: CategorizerPort = {
        categorize: (input) => {
          if (input.payee === 'Boom') {
            throw new Error('categorizer exploded');
          }
          return container.categorizer.categorize(input);
        },
        categorizeBatch: (inputs) => container.categorizer.categorizeBatch(inputs),
      };
      const service = new MessageProcessingService({
        promoFilter: container.promoFilter,
        bankIdentifier: container.bankIdentifier,
        fieldExtractor: container.fieldExtractor,
        accountResolver: container.accountResolver,
        merchantResolver: container.merchantResolver,
        categorizer,
        anomalyDetector: container.anomalyDetector,
        historyProvider: container.historyProvider,
        storage: container.storage,
        logger,
      });

      const { summary, results } = await service.processBatch(
        [{ text: 'Your HSBC card ending 1234 was charged EGP 10.00 at Boom on 15/03/2024.' }, hsbcPurchase],
        'skip',
      );

      expect(results[0]).toEqual({ record: null, status: 'failed', recordId: null, error: 'categorizer exploded' });
      expect(results[1].status).toBe('inserted');
      expect(summary).toMatchObject({ total: 2, processed: 1, failed: 1 });
      expect(logger.error).toHaveBeenCalledWith('❌ Failed to process message: categorizer exploded');
    });
  });
});
