import { z } from 'zod';
import { ANOMALY_RULES } from '../../domain/entities/Anomaly.js';
import { TRANSACTION_STATES } from '../../domain/entities/Transaction.js';

const ConfidenceSchema = z.enum(['low', 'medium', 'high']);

export const TransactionRecordSchema = z.object({
  id: z.string().min(1),
  sourceText: z.string(),
  normalizedText: z.string(),
  textRepaired: z.boolean(),
  bankMatch: z.object({
    bankId: z.string().min(1),
    confidenceScore: z.number().min(0).max(100),
    matchKind: z.enum(['exact', 'fuzzy', 'none']),
    unmatched: z.boolean(),
  }),
  amount: z.string().nullable(),
  currency: z.string().nullable(),
  dateRaw: z.string().nullable(),
  payee: z.string().nullable(),
  transactionType: z.string().nullable(),
  cardSuffix: z
    .string()
    .regex(/^[0-9]{4}$/)
    .nullable(),
  confidence: ConfidenceSchema,
  matchedBank: z.string(),
  matchedTemplate: z.string().nullable(),
  accountId: z.string().min(1),
  accountType: z.enum(['Credit', 'Debit', 'Prepaid', 'Unknown']),
  interestRate: z.number().nullable(),
  creditLimit: z.number().nullable(),
  billingCycle: z.number().int().min(1).max(31).nullable(),
  label: z.string(),
  isKnown: z.boolean(),
  normalizedMerchant: z.string().nullable(),
  category: z.string().min(1),
  subcategory: z.string(),
  tags: z.array(z.string()),
  matchPriority: z.enum(['exact', 'fuzzy', 'keyword', 'fallback']),
  resolvedDate: z
    .string()
    .regex(/^\d{4}-\d{2}-\d{2}$/)
    .nullable(),
  occurredAt: z.string().nullable(),
  transactionState: z.enum(TRANSACTION_STATES),
  anomalies: z.array(z.enum(ANOMALY_RULES)),
  urgency: z.enum(['high', 'medium', 'normal']),
  warnings: z.array(z.string()),
  needsReview: z.boolean(),
  contentHash: z.string().regex(/^[0-9a-f]{64}$/),
  processedAt: z.string(),
});

export type TransactionRecordDTO = z.infer<typeof TransactionRecordSchema>;
