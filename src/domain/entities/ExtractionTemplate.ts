import type { ConfidenceLevel } from './Confidence.js';

export const EXTRACTION_FIELDS = ['amount', 'currency', 'date', 'payee', 'transactionType', 'cardSuffix'] as const;

export type ExtractionField = (typeof EXTRACTION_FIELDS)[number];

export interface ExtractionTemplate {
  readonly bankId: string;
  readonly name: string;
  readonly fieldPatterns: ReadonlyMap<ExtractionField, RegExp>;
  readonly requiredFields: ReadonlySet<ExtractionField>;
}

export type BankSelection = { kind: 'specified'; bankId: string } | { kind: 'auto' };

export interface ExtractedFields {
  amount: string | null;
  currency: string | null;
  dateRaw: string | null;
  payee: string | null;
  transactionType: string | null;
  cardSuffix: string | null;
  confidence: ConfidenceLevel;
  matchedBank: string;
  matchedTemplate: string | null;
}

export const emptyExtraction = (matchedBank: string): ExtractedFields => ({
  amount: null,
  currency: null,
  dateRaw: null,
  payee: null,
  transactionType: null,
  cardSuffix: null,
  confidence: 'low',
  matchedBank,
  matchedTemplate: null,
});
