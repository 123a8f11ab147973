import type { TransactionState } from '../entities/Transaction.js';

export interface StateEvidence {
  text: string;
  promotional: boolean;
  amount: string | null;
}

interface StateRule {
  state: TransactionState;
  test: (evidence: StateEvidence) => boolean;
}

const otpPattern = /\b(?:otp|one\s*time\s*password|code)\b/i;
const declinedPattern = /\b(?:declined|refused)\b|مرفوض|رفض/i;

// First matching rule wins; MONETARY is the fallthrough.
const rules: StateRule[] = [
  { state: 'PROMO', test: (evidence) => evidence.promotional },
  { state: 'OTP', test: (evidence) => otpPattern.test(evidence.text) || evidence.text.includes('رمز التحقق') },
  { state: 'DECLINED', test: (evidence) => declinedPattern.test(evidence.text) },
  { state: 'UNKNOWN', test: (evidence) => evidence.amount === null || !evidence.amount.trim() },
];

export const classifyTransactionState = (evidence: StateEvidence): TransactionState =>
  rules.find((rule) => rule.test(evidence))?.state ?? 'MONETARY';
