import { describe, expect, it } from 'vitest';
import { classifyTransactionState } from '../../../src/domain/services/TransactionStateClassifier.js';

describe('classifyTransactionState', () => {
  it('puts promotions first', () => {
    expect(classifyTransactionState({ text: 'Use code SAVE20 for an OTP-free checkout', promotional: true, amount: '20' })).toBe(
      'PROMO',
    );
  });

  it('recognizes one-time passwords in both languages', () => {
    expect(classifyTransactionState({ text: 'Your OTP is 482913', promotional: false, amount: null })).toBe('OTP');
    expect(classifyTransactionState({ text: 'رمز التحقق الخاص بك 4829', promotional: false, amount: null })).toBe('OTP');
  });

  it('recognizes declined transactions', () => {
    expect(
      classifyTransactionState({ text: 'Transaction of EGP 100 at Zara was declined', promotional: false, amount: '100' }),
    ).toBe('DECLINED');
    expect(classifyTransactionState({ text: 'تم رفض العملية', promotional: false, amount: null })).toBe('DECLINED');
  });

  it('marks messages without an amount as unknown', () => {
    expect(classifyTransactionState({ text: 'Your statement is ready', promotional: false, amount: null })).toBe('UNKNOWN');
    expect(classifyTransactionState({ text: 'Your statement is ready', promotional: false, amount: ' ' })).toBe('UNKNOWN');
  });

  it('falls through to monetary', () => {
    expect(classifyTransactionState({ text: 'Charged EGP 250.00 at Carrefour', promotional: false, amount: '250.00' })).toBe(
      'MONETARY',
    );
  });
});
