import { beforeEach, describe, expect, it } from 'vitest';
import { bankPatternsConfig, FUZZY_SCAN_LIMIT, PatternBankIdentifier } from '../../../../src/infrastructure/adapters/bank/PatternBankIdentifier.js';
import { ReloadableConfig } from '../../../../src/infrastructure/config/ReloadableConfig.js';
import { ConfigurationError } from '../../../../src/domain/errors/ConfigurationError.js';
import { createTestLogger, type TestLogger } from '../../../helpers/logger.js';

const banks = {
  banks: [
    { id: 'HSBC', patterns: ['HSBC', 'Your HSBC card'] },
    { id: 'CIB', patterns: ['\\bCIB\\b', 'Commercial International Bank'] },
    { id: 'NBE', patterns: ['National Bank of Egypt', 'البنك الأهلي'] },
  ],
};

const identifierFor = (raw: unknown, logger: TestLogger, fuzzyEnabled = true) =>
  new PatternBankIdentifier(ReloadableConfig.fromValue(bankPatternsConfig, raw, logger), { fuzzyEnabled }, logger);

describe('PatternBankIdentifier', () => {
  let logger: TestLogger;
  let identifier: PatternBankIdentifier;

  beforeEach(() => {
    logger = createTestLogger();
    identifier = identifierFor(banks, logger);
  });

  // ─── Exact ───

  it('matches configured patterns exactly', () => {
    expect(identifier.identify('Your HSBC card ending 1234 was charged')).toEqual({
      bankId: 'HSBC',
      confidenceScore: 100,
      matchKind: 'exact',
      unmatched: false,
    });
  });

  it('checks banks in declared order', () => {
    expect(identifier.identify('Transfer from CIB to HSBC account').bankId).toBe('HSBC');
  });

  it('matches Arabic patterns', () => {
    expect(identifier.identify('البنك الأهلي: تم خصم 100 جنيه').bankId).toBe('NBE');
  });

  it('matches a pattern that is not a valid regex literally', () => {
    const odd = identifierFor({ banks: [{ id: 'ODD', patterns: ['C++ Bank('] }] }, logger);

    expect(odd.identify('Alert from c++ bank( today').bankId).toBe('ODD');
  });

  // ─── Fuzzy ───

  it('falls back to fuzzy matching for misspelled names', () => {
    expect(identifier.identify('Nationl Bank of Egypt: your account was debited')).toEqual({
      bankId: 'NBE',
      confidenceScore: 95,
      matchKind: 'fuzzy',
      unmatched: false,
    });
  });

  it('prefers any exact match over a better fuzzy one', () => {
    const ordered = identifierFor(
      {
        banks: [
          { id: 'FIRST', patterns: ['Alpha Bank Egypt'] },
          { id: 'SECOND', patterns: ['BETA'] },
        ],
      },
      logger,
    );

    expect(ordered.identify('Alpha Bank Egypy via BETA')).toMatchObject({ bankId: 'SECOND', matchKind: 'exact' });
  });

  it('keeps the earlier bank on a fuzzy tie', () => {
    const tied = identifierFor(
      {
        banks: [
          { id: 'A', patterns: ['abcd bank'] },
          { id: 'B', patterns: ['abcd bank'] },
        ],
      },
      logger,
    );

    expect(tied.identify('abcx bank')).toMatchObject({ bankId: 'A', matchKind: 'fuzzy' });
  });

  it('only scans the start of a long message for fuzzy matches', () => {
    const padding = 'x '.repeat(FUZZY_SCAN_LIMIT / 2);

    expect(identifier.identify(`${padding}Nationl Bank of Egypt`).unmatched).toBe(true);
    expect(identifier.identify(`${padding}National Bank of Egypt`)).toMatchObject({ bankId: 'NBE', matchKind: 'exact' });
  });

  it('skips fuzzy matching when disabled', () => {
    const strict = identifierFor(banks, logger, false);

    expect(strict.identify('Nationl Bank of Egypt: your account was debited').unmatched).toBe(true);
  });

  // ─── Unmatched ───

  it('reports unknown senders and logs a warning', () => {
    expect(identifier.identify('Hello there')).toEqual({
      bankId: 'unknown_bank',
      confidenceScore: 0,
      matchKind: 'none',
      unmatched: true,
    });
    expect(logger.warn).toHaveBeenCalledTimes(1);
  });

  // ─── Statistics and config ───

  it('counts messages per bank', () => {
    const withoutNbe = identifierFor({ banks: banks.banks.slice(0, 2) }, logger);

    expect(withoutNbe.statistics(['HSBC alert', 'CIB alert', 'unknown text', 'HSBC again'])).toEqual({
      HSBC: 2,
      CIB: 1,
      unknown_bank: 1,
    });
  });

  it('lists supported banks with their display names', () => {
    expect(identifier.supportedBanks().map((bank) => [bank.id, bank.name])).toEqual([
      ['HSBC', 'HSBC'],
      ['CIB', 'CIB'],
      ['NBE', 'NBE'],
    ]);
  });

  it('rejects duplicate bank ids', () => {
    expect(() =>
      ReloadableConfig.fromValue(bankPatternsConfig, { banks: [banks.banks[0], banks.banks[0]] }, logger),
    ).toThrow(ConfigurationError);
  });
});
