import { beforeEach, describe, expect, it } from 'vitest';
import {
  categoryRulesConfig,
  RuleBasedCategorizer,
} from '../../../../src/infrastructure/adapters/categorizer/RuleBasedCategorizer.js';
import { ReloadableConfig } from '../../../../src/infrastructure/config/ReloadableConfig.js';
import { createTestLogger } from '../../../helpers/logger.js';

const rules = {
  categories: [
    {
      category: 'Food & Dining',
      subcategory: 'Groceries',
      tags: ['food', 'essentials', 'food'],
      merchantExact: ['Spinneys'],
      merchantFuzzy: ['carrefour'],
      keywords: { english: ['supermarket'], arabic: ['سوبر ماركت'] },
    },
    {
      category: 'Transportation',
      subcategory: 'Ride Share',
      tags: ['transport'],
      merchantExact: ['uber'],
      merchantFuzzy: ['careem'],
      keywords: { english: ['taxi'] },
    },
    {
      category: 'Cash & ATM',
      subcategory: 'ATM Withdrawal',
      keywords: { english: ['atm'] },
    },
  ],
};

describe('RuleBasedCategorizer', () => {
  let categorizer: RuleBasedCategorizer;

  beforeEach(() => {
    categorizer = new RuleBasedCategorizer(ReloadableConfig.fromValue(categoryRulesConfig, rules, createTestLogger()));
  });

  // ─── Cascade ───

  it('matches exact merchants case-insensitively', () => {
    expect(categorizer.categorize({ payee: 'UBER' })).toEqual({
      category: 'Transportation',
      subcategory: 'Ride Share',
      tags: ['transport'],
      matchPriority: 'exact',
      matchScore: 100,
    });
    expect(categorizer.categorize({ payee: 'Spinneys' }).subcategory).toBe('Groceries');
  });

  it('matches fuzzy merchants contained in a longer payee', () => {
    expect(categorizer.categorize({ payee: 'Carrefour Maadi' })).toEqual({
      category: 'Food & Dining',
      subcategory: 'Groceries',
      tags: ['essentials', 'food'],
      matchPriority: 'fuzzy',
      matchScore: 100,
    });
  });

  it('falls back to keywords in either language', () => {
    expect(categorizer.categorize({ payee: 'Cairo Taxi Co' })).toMatchObject({
      subcategory: 'Ride Share',
      matchPriority: 'keyword',
    });
    expect(categorizer.categorize({ payee: 'هايبر سوبر ماركت المعادي' })).toMatchObject({
      subcategory: 'Groceries',
      matchPriority: 'keyword',
    });
    expect(categorizer.categorize({ payee: 'ATM withdrawal' })).toMatchObject({
      category: 'Cash & ATM',
      subcategory: 'ATM Withdrawal',
      tags: [],
    });
  });

  it('prefers the resolved merchant over the raw payee', () => {
    expect(categorizer.categorize({ payee: 'CRF MAADI 123', normalizedMerchant: 'Carrefour' })).toMatchObject({
      subcategory: 'Groceries',
      matchPriority: 'fuzzy',
    });
  });

  it('uses the fallback category when nothing matches', () => {
    const fallback = {
      category: 'Uncategorized',
      subcategory: 'General',
      tags: [],
      matchPriority: 'fallback',
      matchScore: 0,
    };

    expect(categorizer.categorize({ payee: 'Mystery Vendor' })).toEqual(fallback);
    expect(categorizer.categorize({ payee: null })).toEqual(fallback);
  });

  // ─── Statistics ───

  it('summarizes a batch of assignments', () => {
    const assignments = categorizer.categorizeBatch([{ payee: 'UBER' }, { payee: 'Mystery Vendor' }]);

    expect(categorizer.statistics(assignments)).toEqual({
      total: 2,
      byCategory: { Transportation: 1, Uncategorized: 1 },
      bySubcategory: { 'Transportation/Ride Share': 1, 'Uncategorized/General': 1 },
      uncategorized: 1,
      uncategorizedRate: 0.5,
    });
  });
});
