import { describe, expect, it } from 'vitest';
import {
  AliasMerchantResolver,
  merchantAliasesConfig,
} from '../../../../src/infrastructure/adapters/merchant/AliasMerchantResolver.js';
import { ReloadableConfig } from '../../../../src/infrastructure/config/ReloadableConfig.js';
import { createTestLogger } from '../../../helpers/logger.js';

const resolver = new AliasMerchantResolver(
  ReloadableConfig.fromValue(
    merchantAliasesConfig,
    {
      merchants: [
        { canonical: 'Carrefour', aliases: ['carrefour maadi', 'كارفور'] },
        { canonical: 'Uber', aliases: ['uber trip'] },
      ],
    },
    createTestLogger(),
  ),
);

describe('AliasMerchantResolver', () => {
  it('resolves aliases exactly, ignoring case and spacing', () => {
    expect(resolver.resolve('CARREFOUR   MAADI')).toEqual({ merchant: 'Carrefour', matched: true, score: 100 });
    expect(resolver.resolve('كارفور')).toEqual({ merchant: 'Carrefour', matched: true, score: 100 });
  });

  it('resolves close variants fuzzily', () => {
    expect(resolver.resolve('Uber Trip Help')).toEqual({ merchant: 'Uber', matched: true, score: 100 });
  });

  it('passes unknown payees through with whitespace collapsed', () => {
    expect(resolver.resolve('Zara  City Stars')).toEqual({ merchant: 'Zara City Stars', matched: false, score: 0 });
  });

  it('has no merchant for a missing payee', () => {
    expect(resolver.resolve(null)).toEqual({ merchant: null, matched: false, score: 0 });
    expect(resolver.resolve('   ')).toEqual({ merchant: null, matched: false, score: 0 });
  });
});
