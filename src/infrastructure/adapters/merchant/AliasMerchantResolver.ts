import { MerchantAliasesSchema, type MerchantAliasesDTO } from '../../../application/dto/MerchantAliasesDTO.js';
import type { MerchantResolverPort } from '../../../application/ports/MerchantResolverPort.js';
import type { MerchantResolution } from '../../../domain/entities/MerchantResolution.js';
import { bestTokenRatio } from '../../../domain/services/FuzzyMatcher.js';
import { collapseWhitespace, normalizePayee } from '../../../domain/services/PayeeNormalizer.js';
import { defineConfig, ReloadableConfig } from '../../config/ReloadableConfig.js';

export interface MerchantAliasesSnapshot {
  readonly fuzzyThreshold: number;
  // alias (normalized) -> canonical name, in declaration order
  readonly aliases: ReadonlyArray<{ alias: string; canonical: string }>;
}

const buildSnapshot = (dto: MerchantAliasesDTO): MerchantAliasesSnapshot => ({
  fuzzyThreshold: dto.fuzzyThreshold,
  aliases: dto.merchants.flatMap((merchant) =>
    [merchant.canonical, ...merchant.aliases].flatMap((alias) => {
      const normalized = normalizePayee(alias);
      return normalized ? [{ alias: normalized, canonical: merchant.canonical }] : [];
    }),
  ),
});

export const merchantAliasesConfig = defineConfig({
  source: 'merchantAliases',
  schema: MerchantAliasesSchema,
  build: buildSnapshot,
  defaults: { merchants: [] },
});

export class AliasMerchantResolver implements MerchantResolverPort {
  constructor(private readonly config: ReloadableConfig<MerchantAliasesSnapshot>) {}

  resolve(payee: string | null): MerchantResolution {
    const normalized = normalizePayee(payee);
    if (payee === null || normalized === null) {
      return { merchant: null, matched: false, score: 0 };
    }

    const { aliases, fuzzyThreshold } = this.config.current;

    const exact = aliases.find((entry) => entry.alias === normalized);
    if (exact) {
      return { merchant: exact.canonical, matched: true, score: 100 };
    }

    let best: { canonical: string; score: number } | null = null;
    for (const entry of aliases) {
      const score = bestTokenRatio(normalized, entry.alias);
      if (score >= fuzzyThreshold && (best === null || score > best.score)) {
        best = { canonical: entry.canonical, score };
      }
    }

    if (best) {
      return { merchant: best.canonical, matched: true, score: Math.round(best.score) };
    }

    return { merchant: collapseWhitespace(payee), matched: false, score: 0 };
  }
}
