import { CategoryRulesSchema, type CategoryRulesDTO } from '../../../application/dto/CategoryRulesDTO.js';
import type { CategorizationInput, CategorizerPort } from '../../../application/ports/CategorizerPort.js';
import type { CategoryAssignment } from '../../../domain/entities/CategoryAssignment.js';
import { bestTokenRatio } from '../../../domain/services/FuzzyMatcher.js';
import { normalizePayee } from '../../../domain/services/PayeeNormalizer.js';
import { defineConfig, ReloadableConfig } from '../../config/ReloadableConfig.js';

interface CategoryRule {
  category: string;
  subcategory: string;
  tags: readonly string[];
  merchantExact: ReadonlySet<string>;
  merchantFuzzy: readonly string[];
  keywords: readonly string[];
}

export interface CategoryRulesSnapshot {
  readonly fuzzyThreshold: number;
  readonly rules: readonly CategoryRule[];
  readonly fallback: { category: string; subcategory: string; tags: readonly string[] };
}

interface Match {
  rule: CategoryRule;
  score: number;
}

type MatchStage = (merchant: string, snapshot: CategoryRulesSnapshot) => (Match & { priority: CategoryAssignment['matchPriority'] }) | null;

// A configured fuzzy merchant appearing verbatim inside the payee is at least this similar.
const CONTAINED_MERCHANT_SCORE = 90;

const sortedTags = (tags: Iterable<string>): string[] => [...new Set(tags)].sort();

const buildSnapshot = (dto: CategoryRulesDTO): CategoryRulesSnapshot => ({
  fuzzyThreshold: dto.fuzzyThreshold,
  rules: dto.categories.map((rule) => ({
    category: rule.category,
    subcategory: rule.subcategory,
    tags: sortedTags(rule.tags),
    merchantExact: new Set(rule.merchantExact.map((merchant) => merchant.trim().toLowerCase())),
    merchantFuzzy: rule.merchantFuzzy.map((merchant) => merchant.trim().toLowerCase()),
    keywords: Object.values(rule.keywords)
      .flat()
      .map((keyword) => keyword.toLowerCase()),
  })),
  fallback: { ...dto.fallback, tags: sortedTags(dto.fallback.tags) },
});

export const categoryRulesConfig = defineConfig({
  source: 'categoryRules',
  schema: CategoryRulesSchema,
  build: buildSnapshot,
  defaults: { categories: [] },
});

const fuzzyScore = (merchant: string, candidate: string): number => {
  const score = bestTokenRatio(merchant, candidate);
  return merchant.includes(candidate) ? Math.max(score, CONTAINED_MERCHANT_SCORE) : score;
};

// Ordered cascade; the first stage that produces a match decides the category.
const stages: MatchStage[] = [
  (merchant, snapshot) => {
    const rule = snapshot.rules.find((candidate) => candidate.merchantExact.has(merchant));
    return rule ? { rule, score: 100, priority: 'exact' } : null;
  },
  (merchant, snapshot) => {
    let best: Match | null = null;

    for (const rule of snapshot.rules) {
      for (const candidate of rule.merchantFuzzy) {
        const score = fuzzyScore(merchant, candidate);
        if (score >= snapshot.fuzzyThreshold && (best === null || score > best.score)) {
          best = { rule, score };
        }
      }
    }

    return best ? { ...best, priority: 'fuzzy' } : null;
  },
  (merchant, snapshot) => {
    const rule = snapshot.rules.find((candidate) => candidate.keywords.some((keyword) => merchant.includes(keyword)));
    return rule ? { rule, score: 100, priority: 'keyword' } : null;
  },
];

export interface CategoryStatistics {
  total: number;
  byCategory: Record<string, number>;
  bySubcategory: Record<string, number>;
  uncategorized: number;
  uncategorizedRate: number;
}

export class RuleBasedCategorizer implements CategorizerPort {
  constructor(private readonly config: ReloadableConfig<CategoryRulesSnapshot>) {}

  categorize(input: CategorizationInput): CategoryAssignment {
    const snapshot = this.config.current;
    const merchant = normalizePayee(input.normalizedMerchant ?? input.payee);

    if (merchant !== null) {
      for (const stage of stages) {
        const match = stage(merchant, snapshot);
        if (match) {
          return {
            category: match.rule.category,
            subcategory: match.rule.subcategory,
            tags: match.rule.tags,
            matchPriority: match.priority,
            matchScore: Math.round(match.score),
          };
        }
      }
    }

    return {
      category: snapshot.fallback.category,
      subcategory: snapshot.fallback.subcategory,
      tags: snapshot.fallback.tags,
      matchPriority: 'fallback',
      matchScore: 0,
    };
  }

  categorizeBatch(inputs: readonly CategorizationInput[]): CategoryAssignment[] {
    return inputs.map((input) => this.categorize(input));
  }

  statistics(
    assignments: ReadonlyArray<Pick<CategoryAssignment, 'category' | 'subcategory' | 'matchPriority'>>,
  ): CategoryStatistics {
    const byCategory: Record<string, number> = {};
    const bySubcategory: Record<string, number> = {};
    let uncategorized = 0;

    for (const assignment of assignments) {
      byCategory[assignment.category] = (byCategory[assignment.category] ?? 0) + 1;
      const subKey = `${assignment.category}/${assignment.subcategory}`;
      bySubcategory[subKey] = (bySubcategory[subKey] ?? 0) + 1;

      if (assignment.matchPriority === 'fallback') {
        uncategorized += 1;
      }
    }

    return {
      total: assignments.length,
      byCategory,
      bySubcategory,
      uncategorized,
      uncategorizedRate: assignments.length === 0 ? 0 : uncategorized / assignments.length,
    };
  }
}
