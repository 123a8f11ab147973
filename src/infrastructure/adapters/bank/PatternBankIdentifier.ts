import { BankPatternsSchema, type BankPatternsDTO } from '../../../application/dto/BankPatternsDTO.js';
import type { BankIdentifierPort } from '../../../application/ports/BankIdentifierPort.js';
import type { LoggerPort } from '../../../application/ports/LoggerPort.js';
import { unmatchedBank, type BankMatch } from '../../../domain/entities/BankMatch.js';
import { partialRatio } from '../../../domain/services/FuzzyMatcher.js';
import { defineConfig, ReloadableConfig } from '../../config/ReloadableConfig.js';

interface CompiledBank {
  id: string;
  name: string;
  patterns: readonly string[];
  matchers: ReadonlyArray<(text: string) => boolean>;
}

export interface BankPatternsSnapshot {
  readonly banks: readonly CompiledBank[];
}

export interface BankIdentifierOptions {
  fuzzyEnabled?: boolean;
  fuzzyThreshold?: number;
}

const EXACT_SCORE = 100;
// Fuzzy scoring rescans every window of the text per pattern; only this much of it is scanned.
export const FUZZY_SCAN_LIMIT = 1600;

// Patterns are regex fragments; anything that fails to compile is matched literally.
const compilePattern = (pattern: string): ((text: string) => boolean) => {
  try {
    const regex = new RegExp(pattern, 'iu');
    return (text) => regex.test(text);
  } catch {
    const needle = pattern.toLowerCase();
    return (text) => text.toLowerCase().includes(needle);
  }
};

const buildSnapshot = (dto: BankPatternsDTO): BankPatternsSnapshot => ({
  banks: dto.banks.map((bank) => ({
    id: bank.id,
    name: bank.name ?? bank.id,
    patterns: [...bank.patterns],
    matchers: bank.patterns.map(compilePattern),
  })),
});

export const bankPatternsConfig = defineConfig({
  source: 'bankPatterns',
  schema: BankPatternsSchema,
  build: buildSnapshot,
  defaults: { banks: [] },
});

export class PatternBankIdentifier implements BankIdentifierPort {
  private readonly fuzzyEnabled: boolean;
  private readonly fuzzyThreshold: number;

  constructor(
    private readonly config: ReloadableConfig<BankPatternsSnapshot>,
    options: BankIdentifierOptions = {},
    private readonly logger: LoggerPort = console,
  ) {
    this.fuzzyEnabled = options.fuzzyEnabled ?? true;
    this.fuzzyThreshold = options.fuzzyThreshold ?? 80;
  }

  identify(text: string): BankMatch {
    if (!text || !text.trim()) {
      return unmatchedBank();
    }

    const { banks } = this.config.current;

    const exact = banks.find((bank) => bank.matchers.some((matches) => matches(text)));
    if (exact) {
      return { bankId: exact.id, confidenceScore: EXACT_SCORE, matchKind: 'exact', unmatched: false };
    }

    if (this.fuzzyEnabled) {
      const fuzzy = this.bestFuzzyMatch(banks, text);
      if (fuzzy) {
        return fuzzy;
      }
    }

    this.logger.warn(`⚠️ No bank pattern matched message: ${text.slice(0, 40)}`);
    return unmatchedBank();
  }

  identifyBatch(texts: readonly string[]): BankMatch[] {
    return texts.map((text) => this.identify(text));
  }

  statistics(texts: readonly string[]): Record<string, number> {
    const counts: Record<string, number> = {};

    for (const match of this.identifyBatch(texts)) {
      counts[match.bankId] = (counts[match.bankId] ?? 0) + 1;
    }

    return counts;
  }

  supportedBanks(): Array<{ id: string; name: string; patterns: readonly string[] }> {
    return this.config.current.banks.map(({ id, name, patterns }) => ({ id, name, patterns }));
  }

  private bestFuzzyMatch(banks: readonly CompiledBank[], text: string): BankMatch | null {
    const haystack = text.slice(0, FUZZY_SCAN_LIMIT).toLowerCase();
    let best: { bank: CompiledBank; score: number } | null = null;

    for (const bank of banks) {
      const score = Math.max(...bank.patterns.map((pattern) => partialRatio(pattern.toLowerCase(), haystack)));

      // Strictly greater keeps the earlier bank on ties.
      if (score >= this.fuzzyThreshold && (best === null || score > best.score)) {
        best = { bank, score };
      }
    }

    if (best === null) {
      return null;
    }

    return { bankId: best.bank.id, confidenceScore: Math.round(best.score), matchKind: 'fuzzy', unmatched: false };
  }
}
