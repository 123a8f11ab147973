import { AccountsSchema, type AccountsDTO } from '../../../application/dto/AccountsDTO.js';
import type { AccountResolverPort } from '../../../application/ports/AccountResolverPort.js';
import type { LoggerPort } from '../../../application/ports/LoggerPort.js';
import type { AccountMetadata } from '../../../domain/entities/AccountMetadata.js';
import { assertCardSuffix } from '../../../domain/errors/InvariantViolationError.js';
import { convertArabicIndicDigits } from '../../../domain/services/TextNormalizer.js';
import { defineConfig, ReloadableConfig } from '../../config/ReloadableConfig.js';

export interface AccountsSnapshot {
  readonly accounts: ReadonlyMap<string, AccountMetadata>;
}

// English forms first, then Arabic. The trailing (?!\d) rejects longer digit runs.
const cardSuffixPatterns: readonly RegExp[] = [
  /(?:ending|card ending|ends with)\s+(\d{4})(?!\d)/i,
  /card\s+(?:number\s+)?(?:\*+\s*)?(\d{4})(?!\d)/i,
  /\*+(\d{4})(?!\d)/,
  /(?:رقم|بطاقة رقم|ينتهي)\s+(\d{4})(?!\d)/u,
  /بطاقة\s+(?:\*+\s*)?(\d{4})(?!\d)/u,
];

const buildSnapshot = (dto: AccountsDTO): AccountsSnapshot => {
  const accounts = new Map<string, AccountMetadata>();

  for (const [suffix, record] of Object.entries(dto.accounts)) {
    accounts.set(suffix, {
      accountId: record.accountId,
      accountType: record.accountType,
      interestRate: record.interestRate ?? null,
      creditLimit: record.creditLimit ?? null,
      billingCycle: record.billingCycle ?? null,
      label: record.label ?? record.accountId,
      isKnown: true,
    });
  }

  return { accounts };
};

export const accountsConfig = defineConfig({
  source: 'accounts',
  schema: AccountsSchema,
  build: buildSnapshot,
  defaults: { accounts: {} },
});

const unknownAccount = (suffix: string | null): AccountMetadata => ({
  accountId: suffix === null ? 'unknown' : `unknown_${suffix}`,
  accountType: 'Unknown',
  interestRate: null,
  creditLimit: null,
  billingCycle: null,
  label: suffix === null ? 'No card suffix in SMS' : 'Unknown card',
  isKnown: false,
});

export class CardAccountResolver implements AccountResolverPort {
  constructor(
    private readonly config: ReloadableConfig<AccountsSnapshot>,
    private readonly logger: LoggerPort = console,
  ) {}

  extractCardSuffix(text: string): string | null {
    if (!text) {
      return null;
    }

    const converted = convertArabicIndicDigits(text);

    for (const pattern of cardSuffixPatterns) {
      const match = pattern.exec(converted);
      if (match?.[1]) {
        return match[1];
      }
    }

    return null;
  }

  lookupAccount(suffix: string | null): AccountMetadata {
    if (suffix === null) {
      return unknownAccount(null);
    }

    assertCardSuffix(suffix);

    const account = this.config.current.accounts.get(suffix);
    if (!account) {
      this.logger.warn(`⚠️ Unknown card suffix ${suffix}`);
      return unknownAccount(suffix);
    }

    return { ...account };
  }

  resolve(text: string): { cardSuffix: string | null; account: AccountMetadata } {
    const cardSuffix = this.extractCardSuffix(text);
    return { cardSuffix, account: this.lookupAccount(cardSuffix) };
  }

  knownSuffixes(): string[] {
    return [...this.config.current.accounts.keys()];
  }
}
