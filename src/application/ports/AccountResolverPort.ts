import type { AccountMetadata } from '../../domain/entities/AccountMetadata.js';

export interface AccountResolverPort {
  extractCardSuffix(text: string): string | null;
  lookupAccount(suffix: string | null): AccountMetadata;
}
