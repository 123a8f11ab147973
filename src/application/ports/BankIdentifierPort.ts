import type { BankMatch } from '../../domain/entities/BankMatch.js';

export interface BankIdentifierPort {
  identify(text: string): BankMatch;
  identifyBatch(texts: readonly string[]): BankMatch[];
}
