import type { CategoryAssignment } from '../../domain/entities/CategoryAssignment.js';

export interface CategorizationInput {
  payee: string | null;
  normalizedMerchant?: string | null;
}

export interface CategorizerPort {
  categorize(input: CategorizationInput): CategoryAssignment;
  categorizeBatch(inputs: readonly CategorizationInput[]): CategoryAssignment[];
}
