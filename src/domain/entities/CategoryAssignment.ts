export type CategoryMatchPriority = 'exact' | 'fuzzy' | 'keyword' | 'fallback';

export interface CategoryAssignment {
  category: string;
  subcategory: string;
  tags: readonly string[];
  matchPriority: CategoryMatchPriority;
  matchScore: number;
}
