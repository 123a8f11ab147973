export type ConfidenceLevel = 'low' | 'medium' | 'high';

const rank: Record<ConfidenceLevel, number> = { low: 0, medium: 1, high: 2 };

export const compareConfidence = (a: ConfidenceLevel, b: ConfidenceLevel): number => rank[a] - rank[b];

export const confidenceFromMatchCount = (count: number): ConfidenceLevel => {
  if (count >= 3) {
    return 'high';
  }

  return count === 2 ? 'medium' : 'low';
};
