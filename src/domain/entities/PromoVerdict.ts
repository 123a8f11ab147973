import type { ConfidenceLevel } from './Confidence.js';

export interface PromoVerdict {
  skip: boolean;
  reason: string;
  matchedKeywords: readonly string[];
  confidence: ConfidenceLevel;
}
