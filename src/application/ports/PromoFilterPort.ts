import type { PromoVerdict } from '../../domain/entities/PromoVerdict.js';

export interface PromoFilterPort {
  classify(text: string): PromoVerdict;
  classifyBatch(texts: readonly string[]): PromoVerdict[];
}
