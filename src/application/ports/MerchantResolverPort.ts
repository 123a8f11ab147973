import type { MerchantResolution } from '../../domain/entities/MerchantResolution.js';

export interface MerchantResolverPort {
  resolve(payee: string | null): MerchantResolution;
}
