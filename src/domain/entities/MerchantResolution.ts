export interface MerchantResolution {
  merchant: string | null;
  matched: boolean;
  score: number;
}
