import { z } from 'zod';

export const MerchantAliasesSchema = z.object({
  fuzzyThreshold: z.number().min(0).max(100).default(85),
  merchants: z.array(
    z.object({
      canonical: z.string().trim().min(1),
      aliases: z.array(z.string().trim().min(1)).default([]),
    }),
  ),
});

export type MerchantAliasesDTO = z.infer<typeof MerchantAliasesSchema>;
