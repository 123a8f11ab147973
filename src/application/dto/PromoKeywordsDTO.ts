import { z } from 'zod';

export const PromoKeywordLanguageSchema = z.object({
  keywords: z.array(z.string().trim().min(1)),
});

export const PromoKeywordsSchema = z.object({
  languages: z.record(PromoKeywordLanguageSchema),
});

export type PromoKeywordsDTO = z.infer<typeof PromoKeywordsSchema>;
