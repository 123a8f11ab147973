import { z } from 'zod';

export const CategoryRuleSchema = z.object({
  category: z.string().trim().min(1),
  subcategory: z.string().trim().min(1).default('General'),
  tags: z.array(z.string()).default([]),
  merchantExact: z.array(z.string().min(1)).default([]),
  merchantFuzzy: z.array(z.string().min(1)).default([]),
  keywords: z.record(z.array(z.string().min(1))).default({}),
});

export const CategoryRulesSchema = z.object({
  fuzzyThreshold: z.number().min(0).max(100).default(80),
  categories: z.array(CategoryRuleSchema),
  fallback: z
    .object({
      category: z.string().default('Uncategorized'),
      subcategory: z.string().default('General'),
      tags: z.array(z.string()).default([]),
    })
    .default({}),
});

export type CategoryRuleDTO = z.infer<typeof CategoryRuleSchema>;
export type CategoryRulesDTO = z.infer<typeof CategoryRulesSchema>;
