import { z } from 'zod';

export const BankDefinitionSchema = z.object({
  id: z.string().trim().min(1),
  name: z.string().optional(),
  patterns: z.array(z.string().min(1)).min(1),
});

export const BankPatternsSchema = z
  .object({
    banks: z.array(BankDefinitionSchema),
  })
  .superRefine((value, ctx) => {
    const seen = new Set<string>();
    value.banks.forEach((bank, index) => {
      if (seen.has(bank.id)) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['banks', index, 'id'], message: `Duplicate bank id ${bank.id}` });
      }
      seen.add(bank.id);
    });
  });

export type BankPatternsDTO = z.infer<typeof BankPatternsSchema>;
