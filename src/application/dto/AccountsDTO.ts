import { z } from 'zod';

export const AccountRecordSchema = z.object({
  accountId: z.string().trim().min(1),
  accountType: z.enum(['Credit', 'Debit', 'Prepaid']),
  interestRate: z.number().min(0).nullable().optional(),
  creditLimit: z.number().min(0).nullable().optional(),
  billingCycle: z.number().int().min(1).max(31).nullable().optional(),
  label: z.string().optional(),
});

export const AccountsSchema = z.object({
  accounts: z.record(z.string().regex(/^[0-9]{4}$/, 'Card suffix keys must be 4 digits'), AccountRecordSchema),
});

export type AccountRecordDTO = z.infer<typeof AccountRecordSchema>;
export type AccountsDTO = z.infer<typeof AccountsSchema>;
