import { z } from 'zod';
import { EXTRACTION_FIELDS } from '../../domain/entities/ExtractionTemplate.js';

export const ExtractionFieldSchema = z.enum(EXTRACTION_FIELDS);

export const FieldPatternsSchema = z
  .object({
    amount: z.string().min(1).optional(),
    currency: z.string().min(1).optional(),
    date: z.string().min(1).optional(),
    payee: z.string().min(1).optional(),
    transactionType: z.string().min(1).optional(),
    cardSuffix: z.string().min(1).optional(),
  })
  .strict();

export const ExtractionTemplateSchema = z
  .object({
    name: z.string().trim().min(1),
    patterns: FieldPatternsSchema,
    requiredFields: z.array(ExtractionFieldSchema).default(['amount']),
  })
  .superRefine((template, ctx) => {
    template.requiredFields.forEach((field, index) => {
      if (!template.patterns[field]) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['requiredFields', index],
          message: `Required field ${field} has no pattern in template ${template.name}`,
        });
      }
    });
  });

export const ExtractionTemplatesSchema = z.object({
  banks: z.array(
    z.object({
      bankId: z.string().trim().min(1),
      templates: z.array(ExtractionTemplateSchema),
    }),
  ),
});

export type ExtractionTemplateDTO = z.infer<typeof ExtractionTemplateSchema>;
export type ExtractionTemplatesDTO = z.infer<typeof ExtractionTemplatesSchema>;
