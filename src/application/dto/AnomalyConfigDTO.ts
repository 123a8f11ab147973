import { z } from 'zod';
import { ANOMALY_RULES } from '../../domain/entities/Anomaly.js';

export const AnomalyConfigSchema = z.object({
  enabledRules: z.array(z.enum(ANOMALY_RULES)).default([...ANOMALY_RULES]),
  highValue: z
    .object({
      percentile: z.number().min(0).max(100).default(90),
      minHistory: z.number().int().min(1).default(10),
    })
    .default({}),
  burst: z
    .object({
      count: z.number().int().min(1).default(3),
      windowHours: z.number().positive().default(24),
    })
    .default({}),
  unknownMerchant: z
    .object({
      window: z.number().int().min(1).default(100),
    })
    .default({}),
});

export type AnomalyConfigDTO = z.infer<typeof AnomalyConfigSchema>;
