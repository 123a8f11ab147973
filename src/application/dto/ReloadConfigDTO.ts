import { z } from 'zod';

export const CONFIG_SOURCES = [
  'promoKeywords',
  'bankPatterns',
  'extractionTemplates',
  'accounts',
  'merchantAliases',
  'categoryRules',
  'anomalyRules',
] as const;

export type ConfigSourceName = (typeof CONFIG_SOURCES)[number];

export const ReloadConfigRequestSchema = z.object({
  source: z.enum(CONFIG_SOURCES).optional(),
});

export type ReloadConfigRequestDTO = z.infer<typeof ReloadConfigRequestSchema>;

export type ReloadStatus = 'reloaded' | 'missing' | 'rejected' | 'static';

export interface ReloadOutcomeDTO {
  source: ConfigSourceName;
  status: ReloadStatus;
  message: string;
}
