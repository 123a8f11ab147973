import { z } from 'zod';

export const StoreModeSchema = z.enum(['skip', 'upsert']);

export type StoreMode = z.infer<typeof StoreModeSchema>;

// Ten concatenated SMS segments.
export const MAX_MESSAGE_LENGTH = 1600;
export const MAX_BATCH_SIZE = 500;

export const RawMessageSchema = z.object({
  text: z.string().max(MAX_MESSAGE_LENGTH),
  sourceTimestamp: z.string().nullable().optional(),
  fileCreatedAt: z.string().nullable().optional(),
});

export const RawMessageBatchSchema = z.array(RawMessageSchema).min(1).max(MAX_BATCH_SIZE);

export const ProcessMessagesRequestSchema = z.object({
  messages: RawMessageBatchSchema,
  mode: StoreModeSchema.optional(),
});

export type ProcessMessagesRequestDTO = z.infer<typeof ProcessMessagesRequestSchema>;

export const UploadMessagesFormSchema = z.object({
  mode: StoreModeSchema.optional(),
  lastModified: z.string().optional(),
});
