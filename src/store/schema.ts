import { z } from 'zod';

export const namespaceRecordSchema = z
  .object({
    namespace_id: z
      .string()
      .trim()
      .min(1, 'namespace_id must not be empty')
      // Classification replies are read token by token.
      .regex(/^[^\s,]+$/, 'namespace_id must be a single token without spaces or commas'),
    title: z.string().default('N/A'),
    description: z.string().default('N/A'),
  })
  .passthrough();

export const knowledgeStoreSchema = z
  .object({
    namespaces: z.array(namespaceRecordSchema).optional(),
    dataset: z.array(namespaceRecordSchema).optional(),
  })
  .passthrough()
  .refine((store) => store.namespaces !== undefined || store.dataset !== undefined, {
    message: 'Knowledge store must contain a "namespaces" (or "dataset") array.',
  });

export type NamespaceRecord = z.infer<typeof namespaceRecordSchema>;
