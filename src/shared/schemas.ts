import { z } from 'zod';

export const CACHE_FORMAT_VERSION = 1;

export const PolicyDetailSchema = z.object({
  name: z.string(),
  versionId: z.string(),
  description: z.string(),
  documentText: z.string(),
  contentHash: z.string(),
});

export const CacheFileSchema = z.object({
  format: z.number().int(),
  entries: z.record(PolicyDetailSchema),
});

export type CacheFile = z.infer<typeof CacheFileSchema>;

export const LedgerConfigSchema = z.object({
  cache: z
    .object({
      path: z.string().min(1).optional(),
      bucket: z.string().min(1).optional(),
      key: z.string().min(1).optional(),
    })
    .optional(),
  aws: z
    .object({
      region: z.string().min(1).optional(),
      profile: z.string().min(1).optional(),
    })
    .optional(),
  log_level: z.enum(['debug', 'info', 'warn', 'error']).optional(),
});

export type LedgerConfigFile = z.infer<typeof LedgerConfigSchema>;
