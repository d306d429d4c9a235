import { z } from 'zod';
import { EncryptedBlobSchema } from './noteSchemas';

/**
 * Schema for remote synchronisation tuning
 */
export const SyncSettingsSchema = z.object({
  remoteFolder: z.string().startsWith('/').default('/note-taker-pro'),
  maxAttempts: z.number().int().min(1).max(10).default(4),
  baseDelayMs: z.number().int().min(0).default(500),
  maxDelayMs: z.number().int().min(0).default(8000),
  timeoutMs: z.number().int().min(100).default(15000),
});

/**
 * Schema for the persisted application config file
 */
export const AppConfigSchema = z.object({
  encrypted: z.boolean().default(false),
  cloudSync: z.boolean().default(false),
  dropboxToken: z.string().min(1).nullable().default(null),
  timezone: z.string().min(1).default('UTC'),
  dataDir: z.string().min(1).optional(),
  sync: SyncSettingsSchema.default({}),
});

export type AppConfig = z.infer<typeof AppConfigSchema>;

/**
 * Schema for the key file. It stores what is needed to re-derive and verify
 * the key, never the key itself.
 */
export const KeyFileSchema = z.object({
  version: z.literal(1),
  kdf: z.literal('pbkdf2-sha256'),
  iterations: z.number().int().min(1),
  salt: z.string().min(1),
  check: EncryptedBlobSchema,
});

export type KeyFile = z.infer<typeof KeyFileSchema>;
