/**
 * Application config
 * Read once from the environment (dotenv is loaded by the entry point).
 * DATABASE_URL absent means no store is configured: telemetry is still served
 * but sessions, history, export and summaries answer with store_unavailable.
 */

import { z } from 'zod';
import type { StoreSettings } from '@rover/adapters';

export const DEFAULT_IMAGE_URL =
  'https://images.unsplash.com/photo-1462331940025-496dfbfc7564?q=80&w=1600&auto=format&fit=crop';

const optionalString = z
  .string()
  .trim()
  .optional()
  .transform((v) => (v ? v : undefined));

const envSchema = z.object({
  PORT: z.coerce.number().int().min(1).max(65_535).default(8000),
  HOST: z.string().default('0.0.0.0'),
  DATABASE_URL: optionalString,
  DATABASE_NAME: optionalString,
  STORE_TIMEOUT_MS: z.coerce.number().int().min(100).max(120_000).default(5000),
  IMAGE_URL: z.string().url().default(DEFAULT_IMAGE_URL),
});

export interface AppConfig {
  port: number;
  host: string;
  imageUrl: string;
  store: StoreSettings | null;
  /** Whether the env vars were set, independent of whether the store answers. */
  env: {
    databaseUrlSet: boolean;
    databaseNameSet: boolean;
  };
}

export function loadAppConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const result = envSchema.safeParse(env);
  if (!result.success) {
    const errors = result.error.errors.map((e) => `${e.path.join('.')}: ${e.message}`).join(', ');
    throw new Error(`Invalid environment: ${errors}`);
  }
  const parsed = result.data;

  return {
    port: parsed.PORT,
    host: parsed.HOST,
    imageUrl: parsed.IMAGE_URL,
    store: parsed.DATABASE_URL
      ? {
          connectionString: parsed.DATABASE_URL,
          databaseName: parsed.DATABASE_NAME,
          timeoutMs: parsed.STORE_TIMEOUT_MS,
        }
      : null,
    env: {
      databaseUrlSet: parsed.DATABASE_URL !== undefined,
      databaseNameSet: parsed.DATABASE_NAME !== undefined,
    },
  };
}
