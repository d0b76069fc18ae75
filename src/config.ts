import path from 'node:path';
import { z } from 'zod';

export type UnresolvedCategoryPolicy = 'reject' | 'uncategorized';

export interface CatalogConfig {
  port: number;
  host: string;
  contentRoot: string;
  allowedExtensions: string[];
  thumbnail: {
    maxWidth: number;
    maxHeight: number;
    quality: number;
  };
  pageSize: number;
  unresolvedCategory: UnresolvedCategoryPolicy;
  requireOwner: boolean;
  maxUploadBytes: number;
  databaseUrl?: string;
  redis: {
    host: string;
    port: number;
    password?: string;
  };
}

const booleanFlag = z
  .enum(['true', 'false', '1', '0', 'yes', 'no'])
  .transform((value) => value === 'true' || value === '1' || value === 'yes');

const extensionList = z
  .string()
  .transform((value) =>
    value
      .split(',')
      .map((ext) => ext.trim().replace(/^\./, '').toLowerCase())
      .filter(Boolean)
  )
  .pipe(z.array(z.string().regex(/^[a-z0-9]+$/)).min(1));

const envSchema = z.object({
  PORT: z.coerce.number().int().min(0).max(65535).default(3000),
  HOST: z.string().min(1).default('0.0.0.0'),
  CONTENT_ROOT: z.string().min(1).default('./uploads'),
  ALLOWED_EXTENSIONS: extensionList.default('jpg,jpeg,png,gif,webp'),
  THUMBNAIL_MAX_WIDTH: z.coerce.number().int().positive().default(200),
  THUMBNAIL_MAX_HEIGHT: z.coerce.number().int().positive().default(200),
  THUMBNAIL_QUALITY: z.coerce.number().int().min(1).max(100).default(85),
  PAGE_SIZE: z.coerce.number().int().positive().default(20),
  UNRESOLVED_CATEGORY: z.enum(['reject', 'uncategorized']).default('reject'),
  REQUIRE_OWNER: booleanFlag.default('false'),
  MAX_UPLOAD_BYTES: z.coerce.number().int().positive().default(20 * 1024 * 1024),
  DATABASE_URL: z.string().optional(),
  REDIS_HOST: z.string().default('localhost'),
  REDIS_PORT: z.coerce.number().int().positive().default(6379),
  REDIS_PASSWORD: z.string().optional(),
});

/**
 * Build the catalog configuration from environment variables.
 * Throws a ZodError naming every invalid variable.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): CatalogConfig {
  const parsed = envSchema.parse(env);

  return {
    port: parsed.PORT,
    host: parsed.HOST,
    contentRoot: path.resolve(parsed.CONTENT_ROOT),
    allowedExtensions: parsed.ALLOWED_EXTENSIONS,
    thumbnail: {
      maxWidth: parsed.THUMBNAIL_MAX_WIDTH,
      maxHeight: parsed.THUMBNAIL_MAX_HEIGHT,
      quality: parsed.THUMBNAIL_QUALITY,
    },
    pageSize: parsed.PAGE_SIZE,
    unresolvedCategory: parsed.UNRESOLVED_CATEGORY,
    requireOwner: parsed.REQUIRE_OWNER,
    maxUploadBytes: parsed.MAX_UPLOAD_BYTES,
    databaseUrl: parsed.DATABASE_URL || undefined,
    redis: {
      host: parsed.REDIS_HOST,
      port: parsed.REDIS_PORT,
      password: parsed.REDIS_PASSWORD || undefined,
    },
  };
}
