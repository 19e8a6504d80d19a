import { z } from 'zod';

/** Accepts the usual spellings of a boolean env var; anything else is a validation error. */
const booleanFlag = z
  .enum(['true', 'false', '1', '0', 'yes', 'no'])
  .transform((value) => value === 'true' || value === '1' || value === 'yes');

const envSchema = z.object({
  NODE_ENV: z.string().default('dev'),
  PORT: z.coerce.number().int().positive().default(3000),

  // Which backend every store uses; memory keeps all data in-process.
  STORE_DRIVER: z.enum(['mysql', 'memory']).default('mysql'),

  DB_HOST: z.string().min(1).optional(),
  DB_PORT: z.coerce.number().int().positive().default(3306),
  DB_USER: z.string().min(1).optional(),
  DB_PASSWORD: z.string().optional(),
  DB_NAME: z.string().min(1).optional(),
  DB_SSL: booleanFlag.default('true'),
  DB_SSL_REJECT_UNAUTHORIZED: booleanFlag.default('true'),
  DB_SSL_CA_PATH: z.string().min(1).optional(),

  TOKEN_SIGNING_KEY_NAME: z.string().min(1).default('jwt-signing'),
  TOKEN_VALIDITY_SECONDS: z.coerce.number().int().positive().default(3600),
  KEY_AUTO_PROVISION: booleanFlag.default('false'),

  MEMORY_SEED_PATH: z.string().min(1).optional(),
  CORS_ORIGINS: z.string().optional(),
  SWAGGER_ENABLED: booleanFlag.default('true')
});

export type AppEnv = z.infer<typeof envSchema>;

/**
 * Validate environment variables at startup.
 * Error messages name the offending keys only, never their values.
 */
export function validateEnv(config: Record<string, unknown>): AppEnv {
  const result = envSchema.safeParse(config);

  if (!result.success) {
    const keys = Array.from(
      new Set(
        result.error.issues
          .map((issue) => issue.path[0])
          .filter((k): k is string => typeof k === 'string' && k.length > 0)
      )
    );
    const keyList = keys.length > 0 ? keys.join(', ') : 'unknown keys';
    throw new Error(`Invalid environment configuration. Missing/invalid: ${keyList}.`);
  }

  const parsed = result.data;

  if (parsed.STORE_DRIVER === 'mysql') {
    const missing: string[] = [];
    if (!parsed.DB_HOST) missing.push('DB_HOST');
    if (!parsed.DB_USER) missing.push('DB_USER');
    if (!parsed.DB_NAME) missing.push('DB_NAME');

    if (missing.length > 0) {
      throw new Error(`Invalid environment configuration. Missing/invalid: ${missing.join(', ')}.`);
    }
  }

  if (parsed.MEMORY_SEED_PATH && parsed.STORE_DRIVER !== 'memory') {
    throw new Error('Invalid environment configuration. MEMORY_SEED_PATH requires STORE_DRIVER=memory.');
  }

  return parsed;
}
