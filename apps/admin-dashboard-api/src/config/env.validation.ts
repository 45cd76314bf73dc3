import { z } from 'zod';

/**
 * Environment schema for the admin dashboard service.
 * Only the auth module address is required; everything else has a default.
 */
const envSchema = z.object({
  NODE_ENV: z.string().min(1).default('development'),
  PORT: z.coerce.number().int().positive().default(8200),

  // Base URL of the auth module, the service of record for user accounts
  AUTH_MODULE_URL: z
    .string()
    .url()
    .refine((value) => /^https?:\/\//i.test(value), { message: 'must be an http(s) URL' }),
  AUTH_MODULE_TIMEOUT_MS: z.coerce.number().int().positive().default(10_000),

  // Paths embedded in the generated UI documents
  API_BASE_PATH: z.string().startsWith('/').default('/api'),
  UI_BASE_PATH: z.string().startsWith('/').default('/ui'),

  // Comma-separated allow list; empty means any origin
  CORS_ORIGINS: z.string().optional(),
  SWAGGER_ENABLED: z
    .string()
    .optional()
    .transform((value) => (value ? value.trim().toLowerCase() !== 'false' : true))
});

export type AppEnv = z.infer<typeof envSchema>;

/**
 * Validate environment variables once at startup.
 * A failure here is fatal: the process must not serve traffic without an auth module address.
 */
export function validateEnv(config: Record<string, unknown>): AppEnv {
  try {
    return envSchema.parse(config);
  } catch (err: unknown) {
    if (err instanceof z.ZodError) {
      const keys = Array.from(
        new Set(
          err.issues
            .map((issue) => issue.path[0])
            .filter((k): k is string => typeof k === 'string' && k.length > 0)
        )
      );

      const keyList = keys.length > 0 ? keys.join(', ') : 'unknown keys';
      throw new Error(
        `Invalid environment configuration. Missing/invalid: ${keyList}. ` +
          `Set them in the environment, or in .env.local in the working directory (see apps/admin-dashboard-api/.env.example).`
      );
    }
    throw err;
  }
}
