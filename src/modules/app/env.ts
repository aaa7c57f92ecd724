import { z } from 'zod';

const numeric = (name: string) =>
  z
    .string()
    .optional()
    .refine((v) => (v ? !Number.isNaN(Number(v)) : true), `${name} must be a number`);

export const envSchema = z
  .object({
    NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
    PORT: numeric('PORT'),

    // Shared secret for /daily and the admin endpoints (query `token` or `Authorization: Bearer`).
    // When unset, every endpoint is open (local development only).
    APP_TOKEN: z.string().optional(),

    // Upstream providers. Missing keys are terminal provider failures, not boot errors,
    // so the emoji day still works without them.
    SERPAPI_API_KEY: z.string().optional(),
    OPENAI_API_KEY: z.string().optional(),
    OPENAI_MODEL: z.string().optional(),

    // Durable state (JSON on disk).
    DATA_DIR: z.string().optional(),
    CACHE_FILE: z.string().optional(),
    HISTORY_FILE: z.string().optional(),

    // Reminder sources (line-oriented text files).
    BIRTHDAYS_FILE: z.string().optional(),
    ANNIVERSARIES_FILE: z.string().optional(),

    PROVIDER_MAX_ATTEMPTS: numeric('PROVIDER_MAX_ATTEMPTS'),
    PROVIDER_BASE_DELAY_MS: numeric('PROVIDER_BASE_DELAY_MS'),
    PROVIDER_MAX_DELAY_MS: numeric('PROVIDER_MAX_DELAY_MS'),
    PROVIDER_JITTER_MS: numeric('PROVIDER_JITTER_MS'),
    PROVIDER_TIMEOUT_MS: numeric('PROVIDER_TIMEOUT_MS'),
    NON_REPEAT_ROUNDS: numeric('NON_REPEAT_ROUNDS'),
    HISTORY_MAX_PER_WEEKDAY: numeric('HISTORY_MAX_PER_WEEKDAY'),
    LOCK_TTL_MS: numeric('LOCK_TTL_MS'),
    LOCK_WAIT_MS: numeric('LOCK_WAIT_MS'),

    RATE_LIMIT_TTL_SECONDS: numeric('RATE_LIMIT_TTL_SECONDS'),
    RATE_LIMIT_LIMIT: numeric('RATE_LIMIT_LIMIT'),

    LOG_REQUESTS: z.string().optional(),
    TRUST_PROXY: z.string().optional(),
  })
  .superRefine((env, ctx) => {
    if (env.NODE_ENV !== 'production') return;

    if (!env.APP_TOKEN || env.APP_TOKEN.length < 16) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['APP_TOKEN'],
        message: 'APP_TOKEN is required in production (min 16 chars)',
      });
    }
  });

export function validateEnv<TSchema extends z.ZodTypeAny>(schema: TSchema) {
  return (config: Record<string, unknown>) => {
    const parsed = schema.safeParse(config);
    if (!parsed.success) {
      // Nest expects thrown errors to abort bootstrap.
      throw new Error(
        `Invalid environment variables:\n${parsed.error.issues
          .map((i) => `- ${i.path.join('.')}: ${i.message}`)
          .join('\n')}`,
      );
    }
    return parsed.data;
  };
}
