import { z } from 'zod';

const numeric = (name: string) =>
  z
    .string()
    .optional()
    .refine((v) => (v ? !Number.isNaN(Number(v)) : true), `${name} must be a number`);

export const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
  PORT: numeric('PORT'),
  DATABASE_URL: z.string().min(1, 'DATABASE_URL is required'),
  REDIS_URL: z.string().optional(),

  // Process roles. A single process can host the API, the job consumers and the schedulers.
  RUN_HTTP: z.string().optional(),
  RUN_JOB_CONSUMERS: z.string().optional(),
  RUN_SCHEDULERS: z.string().optional(),
  RUN_MIGRATIONS: z.string().optional(),
  DB_CONNECT_RETRIES: numeric('DB_CONNECT_RETRIES'),
  DB_CONNECT_RETRY_DELAY_MS: numeric('DB_CONNECT_RETRY_DELAY_MS'),

  // Filter stream
  STREAM_URL: z.string().url().optional(),
  STREAM_BEARER_TOKEN: z.string().optional(),
  // Comma-separated. Empty means "follow only" (keyword matching never succeeds).
  STREAM_KEYWORDS: z.string().optional().default(''),
  STREAM_RECENT_WINDOW: numeric('STREAM_RECENT_WINDOW'),
  STREAM_RESTART_MIN_INTERVAL_MS: numeric('STREAM_RESTART_MIN_INTERVAL_MS'),

  // Profile lookups
  PROFILE_API_URL: z.string().url().optional(),
  PROFILE_API_BEARER_TOKEN: z.string().optional(),
  USERS_REFRESH_CHUNK_SIZE: numeric('USERS_REFRESH_CHUNK_SIZE'),
  USERS_REFRESH_DELAY_MS: numeric('USERS_REFRESH_DELAY_MS'),

  REPLIES_SWEEP_BATCH_SIZE: numeric('REPLIES_SWEEP_BATCH_SIZE'),

  ADMIN_API_TOKEN: z.string().optional(),
}).superRefine((env, ctx) => {
  if (env.NODE_ENV !== 'production') return;

  if (!env.ADMIN_API_TOKEN || env.ADMIN_API_TOKEN.length < 16) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ['ADMIN_API_TOKEN'],
      message: 'ADMIN_API_TOKEN is required in production (min 16 chars)',
    });
  }
});

export type Env = z.infer<typeof envSchema>;

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
