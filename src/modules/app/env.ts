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
    DATABASE_URL: z.string().min(1, 'DATABASE_URL is required'),
    // Let TypeORM create/alter tables from the entities. Convenient locally, never in production.
    DATABASE_SYNCHRONIZE: z.string().optional(),
    DATABASE_LOGGING: z.string().optional(),
    DATABASE_SLOW_QUERY_MS: numeric('DATABASE_SLOW_QUERY_MS'),

    // Comma-separated list of allowed web origins for CORS (must be explicit when using cookies).
    ALLOWED_ORIGINS: z.string().optional().default('http://localhost:3000'),

    SESSION_HMAC_SECRET: z.string().optional(),
    SESSION_TTL_DAYS: numeric('SESSION_TTL_DAYS'),
    COOKIE_DOMAIN: z.string().optional(),
  })
  .superRefine((env, ctx) => {
    if (env.NODE_ENV !== 'production') return;

    if (!env.SESSION_HMAC_SECRET || env.SESSION_HMAC_SECRET.length < 16) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['SESSION_HMAC_SECRET'],
        message: 'SESSION_HMAC_SECRET is required in production (min 16 chars)',
      });
    }

    if (['1', 'true', 'yes', 'on'].includes((env.DATABASE_SYNCHRONIZE ?? '').trim().toLowerCase())) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['DATABASE_SYNCHRONIZE'],
        message: 'DATABASE_SYNCHRONIZE must be off in production',
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
