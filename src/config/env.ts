import dotenv from 'dotenv';
import { z } from 'zod';

dotenv.config();

const optionalString = z.preprocess(
  (value) => (typeof value === 'string' && value.trim() === '' ? undefined : value),
  z.string().min(1).optional()
);

const booleanString = z
  .enum(['true', 'false'])
  .default('false')
  .transform((value) => value === 'true');

const envSchema = z
  .object({
    PORT: z.string().default('3000'),
    NODE_ENV: z.enum(['development', 'staging', 'production', 'test']).default('development'),
    STORAGE_DRIVER: z.enum(['postgres', 'memory']).default('memory'),
    DATABASE_URL: optionalString,
    PII_ENCRYPTION_KEY: optionalString,
    REDIS_URL: optionalString,
    LLM_PROVIDER: z.enum(['anthropic', 'openai']).default('anthropic'),
    ANTHROPIC_API_KEY: optionalString,
    ANTHROPIC_MODEL: z.string().default('claude-3-5-haiku-latest'),
    OPENAI_API_KEY: optionalString,
    OPENAI_MODEL: z.string().default('gpt-4o-mini'),
    LLM_TEMPERATURE: z.coerce.number().min(0).max(2).default(0.3),
    USE_LLM_RESPONSES: booleanString,
    API_KEYS: optionalString,
    SENTRY_DSN: z.string().optional(),
  })
  .superRefine((value, ctx) => {
    if (value.STORAGE_DRIVER === 'postgres') {
      if (!value.DATABASE_URL) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['DATABASE_URL'], message: 'Required for postgres storage' });
      }
      if (!value.PII_ENCRYPTION_KEY) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['PII_ENCRYPTION_KEY'], message: 'Required for postgres storage' });
      }
    }
    if (value.LLM_PROVIDER === 'anthropic' && !value.ANTHROPIC_API_KEY) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['ANTHROPIC_API_KEY'], message: 'Required for the anthropic provider' });
    }
    if (value.LLM_PROVIDER === 'openai' && !value.OPENAI_API_KEY) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['OPENAI_API_KEY'], message: 'Required for the openai provider' });
    }
  });

export type Env = z.infer<typeof envSchema>;

const parsed = envSchema.safeParse(process.env);

if (!parsed.success) {
  console.error('❌ Invalid environment variables:', parsed.error.flatten().fieldErrors);
  process.exit(1);
}

export const env: Env = parsed.data;
