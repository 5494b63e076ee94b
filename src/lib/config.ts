import { z } from 'zod';
import { ConfigError } from './errors.js';

const positiveInt = (fallback: number) =>
  z.preprocess(
    (value) => (value === undefined || value === '' ? undefined : Number.parseInt(String(value), 10)),
    z.number().int().positive().default(fallback),
  );

const optionalString = z.preprocess(
  (value) => (typeof value === 'string' && value.trim() === '' ? undefined : value),
  z.string().optional(),
);

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  PORT: positiveInt(3001),
  SUPABASE_URL: z.string().url(),
  SUPABASE_SERVICE_ROLE_KEY: z.string().min(1),
  ANTHROPIC_API_KEY: optionalString,
  ANTHROPIC_MODEL: z.string().default('claude-sonnet-4-5-20250929'),
  ANTHROPIC_MODEL_LIGHT: z.string().default('claude-haiku-4-5-20251001'),
  MAX_TOKENS: positiveInt(4096),
  PERPLEXITY_API_KEY: optionalString,
  ALLOWED_ORIGINS: optionalString,
});

export interface AppConfig {
  env: 'development' | 'production' | 'test';
  port: number;
  supabase: { url: string; serviceRoleKey: string };
  anthropic: { apiKey?: string; model: string; lightModel: string; maxTokens: number };
  perplexityApiKey?: string;
  allowedOrigins: string[];
}

const DEV_ORIGINS = ['http://localhost:5173', 'http://localhost:3000'];

/**
 * Parses the process environment into a typed config. Throws ConfigError
 * listing every failing variable.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new ConfigError(`Invalid environment configuration (${issues.join('; ')})`, issues);
  }

  const e = parsed.data;
  const allowedOrigins = e.ALLOWED_ORIGINS
    ? e.ALLOWED_ORIGINS.split(',').map((o) => o.trim()).filter(Boolean)
    : e.NODE_ENV === 'production'
      ? []
      : DEV_ORIGINS;

  return {
    env: e.NODE_ENV,
    port: e.PORT,
    supabase: { url: e.SUPABASE_URL, serviceRoleKey: e.SUPABASE_SERVICE_ROLE_KEY },
    anthropic: {
      apiKey: e.ANTHROPIC_API_KEY,
      model: e.ANTHROPIC_MODEL,
      lightModel: e.ANTHROPIC_MODEL_LIGHT,
      maxTokens: e.MAX_TOKENS,
    },
    perplexityApiKey: e.PERPLEXITY_API_KEY,
    allowedOrigins,
  };
}
