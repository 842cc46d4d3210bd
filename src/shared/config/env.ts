import dotenv from 'dotenv';
import { z } from 'zod';

const isTestRuntime =
  process.env.NODE_ENV === 'test' ||
  process.env.VITEST === 'true' ||
  process.env.VITEST_WORKER_ID !== undefined;

if (!isTestRuntime) {
  dotenv.config();
}

const hostnameSchema = z
  .string()
  .trim()
  .min(1)
  .refine((value) => !/[\s/]/.test(value) && !value.includes('://'), 'Must be a bare hostname or IP address.');

const testDefaults: Record<string, string> = {
  NODE_ENV: 'test',
  LOG_LEVEL: 'error',
  LMSTUDIO_HOST: 'localhost',
  LMSTUDIO_PORT: '1234',
  RATE_LIMIT_WINDOW: '60',
  RATE_LIMIT_MAX_REQUESTS: '30',
  MAX_CONTEXT_SIZE: '32000',
  BATCH_PACING_MS: '500',
  TIMEOUT_HEALTH_MS: '5000',
  TIMEOUT_PROBE_MS: '10000',
  TIMEOUT_CHAT_MS: '30000',
  TIMEOUT_LOAD_MS: '30000',
  MODEL_CACHE_TTL_SEC: '60',
  RECOMMENDED_MODEL: 'qwen2.5-coder-32b-instruct-q4_k_m',
  SIDEKICK_CLIENT_ID: 'default',
};

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).default('info'),

  // Backend
  LMSTUDIO_HOST: hostnameSchema.default('localhost'),
  LMSTUDIO_PORT: z.coerce.number().int().min(1).max(65535).default(1234),
  RECOMMENDED_MODEL: z.string().trim().min(1).default('qwen2.5-coder-32b-instruct-q4_k_m'),
  MODEL_CACHE_TTL_SEC: z.coerce.number().int().min(0).max(3600).default(60),

  // Throttling
  RATE_LIMIT_WINDOW: z.coerce.number().int().positive().max(86400).default(60),
  RATE_LIMIT_MAX_REQUESTS: z.coerce.number().int().positive().max(100000).default(30),
  SIDEKICK_CLIENT_ID: z.string().trim().min(1).default('default'),
  BATCH_PACING_MS: z.coerce.number().int().min(0).max(60000).default(500),

  // Context store
  MAX_CONTEXT_SIZE: z.coerce.number().int().positive().max(10_000_000).default(32000),

  // Timeouts
  TIMEOUT_HEALTH_MS: z.coerce.number().int().positive().max(120000).default(5000),
  TIMEOUT_PROBE_MS: z.coerce.number().int().positive().max(120000).default(10000),
  TIMEOUT_CHAT_MS: z.coerce.number().int().positive().max(600000).default(30000),
  TIMEOUT_LOAD_MS: z.coerce.number().int().positive().max(600000).default(30000),
});

export type EnvConfig = z.infer<typeof envSchema>;

export type AppConfig = EnvConfig & {
  /** Base URL of the OpenAI-compatible API, including the /v1 prefix. */
  backendBaseUrl: string;
  /** host:port, used in every user-facing status line. */
  backendLabel: string;
};

function withDerived(data: EnvConfig): AppConfig {
  return {
    ...data,
    backendBaseUrl: `http://${data.LMSTUDIO_HOST}:${data.LMSTUDIO_PORT}/v1`,
    backendLabel: `${data.LMSTUDIO_HOST}:${data.LMSTUDIO_PORT}`,
  };
}

/**
 * Validate a raw environment map into the application config.
 *
 * @throws ZodError when a variable is present but malformed.
 */
export function parseEnv(env: Record<string, string | undefined>): AppConfig {
  return withDerived(envSchema.parse(env));
}

const mergedEnv = {
  ...(process.env.NODE_ENV === 'test' ? testDefaults : {}),
  ...process.env,
};

const parsed = envSchema.safeParse(mergedEnv);

if (!parsed.success) {
  console.error('Invalid environment configuration:', parsed.error.format());
  process.exit(1);
}

export const config: AppConfig = withDerived(parsed.data);
