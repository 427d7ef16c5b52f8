import { z } from 'zod';

const booleanFlag = z
  .enum(['true', 'false', '1', '0'])
  .transform(value => value === 'true' || value === '1');

const envSchema = z.object({
  API_PORT: z.coerce.number().int().positive().default(3000),
  STORE_FILE: z.string().min(1).optional(),

  FETCH_TIMEOUT_MS: z.coerce.number().int().positive().default(10_000),
  FETCH_MAX_ATTEMPTS: z.coerce.number().int().min(1).default(3),
  RETRY_DELAY_MIN_MS: z.coerce.number().int().min(0).default(1000),
  RETRY_DELAY_MAX_MS: z.coerce.number().int().min(0).default(3000),
  BATCH_DELAY_MIN_MS: z.coerce.number().int().min(0).default(1000),
  BATCH_DELAY_MAX_MS: z.coerce.number().int().min(0).default(3000),

  RULE_SET: z.enum(['full', 'footer', 'policy']).default('full'),

  WORKER_ENABLED: booleanFlag.default('true'),
  WORKER_INTERVAL_SEC: z.coerce.number().int().positive().default(300),
  WORKER_ALL: booleanFlag.default('false'),

  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
});

const parsed = envSchema.safeParse(process.env);

if (!parsed.success) {
  console.error('Invalid environment variables:', parsed.error.flatten().fieldErrors);
  process.exit(1);
}

export const config = {
  apiPort: parsed.data.API_PORT,
  storeFile: parsed.data.STORE_FILE,
  fetch: {
    timeoutMs: parsed.data.FETCH_TIMEOUT_MS,
    maxAttempts: parsed.data.FETCH_MAX_ATTEMPTS,
    retryDelayMinMs: parsed.data.RETRY_DELAY_MIN_MS,
    retryDelayMaxMs: Math.max(parsed.data.RETRY_DELAY_MIN_MS, parsed.data.RETRY_DELAY_MAX_MS),
  },
  batch: {
    delayMinMs: parsed.data.BATCH_DELAY_MIN_MS,
    delayMaxMs: Math.max(parsed.data.BATCH_DELAY_MIN_MS, parsed.data.BATCH_DELAY_MAX_MS),
  },
  ruleSet: parsed.data.RULE_SET,
  worker: {
    enabled: parsed.data.WORKER_ENABLED,
    intervalMs: parsed.data.WORKER_INTERVAL_SEC * 1000,
    includeAnalyzed: parsed.data.WORKER_ALL,
  },
  nodeEnv: parsed.data.NODE_ENV,
  logLevel: parsed.data.LOG_LEVEL,
} as const;
