/**
 * Environment Configuration
 * =========================
 *
 * Single typed view over process.env. Everything that reads configuration
 * goes through `env` (or `loadEnv` in tests), never process.env directly.
 */

import 'dotenv/config';
import { z } from 'zod';
import { HotkeySchema } from '../modules/dividends/dividend.contracts.js';

const bool = z
  .enum(['true', 'false', '1', '0'])
  .transform((v) => v === 'true' || v === '1');

const EnvSchema = z
  .object({
    NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
    PORT: z.coerce.number().int().positive().default(8000),
    HOST: z.string().default('0.0.0.0'),
    LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
    CORS_ORIGINS: z.string().default('*'),
    API_PREFIX: z.string().default('/api/v1'),
    API_AUTH_TOKEN: z.string().min(1),

    MONGODB_URI: z.string().default('mongodb://localhost:27017/tao_dividends'),
    STORAGE_DRIVER: z.enum(['mongo', 'memory']).default('mongo'),

    CACHE_TTL_SECONDS: z.coerce.number().int().positive().default(120),
    LOCK_TTL_SECONDS: z.coerce.number().int().positive().default(600),
    TASK_DEADLINE_SECONDS: z.coerce.number().int().positive().default(480),
    QUEUE_LEASE_SECONDS: z.coerce.number().int().positive().default(540),

    DEFAULT_NETUID: z.coerce.number().int().min(0).max(65535).default(18),
    DEFAULT_HOTKEY: HotkeySchema,

    CHAIN_PROVIDER: z.enum(['mock', 'http']).default('mock'),
    CHAIN_GATEWAY_URL: z.string().url().default('http://localhost:9944'),
    CHAIN_TIMEOUT_MS: z.coerce.number().int().positive().default(10_000),
    CHAIN_QUERY_ATTEMPTS: z.coerce.number().int().min(1).max(10).default(2),

    DATURA_API_KEY: z.string().default(''),
    DATURA_BASE_URL: z.string().url().default('https://apis.datura.ai'),
    CHUTES_API_KEY: z.string().default(''),
    CHUTES_BASE_URL: z.string().url().default('https://llm.chutes.ai/v1'),
    CHUTES_MODEL: z.string().default('unsloth/Llama-3.2-3B-Instruct'),
    SENTIMENT_TIMEOUT_MS: z.coerce.number().int().positive().default(15_000),
    SENTIMENT_MAX_POSTS: z.coerce.number().int().min(1).max(100).default(10),

    TRADE_UNIT_AMOUNT: z.coerce.number().positive().default(1),
    TRADE_MAX_AMOUNT: z.coerce.number().positive().default(1),

    RETRY_MAX_ATTEMPTS: z.coerce.number().int().min(1).max(10).default(3),
    RETRY_BASE_DELAY_MS: z.coerce.number().int().min(0).default(1000),

    WORKER_CONCURRENCY: z.coerce.number().int().min(1).max(64).default(4),
    WORKER_POLL_MS: z.coerce.number().int().positive().default(500),
    WORKERS_IN_PROCESS: bool.default('true'),
  })
  .superRefine((cfg, ctx) => {
    // lock must outlive both the task deadline and the queue lease
    if (cfg.TASK_DEADLINE_SECONDS >= cfg.LOCK_TTL_SECONDS) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['TASK_DEADLINE_SECONDS'],
        message: 'must be shorter than LOCK_TTL_SECONDS',
      });
    }
    if (cfg.QUEUE_LEASE_SECONDS <= cfg.TASK_DEADLINE_SECONDS || cfg.QUEUE_LEASE_SECONDS >= cfg.LOCK_TTL_SECONDS) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['QUEUE_LEASE_SECONDS'],
        message: 'must lie between TASK_DEADLINE_SECONDS and LOCK_TTL_SECONDS',
      });
    }
  });

export type Env = Readonly<z.infer<typeof EnvSchema>>;

export function loadEnv(source: Record<string, string | undefined> = process.env): Env {
  const parsed = EnvSchema.safeParse(source);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((i) => `  - ${i.path.join('.') || '(root)'}: ${i.message}`)
      .join('\n');
    throw new Error(`Invalid environment configuration:\n${issues}`);
  }
  return Object.freeze(parsed.data);
}

let cached: Env | null = null;

/**
 * Lazily validated so that importing modules in tests does not require a
 * complete environment.
 */
export function getEnv(): Env {
  if (!cached) {
    cached = loadEnv();
  }
  return cached;
}
