// src/config.ts
import { z } from 'zod';

// пустые значения из .env считаем «не задано»
const blankToUndefined = (v: unknown) => (typeof v === 'string' && v.trim() === '' ? undefined : v);
const env = <T extends z.ZodTypeAny>(schema: T) => z.preprocess(blankToUndefined, schema);

const EnvSchema = z
  .object({
    PORT: env(z.coerce.number().int().min(1).max(65535).default(8787)),

    CLOUD_API_KEY: env(z.string().min(1, 'CLOUD_API_KEY env var is required')),
    CLOUD_BASE_URL: env(z.string().url().default('https://cloud.anylogic.com/api/open/8.5.0/')),
    CLOUD_TIMEOUT_MS: env(z.coerce.number().int().positive().default(30_000)),
    CLOUD_POLL_INTERVAL_MS: env(z.coerce.number().int().min(0).default(2_000)),
    CLOUD_RUN_TIMEOUT_MS: env(z.coerce.number().int().positive().default(600_000)),

    DEFAULT_MODEL_NAME: env(z.string().min(1).default('Service System Demo')),
    DEFAULT_EXPERIMENT_NAME: env(z.string().min(1).default('Baseline')),
    CAPACITY_INPUT: env(z.string().min(1).default('Server capacity')),
    MEAN_QUEUE_OUTPUT: env(z.string().min(1).default('Mean queue size|Mean queue size')),
    UTILIZATION_OUTPUT: env(z.string().min(1).default('Utilization|Server utilization')),

    API_KEYS: env(
      z
        .string()
        .default('')
        .transform((s) => s.split(',').map((k) => k.trim()).filter(Boolean))
    ),

    SUPABASE_URL: env(z.string().url().optional()),
    SUPABASE_ANON_KEY: env(z.string().optional()),
    RUNS_TABLE: env(z.string().min(1).default('cloud_runs')),
  })
  .refine((e) => Boolean(e.SUPABASE_URL) === Boolean(e.SUPABASE_ANON_KEY), {
    message: 'SUPABASE_URL and SUPABASE_ANON_KEY must be set together',
    path: ['SUPABASE_ANON_KEY'],
  });

export type Env = z.infer<typeof EnvSchema>;

export type Config = {
  port: number;
  cloud: {
    apiKey: string;
    baseUrl: string;
    timeoutMs: number;
    pollIntervalMs: number;
    runTimeoutMs: number;
  };
  defaults: { modelName: string; experimentName: string };
  names: { capacityInput: string; meanQueueOutput: string; utilizationOutput: string };
  apiKeys: string[];
  supabase: { url: string; key: string; table: string } | null;
};

export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const lines = parsed.error.issues.map((i) => `${i.path.join('.') || 'env'}: ${i.message}`);
    throw new Error(`invalid environment:\n  ${lines.join('\n  ')}`);
  }
  const e = parsed.data;

  return {
    port: e.PORT,
    cloud: {
      apiKey: e.CLOUD_API_KEY,
      baseUrl: e.CLOUD_BASE_URL,
      timeoutMs: e.CLOUD_TIMEOUT_MS,
      pollIntervalMs: e.CLOUD_POLL_INTERVAL_MS,
      runTimeoutMs: e.CLOUD_RUN_TIMEOUT_MS,
    },
    defaults: { modelName: e.DEFAULT_MODEL_NAME, experimentName: e.DEFAULT_EXPERIMENT_NAME },
    names: {
      capacityInput: e.CAPACITY_INPUT,
      meanQueueOutput: e.MEAN_QUEUE_OUTPUT,
      utilizationOutput: e.UTILIZATION_OUTPUT,
    },
    apiKeys: e.API_KEYS,
    supabase:
      e.SUPABASE_URL && e.SUPABASE_ANON_KEY
        ? { url: e.SUPABASE_URL, key: e.SUPABASE_ANON_KEY, table: e.RUNS_TABLE }
        : null,
  };
}
