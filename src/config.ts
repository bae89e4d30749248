import { z } from 'zod';
import { ConfigError } from './errors.js';

const flag = z.enum(['0', '1']).default('0').transform((v) => v === '1');

const optionalString = z.preprocess(
  (val) => (val === '' ? undefined : val),
  z.string().optional()
);

export const ConfigSchema = z.object({
  PORT: z.coerce.number().int().min(0).max(65535).default(4500),
  HOST: z.string().default('0.0.0.0'),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),

  REPO_KIND: z.enum(['memory', 'redis']).default('memory'),
  UPSTASH_REDIS_REST_URL: optionalString,
  UPSTASH_REDIS_REST_TOKEN: optionalString,

  SOURCE_KIND: z.enum(['demo', 'http']).default('demo'),
  CARRIER_API_URL: z.string().url().default('https://api.apify.com/v2'),
  CARRIER_API_TOKEN: optionalString,
  CARRIER_API_ACTOR: z.string().min(1).default('fmcsa-scraper'),

  REQUESTS_PER_MINUTE: z.coerce.number().positive().default(10),
  MAX_RETRIES: z.coerce.number().int().min(0).max(10).default(3),
  RETRY_BASE_DELAY_MS: z.coerce.number().int().min(0).default(2000),
  REQUEST_TIMEOUT_MS: z.coerce.number().int().positive().default(30000),
  MAX_CONCURRENT_JOBS: z.coerce.number().int().min(1).default(4),

  API_KEY: optionalString,
  RATE_LIMIT_ENABLED: flag,
  ENQUEUE_BURST: z.coerce.number().int().min(1).default(60),
  ENQUEUE_SUSTAINED_PER_MIN: z.coerce.number().int().min(1).default(600),
  CORS_DEV: flag,

  OUTPUT_DIR: z.string().default('output'),
});

export type RawConfig = z.infer<typeof ConfigSchema>;

export interface AppConfig {
  port: number;
  host: string;
  logLevel: RawConfig['LOG_LEVEL'];
  repo:
    | { kind: 'memory' }
    | { kind: 'redis'; url: string; token: string };
  source:
    | { kind: 'demo' }
    | { kind: 'http'; baseUrl: string; token: string | undefined; actorId: string };
  extraction: {
    requestsPerMinute: number;
    maxRetries: number;
    retryBaseDelayMs: number;
    requestTimeoutMs: number;
    maxConcurrentJobs: number;
  };
  api: {
    apiKey: string | undefined;
    rateLimitEnabled: boolean;
    enqueueBurst: number;
    enqueueSustainedPerMin: number;
    corsDev: boolean;
  };
  outputDir: string;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = ConfigSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ');
    throw new ConfigError(`Invalid configuration: ${issues}`);
  }
  const c = parsed.data;

  let repo: AppConfig['repo'];
  if (c.REPO_KIND === 'redis') {
    if (!c.UPSTASH_REDIS_REST_URL || !c.UPSTASH_REDIS_REST_TOKEN) {
      throw new ConfigError('UPSTASH_REDIS_REST_URL and UPSTASH_REDIS_REST_TOKEN must be set when REPO_KIND=redis');
    }
    repo = { kind: 'redis', url: c.UPSTASH_REDIS_REST_URL, token: c.UPSTASH_REDIS_REST_TOKEN };
  } else {
    repo = { kind: 'memory' };
  }

  // A missing token surfaces when a job opens the source, not at boot
  const source: AppConfig['source'] = c.SOURCE_KIND === 'http'
    ? { kind: 'http', baseUrl: c.CARRIER_API_URL, token: c.CARRIER_API_TOKEN, actorId: c.CARRIER_API_ACTOR }
    : { kind: 'demo' };

  return {
    port: c.PORT,
    host: c.HOST,
    logLevel: c.LOG_LEVEL,
    repo,
    source,
    extraction: {
      requestsPerMinute: c.REQUESTS_PER_MINUTE,
      maxRetries: c.MAX_RETRIES,
      retryBaseDelayMs: c.RETRY_BASE_DELAY_MS,
      requestTimeoutMs: c.REQUEST_TIMEOUT_MS,
      maxConcurrentJobs: c.MAX_CONCURRENT_JOBS,
    },
    api: {
      apiKey: c.API_KEY,
      rateLimitEnabled: c.RATE_LIMIT_ENABLED,
      enqueueBurst: c.ENQUEUE_BURST,
      enqueueSustainedPerMin: c.ENQUEUE_SUSTAINED_PER_MIN,
      corsDev: c.CORS_DEV,
    },
    outputDir: c.OUTPUT_DIR,
  };
}
