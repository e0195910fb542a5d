import { z } from 'zod';
import type { QuotaConfig } from '../types';
import { ConfigError } from './errors';
import type { LogLevel } from './logger';
import { DEFAULT_PREFIX } from './quotaGate';

const emptyToUndefined = (value: unknown) => (value === '' ? undefined : value);

const ceiling = z.preprocess(emptyToUndefined, z.coerce.number().int().min(0));

const envSchema = z.object({
  QUOTA_REQUESTS_PER_MINUTE: ceiling,
  QUOTA_TOKENS_PER_MINUTE: ceiling,
  QUOTA_REQUESTS_PER_DAY: ceiling,
  QUOTA_PREFIX: z.preprocess(emptyToUndefined, z.string().min(1).default(DEFAULT_PREFIX)),
  QUOTA_TIMEOUT_MS: z.preprocess(emptyToUndefined, z.coerce.number().int().positive().optional()),
  QUOTA_LOG_LEVEL: z.preprocess(emptyToUndefined, z.enum(['debug', 'info', 'warn', 'error']).default('warn')),
  REDIS_URL: z.preprocess(emptyToUndefined, z.string().url().optional()),
});

export type QuotaSettings = {
  quota: QuotaConfig;
  prefix: string;
  timeoutMs?: number;
  logLevel: LogLevel;
  redisUrl?: string;
};

export function loadQuotaSettings(env: Record<string, string | undefined> = process.env): QuotaSettings {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`));
  }
  const values = parsed.data;
  return {
    quota: {
      requestsPerMinute: values.QUOTA_REQUESTS_PER_MINUTE,
      tokensPerMinute: values.QUOTA_TOKENS_PER_MINUTE,
      requestsPerDay: values.QUOTA_REQUESTS_PER_DAY,
    },
    prefix: values.QUOTA_PREFIX,
    timeoutMs: values.QUOTA_TIMEOUT_MS,
    logLevel: values.QUOTA_LOG_LEVEL,
    redisUrl: values.REDIS_URL,
  };
}
