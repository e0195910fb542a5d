import express from 'express';
import Redis from 'ioredis';
import { loadQuotaSettings } from '../../src/lib/config';
import { QuotaGate } from '../../src/lib/quotaGate';
import { quotaGuard, quotaUsage } from '../../src/lib/quotaGuard';
import { keyByHeader } from '../../src/lib/keys';
import { createLogger } from '../../src/lib/logger';
import { QuotaMetrics } from '../../src/lib/metrics';
import { prometheusMetrics } from '../../src/lib/prometheus';
import { MemoryCounterStore } from '../../src/stores/memoryStore';
import { RedisCounterStore } from '../../src/stores/redisStore';
import { StoreUnavailableError } from '../../src/lib/errors';

// QUOTA_REQUESTS_PER_MINUTE, QUOTA_TOKENS_PER_MINUTE and QUOTA_REQUESTS_PER_DAY are required
const settings = loadQuotaSettings();
const logger = createLogger({ level: settings.logLevel, fields: { component: 'quota-gate' } });
const metrics = new QuotaMetrics();

const store = settings.redisUrl ? new RedisCounterStore(new Redis(settings.redisUrl)) : new MemoryCounterStore();
const gate = new QuotaGate(store, settings.quota, {
  prefix: settings.prefix,
  timeoutMs: settings.timeoutMs,
  logger,
  metrics,
});

const app = express();
app.use(express.json());
app.use(prometheusMetrics({ metrics, path: '/metrics', logger }));

const keyGenerator = keyByHeader('x-api-key', { fallbackToIp: true });

app.get('/quota', quotaUsage({ gate, keyGenerator }));

// Estimated prompt size stands in for the token cost of the upstream call
app.post(
  '/completions',
  quotaGuard({
    gate,
    keyGenerator,
    logger,
    tokenCost: (req) => {
      const prompt: unknown = req.body?.prompt;
      return typeof prompt === 'string' ? Math.ceil(prompt.length / 4) : 0;
    },
    hooks: {
      onBlocked: ({ key, result }) => {
        logger.info('quota exhausted', { key, violated: result.violated });
      },
    },
  }),
  (_req, res) => {
    res.json({ completion: 'ok' });
  },
);

app.post('/admin/quota/reset', async (_req, res, next) => {
  try {
    await gate.reset();
    res.json({ reset: true });
  } catch (error) {
    next(error);
  }
});

app.use((error: unknown, _req: express.Request, res: express.Response, _next: express.NextFunction) => {
  if (error instanceof StoreUnavailableError) {
    res.status(503).json({ error: 'Quota status unavailable' });
    return;
  }
  logger.error('unhandled error', { error });
  res.status(500).json({ error: 'Internal Server Error' });
});

const port = Number(process.env.PORT || 3000);
app.listen(port, () => {
  logger.info('example app listening', { url: `http://localhost:${port}`, limits: settings.quota });
});
