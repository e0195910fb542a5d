import express from 'express';
import request from 'supertest';
import { quotaGuard, quotaUsage } from '../src/lib/quotaGuard';
import { keyByHeader } from '../src/lib/keys';
import { QuotaGate } from '../src/lib/quotaGate';
import { MemoryCounterStore } from '../src/stores/memoryStore';
import type { CheckResult, CounterStore } from '../src/types';

const NOW = Date.UTC(2026, 9, 19, 12, 30, 15);

function makeGate(config = { requestsPerMinute: 2, tokensPerMinute: 100, requestsPerDay: 10 }) {
  return new QuotaGate(new MemoryCounterStore(() => NOW), config, { now: () => NOW });
}

const tokensFromHeader = (req: express.Request) => Number(req.header('x-tokens') ?? 0);

describe('quotaGuard middleware', () => {
  test('admits requests within quota and sets headers', async () => {
    const app = express();
    app.use(quotaGuard({ gate: makeGate(), tokenCost: tokensFromHeader }));
    app.get('/', (_req, res) => res.send('ok'));

    const r1 = await request(app).get('/').set('x-tokens', '10');
    expect(r1.status).toBe(200);
    expect(r1.headers['x-ratelimit-limit']).toBe('2');
    expect(r1.headers['x-ratelimit-remaining']).toBe('1');
    expect(r1.headers['x-ratelimit-reset']).toBe('45');
    expect(r1.headers['x-quota-tokens-remaining']).toBe('90');
    expect(r1.headers['x-quota-day-remaining']).toBe('9');
  });

  test('answers 429 once the minute request ceiling is reached', async () => {
    const app = express();
    app.use(quotaGuard({ gate: makeGate(), tokenCost: tokensFromHeader }));
    app.get('/', (_req, res) => res.send('ok'));

    await request(app).get('/').set('x-tokens', '10');
    await request(app).get('/').set('x-tokens', '10');
    const r3 = await request(app).get('/').set('x-tokens', '10');

    expect(r3.status).toBe(429);
    expect(r3.headers['retry-after']).toBe('45');
    expect(r3.headers['x-ratelimit-remaining']).toBe('0');
    expect(r3.headers['x-quota-day-remaining']).toBe('8');
    expect(r3.body).toEqual({
      error: 'Too Many Requests',
      reason: 'requests per minute limit exceeded (2/2)',
      violated: 'requests_per_minute',
    });
  });

  test('blocks on token budget', async () => {
    const app = express();
    app.use(quotaGuard({ gate: makeGate(), tokenCost: tokensFromHeader }));
    app.get('/', (_req, res) => res.send('ok'));

    const r1 = await request(app).get('/').set('x-tokens', '101');
    expect(r1.status).toBe(429);
    expect(r1.body.violated).toBe('tokens_per_minute');
  });

  test('keeps a separate quota per key', async () => {
    const app = express();
    app.use(
      quotaGuard({
        gate: makeGate({ requestsPerMinute: 1, tokensPerMinute: 100, requestsPerDay: 10 }),
        keyGenerator: keyByHeader('x-api-key'),
      }),
    );
    app.get('/', (_req, res) => res.send('ok'));

    const a1 = await request(app).get('/').set('x-api-key', 'A');
    const a2 = await request(app).get('/').set('x-api-key', 'A');
    const b1 = await request(app).get('/').set('x-api-key', 'B');

    expect(a1.status).toBe(200);
    expect(a2.status).toBe(429);
    expect(b1.status).toBe(200);
  });

  test('hooks fire with the scoped key', async () => {
    const app = express();
    const events: string[] = [];
    app.use(
      quotaGuard({
        gate: makeGate({ requestsPerMinute: 1, tokensPerMinute: 100, requestsPerDay: 10 }),
        keyGenerator: keyByHeader('x-api-key'),
        hooks: {
          onAllowed: ({ key, result }) => events.push(`allowed:${key}:${result.currentRequests}`),
          onBlocked: ({ key, result }) => events.push(`blocked:${key}:${result.violated}`),
        },
      }),
    );
    app.get('/', (_req, res) => res.send('ok'));

    await request(app).get('/').set('x-api-key', 'A');
    await request(app).get('/').set('x-api-key', 'A');
    expect(events).toEqual(['allowed:key:A:1', 'blocked:key:A:requests_per_minute']);
  });

  test('passes store failures to the error handler', async () => {
    const broken: CounterStore = {
      batchGet: async () => {
        throw new Error('connection refused');
      },
      batchIncrementAndExpire: async () => {},
      delete: async () => {},
    };
    const gate = new QuotaGate(broken, { requestsPerMinute: 1, tokensPerMinute: 1, requestsPerDay: 1 });
    const errors: unknown[] = [];
    const app = express();
    app.use(quotaGuard({ gate, hooks: { onError: ({ error }) => errors.push(error) } }));
    app.get('/', (_req, res) => res.send('ok'));
    app.use((error: Error, _req: express.Request, res: express.Response, _next: express.NextFunction) => {
      res.status(503).json({ error: error.name });
    });

    const r = await request(app).get('/');
    expect(r.status).toBe(503);
    expect(r.body).toEqual({ error: 'StoreUnavailableError' });
    expect(errors).toHaveLength(1);
  });
});

describe('quotaUsage handler', () => {
  test('reports usage without consuming quota', async () => {
    const gate = makeGate();
    const app = express();
    app.get('/usage', quotaUsage({ gate }));
    app.use(quotaGuard({ gate, tokenCost: tokensFromHeader }));
    app.get('/', (_req, res) => res.send('ok'));

    await request(app).get('/').set('x-tokens', '10');
    const first = await request(app).get('/usage');
    const second = await request(app).get('/usage');

    expect(first.status).toBe(200);
    const usage: CheckResult = {
      currentRequests: 1,
      currentTokens: 10,
      currentDayRequests: 1,
      resetMinuteMs: 45_000,
      resetDayMs: 41_385_000,
    };
    expect(first.body).toEqual({
      limits: { requestsPerMinute: 2, tokensPerMinute: 100, requestsPerDay: 10 },
      usage,
    });
    expect(second.body).toEqual(first.body);
  });
});
