import express from 'express';
import request from 'supertest';
import { prometheusMetrics } from '../src/lib/prometheus';
import { QuotaMetrics } from '../src/lib/metrics';

describe('prometheusMetrics', () => {
  test('serves counters in text exposition format', async () => {
    const metrics = new QuotaMetrics();
    metrics.recordAllowed();
    metrics.recordAllowed();
    metrics.recordRejected('tokens_per_minute');
    metrics.recordCancelled();

    const app = express();
    app.use(prometheusMetrics({ metrics }));
    app.get('/', (_req, res) => res.send('ok'));

    const r = await request(app).get('/metrics');
    expect(r.status).toBe(200);
    const contentType = String(r.headers['content-type']).split(';').map((part) => part.trim());
    expect(contentType[0]).toBe('text/plain');
    expect(contentType).toContain('version=0.0.4');
    const lines = r.text.split('\n');
    expect(lines).toContain('quota_gate_checks_allowed_total 2');
    expect(lines).toContain('quota_gate_checks_rejected_total{ceiling="tokens_per_minute"} 1');
    expect(lines).toContain('quota_gate_checks_rejected_total{ceiling="requests_per_day"} 0');
    expect(lines).toContain('quota_gate_store_errors_total 0');
    expect(lines).toContain('quota_gate_cancelled_total 1');
  });

  test('passes other paths through', async () => {
    const app = express();
    app.use(prometheusMetrics({ metrics: new QuotaMetrics(), path: '/internal/metrics' }));
    app.get('/metrics', (_req, res) => res.send('app route'));

    const r = await request(app).get('/metrics');
    expect(r.text).toBe('app route');
  });

  test('reset zeroes every counter', () => {
    const metrics = new QuotaMetrics();
    metrics.recordStoreError();
    metrics.reset();
    expect(metrics.getCurrentMetrics().storeErrors).toBe(0);
  });
});
