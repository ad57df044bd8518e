import express from 'express';
import request from 'supertest';
import { MetricsCollector } from '../src/lib/metrics';
import { createMetricsMiddleware, prometheusMetrics } from '../src/lib/prometheus';

describe('MetricsCollector', () => {
  test('renders counters in Prometheus text format', () => {
    const metrics = new MetricsCollector();
    metrics.increment('admissionBlocked');
    metrics.increment('cacheHits', 3);
    metrics.increment('cacheMisses');

    const lines = metrics.getPrometheusMetrics().split('\n');

    expect(lines.slice(4, 7)).toEqual([
      '# HELP surgeguard_admission_blocked_total Requests rejected by the token bucket',
      '# TYPE surgeguard_admission_blocked_total counter',
      'surgeguard_admission_blocked_total 1',
    ]);
    expect(lines).toContain('surgeguard_cache_hits_total 3');
    expect(lines).toContain('surgeguard_cache_hit_ratio 0.75');
  });

  test('histogram buckets are cumulative', () => {
    const metrics = new MetricsCollector({ prefix: 'app_' });
    metrics.recordRequest('GET /a', 1);
    metrics.recordRequest('GET /a', 2);

    const lines = metrics.getPrometheusMetrics().split('\n');

    expect(lines).toContain('app_response_time_seconds_bucket{le="0.001"} 1');
    expect(lines).toContain('app_response_time_seconds_bucket{le="0.005"} 2');
    expect(lines).toContain('app_response_time_seconds_bucket{le="+Inf"} 2');
    expect(lines).toContain('app_response_time_seconds_sum 0.003');
    expect(lines).toContain('app_response_time_seconds_count 2');
    expect(lines).toContain('app_endpoint_hits_total{endpoint="GET__a"} 2');
  });

  test('getCurrentMetrics returns a copy', () => {
    const metrics = new MetricsCollector();
    metrics.increment('tasksSubmitted');
    metrics.recordRequest('POST /exports', 5);

    const copy = metrics.getCurrentMetrics();
    copy.endpointHits.set('POST /exports', 99);
    metrics.increment('tasksSubmitted', 2);

    expect(copy.tasksSubmitted).toBe(1);
    expect(metrics.getCurrentMetrics().tasksSubmitted).toBe(3);
    expect(metrics.getCurrentMetrics().endpointHits.get('POST /exports')).toBe(1);
  });
});

describe('metrics middleware', () => {
  test('records route timings and serves the exposition endpoint', async () => {
    const metrics = new MetricsCollector();
    let clock = 0;
    const app = express();
    app.use(prometheusMetrics({ metrics }));
    app.use(
      createMetricsMiddleware({
        metrics,
        now: () => {
          clock += 4;
          return clock;
        },
      }),
    );
    app.get('/items/:id', (_req, res) => res.json({ ok: true }));

    await request(app).get('/items/7');
    const res = await request(app).get('/metrics');

    expect(res.status).toBe(200);
    expect(res.headers['content-type']).toMatch(/^text\/plain;/);
    expect(res.headers['content-type']).toContain('version=0.0.4');
    expect(res.text.split('\n')).toContain('surgeguard_endpoint_hits_total{endpoint="GET__items__id"} 1');
    expect(res.text.split('\n')).toContain('surgeguard_response_time_seconds_sum 0.004');
  });
});
