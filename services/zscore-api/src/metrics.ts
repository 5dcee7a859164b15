import client from 'prom-client';

export function createMetrics() {
  const registry = new client.Registry();
  client.collectDefaultMetrics({ register: registry });

  const requests = new client.Counter({
    name: 'zscore_http_requests_total',
    help: 'Total HTTP requests',
    labelNames: ['method', 'path', 'status'],
    registers: [registry]
  });
  const errors = new client.Counter({
    name: 'zscore_errors_total',
    help: 'Failed requests by error code',
    labelNames: ['code'],
    registers: [registry]
  });
  const evaluation = new client.Histogram({
    name: 'zscore_evaluation_seconds',
    help: 'End-to-end time to evaluate one company',
    buckets: [0.25, 0.5, 1, 2, 5, 10, 30],
    registers: [registry]
  });

  return { registry, requests, errors, evaluation };
}

export type Metrics = ReturnType<typeof createMetrics>;
