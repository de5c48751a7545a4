import fp from 'fastify-plugin';
import { collectDefaultMetrics, Counter, Histogram, Registry } from 'prom-client';
import type { LifecycleObserver } from '../lifecycle/controller';

export type IngestMetrics = {
  registry: Registry;
  httpRequestsTotal: Counter<string>;
  httpRequestDurationSeconds: Histogram<string>;
  datasetTransitionsTotal: Counter<string>;
  rowsProcessedTotal: Counter<string>;
  rowsRejectedTotal: Counter<string>;
  enabled: boolean;
};

declare module 'fastify' {
  interface FastifyInstance {
    metrics: IngestMetrics;
  }

  interface FastifyRequest {
    metricsStart?: bigint;
  }
}

type MetricsPluginOptions = {
  enabled: boolean;
};

export function createLifecycleObserver(metrics: IngestMetrics): LifecycleObserver {
  return {
    onTransition(from, to) {
      if (metrics.enabled) {
        metrics.datasetTransitionsTotal.labels(from, to).inc();
      }
    },
    onIngested(result) {
      if (!metrics.enabled) {
        return;
      }
      metrics.rowsProcessedTotal.labels(result.mode).inc(result.rowsProcessed);
      metrics.rowsRejectedTotal.labels(result.mode).inc(result.rowsRejected);
    }
  };
}

export const metricsPlugin = fp<MetricsPluginOptions>(async (app, options) => {
  const registry = new Registry();
  const enabled = options.enabled;

  if (enabled) {
    collectDefaultMetrics({ register: registry, prefix: 'ingest_' });
  }

  const httpRequestsTotal = new Counter({
    name: 'ingest_http_requests_total',
    help: 'Total number of HTTP requests received',
    labelNames: ['method', 'route', 'status'],
    registers: [registry]
  });

  const httpRequestDurationSeconds = new Histogram({
    name: 'ingest_http_request_duration_seconds',
    help: 'Duration of HTTP requests in seconds',
    labelNames: ['method', 'route', 'status'],
    buckets: [0.005, 0.01, 0.025, 0.05, 0.1, 0.25, 0.5, 1, 2, 5, 15, 60],
    registers: [registry]
  });

  const datasetTransitionsTotal = new Counter({
    name: 'ingest_dataset_transitions_total',
    help: 'Dataset lifecycle transitions by source and target status',
    labelNames: ['from', 'to'],
    registers: [registry]
  });

  const rowsProcessedTotal = new Counter({
    name: 'ingest_rows_processed_total',
    help: 'Raw rows read by completed ingestions',
    labelNames: ['mode'],
    registers: [registry]
  });

  const rowsRejectedTotal = new Counter({
    name: 'ingest_rows_rejected_total',
    help: 'Raw rows with at least one rejection in completed ingestions',
    labelNames: ['mode'],
    registers: [registry]
  });

  app.decorate('metrics', {
    registry,
    httpRequestsTotal,
    httpRequestDurationSeconds,
    datasetTransitionsTotal,
    rowsProcessedTotal,
    rowsRejectedTotal,
    enabled
  });

  app.addHook('onRequest', async (request) => {
    if (!enabled) {
      return;
    }
    request.metricsStart = process.hrtime.bigint();
  });

  app.addHook('onResponse', async (request, reply) => {
    if (!enabled) {
      return;
    }
    const start = request.metricsStart;
    const method = request.method;
    const route = request.routeOptions?.url ?? request.raw.url ?? 'unknown';
    const status = reply.statusCode;

    app.metrics.httpRequestsTotal.labels(method, route, String(status)).inc();

    if (start) {
      const durationNs = Number(process.hrtime.bigint() - start);
      app.metrics.httpRequestDurationSeconds
        .labels(method, route, String(status))
        .observe(durationNs / 1_000_000_000);
    }
  });

  app.get('/metrics', async (_request, reply) => {
    if (!enabled) {
      reply.code(503).type('text/plain').send('metrics disabled');
      return;
    }
    reply.type('text/plain; version=0.0.4');
    return app.metrics.registry.metrics();
  });
});
