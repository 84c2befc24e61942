import { FastifyInstance } from 'fastify';
import Redis from 'ioredis';
import { env } from '../config/env';
import { getMetrics, getContentType } from '../observability/metrics';
import { DependencyHealthManager } from '../resilience/dependency-health';

export interface HealthRouteDeps {
  redis?: Redis;
  health: DependencyHealthManager;
  /** Number of indexed products and knowledge entries; 0 means retrieval has nothing to search */
  indexedDocuments: () => number;
}

export function registerHealthRoutes(app: FastifyInstance, deps: HealthRouteDeps): void {
  /** Liveness probe: 200 while the process is running */
  app.get('/health', async (_req, reply) => {
    return reply.send({ status: 'ok', timestamp: new Date().toISOString() });
  });

  /** Readiness probe: Redis reachability plus circuit state of every dependency */
  app.get('/ready', async (_req, reply) => {
    const checks: Record<string, { status: string; latencyMs?: number; failures?: number }> = {};

    if (deps.redis) {
      const start = Date.now();
      try {
        await deps.redis.ping();
        checks.redis = { status: 'ok', latencyMs: Date.now() - start };
      } catch {
        checks.redis = { status: 'error', latencyMs: Date.now() - start };
      }
    } else {
      checks.redis = { status: 'skipped' };
    }

    checks.index = { status: deps.indexedDocuments() > 0 ? 'ok' : 'skipped' };

    // A degraded dependency still serves fallbacks; only an open circuit fails readiness
    for (const [name, health] of Object.entries(deps.health.getHealthSummary())) {
      checks[`dep_${name}`] = {
        status: health.circuitOpen ? 'error' : 'ok',
        failures: health.failures,
      };
    }

    const allOk = Object.values(checks).every((c) => c.status === 'ok' || c.status === 'skipped');

    return reply.status(allOk ? 200 : 503).send({
      status: allOk ? 'ready' : 'not_ready',
      checks,
      degradationLevel: deps.health.getDegradationLevel(),
      timestamp: new Date().toISOString(),
    });
  });

  /** Prometheus metrics endpoint */
  if (env.observability.enableMetrics) {
    app.get('/metrics', async (_req, reply) => {
      const metrics = await getMetrics();
      reply.header('Content-Type', getContentType());
      return reply.send(metrics);
    });
  }
}
