/**
 * Prometheus Metrics: Internal Only
 *
 * Counters for run and turn lifecycle events.
 * Served on a separate internal port (default 9090), NOT on the read API.
 */

import { Counter, Histogram, Registry, collectDefaultMetrics } from 'prom-client';
import { createServer, Server } from 'http';

export const metricsRegistry = new Registry();

collectDefaultMetrics({ register: metricsRegistry });

export const runsStarted = new Counter({
  name: 'harness_runs_started_total',
  help: 'Number of runs started',
  labelNames: ['model'] as const,
  registers: [metricsRegistry],
});

export const runsTerminated = new Counter({
  name: 'harness_runs_terminated_total',
  help: 'Number of runs terminated, by reason',
  labelNames: ['reason'] as const,
  registers: [metricsRegistry],
});

export const turnsCompleted = new Counter({
  name: 'harness_turns_completed_total',
  help: 'Number of completed turns, by outcome',
  labelNames: ['outcome'] as const,
  registers: [metricsRegistry],
});

export const rewardUnits = new Counter({
  name: 'harness_reward_units_total',
  help: 'Newly discovered instruction keys across all runs',
  registers: [metricsRegistry],
});

export const executionDuration = new Histogram({
  name: 'harness_execution_duration_seconds',
  help: 'Wall time of sandboxed code unit executions',
  buckets: [0.25, 0.5, 1, 2, 5, 10, 30, 60],
  registers: [metricsRegistry],
});

export function trackRunStarted(model: string): void {
  runsStarted.inc({ model });
}

export function trackRunTerminated(reason: string): void {
  runsTerminated.inc({ reason });
}

export function trackTurnCompleted(outcome: string, rewardDelta: number): void {
  turnsCompleted.inc({ outcome });
  if (rewardDelta > 0) rewardUnits.inc(rewardDelta);
}

export function trackExecution(durationMs: number): void {
  executionDuration.observe(durationMs / 1000);
}

/**
 * Start the internal metrics HTTP server.
 * Serves /metrics in Prometheus exposition format.
 */
export function startMetricsServer(port: number): Server {
  const server = createServer((req, res) => {
    if (req.url !== '/metrics') {
      res.statusCode = 404;
      res.end('Not found');
      return;
    }
    metricsRegistry.metrics().then(
      (body) => {
        res.setHeader('Content-Type', metricsRegistry.contentType);
        res.end(body);
      },
      (err: unknown) => {
        res.statusCode = 500;
        res.end(err instanceof Error ? err.message : 'metrics unavailable');
      }
    );
  });

  server.listen(port, '0.0.0.0');
  return server;
}
