/**
 * Prometheus Metrics: Unit Tests
 *
 * Tests for:
 *   - /metrics endpoint returns HTTP 200
 *   - Metrics are exposed in Prometheus format
 *   - Counter tracking works
 */

import { describe, it, expect, afterEach } from 'vitest';
import type { Server } from 'http';
import {
  metricsRegistry,
  startMetricsServer,
  trackExecution,
  trackRunStarted,
  trackRunTerminated,
  trackTurnCompleted,
} from '../../src/metrics/index.js';

let server: Server | undefined;

afterEach(() => {
  if (server) server.close();
  server = undefined;
});

async function listening(s: Server): Promise<number> {
  if (!s.listening) {
    await new Promise<void>((resolve) => s.once('listening', () => resolve()));
  }
  const address = s.address();
  if (address === null || typeof address === 'string') {
    throw new Error('Metrics server has no TCP address');
  }
  return address.port;
}

describe('Prometheus Metrics', () => {
  it('/metrics returns HTTP 200 with Prometheus content', async () => {
    server = startMetricsServer(0);
    const port = await listening(server);

    const res = await fetch(`http://127.0.0.1:${port}/metrics`);
    expect(res.status).toBe(200);

    const text = await res.text();
    expect(text).toContain('harness_runs_started_total');
    expect(text).toContain('harness_runs_terminated_total');
    expect(text).toContain('harness_turns_completed_total');
    expect(text).toContain('harness_reward_units_total');
    expect(text).toContain('harness_execution_duration_seconds');
  });

  it('tracks run and turn counters correctly', async () => {
    trackRunStarted('model-metrics');
    trackRunStarted('model-metrics');
    trackTurnCompleted('Success', 2);
    trackTurnCompleted('Timeout', 0);
    trackTurnCompleted('Success', 1);
    trackRunTerminated('CANCELLED');
    trackExecution(1_500);

    const metrics = await metricsRegistry.metrics();

    expect(metrics).toContain('harness_runs_started_total{model="model-metrics"} 2');
    expect(metrics).toContain('harness_turns_completed_total{outcome="Success"} 2');
    expect(metrics).toContain('harness_turns_completed_total{outcome="Timeout"} 1');
    expect(metrics).toContain('harness_reward_units_total 3');
    expect(metrics).toContain('harness_runs_terminated_total{reason="CANCELLED"} 1');
    expect(metrics).toContain('harness_execution_duration_seconds_bucket{le="2"} 1');
  });

  it('non-/metrics path returns 404', async () => {
    server = startMetricsServer(0);
    const port = await listening(server);

    const res = await fetch(`http://127.0.0.1:${port}/other`);
    expect(res.status).toBe(404);
  });
});
