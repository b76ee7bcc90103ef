/**
 * HTTP API Routes: Unit Tests
 *
 * Each request starts the app on an ephemeral port in front of an
 * in-memory store.
 */

import express from 'express';
import { describe, it, expect, beforeAll } from 'vitest';

import { createRoutes, errorHandler } from '../../src/http/index.js';
import { InMemoryTranscriptStore, TranscriptStore } from '../../src/runs/transcript-store.js';
import type { RunTranscript } from '../../src/runs/types.js';
import { silentLogger } from '../../src/utils/index.js';

// =============================================================================
// Helpers
// =============================================================================

interface RunSummaryBody {
  run_id: string;
  cumulative_reward: number;
  [field: string]: unknown;
}

interface ApiBody {
  version: string;
  data?: {
    runs?: RunSummaryBody[];
    count?: number;
    cumulative_rewards?: number[];
    programs_discovered?: Record<string, number>;
  };
  error?: { code: string; message: string };
  status?: string;
}

function transcript(runId: string, model: string, startTime: string, rewards: number[]): RunTranscript {
  return {
    run_id: runId,
    model,
    run_index: 0,
    start_time: startTime,
    end_time: '2024-03-01T00:00:00.000Z',
    status: 'TERMINATED',
    budget: 3,
    identity: 'Agent111',
    termination: { reason: 'BUDGET_EXHAUSTED', at: '2024-03-01T00:00:00.000Z' },
    cumulative_rewards: rewards,
    messages: [],
    programs_discovered: { 'ProgA:0': 1, 'ProgB:1': 2 },
    errors: [],
  };
}

class FailingStore implements TranscriptStore {
  async save(): Promise<void> {
    throw new Error('disk full');
  }
  async load(): Promise<RunTranscript | null> {
    throw new Error('disk full');
  }
  async list(): Promise<RunTranscript[]> {
    throw new Error('disk full');
  }
}

function createApp(store: TranscriptStore): express.Express {
  const app = express();
  app.use(createRoutes({ store }, silentLogger()));
  app.use(errorHandler(silentLogger()));
  return app;
}

async function get(app: express.Express, path: string): Promise<{ status: number; body: ApiBody }> {
  return new Promise((resolve, reject) => {
    const server = app.listen(0, () => {
      const addr = server.address();
      if (!addr || typeof addr === 'string') {
        server.close();
        reject(new Error('Could not get server address'));
        return;
      }
      fetch(`http://127.0.0.1:${addr.port}${path}`)
        .then(async (res) => {
          const body: ApiBody = JSON.parse(await res.text());
          server.close();
          resolve({ status: res.status, body });
        })
        .catch((err: unknown) => {
          server.close();
          reject(err);
        });
    });
  });
}

// =============================================================================
// Tests
// =============================================================================

describe('Run API', () => {
  let app: express.Express;

  beforeAll(async () => {
    const store = new InMemoryTranscriptStore();
    await store.save(transcript('run_1', 'model-x', '2024-01-01T00:00:00.000Z', [1, 2]));
    await store.save(transcript('run_2', 'model-y', '2024-02-01T00:00:00.000Z', [0, 0, 1]));
    await store.save(transcript('run_3', 'model-x', '2024-03-01T00:00:00.000Z', []));
    app = createApp(store);
  });

  describe('GET /v1/runs', () => {
    it('lists run summaries newest first', async () => {
      const { status, body } = await get(app, '/v1/runs');
      const runs = body.data?.runs ?? [];

      expect(status).toBe(200);
      expect(body.version).toBe('1.0');
      expect(body.data?.count).toBe(3);
      expect(runs.map((r) => r.run_id)).toEqual(['run_3', 'run_2', 'run_1']);
      expect(runs[2]).toEqual({
        run_id: 'run_1',
        model: 'model-x',
        run_index: 0,
        status: 'TERMINATED',
        start_time: '2024-01-01T00:00:00.000Z',
        end_time: '2024-03-01T00:00:00.000Z',
        termination_reason: 'BUDGET_EXHAUSTED',
        turns_completed: 0,
        budget: 3,
        cumulative_reward: 2,
        unique_instructions: 2,
      });
      expect(runs[0].cumulative_reward).toBe(0);
    });

    it('filters by model and limits the page', async () => {
      const { body } = await get(app, '/v1/runs?model=model-x&limit=1');

      expect((body.data?.runs ?? []).map((r) => r.run_id)).toEqual(['run_3']);
    });

    it('rejects an out-of-range limit', async () => {
      const { status, body } = await get(app, '/v1/runs?limit=0');

      expect(status).toBe(400);
      expect(body.error).toEqual({ code: 'INVALID_REQUEST', message: 'limit must be an integer between 1 and 500' });
    });
  });

  describe('GET /v1/runs/:id', () => {
    it('returns the full transcript', async () => {
      const { status, body } = await get(app, '/v1/runs/run_2');

      expect(status).toBe(200);
      expect(body.data?.cumulative_rewards).toEqual([0, 0, 1]);
      expect(body.data?.programs_discovered).toEqual({ 'ProgA:0': 1, 'ProgB:1': 2 });
    });

    it('returns 404 for an unknown run', async () => {
      const { status, body } = await get(app, '/v1/runs/run_404');

      expect(status).toBe(404);
      expect(body.error?.code).toBe('RUN_NOT_FOUND');
    });

    it('rejects a malformed run id', async () => {
      const { status } = await get(app, '/v1/runs/run%20with%20spaces');

      expect(status).toBe(400);
    });
  });

  it('GET /health reports ok', async () => {
    const { status, body } = await get(app, '/health');

    expect(status).toBe(200);
    expect(body.status).toBe('ok');
  });

  it('hides store failures behind a 500', async () => {
    const { status, body } = await get(createApp(new FailingStore()), '/v1/runs');

    expect(status).toBe(500);
    expect(body.error).toEqual({ code: 'INTERNAL_ERROR', message: 'Internal server error' });
  });
});
