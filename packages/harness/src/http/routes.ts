/**
 * HTTP API Routes
 *
 * Read-only view of run transcripts. Thin controllers, no business logic.
 */

import { Router, Request, Response, NextFunction } from 'express';
import type { TranscriptStore } from '../runs/transcript-store.js';
import type { RunTranscript } from '../runs/types.js';
import { Logger } from '../utils/logger.js';

const API_VERSION = '1.0';

// =============================================================================
// RESPONSE TYPES
// =============================================================================

interface RunSummaryResponse {
  run_id: string;
  model: string;
  run_index: number;
  status: string;
  start_time: string;
  end_time: string | null;
  termination_reason: string | null;
  turns_completed: number;
  budget: number;
  cumulative_reward: number;
  unique_instructions: number;
}

// =============================================================================
// VALIDATION
// =============================================================================

export class ValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ValidationError';
  }
}

const RUN_ID_PATTERN = /^[A-Za-z0-9_.-]{1,128}$/;

function validateRunId(value: unknown): string {
  if (typeof value !== 'string' || !RUN_ID_PATTERN.test(value)) {
    throw new ValidationError('run id must be 1-128 characters of [A-Za-z0-9_.-]');
  }
  return value;
}

function validateOptionalLimit(value: unknown): number {
  if (value === undefined) return 50;
  const limit = Number(value);
  if (!Number.isInteger(limit) || limit < 1 || limit > 500) {
    throw new ValidationError('limit must be an integer between 1 and 500');
  }
  return limit;
}

// =============================================================================
// ROUTES
// =============================================================================

export interface RunRoutesDeps {
  store: TranscriptStore;
}

export function createRoutes(deps: RunRoutesDeps, logger: Logger): Router {
  const router = Router();
  const { store } = deps;

  // ===========================================================================
  // GET /v1/runs
  // ===========================================================================
  router.get('/v1/runs', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const limit = validateOptionalLimit(req.query.limit);
      const model = typeof req.query.model === 'string' ? req.query.model : undefined;

      const runs = (await store.list())
        .filter((t) => model === undefined || t.model === model)
        .slice(0, limit)
        .map(toRunSummaryResponse);

      res.json({ version: API_VERSION, data: { runs, count: runs.length } });
    } catch (error) {
      next(error);
    }
  });

  // ===========================================================================
  // GET /v1/runs/:id
  // ===========================================================================
  router.get('/v1/runs/:id', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const runId = validateRunId(req.params.id);
      const transcript = await store.load(runId);

      if (!transcript) {
        res.status(404).json({
          version: API_VERSION,
          error: { code: 'RUN_NOT_FOUND', message: `No run with id ${runId}` },
        });
        return;
      }

      logger.debug({ runId }, 'Transcript served');
      res.json({ version: API_VERSION, data: transcript });
    } catch (error) {
      next(error);
    }
  });

  // ===========================================================================
  // Health check
  // ===========================================================================
  router.get('/health', (_req: Request, res: Response) => {
    res.json({ status: 'ok', timestamp: Date.now() });
  });

  return router;
}

// =============================================================================
// RESPONSE MAPPING
// =============================================================================

function toRunSummaryResponse(transcript: RunTranscript): RunSummaryResponse {
  const rewards = transcript.cumulative_rewards;
  return {
    run_id: transcript.run_id,
    model: transcript.model,
    run_index: transcript.run_index,
    status: transcript.status,
    start_time: transcript.start_time,
    end_time: transcript.end_time,
    termination_reason: transcript.termination?.reason ?? null,
    turns_completed: transcript.messages.length,
    budget: transcript.budget,
    cumulative_reward: rewards.length > 0 ? rewards[rewards.length - 1] : 0,
    unique_instructions: Object.keys(transcript.programs_discovered).length,
  };
}

// =============================================================================
// ERROR HANDLER MIDDLEWARE
// =============================================================================

export function errorHandler(logger: Logger) {
  return (err: Error, _req: Request, res: Response, _next: NextFunction) => {
    if (err instanceof ValidationError) {
      res.status(400).json({ version: API_VERSION, error: { code: 'INVALID_REQUEST', message: err.message } });
      return;
    }

    logger.error({ error: err }, 'Unhandled error');
    res.status(500).json({ version: API_VERSION, error: { code: 'INTERNAL_ERROR', message: 'Internal server error' } });
  };
}
