/**
 * Metrics Recorder
 *
 * In-memory log of turn and run-summary records. Each append updates the
 * Prometheus counters and checkpoints the run's transcript. Never feeds back
 * into reward computation.
 *
 * A run's turn records are kept only until its summary is checkpointed; the
 * persisted transcript holds them from then on. Summaries are capped, oldest
 * first.
 */

import { toTranscript, TranscriptStore } from '../runs/transcript-store.js';
import type { RunState, RunSummary, TurnRecord } from '../runs/types.js';
import { Logger, silentLogger } from '../utils/index.js';
import { trackRunStarted, trackRunTerminated, trackTurnCompleted } from './index.js';

export type MetricsRecord =
  | { type: 'turn'; runId: string; model: string; runIndex: number; record: TurnRecord }
  | { type: 'run_summary'; summary: RunSummary };

export interface RecorderOptions {
  maxSummaries?: number;
}

export const DEFAULT_MAX_SUMMARIES = 1000;

export class MetricsRecorder {
  private log: MetricsRecord[] = [];
  private store: TranscriptStore;
  private logger: Logger;
  private maxSummaries: number;

  constructor(store: TranscriptStore, logger?: Logger, options: RecorderOptions = {}) {
    this.store = store;
    this.logger = logger ?? silentLogger();
    this.maxSummaries = options.maxSummaries ?? DEFAULT_MAX_SUMMARIES;
  }

  async recordRunStarted(run: RunState): Promise<void> {
    trackRunStarted(run.model);
    await this.checkpoint(run);
  }

  async recordTurn(run: RunState, record: TurnRecord): Promise<void> {
    this.log.push({ type: 'turn', runId: run.runId, model: run.model, runIndex: run.runIndex, record });
    trackTurnCompleted(record.outcome, record.rewardDelta);
    await this.checkpoint(run);
  }

  async recordRunSummary(run: RunState): Promise<RunSummary> {
    if (!run.termination) {
      throw new Error(`Run ${run.runId} has not terminated`);
    }
    const summary = summarize(run);
    this.log.push({ type: 'run_summary', summary });
    trackRunTerminated(run.termination.reason);
    await this.checkpoint(run);
    this.prune(run.runId);
    return summary;
  }

  records(): readonly MetricsRecord[] {
    return this.log;
  }

  recordsFor(runId: string): MetricsRecord[] {
    return this.log.filter((r) => (r.type === 'turn' ? r.runId : r.summary.runId) === runId);
  }

  private async checkpoint(run: RunState): Promise<void> {
    await this.store.save(toTranscript(run));
    this.logger.debug({ runId: run.runId, turns: run.turnIndex }, 'Transcript checkpointed');
  }

  private prune(runId: string): void {
    let excess = this.log.filter((r) => r.type === 'run_summary').length - this.maxSummaries;
    this.log = this.log.filter((r) => {
      if (r.type === 'turn') {
        return r.runId !== runId;
      }
      if (excess > 0) {
        excess--;
        return false;
      }
      return true;
    });
  }
}

/**
 * Final figures of a terminated run.
 */
export function summarize(run: RunState): RunSummary {
  if (!run.termination) {
    throw new Error(`Run ${run.runId} has not terminated`);
  }
  return {
    runId: run.runId,
    model: run.model,
    runIndex: run.runIndex,
    turnsCompleted: run.turnIndex,
    cumulativeReward: run.cumulativeReward,
    uniqueInstructions: run.ledger.size,
    termination: { ...run.termination },
  };
}
