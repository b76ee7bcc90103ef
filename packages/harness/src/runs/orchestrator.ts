/**
 * Turn Orchestrator
 *
 * Drives one run through its bounded sequence of turns:
 *
 *   AWAITING_CODE → EXECUTING → SUBMITTING → SCORING → FEEDBACK → AWAITING_CODE …
 *
 * Design invariants:
 * - Turns within a run are strictly sequential; runs share nothing
 * - Every turn-scoped error costs the turn and the loop continues
 * - A FatalBridgeError terminates the run; there is no automatic retry
 * - Any other escaped failure terminates the run as INTERNAL_ERROR, so a run
 *   always ends TERMINATED with a summary
 * - Cancellation drops the in-flight turn; committed turns stay as they are
 */

import { v4 as uuidv4 } from 'uuid';

import { FatalBridgeError } from '../bridge/errors.js';
import type { ValidatorBridge } from '../bridge/validator-bridge.js';
import type { CodeGenerator, CodeGeneratorFactory } from '../generator/index.js';
import { MetricsRecorder, summarize } from '../metrics/recorder.js';
import type { SandboxGateway } from '../sandbox/gateway.js';
import { Logger, silentLogger } from '../utils/index.js';
import { DiscoveryLedger } from './ledger.js';
import {
  PhaseExecutor,
  PhaseResult,
  RunSession,
  TurnContext,
  createPhaseExecutors,
  newTurnContext,
} from './phases.js';
import {
  ErrorRecord,
  RunState,
  RunSummary,
  RunTermination,
  TerminationReason,
  TurnPhase,
  TurnRecord,
  errorRecord,
} from './types.js';

// =============================================================================
// TYPES
// =============================================================================

export interface RunRequest {
  model: string;
  runIndex?: number;
  budget?: number;
  runId?: string;
}

export interface OrchestratorDeps {
  gateway: SandboxGateway;
  bridge: ValidatorBridge;
  recorder: MetricsRecorder;
  executionTimeoutMs: number;
  defaultBudget: number;
  logger?: Logger;
}

export type OrchestratorEvent =
  | { type: 'RUN_STARTED'; runId: string; model: string; runIndex: number; identity: string }
  | { type: 'PHASE_ENTERED'; runId: string; turn: number; phase: TurnPhase }
  | { type: 'TURN_COMPLETED'; runId: string; record: TurnRecord }
  | { type: 'RUN_TERMINATED'; runId: string; termination: RunTermination; cumulativeReward: number };

export type EventHandler = (event: OrchestratorEvent) => void;

export interface BatchOptions {
  concurrency: number;
  signal?: AbortSignal;
}

export type BatchOutcome =
  | { status: 'fulfilled'; request: RunRequest; summary: RunSummary }
  | { status: 'rejected'; request: RunRequest; runId: string; error: Error };

export const DEFAULT_TURN_BUDGET = 50;

// =============================================================================
// ORCHESTRATOR
// =============================================================================

export class TurnOrchestrator {
  private deps: OrchestratorDeps;
  private logger: Logger;
  private executors: Map<TurnPhase, PhaseExecutor>;
  private eventHandlers: EventHandler[] = [];

  constructor(deps: OrchestratorDeps) {
    this.deps = deps;
    this.logger = deps.logger ?? silentLogger();
    this.executors = createPhaseExecutors({
      gateway: deps.gateway,
      bridge: deps.bridge,
      recorder: deps.recorder,
      executionTimeoutMs: deps.executionTimeoutMs,
      logger: this.logger,
    });
  }

  onEvent(handler: EventHandler): () => void {
    this.eventHandlers.push(handler);
    return () => {
      this.eventHandlers = this.eventHandlers.filter((h) => h !== handler);
    };
  }

  createRun(request: RunRequest): RunState {
    const budget = request.budget ?? this.deps.defaultBudget;
    if (!Number.isInteger(budget) || budget < 0) {
      throw new Error(`Turn budget must be a non-negative integer, got ${budget}`);
    }
    return {
      runId: request.runId ?? generateRunId(),
      model: request.model,
      runIndex: request.runIndex ?? 0,
      turnIndex: 0,
      budget,
      cumulativeReward: 0,
      ledger: new DiscoveryLedger(),
      transcript: [],
      errors: [],
      identity: null,
      status: 'ACTIVE',
      startedAt: new Date().toISOString(),
    };
  }

  async run(request: RunRequest, generator: CodeGenerator, signal?: AbortSignal): Promise<RunSummary> {
    return this.execute(this.createRun(request), generator, signal);
  }

  /**
   * Run the turn loop for an already created run until it terminates.
   */
  async execute(state: RunState, generator: CodeGenerator, signal?: AbortSignal): Promise<RunSummary> {
    if (state.status !== 'ACTIVE') {
      throw new Error(`Run ${state.runId} is ${state.status}`);
    }

    const progress = { turn: state.turnIndex + 1 };
    try {
      return await this.drive(state, generator, progress, signal);
    } catch (err) {
      const error = err instanceof Error ? err : new Error(String(err));
      this.logger.error({ runId: state.runId, turn: progress.turn, err: error }, 'Run failed internally');
      state.errors.push({ turn: progress.turn, kind: 'InternalError', message: error.message });
      return this.terminate(state, 'INTERNAL_ERROR', errorRecord('InternalError', error.message, [`error: ${error.name}`]));
    }
  }

  private async drive(
    state: RunState,
    generator: CodeGenerator,
    progress: { turn: number },
    signal?: AbortSignal
  ): Promise<RunSummary> {
    if (signal?.aborted) {
      return this.terminate(state, 'CANCELLED');
    }
    if (state.budget === 0) {
      return this.terminate(state, 'BUDGET_EXHAUSTED');
    }

    try {
      state.identity = await this.deps.bridge.resetIdentity(state.runId);
    } catch (err) {
      if (err instanceof FatalBridgeError) {
        return this.terminate(state, 'FATAL_BRIDGE_ERROR', fatalRecord(err));
      }
      throw err;
    }

    await this.deps.recorder.recordRunStarted(state);
    this.emit({
      type: 'RUN_STARTED',
      runId: state.runId,
      model: state.model,
      runIndex: state.runIndex,
      identity: state.identity.publicKey,
    });

    const session: RunSession = { state, generator, feedback: null, signal };
    let phase: TurnPhase = 'AWAITING_CODE';
    let turn = newTurnContext(state.turnIndex + 1);

    for (;;) {
      // A committed turn always finishes its FEEDBACK phase
      if (signal?.aborted && !turn.committed) {
        return this.terminate(state, 'CANCELLED');
      }

      const executor = this.executors.get(phase);
      if (!executor) {
        throw new Error(`No executor for phase ${phase}`);
      }
      this.emit({ type: 'PHASE_ENTERED', runId: state.runId, turn: turn.turn, phase });

      let result: PhaseResult;
      try {
        result = await executor.execute(session, turn);
      } catch (err) {
        if (err instanceof FatalBridgeError) {
          this.emitTurnCompleted(state, turn);
          state.errors.push({ turn: turn.turn, kind: 'FatalBridgeError', message: err.message });
          return this.terminate(state, 'FATAL_BRIDGE_ERROR', fatalRecord(err));
        }
        throw err;
      }

      if (phase === 'FEEDBACK') {
        this.emitTurnCompleted(state, turn);
      }

      if (result.type === 'TERMINATE') {
        return this.terminate(state, result.reason, result.error);
      }

      if (result.next === 'AWAITING_CODE') {
        turn = newTurnContext(state.turnIndex + 1);
        progress.turn = turn.turn;
      }
      phase = result.next;
    }
  }

  /**
   * Run many independent runs with bounded concurrency. A failing run never
   * affects the others.
   */
  async runBatch(
    requests: RunRequest[],
    generatorFactory: CodeGeneratorFactory,
    options: BatchOptions
  ): Promise<BatchOutcome[]> {
    const outcomes: BatchOutcome[] = new Array(requests.length);
    const workers = Math.max(1, Math.min(options.concurrency, requests.length));
    let cursor = 0;

    const worker = async (): Promise<void> => {
      while (cursor < requests.length) {
        const index = cursor++;
        const request = { runIndex: index, ...requests[index] };
        let runId = request.runId ?? `unstarted_${index}`;
        try {
          const state = this.createRun(request);
          runId = state.runId;
          const generator = generatorFactory({ runId, model: state.model, runIndex: state.runIndex });
          const summary = await this.execute(state, generator, options.signal);
          outcomes[index] = { status: 'fulfilled', request, summary };
        } catch (err) {
          const error = err instanceof Error ? err : new Error(String(err));
          this.logger.error({ runId, error: error.message }, 'Run failed');
          outcomes[index] = { status: 'rejected', request, runId, error };
        }
      }
    };

    await Promise.all(Array.from({ length: workers }, () => worker()));
    return outcomes;
  }

  // ===========================================================================
  // INTERNALS
  // ===========================================================================

  private async terminate(state: RunState, reason: TerminationReason, error?: ErrorRecord): Promise<RunSummary> {
    state.status = 'TERMINATED';
    state.termination = { reason, ...(error ? { error } : {}), at: new Date().toISOString() };

    let summary: RunSummary;
    try {
      summary = await this.deps.recorder.recordRunSummary(state);
    } catch (err) {
      this.logger.error({ runId: state.runId, err }, 'Run summary was not persisted');
      summary = summarize(state);
    }
    const log = reason === 'BUDGET_EXHAUSTED' ? this.logger.info.bind(this.logger) : this.logger.warn.bind(this.logger);
    log(
      { runId: state.runId, reason, turns: state.turnIndex, cumulativeReward: state.cumulativeReward, error: error?.message },
      'Run terminated'
    );
    this.emit({
      type: 'RUN_TERMINATED',
      runId: state.runId,
      termination: state.termination,
      cumulativeReward: state.cumulativeReward,
    });
    return summary;
  }

  private emitTurnCompleted(state: RunState, turn: TurnContext): void {
    const record = state.transcript[state.transcript.length - 1];
    if (turn.committed && record && record.index === turn.turn) {
      this.emit({ type: 'TURN_COMPLETED', runId: state.runId, record });
    }
  }

  private emit(event: OrchestratorEvent): void {
    for (const handler of this.eventHandlers) {
      try {
        handler(event);
      } catch (err) {
        this.logger.error({ event: event.type, err }, 'Event handler failed');
      }
    }
  }
}

function fatalRecord(err: FatalBridgeError): ErrorRecord {
  return errorRecord('FatalBridgeError', err.message, [`code: ${err.code}`]);
}

/** `run_<yymmdd>_<HHMMSS>_<8 hex>` in UTC. */
export function generateRunId(now: Date = new Date()): string {
  const pad = (n: number) => String(n).padStart(2, '0');
  const date = `${pad(now.getUTCFullYear() % 100)}${pad(now.getUTCMonth() + 1)}${pad(now.getUTCDate())}`;
  const time = `${pad(now.getUTCHours())}${pad(now.getUTCMinutes())}${pad(now.getUTCSeconds())}`;
  return `run_${date}_${time}_${uuidv4().replace(/-/g, '').slice(0, 8)}`;
}
