/**
 * Turn Phases
 *
 * One executor per non-terminal phase of a turn. Executors mutate the
 * turn's scratch context and report where the turn goes next; the
 * orchestrator owns the loop, cancellation and termination.
 *
 * A turn is committed exactly once: in SCORING for turns that produced a
 * receipt, otherwise at the start of FEEDBACK. Committing is synchronous so
 * a turn is either fully recorded or not at all.
 */

import { extractCodeUnit } from '../generator/code-blocks.js';
import type { CodeGenerator } from '../generator/index.js';
import type { SandboxGateway } from '../sandbox/gateway.js';
import type { ValidatorBridge } from '../bridge/validator-bridge.js';
import { SubmissionRejectedError } from '../bridge/errors.js';
import { signTransaction } from '../bridge/signer.js';
import type { MetricsRecorder } from '../metrics/recorder.js';
import { trackExecution } from '../metrics/index.js';
import { decode, instructionKeyId } from './decoder.js';
import { buildFeedback } from './feedback.js';
import {
  ErrorRecord,
  RunIdentity,
  RunState,
  ScoreResult,
  TerminationReason,
  TransactionReceipt,
  TurnFeedback,
  TurnPhase,
  TurnRecord,
  errorRecord,
} from './types.js';
import type { Logger } from '../utils/index.js';

// =============================================================================
// CONTEXT
// =============================================================================

export interface RunSession {
  state: RunState;
  generator: CodeGenerator;
  feedback: TurnFeedback | null;
  signal?: AbortSignal;
}

export interface TurnContext {
  turn: number;  // 1-based
  startedAt: number;
  freshnessToken: string | null;
  codeUnit: string | null;
  transaction: Uint8Array | null;
  receipt: TransactionReceipt | null;
  score: ScoreResult;
  instructionCount: number;
  signature: string | null;
  logs: string[];
  error: ErrorRecord | null;
  committed: boolean;
}

export function newTurnContext(turn: number): TurnContext {
  return {
    turn,
    startedAt: Date.now(),
    freshnessToken: null,
    codeUnit: null,
    transaction: null,
    receipt: null,
    score: { delta: 0, newKeys: [] },
    instructionCount: 0,
    signature: null,
    logs: [],
    error: null,
    committed: false,
  };
}

export type PhaseResult =
  | { type: 'ADVANCE'; next: TurnPhase }
  | { type: 'TERMINATE'; reason: TerminationReason; error?: ErrorRecord };

export interface PhaseExecutor {
  readonly phase: TurnPhase;
  execute(session: RunSession, turn: TurnContext): Promise<PhaseResult>;
}

export interface PhaseDeps {
  gateway: SandboxGateway;
  bridge: ValidatorBridge;
  recorder: MetricsRecorder;
  executionTimeoutMs: number;
  logger: Logger;
}

function advance(next: TurnPhase): PhaseResult {
  return { type: 'ADVANCE', next };
}

function requireIdentity(state: RunState): RunIdentity {
  if (!state.identity) {
    throw new Error(`Run ${state.runId} has no identity`);
  }
  return state.identity;
}

// =============================================================================
// COMMIT
// =============================================================================

export function commitTurn(state: RunState, turn: TurnContext): TurnRecord {
  if (turn.committed) {
    throw new Error(`Turn ${turn.turn} of run ${state.runId} is already committed`);
  }
  const cumulativeReward = state.cumulativeReward + turn.score.delta;
  const record: TurnRecord = Object.freeze({
    index: turn.turn,
    timestamp: new Date().toISOString(),
    durationMs: Date.now() - turn.startedAt,
    rewardDelta: turn.score.delta,
    cumulativeReward,
    newKeys: turn.score.newKeys.map(instructionKeyId),
    outcome: turn.error?.kind ?? 'Success',
    instructionCount: turn.instructionCount,
    signature: turn.signature,
    error: turn.error,
  });

  state.transcript.push(record);
  state.cumulativeReward = cumulativeReward;
  state.turnIndex += 1;
  if (turn.error) {
    state.errors.push({ turn: turn.turn, kind: turn.error.kind, message: turn.error.message });
  }
  turn.committed = true;
  return record;
}

// =============================================================================
// AWAITING_CODE
// =============================================================================

export class AwaitCodePhase implements PhaseExecutor {
  readonly phase = 'AWAITING_CODE' as const;

  constructor(private deps: PhaseDeps) {}

  async execute(session: RunSession, turn: TurnContext): Promise<PhaseResult> {
    const { state } = session;
    const identity = requireIdentity(state);
    const freshnessToken = await this.deps.bridge.latestReference();
    turn.freshnessToken = freshnessToken;

    let response: string;
    try {
      response = await session.generator.generate({
        runId: state.runId,
        model: state.model,
        turn: turn.turn,
        budget: state.budget,
        remainingTurns: state.budget - state.turnIndex,
        freshnessToken,
        identity: identity.publicKey,
        feedback: session.feedback,
        signal: session.signal,
      });
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      this.deps.logger.warn({ runId: state.runId, turn: turn.turn, error: message }, 'Code generation failed');
      turn.error = errorRecord('GenerationError', `Code generation failed: ${message}`);
      return advance('FEEDBACK');
    }

    const codeUnit = extractCodeUnit(response);
    if (codeUnit === null) {
      turn.error = errorRecord('InterfaceError', 'No code unit found in the response', [
        'Provide TypeScript in a ```typescript block exporting',
        'export async function executeSkill(freshnessToken: string): Promise<string>',
      ]);
      return advance('FEEDBACK');
    }

    turn.codeUnit = codeUnit;
    return advance('EXECUTING');
  }
}

// =============================================================================
// EXECUTING
// =============================================================================

export class ExecutePhase implements PhaseExecutor {
  readonly phase = 'EXECUTING' as const;

  constructor(private deps: PhaseDeps) {}

  async execute(session: RunSession, turn: TurnContext): Promise<PhaseResult> {
    if (turn.codeUnit === null) {
      throw new Error(`Turn ${turn.turn} entered EXECUTING without a code unit`);
    }
    const { state } = session;

    const started = Date.now();
    const result = await this.deps.gateway.execute(turn.codeUnit, this.deps.executionTimeoutMs, {
      runId: state.runId,
      turnIndex: turn.turn,
      identity: state.identity?.publicKey,
      freshnessToken: turn.freshnessToken ?? undefined,
      signal: session.signal,
    });
    trackExecution(Date.now() - started);

    if (result.serializedTransaction === null) {
      turn.error = result.error;
      return advance('FEEDBACK');
    }
    turn.transaction = result.serializedTransaction;
    return advance('SUBMITTING');
  }
}

// =============================================================================
// SUBMITTING
// =============================================================================

export class SubmitPhase implements PhaseExecutor {
  readonly phase = 'SUBMITTING' as const;

  constructor(private deps: PhaseDeps) {}

  async execute(session: RunSession, turn: TurnContext): Promise<PhaseResult> {
    if (turn.transaction === null) {
      throw new Error(`Turn ${turn.turn} entered SUBMITTING without a transaction`);
    }
    const identity = requireIdentity(session.state);

    try {
      const signed = signTransaction(turn.transaction, identity.secretKey);
      const receipt = await this.deps.bridge.submit(signed);
      turn.receipt = receipt;
      turn.signature = receipt.signature;
      turn.logs = receipt.logs;
      return advance('SCORING');
    } catch (err) {
      if (err instanceof SubmissionRejectedError) {
        turn.error = errorRecord('SubmissionRejected', err.message, [`code: ${err.code}`, ...err.logs]);
        turn.logs = err.logs;
        return advance('FEEDBACK');
      }
      throw err;
    }
  }
}

// =============================================================================
// SCORING
// =============================================================================

export class ScorePhase implements PhaseExecutor {
  readonly phase = 'SCORING' as const;

  constructor(private deps: PhaseDeps) {}

  async execute(session: RunSession, turn: TurnContext): Promise<PhaseResult> {
    const receipt = turn.receipt;
    if (receipt === null) {
      throw new Error(`Turn ${turn.turn} entered SCORING without a receipt`);
    }
    const { state } = session;

    turn.instructionCount = decode(receipt).length;
    if (!receipt.success) {
      turn.error = errorRecord(
        'OnChainFailure',
        `Transaction failed on chain: ${JSON.stringify(receipt.error)}`,
        receipt.logs
      );
    }
    turn.score = state.ledger.scoreReceipt(receipt, turn.turn);
    commitTurn(state, turn);

    this.deps.logger.debug(
      { runId: state.runId, turn: turn.turn, success: receipt.success, delta: turn.score.delta },
      'Receipt scored'
    );
    return advance('FEEDBACK');
  }
}

// =============================================================================
// FEEDBACK
// =============================================================================

export class FeedbackPhase implements PhaseExecutor {
  readonly phase = 'FEEDBACK' as const;

  constructor(private deps: PhaseDeps) {}

  async execute(session: RunSession, turn: TurnContext): Promise<PhaseResult> {
    const { state } = session;
    if (!turn.committed) {
      commitTurn(state, turn);
    }
    const record = state.transcript[state.transcript.length - 1];
    await this.deps.recorder.recordTurn(state, record);

    this.deps.logger.info(
      {
        runId: state.runId,
        turn: record.index,
        outcome: record.outcome,
        rewardDelta: record.rewardDelta,
        cumulativeReward: record.cumulativeReward,
      },
      'Turn completed'
    );

    if (state.turnIndex >= state.budget) {
      return { type: 'TERMINATE', reason: 'BUDGET_EXHAUSTED' };
    }

    const identity = requireIdentity(state);
    const chain = await this.deps.bridge.observe(identity.publicKey);
    session.feedback = buildFeedback({
      turn: record.index,
      budget: state.budget,
      outcome: record.outcome,
      rewardDelta: record.rewardDelta,
      cumulativeReward: record.cumulativeReward,
      newKeys: record.newKeys,
      error: record.error,
      logs: turn.logs,
      signature: record.signature,
      observation: {
        agentPublicKey: identity.publicKey,
        balanceLamports: chain.balanceLamports,
        blockHeight: chain.blockHeight,
        discoveredPrograms: state.ledger.programs(),
        discoveredInstructionsByProgram: state.ledger.instructionsByProgram(),
        uniqueInstructionsFound: state.ledger.size,
        lastTxInstructionCount: record.instructionCount,
        lastTxReward: record.rewardDelta,
      },
    });
    return advance('AWAITING_CODE');
  }
}

export function createPhaseExecutors(deps: PhaseDeps): Map<TurnPhase, PhaseExecutor> {
  const executors: PhaseExecutor[] = [
    new AwaitCodePhase(deps),
    new ExecutePhase(deps),
    new SubmitPhase(deps),
    new ScorePhase(deps),
    new FeedbackPhase(deps),
  ];
  return new Map(executors.map((e): [TurnPhase, PhaseExecutor] => [e.phase, e]));
}
