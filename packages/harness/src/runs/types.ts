/**
 * Run Types
 *
 * Type definitions for the turn execution model: phases, error taxonomy,
 * execution results, receipts and the per-run state owned by the
 * orchestrator.
 */

import type { DiscoveryLedger } from './ledger.js';

// =============================================================================
// TURN PHASES
// =============================================================================

export type TurnPhase =
  | 'AWAITING_CODE'  // Waiting on the generator for the next code unit
  | 'EXECUTING'      // Code unit running inside the sandbox
  | 'SUBMITTING'     // Signing and sending the produced transaction
  | 'SCORING'        // Decoding the receipt and updating the ledger
  | 'FEEDBACK'       // Committing the turn and building feedback
  | 'TERMINATED';    // Run finished (normally or not)

export type RunStatus = 'ACTIVE' | 'TERMINATED';

export type TerminationReason =
  | 'BUDGET_EXHAUSTED'    // Normal completion
  | 'FATAL_BRIDGE_ERROR'  // Validator unreachable or misbehaving
  | 'CANCELLED'           // Caller aborted the run
  | 'INTERNAL_ERROR';     // Harness failure outside the taxonomy (store, sandbox host)

// =============================================================================
// ERROR TAXONOMY
// =============================================================================

export type ErrorKind =
  | 'InterfaceError'      // Entry point missing or wrong shape
  | 'CompileError'        // Build/parse failure, carries every diagnostic
  | 'RuntimeError'        // Uncaught failure while running
  | 'PolicyViolation'     // More than one transaction built
  | 'Timeout'             // Execution exceeded its time box
  | 'SubmissionRejected'  // Validator refused the transaction
  | 'OnChainFailure'      // Transaction landed but failed
  | 'GenerationError'     // Generator threw instead of answering
  | 'FatalBridgeError'    // Validator unreachable, ends the run
  | 'InternalError';      // Harness itself failed, ends the run

/** Every kind except FatalBridgeError and InternalError only costs the current turn. */
export const TURN_SCOPED_ERRORS: ReadonlySet<ErrorKind> = new Set<ErrorKind>([
  'InterfaceError',
  'CompileError',
  'RuntimeError',
  'PolicyViolation',
  'Timeout',
  'SubmissionRejected',
  'OnChainFailure',
  'GenerationError',
]);

export interface Diagnostic {
  message: string;
  line: number | null;    // 1-based
  column: number | null;  // 1-based
  file: string | null;
}

export type ErrorRecord =
  | { kind: 'CompileError'; message: string; details: string[]; diagnostics: Diagnostic[] }
  | { kind: Exclude<ErrorKind, 'CompileError'>; message: string; details: string[] };

export function errorRecord(
  kind: Exclude<ErrorKind, 'CompileError'>,
  message: string,
  details: string[] = []
): ErrorRecord {
  return { kind, message, details };
}

export function compileErrorRecord(diagnostics: Diagnostic[], details: string[] = []): ErrorRecord {
  const count = diagnostics.length;
  return {
    kind: 'CompileError',
    message: `Compilation failed with ${count} error${count === 1 ? '' : 's'}`,
    details,
    diagnostics,
  };
}

// =============================================================================
// EXECUTION RESULT
// =============================================================================

export type ExecutionResult =
  | { serializedTransaction: Uint8Array; error: null }
  | { serializedTransaction: null; error: ErrorRecord };

export interface ExecutionContext {
  runId: string;
  turnIndex: number;
  identity?: string;        // Run identity public key (base58)
  freshnessToken?: string;  // Latest blockhash
  signal?: AbortSignal;
}

// =============================================================================
// RECEIPTS
// =============================================================================

/** Instruction as executed, outer instructions followed by their inner ones. */
export interface CompiledInstruction {
  programIdIndex: number;
  data: Uint8Array;
  depth: 0 | 1;
}

export interface TransactionReceipt {
  signature: string;
  success: boolean;
  error: unknown;  // meta.err verbatim, null on success
  logs: string[];
  accountKeys: string[];
  instructions: CompiledInstruction[];
}

/** JSON-RPC getTransaction shape, reduced to the fields the harness reads. */
export interface WireCompiledInstruction {
  programIdIndex: number;
  accounts?: number[];
  data: string;  // base58
}

export interface WireInnerInstructions {
  index: number;
  instructions: WireCompiledInstruction[];
}

export interface WireTransactionReceipt {
  slot?: number;
  meta: {
    err: unknown;
    logMessages?: string[] | null;
    innerInstructions?: WireInnerInstructions[] | null;
    loadedAddresses?: { writable: string[]; readonly: string[] } | null;
  } | null;
  transaction: {
    signatures?: string[];
    message: {
      accountKeys: string[];
      instructions: WireCompiledInstruction[];
    };
  };
}

// =============================================================================
// DISCOVERY
// =============================================================================

export interface InstructionKey {
  programId: string;
  discriminator: number | null;  // null when the instruction carries no data
}

export interface ScoreResult {
  delta: number;
  newKeys: InstructionKey[];
}

// =============================================================================
// TURNS
// =============================================================================

export type TurnOutcome = ErrorKind | 'Success';

export interface TurnRecord {
  index: number;             // 1-based
  timestamp: string;         // ISO-8601, when the turn was committed
  durationMs: number;
  rewardDelta: number;
  cumulativeReward: number;
  newKeys: string[];         // canonical key form
  outcome: TurnOutcome;
  instructionCount: number;
  signature: string | null;
  error: ErrorRecord | null;
}

export interface Observation {
  agentPublicKey: string;
  balanceLamports: number;
  blockHeight: number;
  discoveredPrograms: string[];
  discoveredInstructionsByProgram: Record<string, string[]>;
  uniqueInstructionsFound: number;
  lastTxInstructionCount: number;
  lastTxReward: number;
}

export interface TurnFeedback {
  turn: number;
  remainingTurns: number;
  outcome: TurnOutcome;
  message: string;
  rewardDelta: number;
  cumulativeReward: number;
  newKeys: string[];
  error: ErrorRecord | null;
  logs: string[];
  signature: string | null;
  observation: Observation;
}

// =============================================================================
// RUN STATE
// =============================================================================

export interface RunIdentity {
  publicKey: string;
  /** Raw 64-byte secret key; never persisted. */
  secretKey: Uint8Array;
  fundedLamports: number;
}

export interface RunTermination {
  reason: TerminationReason;
  error?: ErrorRecord;
  at: string;
}

export interface RunErrorEntry {
  turn: number;
  kind: ErrorKind;
  message: string;
}

export interface RunState {
  runId: string;
  model: string;
  runIndex: number;
  turnIndex: number;  // completed turns
  budget: number;
  cumulativeReward: number;
  ledger: DiscoveryLedger;
  transcript: TurnRecord[];
  errors: RunErrorEntry[];
  identity: RunIdentity | null;
  status: RunStatus;
  termination?: RunTermination;
  startedAt: string;
}

/** Persisted per-run artifact. */
export interface RunTranscript {
  run_id: string;
  model: string;
  run_index: number;
  start_time: string;
  end_time: string | null;
  status: RunStatus;
  budget: number;
  identity: string | null;
  termination: RunTermination | null;
  cumulative_rewards: number[];
  messages: TurnRecord[];
  programs_discovered: Record<string, number>;
  errors: RunErrorEntry[];
}

export interface RunSummary {
  runId: string;
  model: string;
  runIndex: number;
  turnsCompleted: number;
  cumulativeReward: number;
  uniqueInstructions: number;
  termination: RunTermination;
}
