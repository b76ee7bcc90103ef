/**
 * Transaction discovery harness.
 *
 * Design invariants:
 * - At most one transaction is built per turn
 * - An instruction key pays out once per run; failed transactions pay nothing
 * - The cumulative reward is the sum of the transcript's turn deltas
 * - Only an unusable validator ends a run early
 */

// Run model
export type {
  TurnPhase,
  RunStatus,
  TerminationReason,
  ErrorKind,
  Diagnostic,
  ErrorRecord,
  ExecutionResult,
  ExecutionContext,
  CompiledInstruction,
  TransactionReceipt,
  WireCompiledInstruction,
  WireInnerInstructions,
  WireTransactionReceipt,
  InstructionKey,
  ScoreResult,
  TurnOutcome,
  TurnRecord,
  Observation,
  TurnFeedback,
  RunIdentity,
  RunTermination,
  RunErrorEntry,
  RunState,
  RunTranscript,
  RunSummary,
} from './runs/types.js';
export { TURN_SCOPED_ERRORS, errorRecord, compileErrorRecord } from './runs/types.js';

// Decoder + ledger
export { decode, receiptFromWire, instructionKeyId, parseInstructionKeyId, MalformedReceiptError } from './runs/decoder.js';
export { DiscoveryLedger } from './runs/ledger.js';

// Orchestrator
export type { RunRequest, OrchestratorDeps, OrchestratorEvent, EventHandler, BatchOptions, BatchOutcome } from './runs/orchestrator.js';
export { TurnOrchestrator, DEFAULT_TURN_BUDGET, generateRunId } from './runs/orchestrator.js';
export { buildFeedback, formatFeedbackMessage } from './runs/feedback.js';

// Transcripts
export type { TranscriptStore } from './runs/transcript-store.js';
export { InMemoryTranscriptStore, FileTranscriptStore, toTranscript } from './runs/transcript-store.js';
export { PostgresTranscriptStore, createPostgresTranscriptStore } from './persistence/postgres/index.js';

// Sandbox
export type { SandboxGateway, RunnerLauncher, RunnerInvocation, RunnerExit, SandboxGatewayConfig } from './sandbox/gateway.js';
export {
  ProcessSandboxGateway,
  ChildProcessLauncher,
  ArtifactRootError,
  checkPackageResolution,
  GUARDED_PACKAGES,
} from './sandbox/gateway.js';
export { runCodeUnit, compileAndImport, ENTRY_POINT } from './sandbox/runner.js';
export { TransactionGuard, PolicyViolationError } from './sandbox/guard.js';

// Validator bridge
export type { ValidatorBridge, ChainObservation } from './bridge/validator-bridge.js';
export { SolanaValidatorBridge, DEFAULT_AIRDROP_LAMPORTS } from './bridge/solana-bridge.js';
export { BridgeError, FatalBridgeError, SubmissionRejectedError, classifyBridgeError } from './bridge/errors.js';
export { signTransaction } from './bridge/signer.js';

// Generation boundary
export type { CodeGenerator, CodeGeneratorFactory, GenerationRequest } from './generator/index.js';
export { extractCodeBlocks, extractCodeUnit } from './generator/index.js';

// Metrics
export { MetricsRecorder, summarize, DEFAULT_MAX_SUMMARIES } from './metrics/recorder.js';
export type { MetricsRecord, RecorderOptions } from './metrics/recorder.js';
export { metricsRegistry, startMetricsServer } from './metrics/index.js';

// Application
export { Harness, loadConfigFromEnv } from './app.js';
export type { HarnessConfig, HarnessOverrides } from './app.js';
