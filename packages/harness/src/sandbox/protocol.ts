/**
 * Runner process boundary.
 *
 * The runner prints exactly one JSON line on stdout:
 *   success: { "serialized_tx": "<base64>" }
 *   failure: { "serialized_tx": null, "error", "details", "type", "errors"? }
 * and exits 0 on success, 1 on failure.
 */

import {
  Diagnostic,
  ErrorKind,
  ErrorRecord,
  ExecutionResult,
  errorRecord,
} from '../runs/types.js';

export interface RunnerSuccess {
  serialized_tx: string;
}

export interface RunnerFailure {
  serialized_tx: null;
  error: string;
  details: string[];
  type: ErrorKind;
  errors?: Diagnostic[];
}

export type RunnerOutput = RunnerSuccess | RunnerFailure;

const ERROR_KINDS: ReadonlySet<string> = new Set<ErrorKind>([
  'InterfaceError',
  'CompileError',
  'RuntimeError',
  'PolicyViolation',
  'Timeout',
  'SubmissionRejected',
  'OnChainFailure',
  'GenerationError',
  'FatalBridgeError',
]);

export function toRunnerFailure(error: ErrorRecord): RunnerFailure {
  const failure: RunnerFailure = {
    serialized_tx: null,
    error: error.message,
    details: error.details,
    type: error.kind,
  };
  if (error.kind === 'CompileError') {
    failure.errors = error.diagnostics;
  }
  return failure;
}

export function runnerExitCode(output: RunnerOutput): 0 | 1 {
  return output.serialized_tx === null ? 1 : 0;
}

/** Strict base64 decode; null for anything that is not a non-empty payload. */
export function decodeBase64Transaction(value: string): Uint8Array | null {
  const trimmed = value.trim();
  if (trimmed.length === 0 || trimmed.length % 4 !== 0 || !/^[A-Za-z0-9+/]+={0,2}$/.test(trimmed)) {
    return null;
  }
  const bytes = Buffer.from(trimmed, 'base64');
  return bytes.length > 0 ? new Uint8Array(bytes) : null;
}

// =============================================================================
// PARSING (parent side)
// =============================================================================

/**
 * Map the runner's stdout to an ExecutionResult. The last non-empty line is
 * the result; anything unparseable becomes a RuntimeError carrying the raw
 * output.
 */
export function parseRunnerOutput(stdout: string, stderr: string, exitCode: number | null): ExecutionResult {
  const lines = stdout.split('\n').map((l) => l.trim()).filter((l) => l.length > 0);
  const last = lines[lines.length - 1];

  const raw = outputDetails(stdout, stderr, exitCode);
  if (last === undefined) {
    return failed(errorRecord('RuntimeError', 'Runner produced no result', raw));
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(last);
  } catch {
    return failed(errorRecord('RuntimeError', 'Runner produced malformed output', raw));
  }

  if (!isRecord(parsed) || !('serialized_tx' in parsed)) {
    return failed(errorRecord('RuntimeError', 'Runner output is missing serialized_tx', raw));
  }

  const tx = parsed.serialized_tx;
  if (typeof tx === 'string') {
    const bytes = decodeBase64Transaction(tx);
    if (bytes === null) {
      return failed(errorRecord('InterfaceError', 'executeSkill must resolve to a base64-encoded transaction'));
    }
    return { serializedTransaction: bytes, error: null };
  }

  if (tx !== null) {
    return failed(errorRecord('RuntimeError', 'Runner output has an invalid serialized_tx', raw));
  }

  return failed(toErrorRecord(parsed, raw));
}

function toErrorRecord(parsed: Record<string, unknown>, raw: string[]): ErrorRecord {
  const message = typeof parsed.error === 'string' ? parsed.error : 'Unknown error';
  const details = Array.isArray(parsed.details)
    ? parsed.details.filter((d): d is string => typeof d === 'string')
    : typeof parsed.details === 'string'
      ? parsed.details.split('\n')
      : [];
  const type = typeof parsed.type === 'string' && isErrorKind(parsed.type) ? parsed.type : 'RuntimeError';

  if (type === 'CompileError') {
    const diagnostics = Array.isArray(parsed.errors)
      ? parsed.errors.filter(isRecord).map(toDiagnostic)
      : [];
    return { kind: 'CompileError', message, details, diagnostics };
  }
  if (type === 'RuntimeError' && details.length === 0) {
    return errorRecord(type, message, raw);
  }
  return errorRecord(type, message, details);
}

function toDiagnostic(value: Record<string, unknown>): Diagnostic {
  return {
    message: typeof value.message === 'string' ? value.message : 'Unknown diagnostic',
    line: typeof value.line === 'number' ? value.line : null,
    column: typeof value.column === 'number' ? value.column : null,
    file: typeof value.file === 'string' ? value.file : null,
  };
}

function isErrorKind(value: string): value is ErrorKind {
  return ERROR_KINDS.has(value);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function failed(error: ErrorRecord): ExecutionResult {
  return { serializedTransaction: null, error };
}

function outputDetails(stdout: string, stderr: string, exitCode: number | null): string[] {
  const details = [`exit code: ${exitCode ?? 'none'}`];
  if (stdout.trim()) details.push(`stdout: ${stdout.trim()}`);
  if (stderr.trim()) details.push(`stderr: ${stderr.trim()}`);
  return details;
}
