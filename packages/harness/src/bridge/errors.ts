/**
 * Bridge error taxonomy.
 *
 * FATAL    - validator unreachable or misbehaving; the run cannot continue.
 * REJECTED - the validator refused this transaction; only the turn is lost.
 */

export type BridgeFailureCategory = 'FATAL' | 'REJECTED';

export type BridgeOperation =
  | 'resetIdentity'
  | 'latestReference'
  | 'submit'
  | 'confirm'
  | 'getTransaction'
  | 'observe';

export interface ClassifiedBridgeError {
  category: BridgeFailureCategory;
  message: string;
  code: string;
  originalError?: Error;
}

export abstract class BridgeError extends Error {
  abstract readonly category: BridgeFailureCategory;
  readonly code: string;

  constructor(code: string, message: string) {
    super(message);
    this.code = code;
  }
}

export class FatalBridgeError extends BridgeError {
  readonly category = 'FATAL' as const;

  constructor(code: string, message: string) {
    super(code, message);
    this.name = 'FatalBridgeError';
  }
}

export class SubmissionRejectedError extends BridgeError {
  readonly category = 'REJECTED' as const;
  readonly logs: string[];

  constructor(code: string, message: string, logs: string[] = []) {
    super(code, message);
    this.name = 'SubmissionRejectedError';
    this.logs = logs;
  }
}

// =============================================================================
// CLASSIFICATION
// =============================================================================

const UNREACHABLE_PATTERNS = [
  'fetch failed',
  'econnrefused',
  'econnreset',
  'enotfound',
  'eai_again',
  'socket hang up',
  'network error',
  '502 bad gateway',
  '503 service unavailable',
  '504 gateway timeout',
];

const TIMEOUT_PATTERNS = ['timed out', 'timeout', 'etimedout'];

const REJECTION_PATTERNS = [
  'failed to send transaction',
  'failed to deserialize',
  'invalid transaction',
  'signature verification failure',
  'transaction simulation failed',
  'blockhash not found',
  'insufficient funds',
  'invalid params',
  'too large',
];

/**
 * Classify a failure raised by an RPC call. Unreachability is always fatal.
 * During submission any other RPC answer is a rejection of the transaction;
 * elsewhere an unexpected answer means the validator is unusable.
 */
export function classifyBridgeError(error: unknown, operation: BridgeOperation): ClassifiedBridgeError {
  const originalError = error instanceof Error ? error : undefined;
  const message = error instanceof Error ? error.message : String(error);
  const lower = message.toLowerCase();

  if (UNREACHABLE_PATTERNS.some((p) => lower.includes(p))) {
    return { category: 'FATAL', code: 'VALIDATOR_UNREACHABLE', message, originalError };
  }
  if (TIMEOUT_PATTERNS.some((p) => lower.includes(p))) {
    return { category: 'FATAL', code: 'RPC_TIMEOUT', message, originalError };
  }
  if (operation === 'submit') {
    const code = REJECTION_PATTERNS.some((p) => lower.includes(p)) ? 'TRANSACTION_REJECTED' : 'RPC_REJECTED';
    return { category: 'REJECTED', code, message, originalError };
  }
  return { category: 'FATAL', code: 'RPC_ERROR', message, originalError };
}

export function toBridgeError(error: unknown, operation: BridgeOperation): BridgeError {
  if (error instanceof BridgeError) {
    return error;
  }
  const classified = classifyBridgeError(error, operation);
  if (classified.category === 'REJECTED') {
    return new SubmissionRejectedError(classified.code, classified.message, logsOf(error));
  }
  return new FatalBridgeError(classified.code, `${operation} failed: ${classified.message}`);
}

/** Program logs carried by a send error, when the library attached them. */
function logsOf(error: unknown): string[] {
  if (typeof error !== 'object' || error === null) return [];
  const logs: unknown = Reflect.get(error, 'logs');
  return Array.isArray(logs) ? logs.filter((l): l is string => typeof l === 'string') : [];
}
