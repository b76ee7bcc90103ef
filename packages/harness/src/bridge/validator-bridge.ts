/**
 * Validator Bridge
 *
 * The harness's only view of the sandboxed chain replica. Implementations
 * throw FatalBridgeError when the replica cannot be used and
 * SubmissionRejectedError when it refuses one transaction.
 */

import type { RunIdentity, TransactionReceipt } from '../runs/types.js';

export interface ChainObservation {
  balanceLamports: number;
  blockHeight: number;
}

export interface ValidatorBridge {
  /** Fresh keypair funded with the starting balance, confirmed on return. */
  resetIdentity(runId: string): Promise<RunIdentity>;

  /** Latest blockhash, used as the freshness token of the next transaction. */
  latestReference(): Promise<string>;

  /** Send signed bytes and wait for the confirmed receipt. */
  submit(signedBytes: Uint8Array): Promise<TransactionReceipt>;

  observe(publicKey: string): Promise<ChainObservation>;
}
