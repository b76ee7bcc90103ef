/**
 * Partial signing of code-unit transactions with the run identity.
 */

import { Keypair, VersionedTransaction } from '@solana/web3.js';
import { SubmissionRejectedError } from './errors.js';

/**
 * Deserialize the unsigned transaction (legacy or v0), fill the identity's
 * signature slot and re-serialize. Malformed bytes, or a message that does
 * not require the identity's signature, are rejected for this turn only.
 */
export function signTransaction(serialized: Uint8Array, secretKey: Uint8Array): Uint8Array {
  const signer = Keypair.fromSecretKey(secretKey);

  let transaction: VersionedTransaction;
  try {
    transaction = VersionedTransaction.deserialize(serialized);
  } catch (err) {
    throw new SubmissionRejectedError(
      'MALFORMED_TRANSACTION',
      `Transaction bytes could not be deserialized: ${err instanceof Error ? err.message : String(err)}`
    );
  }

  const requiredSigners = transaction.message.staticAccountKeys
    .slice(0, transaction.message.header.numRequiredSignatures);
  if (!requiredSigners.some((key) => key.equals(signer.publicKey))) {
    throw new SubmissionRejectedError(
      'SIGNER_NOT_REQUIRED',
      `Transaction does not list ${signer.publicKey.toBase58()} as a signer; use it as the fee payer`
    );
  }

  try {
    transaction.sign([signer]);
    return transaction.serialize();
  } catch (err) {
    throw new SubmissionRejectedError(
      'SIGNING_FAILED',
      `Transaction could not be signed: ${err instanceof Error ? err.message : String(err)}`
    );
  }
}
