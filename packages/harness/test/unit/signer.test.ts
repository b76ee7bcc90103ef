/**
 * Transaction signing: Unit Tests
 */

import { Keypair, Transaction } from '@solana/web3.js';
import { describe, it, expect } from 'vitest';

import { SubmissionRejectedError } from '../../src/bridge/errors.js';
import { signTransaction } from '../../src/bridge/signer.js';
import { unsignedTransfer } from '../helpers/fakes.js';

const BLOCKHASH = Keypair.generate().publicKey.toBase58();

function rejection(fn: () => unknown): SubmissionRejectedError {
  try {
    fn();
  } catch (err) {
    if (err instanceof SubmissionRejectedError) return err;
    throw err;
  }
  throw new Error('Expected a SubmissionRejectedError');
}

describe('signTransaction', () => {
  it('fills the fee payer signature', () => {
    const identity = Keypair.generate();
    const unsigned = unsignedTransfer(identity.publicKey.toBase58(), BLOCKHASH);

    const signed = Transaction.from(signTransaction(unsigned, identity.secretKey));

    expect(signed.signature).not.toBeNull();
    expect(signed.verifySignatures()).toBe(true);
  });

  it('rejects a transaction that does not need the identity', () => {
    const payer = Keypair.generate();
    const other = Keypair.generate();
    const unsigned = unsignedTransfer(payer.publicKey.toBase58(), BLOCKHASH);

    expect(rejection(() => signTransaction(unsigned, other.secretKey)).code).toBe('SIGNER_NOT_REQUIRED');
  });

  it('rejects bytes that are not a transaction', () => {
    const identity = Keypair.generate();

    expect(rejection(() => signTransaction(Uint8Array.from([1, 2, 3]), identity.secretKey)).code).toBe(
      'MALFORMED_TRANSACTION'
    );
  });
});
