/**
 * Solana validator bridge: Unit Tests
 *
 * The RPC connection is replaced by mocks; transactions are real compiled
 * messages so the receipt conversion runs end to end.
 */

import {
  Keypair,
  SystemProgram,
  Transaction,
  VersionedTransactionResponse,
} from '@solana/web3.js';
import bs58 from 'bs58';
import { describe, it, expect, vi, beforeEach } from 'vitest';

import { BridgeError, FatalBridgeError, SubmissionRejectedError } from '../../src/bridge/errors.js';
import { RpcConnection, SolanaBridgeConfig, SolanaValidatorBridge } from '../../src/bridge/solana-bridge.js';
import { decode } from '../../src/runs/decoder.js';

const CONFIG: SolanaBridgeConfig = {
  rpcUrl: 'http://127.0.0.1:8899',
  rpcTimeoutMs: 200,
  confirmTimeoutMs: 50,
  pollIntervalMs: 1,
  airdropLamports: 1_000_000,
  skipPreflight: true,
};

const SYSTEM_PROGRAM = SystemProgram.programId.toBase58();

function confirmed() {
  return { context: { slot: 1 }, value: [{ slot: 1, confirmations: null, err: null, confirmationStatus: 'confirmed' }] };
}

function unknownStatus() {
  return { context: { slot: 1 }, value: [null] };
}

function transferResponse(): { response: VersionedTransactionResponse; payer: string; recipient: string } {
  const payer = Keypair.generate().publicKey;
  const recipient = Keypair.generate().publicKey;
  const tx = new Transaction({ feePayer: payer, recentBlockhash: Keypair.generate().publicKey.toBase58() }).add(
    SystemProgram.transfer({ fromPubkey: payer, toPubkey: recipient, lamports: 10 })
  );
  const response: VersionedTransactionResponse = {
    slot: 9,
    blockTime: null,
    version: 'legacy',
    transaction: { message: tx.compileMessage(), signatures: ['sig-1'] },
    meta: {
      err: null,
      fee: 5000,
      preBalances: [],
      postBalances: [],
      logMessages: [`Program ${SYSTEM_PROGRAM} invoke [1]`, `Program ${SYSTEM_PROGRAM} success`],
      innerInstructions: [
        { index: 0, instructions: [{ programIdIndex: 2, accounts: [0, 1], data: bs58.encode(Uint8Array.from([9, 9])) }] },
      ],
      loadedAddresses: { writable: [], readonly: [] },
    },
  };
  return { response, payer: payer.toBase58(), recipient: recipient.toBase58() };
}

async function caught(promise: Promise<unknown>): Promise<BridgeError> {
  try {
    await promise;
  } catch (err) {
    if (err instanceof BridgeError) return err;
    throw err;
  }
  throw new Error('Expected a BridgeError');
}

describe('SolanaValidatorBridge', () => {
  const requestAirdrop = vi.fn();
  const getLatestBlockhash = vi.fn();
  const sendRawTransaction = vi.fn();
  const getSignatureStatuses = vi.fn();
  const getTransaction = vi.fn();
  const getBalance = vi.fn();
  const getBlockHeight = vi.fn();
  const connection: RpcConnection = {
    requestAirdrop,
    getLatestBlockhash,
    sendRawTransaction,
    getSignatureStatuses,
    getTransaction,
    getBalance,
    getBlockHeight,
  };
  let bridge: SolanaValidatorBridge;

  beforeEach(() => {
    vi.resetAllMocks();
    bridge = new SolanaValidatorBridge(CONFIG, connection);
  });

  // ===========================================================================
  // IDENTITY
  // ===========================================================================

  describe('resetIdentity', () => {
    it('funds a fresh keypair and waits for the airdrop', async () => {
      requestAirdrop.mockResolvedValue('airdrop-sig');
      getSignatureStatuses.mockResolvedValueOnce(unknownStatus()).mockResolvedValue(confirmed());

      const first = await bridge.resetIdentity('run_a');
      const second = await bridge.resetIdentity('run_b');

      expect(first.publicKey).not.toBe(second.publicKey);
      expect(first.secretKey).toHaveLength(64);
      expect(first.fundedLamports).toBe(1_000_000);
      expect(requestAirdrop.mock.calls[0][0].toBase58()).toBe(first.publicKey);
      expect(requestAirdrop.mock.calls[0][1]).toBe(1_000_000);
    });

    it('is fatal when the airdrop never confirms', async () => {
      requestAirdrop.mockResolvedValue('airdrop-sig');
      getSignatureStatuses.mockResolvedValue(unknownStatus());

      const error = await caught(bridge.resetIdentity('run_a'));

      expect(error).toBeInstanceOf(FatalBridgeError);
      expect(error.code).toBe('AIRDROP_NOT_CONFIRMED');
    });
  });

  // ===========================================================================
  // REFERENCE + OBSERVATION
  // ===========================================================================

  describe('latestReference', () => {
    it('returns the latest blockhash', async () => {
      getLatestBlockhash.mockResolvedValue({ blockhash: 'hash-1', lastValidBlockHeight: 100 });

      await expect(bridge.latestReference()).resolves.toBe('hash-1');
    });

    it('is fatal when the validator is unreachable', async () => {
      getLatestBlockhash.mockRejectedValue(new TypeError('fetch failed'));

      const error = await caught(bridge.latestReference());

      expect(error).toBeInstanceOf(FatalBridgeError);
      expect(error.code).toBe('VALIDATOR_UNREACHABLE');
      expect(error.message).toBe('latestReference failed: fetch failed');
    });

    it('is fatal when a call outlives the RPC timeout', async () => {
      getLatestBlockhash.mockReturnValue(new Promise(() => undefined));
      bridge = new SolanaValidatorBridge({ ...CONFIG, rpcTimeoutMs: 20 }, connection);

      const error = await caught(bridge.latestReference());

      expect(error).toBeInstanceOf(FatalBridgeError);
      expect(error.code).toBe('RPC_TIMEOUT');
      expect(error.message).toBe('latestReference did not answer within 20ms');
    });
  });

  describe('observe', () => {
    it('reads balance and block height', async () => {
      getBalance.mockResolvedValue(1_500);
      getBlockHeight.mockResolvedValue(77);

      const observation = await bridge.observe(Keypair.generate().publicKey.toBase58());

      expect(observation).toEqual({ balanceLamports: 1_500, blockHeight: 77 });
    });
  });

  // ===========================================================================
  // SUBMISSION
  // ===========================================================================

  describe('submit', () => {
    it('returns the executed receipt with inner instructions after their parent', async () => {
      const { response, payer, recipient } = transferResponse();
      sendRawTransaction.mockResolvedValue('sig-1');
      getSignatureStatuses.mockResolvedValue(confirmed());
      getTransaction.mockResolvedValueOnce(null).mockResolvedValue(response);

      const bytes = Uint8Array.from([1, 2, 3]);
      const receipt = await bridge.submit(bytes);

      expect(sendRawTransaction).toHaveBeenCalledWith(bytes, { skipPreflight: true, preflightCommitment: 'confirmed' });
      expect(getTransaction).toHaveBeenCalledTimes(2);
      expect(receipt.signature).toBe('sig-1');
      expect(receipt.success).toBe(true);
      expect(receipt.accountKeys).toEqual([payer, recipient, SYSTEM_PROGRAM]);
      expect(receipt.logs).toHaveLength(2);
      expect(receipt.instructions.map((ix) => ix.depth)).toEqual([0, 1]);
      expect(decode(receipt)).toEqual([
        { programId: SYSTEM_PROGRAM, discriminator: 2 },
        { programId: SYSTEM_PROGRAM, discriminator: 9 },
      ]);
    });

    it('marks an on-chain error as an unsuccessful receipt', async () => {
      const { response } = transferResponse();
      const failed: VersionedTransactionResponse = {
        ...response,
        meta: response.meta ? { ...response.meta, err: { InstructionError: [0, { Custom: 1 }] } } : null,
      };
      sendRawTransaction.mockResolvedValue('sig-1');
      getSignatureStatuses.mockResolvedValue(confirmed());
      getTransaction.mockResolvedValue(failed);

      const receipt = await bridge.submit(Uint8Array.from([1]));

      expect(receipt.success).toBe(false);
      expect(receipt.error).toEqual({ InstructionError: [0, { Custom: 1 }] });
    });

    it('rejects the turn when the validator refuses the transaction', async () => {
      const refusal = Object.assign(new Error('failed to send transaction: Blockhash not found'), {
        logs: ['Program log: refused'],
      });
      sendRawTransaction.mockRejectedValue(refusal);

      const error = await caught(bridge.submit(Uint8Array.from([1])));

      expect(error).toBeInstanceOf(SubmissionRejectedError);
      expect(error.code).toBe('TRANSACTION_REJECTED');
      if (error instanceof SubmissionRejectedError) {
        expect(error.logs).toEqual(['Program log: refused']);
      }
    });

    it('rejects the turn when the transaction never confirms', async () => {
      sendRawTransaction.mockResolvedValue('sig-1');
      getSignatureStatuses.mockResolvedValue(unknownStatus());

      const error = await caught(bridge.submit(Uint8Array.from([1])));

      expect(error).toBeInstanceOf(SubmissionRejectedError);
      expect(error.code).toBe('TX_NOT_CONFIRMED');
      expect(getTransaction).not.toHaveBeenCalled();
    });

    it('is fatal when the connection drops during submission', async () => {
      sendRawTransaction.mockRejectedValue(new Error('connect ECONNREFUSED 127.0.0.1:8899'));

      const error = await caught(bridge.submit(Uint8Array.from([1])));

      expect(error).toBeInstanceOf(FatalBridgeError);
      expect(error.code).toBe('VALIDATOR_UNREACHABLE');
    });

    it('is fatal when a confirmed transaction cannot be fetched', async () => {
      sendRawTransaction.mockResolvedValue('sig-1');
      getSignatureStatuses.mockResolvedValue(confirmed());
      getTransaction.mockResolvedValue(null);

      const error = await caught(bridge.submit(Uint8Array.from([1])));

      expect(error).toBeInstanceOf(FatalBridgeError);
      expect(error.code).toBe('TRANSACTION_UNAVAILABLE');
    });
  });
});
