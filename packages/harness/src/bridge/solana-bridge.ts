/**
 * Solana Validator Bridge
 *
 * JSON-RPC access to the sandboxed replica through @solana/web3.js.
 * Every RPC call is bounded by `rpcTimeoutMs`; expiry is fatal.
 */

import { setTimeout as sleep } from 'node:timers/promises';
import {
  Connection,
  Keypair,
  LAMPORTS_PER_SOL,
  PublicKey,
  VersionedTransactionResponse,
} from '@solana/web3.js';
import bs58 from 'bs58';

import { ChainObservation, ValidatorBridge } from './validator-bridge.js';
import { BridgeOperation, FatalBridgeError, SubmissionRejectedError, toBridgeError } from './errors.js';
import { MalformedReceiptError, receiptFromWire } from '../runs/decoder.js';
import type { RunIdentity, TransactionReceipt, WireTransactionReceipt } from '../runs/types.js';
import { Logger, silentLogger } from '../utils/index.js';

export const DEFAULT_AIRDROP_LAMPORTS = 2 * LAMPORTS_PER_SOL;

export interface SolanaBridgeConfig {
  rpcUrl: string;
  rpcTimeoutMs: number;
  confirmTimeoutMs: number;
  pollIntervalMs: number;
  airdropLamports: number;
  /** Skip simulation so failing transactions land and return logs. */
  skipPreflight: boolean;
}

/** The subset of Connection the bridge talks to. */
export type RpcConnection = Pick<
  Connection,
  | 'requestAirdrop'
  | 'getLatestBlockhash'
  | 'sendRawTransaction'
  | 'getSignatureStatuses'
  | 'getTransaction'
  | 'getBalance'
  | 'getBlockHeight'
>;

export class SolanaValidatorBridge implements ValidatorBridge {
  private config: SolanaBridgeConfig;
  private connection: RpcConnection;
  private logger: Logger;

  constructor(config: SolanaBridgeConfig, connection?: RpcConnection, logger?: Logger) {
    this.config = config;
    this.connection = connection ?? new Connection(config.rpcUrl, 'confirmed');
    this.logger = logger ?? silentLogger();
  }

  async resetIdentity(runId: string): Promise<RunIdentity> {
    const keypair = Keypair.generate();
    const signature = await this.rpc('resetIdentity', () =>
      this.connection.requestAirdrop(keypair.publicKey, this.config.airdropLamports)
    );

    const confirmed = await this.waitForConfirmation(signature);
    if (!confirmed) {
      throw new FatalBridgeError(
        'AIRDROP_NOT_CONFIRMED',
        `Airdrop ${signature} was not confirmed within ${this.config.confirmTimeoutMs}ms`
      );
    }

    this.logger.info(
      { runId, publicKey: keypair.publicKey.toBase58(), lamports: this.config.airdropLamports },
      'Run identity funded'
    );

    return {
      publicKey: keypair.publicKey.toBase58(),
      secretKey: keypair.secretKey,
      fundedLamports: this.config.airdropLamports,
    };
  }

  async latestReference(): Promise<string> {
    const { blockhash } = await this.rpc('latestReference', () => this.connection.getLatestBlockhash('confirmed'));
    return blockhash;
  }

  async submit(signedBytes: Uint8Array): Promise<TransactionReceipt> {
    const signature = await this.rpc('submit', () =>
      this.connection.sendRawTransaction(signedBytes, {
        skipPreflight: this.config.skipPreflight,
        preflightCommitment: 'confirmed',
      })
    );
    this.logger.debug({ signature }, 'Transaction sent');

    const confirmed = await this.waitForConfirmation(signature);
    if (!confirmed) {
      // The replica kept answering but never saw the transaction land
      throw new SubmissionRejectedError(
        'TX_NOT_CONFIRMED',
        `Transaction ${signature} was not confirmed within ${this.config.confirmTimeoutMs}ms; the blockhash may be stale`
      );
    }

    const response = await this.fetchTransaction(signature);
    try {
      return receiptFromWire(signature, toWireReceipt(response));
    } catch (err) {
      if (err instanceof MalformedReceiptError) {
        throw new FatalBridgeError('MALFORMED_RECEIPT', err.message);
      }
      throw err;
    }
  }

  async observe(publicKey: string): Promise<ChainObservation> {
    const key = new PublicKey(publicKey);
    const [balanceLamports, blockHeight] = await Promise.all([
      this.rpc('observe', () => this.connection.getBalance(key, 'confirmed')),
      this.rpc('observe', () => this.connection.getBlockHeight('confirmed')),
    ]);
    return { balanceLamports, blockHeight };
  }

  // ===========================================================================
  // INTERNALS
  // ===========================================================================

  private async waitForConfirmation(signature: string): Promise<boolean> {
    const deadline = Date.now() + this.config.confirmTimeoutMs;
    while (Date.now() < deadline) {
      const { value } = await this.rpc('confirm', () => this.connection.getSignatureStatuses([signature]));
      const status = value[0];
      if (status && (status.confirmationStatus === 'confirmed' || status.confirmationStatus === 'finalized')) {
        return true;
      }
      await sleep(this.config.pollIntervalMs);
    }
    return false;
  }

  private async fetchTransaction(signature: string): Promise<VersionedTransactionResponse> {
    const deadline = Date.now() + this.config.confirmTimeoutMs;
    while (Date.now() < deadline) {
      const response = await this.rpc('getTransaction', () =>
        this.connection.getTransaction(signature, { commitment: 'confirmed', maxSupportedTransactionVersion: 0 })
      );
      if (response) {
        return response;
      }
      await sleep(this.config.pollIntervalMs);
    }
    throw new FatalBridgeError(
      'TRANSACTION_UNAVAILABLE',
      `Transaction ${signature} was confirmed but could not be fetched`
    );
  }

  private async rpc<T>(operation: BridgeOperation, call: () => Promise<T>): Promise<T> {
    let timer: NodeJS.Timeout | undefined;
    const expired = new Promise<never>((_, reject) => {
      timer = setTimeout(
        () => reject(new FatalBridgeError('RPC_TIMEOUT', `${operation} did not answer within ${this.config.rpcTimeoutMs}ms`)),
        this.config.rpcTimeoutMs
      );
    });
    try {
      return await Promise.race([call(), expired]);
    } catch (err) {
      const bridgeError = toBridgeError(err, operation);
      this.logger.warn({ operation, code: bridgeError.code, category: bridgeError.category }, bridgeError.message);
      throw bridgeError;
    } finally {
      clearTimeout(timer);
    }
  }
}

/** web3.js response → JSON-RPC wire shape. */
export function toWireReceipt(response: VersionedTransactionResponse): WireTransactionReceipt {
  const message = response.transaction.message;
  const meta = response.meta;
  return {
    slot: response.slot,
    meta: meta
      ? {
          err: meta.err,
          logMessages: meta.logMessages ?? [],
          innerInstructions: (meta.innerInstructions ?? []).map((group) => ({
            index: group.index,
            instructions: group.instructions.map((ix) => ({
              programIdIndex: ix.programIdIndex,
              accounts: ix.accounts,
              data: ix.data,
            })),
          })),
          loadedAddresses: meta.loadedAddresses
            ? {
                writable: meta.loadedAddresses.writable.map((k) => k.toBase58()),
                readonly: meta.loadedAddresses.readonly.map((k) => k.toBase58()),
              }
            : null,
        }
      : null,
    transaction: {
      signatures: response.transaction.signatures,
      message: {
        accountKeys: message.staticAccountKeys.map((k) => k.toBase58()),
        instructions: message.compiledInstructions.map((ix) => ({
          programIdIndex: ix.programIdIndex,
          accounts: ix.accountKeyIndexes,
          data: bs58.encode(ix.data),
        })),
      },
    },
  };
}
