/**
 * Transaction Decoder
 *
 * Turns an executed transaction into the instruction keys the ledger
 * rewards. A key is the invoked program plus the first byte of the
 * instruction data.
 *
 * Known approximation: instruction variants that share a leading byte
 * (Anchor-style 8-byte discriminators, for instance) collapse into one key.
 */

import bs58 from 'bs58';
import type {
  CompiledInstruction,
  InstructionKey,
  TransactionReceipt,
  WireCompiledInstruction,
  WireTransactionReceipt,
} from './types.js';

export class MalformedReceiptError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'MalformedReceiptError';
  }
}

// =============================================================================
// DECODING
// =============================================================================

/**
 * Keys for every instruction in execution order: each outer instruction is
 * followed by the inner instructions it invoked. Pure; zero-length data
 * yields a null discriminator.
 */
export function decode(receipt: TransactionReceipt): InstructionKey[] {
  return receipt.instructions.map((ix) => {
    const programId = receipt.accountKeys[ix.programIdIndex];
    if (programId === undefined) {
      throw new MalformedReceiptError(
        `programIdIndex ${ix.programIdIndex} outside account list of ${receipt.accountKeys.length}`
      );
    }
    return { programId, discriminator: ix.data.length > 0 ? ix.data[0] : null };
  });
}

export function instructionKeyId(key: InstructionKey): string {
  return `${key.programId}:${key.discriminator ?? 'none'}`;
}

export function parseInstructionKeyId(id: string): InstructionKey {
  const separator = id.lastIndexOf(':');
  if (separator <= 0) {
    throw new Error(`Invalid instruction key: ${id}`);
  }
  const programId = id.slice(0, separator);
  const raw = id.slice(separator + 1);
  if (raw === 'none') {
    return { programId, discriminator: null };
  }
  const discriminator = Number(raw);
  if (!Number.isInteger(discriminator) || discriminator < 0 || discriminator > 255) {
    throw new Error(`Invalid instruction key: ${id}`);
  }
  return { programId, discriminator };
}

// =============================================================================
// WIRE CONVERSION
// =============================================================================

/**
 * Build a receipt from the JSON-RPC getTransaction shape.
 *
 * The account list is the static keys followed by the addresses loaded from
 * lookup tables (writable, then readonly), which is how v0 program indexes
 * are resolved.
 */
export function receiptFromWire(signature: string, wire: WireTransactionReceipt): TransactionReceipt {
  const meta = wire.meta;
  const accountKeys = [
    ...wire.transaction.message.accountKeys,
    ...(meta?.loadedAddresses?.writable ?? []),
    ...(meta?.loadedAddresses?.readonly ?? []),
  ];

  const innerByIndex = new Map<number, WireCompiledInstruction[]>();
  for (const group of meta?.innerInstructions ?? []) {
    innerByIndex.set(group.index, group.instructions);
  }

  const instructions: CompiledInstruction[] = [];
  wire.transaction.message.instructions.forEach((outer, index) => {
    instructions.push(toCompiled(outer, 0, accountKeys.length));
    for (const inner of innerByIndex.get(index) ?? []) {
      instructions.push(toCompiled(inner, 1, accountKeys.length));
    }
  });

  const error = meta ? meta.err ?? null : null;

  return {
    signature,
    success: meta !== null && error === null,
    error,
    logs: meta?.logMessages ?? [],
    accountKeys,
    instructions,
  };
}

function toCompiled(ix: WireCompiledInstruction, depth: 0 | 1, accountCount: number): CompiledInstruction {
  if (!Number.isInteger(ix.programIdIndex) || ix.programIdIndex < 0 || ix.programIdIndex >= accountCount) {
    throw new MalformedReceiptError(
      `programIdIndex ${ix.programIdIndex} outside account list of ${accountCount}`
    );
  }
  let data: Uint8Array;
  try {
    data = bs58.decode(ix.data);
  } catch (err) {
    throw new MalformedReceiptError(
      `Instruction data is not base58: ${err instanceof Error ? err.message : String(err)}`
    );
  }
  return { programIdIndex: ix.programIdIndex, data, depth };
}
