/**
 * Discovery Ledger
 *
 * Run-scoped, append-only record of which instruction keys have been
 * rewarded and on which turn they were first seen. A key pays out once per
 * run; failed transactions pay nothing.
 */

import { decode, instructionKeyId } from './decoder.js';
import type { InstructionKey, ScoreResult, TransactionReceipt } from './types.js';

interface LedgerEntry {
  key: InstructionKey;
  turn: number;
}

export class DiscoveryLedger {
  private entries: Map<string, LedgerEntry> = new Map();

  /**
   * Insert every key not yet present, mapped to `turnIndex`.
   * Duplicates inside one call count once.
   */
  score(keys: InstructionKey[], turnIndex: number): ScoreResult {
    const newKeys: InstructionKey[] = [];
    for (const key of keys) {
      const id = instructionKeyId(key);
      if (this.entries.has(id)) continue;
      this.entries.set(id, { key: { ...key }, turn: turnIndex });
      newKeys.push({ ...key });
    }
    return { delta: newKeys.length, newKeys };
  }

  /** Failed receipts leave the ledger untouched, whatever they contain. */
  scoreReceipt(receipt: TransactionReceipt, turnIndex: number): ScoreResult {
    if (!receipt.success) {
      return { delta: 0, newKeys: [] };
    }
    return this.score(decode(receipt), turnIndex);
  }

  has(key: InstructionKey): boolean {
    return this.entries.has(instructionKeyId(key));
  }

  firstSeen(key: InstructionKey): number | null {
    return this.entries.get(instructionKeyId(key))?.turn ?? null;
  }

  get size(): number {
    return this.entries.size;
  }

  /** Canonical key → turn of first discovery, in insertion order. */
  toRecord(): Record<string, number> {
    const record: Record<string, number> = {};
    for (const [id, entry] of this.entries) {
      record[id] = entry.turn;
    }
    return record;
  }

  programs(): string[] {
    return [...new Set([...this.entries.values()].map((e) => e.key.programId))];
  }

  instructionsByProgram(): Record<string, string[]> {
    const byProgram: Record<string, string[]> = {};
    for (const { key } of this.entries.values()) {
      const bucket = byProgram[key.programId] ?? (byProgram[key.programId] = []);
      bucket.push(key.discriminator === null ? 'none' : String(key.discriminator));
    }
    return byProgram;
  }
}
