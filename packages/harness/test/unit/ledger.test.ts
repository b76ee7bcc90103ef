/**
 * Discovery Ledger: Unit Tests
 *
 * Tests for:
 *   - reward equals the number of keys not seen before
 *   - duplicates inside one transaction pay once
 *   - failed receipts pay nothing and change nothing
 *   - first-discovery turn bookkeeping
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { DiscoveryLedger } from '../../src/runs/ledger.js';
import { makeReceipt } from '../helpers/fakes.js';

const A0 = { programId: 'ProgA', discriminator: 0 };
const B1 = { programId: 'ProgB', discriminator: 1 };
const CNone = { programId: 'ProgC', discriminator: null };

describe('DiscoveryLedger', () => {
  let ledger: DiscoveryLedger;

  beforeEach(() => {
    ledger = new DiscoveryLedger();
  });

  it('rewards every new key and records the turn it appeared on', () => {
    const result = ledger.score([A0, B1], 1);

    expect(result.delta).toBe(2);
    expect(result.newKeys).toEqual([A0, B1]);
    expect(ledger.firstSeen(A0)).toBe(1);
    expect(ledger.size).toBe(2);
  });

  it('counts a key repeated inside one call once', () => {
    expect(ledger.score([A0, A0, A0], 1).delta).toBe(1);
  });

  it('never pays twice for the same key', () => {
    ledger.score([A0], 1);
    const result = ledger.score([A0, CNone], 2);

    expect(result.delta).toBe(1);
    expect(result.newKeys).toEqual([CNone]);
    expect(ledger.firstSeen(A0)).toBe(1);
    expect(ledger.firstSeen(CNone)).toBe(2);
  });

  it('treats a null discriminator as its own key', () => {
    ledger.score([{ programId: 'ProgA', discriminator: 0 }], 1);

    expect(ledger.score([{ programId: 'ProgA', discriminator: null }], 2).delta).toBe(1);
  });

  it('keeps the ledger unchanged for a failed receipt', () => {
    ledger.score([A0], 1);
    const failed = makeReceipt({ success: false, instructions: [['ProgZ', [9]], ['ProgY', []]] });

    const result = ledger.scoreReceipt(failed, 2);

    expect(result).toEqual({ delta: 0, newKeys: [] });
    expect(ledger.toRecord()).toEqual({ 'ProgA:0': 1 });
  });

  it('scores a successful receipt through the decoder', () => {
    const receipt = makeReceipt({ instructions: [['ProgA', [0, 1]], ['ProgB', [1]], ['ProgA', [0]]] });

    expect(ledger.scoreReceipt(receipt, 3).delta).toBe(2);
    expect(ledger.toRecord()).toEqual({ 'ProgA:0': 3, 'ProgB:1': 3 });
  });

  it('groups discoveries by program', () => {
    ledger.score([A0, { programId: 'ProgA', discriminator: 7 }, CNone], 1);

    expect(ledger.programs()).toEqual(['ProgA', 'ProgC']);
    expect(ledger.instructionsByProgram()).toEqual({ ProgA: ['0', '7'], ProgC: ['none'] });
    expect(ledger.has(B1)).toBe(false);
  });
});
