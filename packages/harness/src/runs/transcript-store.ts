/**
 * Transcript persistence.
 *
 * A transcript is the per-run artifact: every turn record, the cumulative
 * reward curve and the discovered keys. It is rewritten after each turn so
 * an interrupted run still leaves a consistent file behind.
 */

import { mkdir, readFile, readdir, rename, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import type { RunState, RunTranscript } from './types.js';

// =============================================================================
// STORE INTERFACE
// =============================================================================

export interface TranscriptStore {
  /** Insert or replace the transcript for `transcript.run_id`. */
  save(transcript: RunTranscript): Promise<void>;

  /** Returns null if not found. */
  load(runId: string): Promise<RunTranscript | null>;

  /** Most recently started first. */
  list(): Promise<RunTranscript[]>;
}

export function toTranscript(run: RunState): RunTranscript {
  return {
    run_id: run.runId,
    model: run.model,
    run_index: run.runIndex,
    start_time: run.startedAt,
    end_time: run.termination?.at ?? null,
    status: run.status,
    budget: run.budget,
    identity: run.identity?.publicKey ?? null,
    termination: run.termination ?? null,
    cumulative_rewards: run.transcript.map((t) => t.cumulativeReward),
    messages: run.transcript.map((t) => ({ ...t, newKeys: [...t.newKeys] })),
    programs_discovered: run.ledger.toRecord(),
    errors: run.errors.map((e) => ({ ...e })),
  };
}

function byStartDescending(a: RunTranscript, b: RunTranscript): number {
  return b.start_time.localeCompare(a.start_time);
}

// =============================================================================
// IN-MEMORY IMPLEMENTATION
// =============================================================================

export class InMemoryTranscriptStore implements TranscriptStore {
  private transcripts: Map<string, RunTranscript> = new Map();

  async save(transcript: RunTranscript): Promise<void> {
    this.transcripts.set(transcript.run_id, structuredClone(transcript));
  }

  async load(runId: string): Promise<RunTranscript | null> {
    const transcript = this.transcripts.get(runId);
    return transcript ? structuredClone(transcript) : null;
  }

  async list(): Promise<RunTranscript[]> {
    return [...this.transcripts.values()].map((t) => structuredClone(t)).sort(byStartDescending);
  }
}

// =============================================================================
// FILE IMPLEMENTATION
// =============================================================================

const FILE_SUFFIX = '_metrics.json';

/** One JSON file per run: `<dir>/<run_id>_metrics.json`. */
export class FileTranscriptStore implements TranscriptStore {
  private directory: string;

  constructor(directory: string) {
    this.directory = directory;
  }

  pathFor(runId: string): string {
    return join(this.directory, `${runId}${FILE_SUFFIX}`);
  }

  async save(transcript: RunTranscript): Promise<void> {
    await mkdir(this.directory, { recursive: true });
    const target = this.pathFor(transcript.run_id);
    const temp = `${target}.tmp`;
    await writeFile(temp, JSON.stringify(transcript, null, 2), 'utf8');
    await rename(temp, target);
  }

  async load(runId: string): Promise<RunTranscript | null> {
    try {
      return parseTranscript(await readFile(this.pathFor(runId), 'utf8'));
    } catch (err) {
      if (isNotFound(err)) return null;
      throw err;
    }
  }

  async list(): Promise<RunTranscript[]> {
    let names: string[];
    try {
      names = await readdir(this.directory);
    } catch (err) {
      if (isNotFound(err)) return [];
      throw err;
    }
    const transcripts: RunTranscript[] = [];
    for (const name of names.filter((n) => n.endsWith(FILE_SUFFIX))) {
      transcripts.push(parseTranscript(await readFile(join(this.directory, name), 'utf8')));
    }
    return transcripts.sort(byStartDescending);
  }
}

function parseTranscript(text: string): RunTranscript {
  const parsed: RunTranscript = JSON.parse(text);
  return parsed;
}

function isNotFound(err: unknown): boolean {
  return err instanceof Error && Reflect.get(err, 'code') === 'ENOENT';
}
