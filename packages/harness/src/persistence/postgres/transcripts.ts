/**
 * PostgreSQL Transcript Store
 *
 * Implements TranscriptStore using PostgreSQL. One row per run; the turn
 * list, reward curve and discoveries are JSONB columns rewritten on every
 * checkpoint. Schema: sql/001_run_transcripts.sql.
 */

import { Pool } from 'pg';
import type { TranscriptStore } from '../../runs/transcript-store.js';
import type {
  RunErrorEntry,
  RunStatus,
  RunTermination,
  RunTranscript,
  TurnRecord,
} from '../../runs/types.js';

/** The part of a pg Pool the store needs. */
export type QueryClient = Pick<Pool, 'query'>;

type TranscriptRow = {
  run_id: string;
  model: string;
  run_index: number;
  status: RunStatus;
  budget: number;
  identity: string | null;
  start_time: Date;
  end_time: Date | null;
  termination: RunTermination | null;
  cumulative_rewards: number[];
  messages: TurnRecord[];
  programs_discovered: Record<string, number>;
  errors: RunErrorEntry[];
};

const COLUMNS = `
  run_id, model, run_index, status, budget, identity,
  start_time, end_time, termination,
  cumulative_rewards, messages, programs_discovered, errors
`;

// =============================================================================
// POSTGRESQL TRANSCRIPT STORE
// =============================================================================

export class PostgresTranscriptStore implements TranscriptStore {
  private pool: QueryClient;

  constructor(pool: QueryClient) {
    this.pool = pool;
  }

  /**
   * Insert or replace the transcript. Checkpoints are whole-row rewrites so
   * a reader never sees a half-applied turn.
   */
  async save(transcript: RunTranscript): Promise<void> {
    const query = `
      INSERT INTO run_transcripts (${COLUMNS}, updated_at)
      VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10, $11, $12, $13, $14)
      ON CONFLICT (run_id) DO UPDATE SET
        status = EXCLUDED.status,
        identity = EXCLUDED.identity,
        end_time = EXCLUDED.end_time,
        termination = EXCLUDED.termination,
        cumulative_rewards = EXCLUDED.cumulative_rewards,
        messages = EXCLUDED.messages,
        programs_discovered = EXCLUDED.programs_discovered,
        errors = EXCLUDED.errors,
        updated_at = EXCLUDED.updated_at
    `;

    await this.pool.query(query, [
      transcript.run_id,
      transcript.model,
      transcript.run_index,
      transcript.status,
      transcript.budget,
      transcript.identity,
      transcript.start_time,
      transcript.end_time,
      transcript.termination ? JSON.stringify(transcript.termination) : null,
      JSON.stringify(transcript.cumulative_rewards),
      JSON.stringify(transcript.messages),
      JSON.stringify(transcript.programs_discovered),
      JSON.stringify(transcript.errors),
      Date.now(),
    ]);
  }

  async load(runId: string): Promise<RunTranscript | null> {
    const result = await this.pool.query<TranscriptRow>(
      `SELECT ${COLUMNS} FROM run_transcripts WHERE run_id = $1`,
      [runId]
    );
    return result.rows.length > 0 ? this.rowToTranscript(result.rows[0]) : null;
  }

  async list(): Promise<RunTranscript[]> {
    const result = await this.pool.query<TranscriptRow>(
      `SELECT ${COLUMNS} FROM run_transcripts ORDER BY start_time DESC`
    );
    return result.rows.map((row) => this.rowToTranscript(row));
  }

  // ===========================================================================
  // PRIVATE: Row mapping
  // ===========================================================================

  private rowToTranscript(row: TranscriptRow): RunTranscript {
    return {
      run_id: row.run_id,
      model: row.model,
      run_index: Number(row.run_index),
      start_time: toIso(row.start_time),
      end_time: row.end_time === null ? null : toIso(row.end_time),
      status: row.status,
      budget: Number(row.budget),
      identity: row.identity,
      termination: row.termination,
      cumulative_rewards: row.cumulative_rewards,
      messages: row.messages,
      programs_discovered: row.programs_discovered,
      errors: row.errors,
    };
  }
}

function toIso(value: Date | string): string {
  return value instanceof Date ? value.toISOString() : new Date(value).toISOString();
}

// =============================================================================
// FACTORY FUNCTION
// =============================================================================

export function createPostgresTranscriptStore(connectionString: string): { store: PostgresTranscriptStore; pool: Pool } {
  const pool = new Pool({ connectionString });
  return { store: new PostgresTranscriptStore(pool), pool };
}
