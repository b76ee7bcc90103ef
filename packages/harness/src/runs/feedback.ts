/**
 * Turn feedback.
 *
 * Structured outcome of one turn plus the human-readable message the
 * generator sees at the start of the next one.
 */

import { formatDiagnostic } from '../sandbox/compile.js';
import type { ErrorRecord, Observation, TurnFeedback, TurnOutcome } from './types.js';

const MAX_DETAIL_LINES = 12;
const MAX_LOG_LINES = 20;

export interface FeedbackInput {
  turn: number;
  budget: number;
  outcome: TurnOutcome;
  rewardDelta: number;
  cumulativeReward: number;
  newKeys: string[];
  error: ErrorRecord | null;
  logs: string[];
  signature: string | null;
  observation: Observation;
}

export function buildFeedback(input: FeedbackInput): TurnFeedback {
  return {
    turn: input.turn,
    remainingTurns: input.budget - input.turn,
    outcome: input.outcome,
    message: formatFeedbackMessage(input),
    rewardDelta: input.rewardDelta,
    cumulativeReward: input.cumulativeReward,
    newKeys: [...input.newKeys],
    error: input.error,
    logs: [...input.logs],
    signature: input.signature,
    observation: input.observation,
  };
}

export function formatFeedbackMessage(input: FeedbackInput): string {
  const lines: string[] = [`Turn ${input.turn}/${input.budget}: ${input.outcome}`];

  if (input.error) {
    lines.push(`${input.error.kind}: ${input.error.message}`);
    if (input.error.kind === 'CompileError') {
      for (const diagnostic of input.error.diagnostics) {
        lines.push(`  - ${formatDiagnostic(diagnostic)}`);
      }
    } else {
      for (const detail of input.error.details.slice(0, MAX_DETAIL_LINES)) {
        lines.push(`  ${detail}`);
      }
    }
  }

  if (input.signature) {
    lines.push(`Signature: ${input.signature}`);
  }

  lines.push(`Reward: +${input.rewardDelta} (total ${input.cumulativeReward})`);

  if (input.newKeys.length > 0) {
    lines.push(`New instructions: ${input.newKeys.join(', ')}`);
  }

  if (input.logs.length > 0) {
    lines.push('Logs:');
    for (const log of input.logs.slice(-MAX_LOG_LINES)) {
      lines.push(`  ${log}`);
    }
  }

  const { observation } = input;
  lines.push(
    `Balance: ${observation.balanceLamports} lamports, block height ${observation.blockHeight}, ` +
      `${observation.uniqueInstructionsFound} unique instructions across ${observation.discoveredPrograms.length} programs`
  );

  const remaining = input.budget - input.turn;
  lines.push(`[Message ${input.turn}/${input.budget}] - ${remaining} messages remaining`);

  return lines.join('\n');
}
