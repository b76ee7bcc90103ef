/**
 * Code generation boundary.
 *
 * The generator (an LLM call, a scripted replay, ...) lives outside the
 * harness. It receives the previous turn's feedback and answers with free
 * text containing a fenced TypeScript block.
 */

import type { TurnFeedback } from '../runs/types.js';

export interface GenerationRequest {
  runId: string;
  model: string;
  turn: number;            // 1-based turn being generated
  budget: number;
  remainingTurns: number;  // including this one
  freshnessToken: string;
  identity: string;
  feedback: TurnFeedback | null;
  signal?: AbortSignal;
}

export interface CodeGenerator {
  generate(request: GenerationRequest): Promise<string>;
}

/** Builds one generator per run so conversation state is never shared. */
export type CodeGeneratorFactory = (run: { runId: string; model: string; runIndex: number }) => CodeGenerator;

export { extractCodeBlocks, extractCodeUnit } from './code-blocks.js';
