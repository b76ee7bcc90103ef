/**
 * Runner process main. Started through runner-entry.ts.
 *
 * Usage: run-code-unit <artifactPath> <timeoutMs> [identity] [freshnessToken]
 *
 * Prints one JSON result line on stdout and exits 0 on success, 1 on
 * failure. Console output of the code unit goes to stderr so stdout carries
 * nothing but the result.
 */

import { runCodeUnit } from './runner.js';
import { RunnerOutput, runnerExitCode, toRunnerFailure } from './protocol.js';
import { errorRecord } from '../runs/types.js';
import { createLogger } from '../utils/index.js';

function emit(output: RunnerOutput): void {
  process.stdout.write(JSON.stringify(output) + '\n', () => {
    process.exit(runnerExitCode(output));
  });
}

export async function main(argv: string[]): Promise<void> {
  const [artifactPath, timeoutArg, identity, freshnessToken] = argv;
  const timeoutMs = Number(timeoutArg);

  if (!artifactPath || !Number.isInteger(timeoutMs) || timeoutMs <= 0) {
    emit(toRunnerFailure(errorRecord('RuntimeError', 'Usage: run-code-unit <artifactPath> <timeoutMs> [identity] [freshnessToken]')));
    return;
  }

  if (identity) {
    process.env.AGENT_PUBLIC_KEY = identity;
  }
  console.log = (...args: unknown[]) => console.error(...args);
  console.info = (...args: unknown[]) => console.error(...args);
  console.debug = (...args: unknown[]) => console.error(...args);

  const logger = createLogger({
    level: process.env.RUNNER_LOG_LEVEL === 'debug' ? 'debug' : 'warn',
    service: 'code-unit-runner',
    fd: 2,
  });

  const output = await runCodeUnit(
    { artifactPath, timeoutMs, identity: identity || undefined, freshnessToken: freshnessToken || undefined },
    { logger }
  );
  emit(output);
}

/** Reports a failure that escaped `main` as the run's result line. */
export function reportFatal(err: unknown): void {
  const message = err instanceof Error ? err.message : String(err);
  emit(toRunnerFailure(errorRecord('RuntimeError', message)));
}
