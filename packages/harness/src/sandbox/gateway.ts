/**
 * Sandbox Runtime Gateway
 *
 * Executes each code unit in a fresh child process with a hard time box.
 * Every execution gets its own artifact file, unique per run and turn, so
 * concurrent runs never share state.
 */

import { spawn } from 'node:child_process';
import { mkdir, writeFile } from 'node:fs/promises';
import { createRequire } from 'node:module';
import { dirname, join, resolve } from 'node:path';
import { fileURLToPath } from 'node:url';
import { v4 as uuidv4 } from 'uuid';

import { parseRunnerOutput } from './protocol.js';
import { ExecutionContext, ExecutionResult, errorRecord } from '../runs/types.js';
import { Logger, silentLogger } from '../utils/index.js';

// =============================================================================
// INTERFACES
// =============================================================================

export interface SandboxGateway {
  execute(codeUnit: string, timeoutMs: number, context: ExecutionContext): Promise<ExecutionResult>;
}

export interface RunnerInvocation {
  artifactPath: string;
  timeoutMs: number;
  hardKillAfterMs: number;
  identity?: string;
  freshnessToken?: string;
  signal?: AbortSignal;
}

export interface RunnerExit {
  stdout: string;
  stderr: string;
  exitCode: number | null;
  killed: 'TIMEOUT' | 'ABORTED' | null;
}

/** Starts the runner for one artifact and waits for it to exit. */
export interface RunnerLauncher {
  launch(invocation: RunnerInvocation): Promise<RunnerExit>;
  /** Throws when artifacts under this root cannot run. Called once by the gateway. */
  checkArtifactRoot?(artifactRoot: string): void;
}

export interface SandboxGatewayConfig {
  artifactRoot: string;
  /** Extra time the child gets past its own timer before it is killed. */
  killGraceMs: number;
}

// =============================================================================
// CHILD PROCESS LAUNCHER
// =============================================================================

const MAX_CAPTURED_BYTES = 1024 * 1024;

/** Packages the transaction guard patches. Code units must load the runner's copies. */
export const GUARDED_PACKAGES = ['@solana/web3.js'] as const;

export class ArtifactRootError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ArtifactRootError';
  }
}

export function resolveRunnerCommand(): { command: string; args: string[] } {
  const here = fileURLToPath(import.meta.url);
  if (here.endsWith('.ts')) {
    return { command: process.execPath, args: ['--import', 'tsx', join(dirname(here), 'runner-entry.ts')] };
  }
  return { command: process.execPath, args: [join(dirname(here), 'runner-entry.js')] };
}

/**
 * Artifacts import their packages by walking up from the artifact file, so
 * the root has to sit where those imports land on the runner's own copies.
 */
export function checkPackageResolution(artifactRoot: string, packages: readonly string[] = GUARDED_PACKAGES): void {
  const runner = createRequire(import.meta.url);
  const artifact = createRequire(join(artifactRoot, 'artifact.js'));
  for (const name of packages) {
    const expected = runner.resolve(name);
    let actual: string;
    try {
      actual = artifact.resolve(name);
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err);
      throw new ArtifactRootError(
        `Artifact root ${artifactRoot} cannot resolve ${name}; place it inside the project (${reason})`
      );
    }
    if (actual !== expected) {
      throw new ArtifactRootError(
        `Artifact root ${artifactRoot} resolves ${name} to ${actual}, the runner uses ${expected}`
      );
    }
  }
}

export class ChildProcessLauncher implements RunnerLauncher {
  private command: { command: string; args: string[] };

  constructor(command = resolveRunnerCommand()) {
    this.command = command;
  }

  checkArtifactRoot(artifactRoot: string): void {
    checkPackageResolution(artifactRoot);
  }

  launch(invocation: RunnerInvocation): Promise<RunnerExit> {
    const args = [
      ...this.command.args,
      invocation.artifactPath,
      String(invocation.timeoutMs),
      invocation.identity ?? '',
      invocation.freshnessToken ?? '',
    ];

    return new Promise<RunnerExit>((resolvePromise, reject) => {
      const child = spawn(this.command.command, args, {
        cwd: process.cwd(),
        env: process.env,
        stdio: ['ignore', 'pipe', 'pipe'],
      });

      const stdout: Buffer[] = [];
      const stderr: Buffer[] = [];
      let captured = 0;
      let killed: RunnerExit['killed'] = null;

      const collect = (sink: Buffer[]) => (chunk: Buffer) => {
        if (captured >= MAX_CAPTURED_BYTES) return;
        captured += chunk.length;
        sink.push(chunk);
      };
      child.stdout.on('data', collect(stdout));
      child.stderr.on('data', collect(stderr));

      const kill = (reason: 'TIMEOUT' | 'ABORTED') => {
        if (killed !== null || child.exitCode !== null) return;
        killed = reason;
        child.kill('SIGKILL');
      };

      const timer = setTimeout(() => kill('TIMEOUT'), invocation.hardKillAfterMs);
      const onAbort = () => kill('ABORTED');
      invocation.signal?.addEventListener('abort', onAbort, { once: true });
      if (invocation.signal?.aborted) onAbort();

      const cleanup = () => {
        clearTimeout(timer);
        invocation.signal?.removeEventListener('abort', onAbort);
      };

      child.on('error', (err) => {
        cleanup();
        reject(err);
      });

      child.on('close', (code) => {
        cleanup();
        resolvePromise({
          stdout: Buffer.concat(stdout).toString('utf8'),
          stderr: Buffer.concat(stderr).toString('utf8'),
          exitCode: code,
          killed,
        });
      });
    });
  }
}

// =============================================================================
// GATEWAY
// =============================================================================

export class ProcessSandboxGateway implements SandboxGateway {
  private config: SandboxGatewayConfig;
  private launcher: RunnerLauncher;
  private logger: Logger;

  constructor(config: SandboxGatewayConfig, launcher: RunnerLauncher = new ChildProcessLauncher(), logger?: Logger) {
    this.config = { ...config, artifactRoot: resolve(config.artifactRoot) };
    this.launcher = launcher;
    this.logger = logger ?? silentLogger();
    this.launcher.checkArtifactRoot?.(this.config.artifactRoot);
  }

  /** Artifact path for one execution: `<root>/<runId>/turn-<NNNN>-<uuid8>.ts`. */
  artifactPathFor(context: ExecutionContext): string {
    const turn = String(context.turnIndex).padStart(4, '0');
    const suffix = uuidv4().replace(/-/g, '').slice(0, 8);
    return join(this.config.artifactRoot, safeSegment(context.runId), `turn-${turn}-${suffix}.ts`);
  }

  async execute(codeUnit: string, timeoutMs: number, context: ExecutionContext): Promise<ExecutionResult> {
    const artifactPath = this.artifactPathFor(context);
    await mkdir(dirname(artifactPath), { recursive: true });
    await writeFile(artifactPath, codeUnit, 'utf8');

    const started = Date.now();
    const exit = await this.launcher.launch({
      artifactPath,
      timeoutMs,
      hardKillAfterMs: timeoutMs + this.config.killGraceMs,
      identity: context.identity,
      freshnessToken: context.freshnessToken,
      signal: context.signal,
    });
    const elapsedMs = Date.now() - started;

    this.logger.debug(
      { runId: context.runId, turn: context.turnIndex, artifactPath, exitCode: exit.exitCode, killed: exit.killed, elapsedMs },
      'Code unit execution finished'
    );

    if (exit.killed === 'TIMEOUT') {
      return {
        serializedTransaction: null,
        error: errorRecord('Timeout', `Execution exceeded ${timeoutMs}ms`, [
          'The runner was killed after it stopped responding. Avoid blocking loops.',
        ]),
      };
    }
    if (exit.killed === 'ABORTED') {
      return { serializedTransaction: null, error: errorRecord('RuntimeError', 'Execution cancelled') };
    }

    return parseRunnerOutput(exit.stdout, exit.stderr, exit.exitCode);
  }
}

function safeSegment(value: string): string {
  return value.replace(/[^A-Za-z0-9_.-]/g, '_');
}
