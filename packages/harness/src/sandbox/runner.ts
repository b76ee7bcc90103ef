/**
 * Code Unit Runner
 *
 * Runs one code unit inside the current process: compile, load, check the
 * entry point, call it under a time box and the single-transaction guard.
 * The sandbox gateway launches this in a dedicated child process per turn
 * (see run-code-unit.ts); tests drive it in-process with an injected loader.
 *
 * Code-unit contract:
 *   export async function executeSkill(freshnessToken: string): Promise<string>
 * resolving to a base64-encoded unsigned transaction.
 */

import { readFile, writeFile } from 'node:fs/promises';
import { pathToFileURL } from 'node:url';
import { Transaction, VersionedTransaction } from '@solana/web3.js';

import { compileCodeUnit } from './compile.js';
import { GuardTarget, PolicyViolationError, TransactionGuard } from './guard.js';
import { RunnerOutput, decodeBase64Transaction, toRunnerFailure } from './protocol.js';
import { Diagnostic, ErrorRecord, compileErrorRecord, errorRecord } from '../runs/types.js';
import { Logger, silentLogger } from '../utils/index.js';

export const ENTRY_POINT = 'executeSkill';

export type CodeUnitModule = Record<string, unknown>;
export type ModuleLoader = (artifactPath: string) => Promise<CodeUnitModule>;

export interface RunnerRequest {
  artifactPath: string;
  timeoutMs: number;
  identity?: string;
  freshnessToken?: string;
}

export interface RunnerDeps {
  loadModule?: ModuleLoader;
  guardTargets?: GuardTarget[];
  logger?: Logger;
}

export const DEFAULT_GUARD_TARGETS: GuardTarget[] = [Transaction, VersionedTransaction];

// =============================================================================
// FAILURES RAISED WHILE LOADING
// =============================================================================

export class CompileFailure extends Error {
  readonly diagnostics: Diagnostic[];

  constructor(diagnostics: Diagnostic[]) {
    super(`Compilation failed with ${diagnostics.length} error(s)`);
    this.name = 'CompileFailure';
    this.diagnostics = diagnostics;
  }
}

class InterfaceFailure extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InterfaceFailure';
  }
}

// =============================================================================
// DEFAULT LOADER
// =============================================================================

/**
 * Transpile the artifact to `<artifact>.mjs` beside it and import that.
 * Module-resolution and link failures surface as compile failures.
 */
export async function compileAndImport(artifactPath: string): Promise<CodeUnitModule> {
  const source = await readFile(artifactPath, 'utf8');
  const compiled = compileCodeUnit(source, artifactPath);
  if (!compiled.ok) {
    throw new CompileFailure(compiled.diagnostics);
  }

  const outputPath = artifactPath.replace(/\.ts$/, '') + '.mjs';
  await writeFile(outputPath, compiled.output, 'utf8');

  try {
    const loaded: unknown = await import(pathToFileURL(outputPath).href);
    return isModule(loaded) ? loaded : {};
  } catch (err) {
    if (isLinkError(err)) {
      throw new CompileFailure([
        { message: err instanceof Error ? err.message : String(err), line: null, column: null, file: artifactPath },
      ]);
    }
    throw err;
  }
}

function isLinkError(err: unknown): boolean {
  if (!(err instanceof Error)) return false;
  const code: unknown = Reflect.get(err, 'code');
  if (code === 'ERR_MODULE_NOT_FOUND' || code === 'ERR_UNSUPPORTED_DIR_IMPORT') return true;
  return err instanceof SyntaxError && /does not provide an export named/.test(err.message);
}

function isModule(value: unknown): value is CodeUnitModule {
  return typeof value === 'object' && value !== null;
}

// =============================================================================
// RUN
// =============================================================================

type Invocation =
  | { type: 'RETURNED'; value: unknown }
  | { type: 'THREW'; error: unknown };

export async function runCodeUnit(request: RunnerRequest, deps: RunnerDeps = {}): Promise<RunnerOutput> {
  const loadModule = deps.loadModule ?? compileAndImport;
  const logger = deps.logger ?? silentLogger();
  const guard = new TransactionGuard();

  guard.install(deps.guardTargets ?? DEFAULT_GUARD_TARGETS);
  try {
    const invocation = invoke(loadModule, request);
    const settled = await withTimeout(invocation, request.timeoutMs);

    if (settled === null) {
      void invocation.then(
        (late) => logger.debug({ artifact: request.artifactPath, late: late.type }, 'Code unit settled after timeout'),
        (err: unknown) => logger.debug({ artifact: request.artifactPath, err }, 'Code unit failed after timeout')
      );
      return toRunnerFailure(
        errorRecord('Timeout', `Execution exceeded ${request.timeoutMs}ms`, [
          'The code unit did not resolve in time. Reduce the work done in one turn.',
        ])
      );
    }

    if (guard.violated) {
      return toRunnerFailure(policyViolation(guard));
    }

    if (settled.type === 'THREW') {
      return toRunnerFailure(classifyThrown(settled.error, guard));
    }

    const value = settled.value;
    if (typeof value !== 'string') {
      return toRunnerFailure(
        errorRecord('InterfaceError', `${ENTRY_POINT} must resolve to a base64-encoded transaction string`, [
          `Resolved value type: ${value === null ? 'null' : typeof value}`,
        ])
      );
    }
    if (decodeBase64Transaction(value) === null) {
      return toRunnerFailure(
        errorRecord('InterfaceError', `${ENTRY_POINT} resolved to a string that is not base64-encoded transaction bytes`)
      );
    }
    return { serialized_tx: value.trim() };
  } finally {
    guard.uninstall();
  }
}

async function invoke(loadModule: ModuleLoader, request: RunnerRequest): Promise<Invocation> {
  try {
    const mod = await loadModule(request.artifactPath);
    const entry = mod[ENTRY_POINT];
    if (!isEntryPoint(entry)) {
      throw new InterfaceFailure(
        `Code unit must export an async function named ${ENTRY_POINT}(freshnessToken: string)`
      );
    }
    const value: unknown = await entry(request.freshnessToken ?? '');
    return { type: 'RETURNED', value };
  } catch (error) {
    return { type: 'THREW', error };
  }
}

function isEntryPoint(value: unknown): value is (freshnessToken: string) => unknown {
  return typeof value === 'function';
}

async function withTimeout<T>(promise: Promise<T>, timeoutMs: number): Promise<T | null> {
  let timer: NodeJS.Timeout | undefined;
  const expired = new Promise<null>((resolve) => {
    timer = setTimeout(() => resolve(null), timeoutMs);
  });
  try {
    return await Promise.race([promise, expired]);
  } finally {
    clearTimeout(timer);
  }
}

function policyViolation(guard: TransactionGuard): ErrorRecord {
  return errorRecord('PolicyViolation', guard.violated?.message ?? 'Too many transactions built', [
    `serialize() was called ${guard.serializeCount} times`,
  ]);
}

function classifyThrown(error: unknown, guard: TransactionGuard): ErrorRecord {
  if (error instanceof CompileFailure) {
    return compileErrorRecord(error.diagnostics);
  }
  if (error instanceof InterfaceFailure) {
    return errorRecord('InterfaceError', error.message);
  }
  if (error instanceof PolicyViolationError) {
    return policyViolation(guard);
  }
  if (error instanceof Error) {
    return errorRecord('RuntimeError', error.message, (error.stack ?? '').split('\n').filter((l) => l.length > 0));
  }
  return errorRecord('RuntimeError', String(error));
}
