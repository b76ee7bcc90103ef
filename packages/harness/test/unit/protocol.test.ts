/**
 * Runner protocol: Unit Tests
 *
 * Tests for parsing the runner's single JSON result line into an
 * ExecutionResult, including malformed and partial output.
 */

import { describe, it, expect } from 'vitest';
import {
  decodeBase64Transaction,
  parseRunnerOutput,
  runnerExitCode,
  toRunnerFailure,
} from '../../src/sandbox/protocol.js';
import { compileErrorRecord, errorRecord } from '../../src/runs/types.js';

describe('parseRunnerOutput', () => {
  it('decodes a successful result', () => {
    const result = parseRunnerOutput('{"serialized_tx":"AQID"}\n', '', 0);

    expect(result.error).toBeNull();
    expect(Array.from(result.serializedTransaction ?? [])).toEqual([1, 2, 3]);
  });

  it('uses the last non-empty line', () => {
    const stdout = 'stray text\n{"serialized_tx":"AQID"}\n\n';

    expect(parseRunnerOutput(stdout, '', 0).error).toBeNull();
  });

  it('maps a failure line to its error kind and details', () => {
    const line = JSON.stringify(toRunnerFailure(errorRecord('Timeout', 'Execution exceeded 100ms', ['slow'])));
    const result = parseRunnerOutput(line, '', 1);

    expect(result).toEqual({
      serializedTransaction: null,
      error: { kind: 'Timeout', message: 'Execution exceeded 100ms', details: ['slow'] },
    });
  });

  it('keeps every compile diagnostic', () => {
    const failure = toRunnerFailure(
      compileErrorRecord([
        { message: "';' expected.", line: 2, column: 5, file: 'a.ts' },
        { message: 'Identifier expected.', line: 4, column: 1, file: 'a.ts' },
      ])
    );
    const result = parseRunnerOutput(JSON.stringify(failure), '', 1);

    expect(result.error?.kind).toBe('CompileError');
    if (result.error?.kind === 'CompileError') {
      expect(result.error.diagnostics).toHaveLength(2);
      expect(result.error.diagnostics[1]).toEqual({ message: 'Identifier expected.', line: 4, column: 1, file: 'a.ts' });
      expect(result.error.message).toBe('Compilation failed with 2 errors');
    }
  });

  it('accepts details sent as a single newline-joined string', () => {
    const line = '{"serialized_tx":null,"error":"boom","details":"a\\nb","type":"RuntimeError"}';

    expect(parseRunnerOutput(line, '', 1).error).toEqual({ kind: 'RuntimeError', message: 'boom', details: ['a', 'b'] });
  });

  it('treats an unknown error type as a runtime error', () => {
    const line = '{"serialized_tx":null,"error":"odd","details":["x"],"type":"Weird"}';

    expect(parseRunnerOutput(line, '', 1).error).toEqual({ kind: 'RuntimeError', message: 'odd', details: ['x'] });
  });

  it('reports empty output with the exit code and stderr', () => {
    const result = parseRunnerOutput('', 'Segmentation fault\n', 139);

    expect(result.error).toEqual({
      kind: 'RuntimeError',
      message: 'Runner produced no result',
      details: ['exit code: 139', 'stderr: Segmentation fault'],
    });
  });

  it('reports non-JSON output as malformed', () => {
    expect(parseRunnerOutput('hello', '', 1).error?.message).toBe('Runner produced malformed output');
  });

  it('rejects a success value that is not base64', () => {
    const result = parseRunnerOutput('{"serialized_tx":"not base64!"}', '', 0);

    expect(result.error?.kind).toBe('InterfaceError');
  });
});

describe('decodeBase64Transaction', () => {
  it('accepts padded base64 and rejects empty or malformed input', () => {
    expect(Array.from(decodeBase64Transaction('AQ==') ?? [])).toEqual([1]);
    expect(decodeBase64Transaction('')).toBeNull();
    expect(decodeBase64Transaction('AQ=')).toBeNull();
    expect(decodeBase64Transaction('****')).toBeNull();
  });
});

describe('runnerExitCode', () => {
  it('is 0 for success and 1 for failure', () => {
    expect(runnerExitCode({ serialized_tx: 'AQID' })).toBe(0);
    expect(runnerExitCode(toRunnerFailure(errorRecord('RuntimeError', 'x')))).toBe(1);
  });
});
