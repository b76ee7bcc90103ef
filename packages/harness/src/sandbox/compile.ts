/**
 * Code unit compilation.
 *
 * Transpiles generated TypeScript to an ES module and reports every
 * syntactic diagnostic, not just the first.
 */

import ts from 'typescript';
import type { Diagnostic } from '../runs/types.js';

export type CompileResult =
  | { ok: true; output: string }
  | { ok: false; diagnostics: Diagnostic[] };

export function compileCodeUnit(source: string, fileName: string): CompileResult {
  const result = ts.transpileModule(source, {
    fileName,
    reportDiagnostics: true,
    compilerOptions: {
      module: ts.ModuleKind.ESNext,
      target: ts.ScriptTarget.ES2022,
      esModuleInterop: true,
      sourceMap: false,
    },
  });

  const diagnostics = (result.diagnostics ?? [])
    .filter((d) => d.category === ts.DiagnosticCategory.Error)
    .map((d) => toDiagnostic(d, fileName));

  if (diagnostics.length > 0) {
    return { ok: false, diagnostics };
  }
  return { ok: true, output: result.outputText };
}

function toDiagnostic(d: ts.Diagnostic, fileName: string): Diagnostic {
  const message = ts.flattenDiagnosticMessageText(d.messageText, '\n');
  if (d.file && d.start !== undefined) {
    const { line, character } = d.file.getLineAndCharacterOfPosition(d.start);
    return { message, line: line + 1, column: character + 1, file: d.file.fileName };
  }
  return { message, line: null, column: null, file: fileName };
}

export function formatDiagnostic(d: Diagnostic): string {
  const location = d.line !== null ? `${d.file ?? '<unknown>'}:${d.line}:${d.column ?? 0}` : d.file ?? '<unknown>';
  return `${location} - ${d.message}`;
}
