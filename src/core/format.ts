import { z } from 'zod';
import { isBuildError } from './errors.js';

export type OutputFormat = 'text' | 'json';

export interface RenderFailure {
  code: string;
  message: string;
  path?: string;
  hint?: string;
}

export interface FileResult {
  file: string;
  output?: string;
  /** Where the output was written, when it was */
  written?: string;
  errors: RenderFailure[];
}

/**
 * Turn whatever a render attempt threw into reportable failures.
 * Schema errors yield one entry per issue.
 */
export function describeFailure(error: unknown): RenderFailure[] {
  if (isBuildError(error)) {
    const failure: RenderFailure = { code: error.code, message: error.message };
    if (error.field) failure.path = error.field;
    if (error.hint) failure.hint = error.hint;
    return [failure];
  }
  if (error instanceof z.ZodError) {
    return error.issues.map((issue) => ({
      code: 'DOC-SCHEMA',
      message: issue.message,
      path: issue.path.length > 0 ? issue.path.join('.') : '(root)',
    }));
  }
  if (error instanceof SyntaxError) {
    return [{ code: 'DOC-JSON', message: error.message, hint: 'Diagram documents must be valid JSON.' }];
  }
  return [{ code: 'INTERNAL', message: error instanceof Error ? error.message : String(error) }];
}

export function textReport(result: FileResult): string {
  if (result.errors.length === 0) {
    return result.written ? `Wrote ${result.written}` : 'Valid';
  }
  const lines: string[] = [];
  for (const e of result.errors) {
    lines.push(`\x1b[31merror\x1b[0m[${e.code}]: ${e.message}`);
    lines.push(e.path ? `at ${result.file} (${e.path})` : `at ${result.file}`);
    if (e.hint) lines.push(`hint: ${e.hint}`);
    lines.push('');
  }
  return lines.join('\n');
}

export interface JsonFileResult {
  file: string;
  valid: boolean;
  errorCount: number;
  errors: RenderFailure[];
  written?: string;
}

export function toJsonResult(result: FileResult): JsonFileResult {
  const json: JsonFileResult = {
    file: result.file,
    valid: result.errors.length === 0,
    errorCount: result.errors.length,
    errors: result.errors,
  };
  if (result.written) json.written = result.written;
  return json;
}

// foo.diagram.json -> foo.mmd, foo.json -> foo.mmd
export function outputPathFor(file: string): string {
  const base = file.replace(/\.diagram\.json$/i, '').replace(/\.json$/i, '');
  return `${base}.mmd`;
}
