import { describe, expect, it } from 'vitest';
import { DiagramDocumentSchema } from '../src/core/document.js';
import { missingField } from '../src/core/errors.js';
import { describeFailure, outputPathFor, textReport, toJsonResult } from '../src/core/format.js';

describe('describeFailure', () => {
  it('reports build errors with their code and hint', () => {
    expect(describeFailure(missingField('label', 'Call setLabel() first.'))).toEqual([
      { code: 'GEN-MISSING-FIELD', message: "Missing required field 'label'.", path: 'label', hint: 'Call setLabel() first.' },
    ]);
  });

  it('reports schema issues with their path', () => {
    const result = DiagramDocumentSchema.safeParse({ type: 'flowchart', nodes: [{ key: 'a' }] });
    expect(result.success).toBe(false);
    if (result.success) return;
    expect(describeFailure(result.error)).toEqual([{ code: 'DOC-SCHEMA', message: 'Required', path: 'nodes.0.label' }]);
  });

  it('reports malformed JSON', () => {
    expect(describeFailure(new SyntaxError('Unexpected token'))).toEqual([
      { code: 'DOC-JSON', message: 'Unexpected token', hint: 'Diagram documents must be valid JSON.' },
    ]);
  });

  it('reports anything else as internal', () => {
    expect(describeFailure('boom')).toEqual([{ code: 'INTERNAL', message: 'boom' }]);
    expect(describeFailure(new Error('bad'))).toEqual([{ code: 'INTERNAL', message: 'bad' }]);
  });
});

describe('textReport', () => {
  it('prints one block per error', () => {
    const report = textReport({
      file: 'a.json',
      errors: [{ code: 'GEN-EMPTY-FIELD', message: "Field 'label' cannot be empty.", path: 'label', hint: 'Provide non-blank text.' }],
    });
    expect(report).toBe(
      "\x1b[31merror\x1b[0m[GEN-EMPTY-FIELD]: Field 'label' cannot be empty.\n" +
      'at a.json (label)\n' +
      'hint: Provide non-blank text.\n',
    );
  });

  it('summarises successful renders', () => {
    expect(textReport({ file: 'a.json', errors: [] })).toBe('Valid');
    expect(textReport({ file: 'a.json', errors: [], written: 'a.mmd' })).toBe('Wrote a.mmd');
  });
});

describe('toJsonResult', () => {
  it('counts errors', () => {
    expect(toJsonResult({ file: 'a.json', errors: [] })).toEqual({ file: 'a.json', valid: true, errorCount: 0, errors: [] });
    expect(toJsonResult({ file: 'b.json', errors: [{ code: 'INTERNAL', message: 'x' }], written: undefined })).toEqual({
      file: 'b.json',
      valid: false,
      errorCount: 1,
      errors: [{ code: 'INTERNAL', message: 'x' }],
    });
  });

  it('includes the written path', () => {
    expect(toJsonResult({ file: 'a.json', errors: [], written: 'a.mmd' }).written).toBe('a.mmd');
  });
});

describe('outputPathFor', () => {
  it('swaps the document extension for .mmd', () => {
    expect(outputPathFor('docs/flow.diagram.json')).toBe('docs/flow.mmd');
    expect(outputPathFor('x.json')).toBe('x.mmd');
    expect(outputPathFor('X.DIAGRAM.JSON')).toBe('X.mmd');
  });
});
