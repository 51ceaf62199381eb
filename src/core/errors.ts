export type BuildErrorKind =
  | 'MissingField'
  | 'EmptyField'
  | 'InvalidValue'
  | 'UnknownNodeReference'
  | 'BuilderFinalized';

export const BUILD_ERROR_CODES: Record<BuildErrorKind, string> = {
  MissingField: 'GEN-MISSING-FIELD',
  EmptyField: 'GEN-EMPTY-FIELD',
  InvalidValue: 'GEN-INVALID-VALUE',
  UnknownNodeReference: 'GEN-UNKNOWN-NODE',
  BuilderFinalized: 'GEN-BUILDER-FINALIZED',
};

type Common = {
  field?: string;
  reference?: string;
  hint?: string;
};

export class BuildError extends Error {
  readonly kind: BuildErrorKind;
  readonly code: string;
  readonly field?: string;
  readonly reference?: string;
  readonly hint?: string;

  constructor(kind: BuildErrorKind, message: string, extra: Common = {}) {
    super(message);
    this.name = 'BuildError';
    this.kind = kind;
    this.code = BUILD_ERROR_CODES[kind];
    this.field = extra.field;
    this.reference = extra.reference;
    this.hint = extra.hint;
  }
}

export function isBuildError(error: unknown): error is BuildError {
  return error instanceof BuildError;
}

export function missingField(field: string, hint?: string): BuildError {
  return new BuildError('MissingField', `Missing required field '${field}'.`, { field, hint });
}

export function emptyField(field: string): BuildError {
  return new BuildError('EmptyField', `Field '${field}' cannot be empty.`, {
    field,
    hint: 'Provide non-blank text.',
  });
}

export function invalidValue(field: string, message: string, hint?: string): BuildError {
  return new BuildError('InvalidValue', message, { field, hint });
}

export type NodeReferenceRole = 'source' | 'destination' | 'subnode';

const ROLE_PHRASES: Record<NodeReferenceRole, string> = {
  source: ' used as edge source',
  destination: ' used as edge destination',
  subnode: ' used as subnode',
};

export function unknownNodeReference(reference: string, role?: NodeReferenceRole): BuildError {
  const where = role ? ROLE_PHRASES[role] : '';
  return new BuildError('UnknownNodeReference', `Unknown node '${reference}'${where}.`, {
    reference,
    hint: 'Only ids returned by addNode() on the same builder can be referenced.',
  });
}

export function builderFinalized(): BuildError {
  return new BuildError('BuilderFinalized', 'Diagram is already finalized; no more nodes or edges can be added.', {
    hint: 'Create a new builder to start another diagram.',
  });
}

export function requireField<T>(field: string, value: T | undefined, hint?: string): T {
  if (value === undefined) throw missingField(field, hint);
  return value;
}

// Blank text is rejected where it is set, not when the diagram renders.
export function requireText(field: string, value: string): string {
  if (value.trim() === '') throw emptyField(field);
  return value;
}
