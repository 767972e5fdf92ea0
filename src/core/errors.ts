export enum ErrorCode {
  UNKNOWN_ERROR = 'UNKNOWN_ERROR',
  INVALID_ARGUMENT = 'INVALID_ARGUMENT',
  CONFIG_INVALID = 'CONFIG_INVALID',
  FILE_NOT_FOUND = 'FILE_NOT_FOUND',
  SOURCE_LOAD_FAILED = 'SOURCE_LOAD_FAILED',
  PRODUCER_NOT_FOUND = 'PRODUCER_NOT_FOUND',
  SOURCE_EXECUTION_FAILED = 'SOURCE_EXECUTION_FAILED',
  DUPLICATE_BLOCK = 'DUPLICATE_BLOCK',
  MERGE_CONFLICT = 'MERGE_CONFLICT',
  SHAPE_CONFLICT = 'SHAPE_CONFLICT',
  DEPENDENCY_CYCLE = 'DEPENDENCY_CYCLE',
  UNKNOWN_SOURCE = 'UNKNOWN_SOURCE',
  EXPORT_NOT_FOUND = 'EXPORT_NOT_FOUND',
  VARIABLE_NOT_DEFINED = 'VARIABLE_NOT_DEFINED',
  VARIABLE_NOT_POPULATED = 'VARIABLE_NOT_POPULATED',
  WRITE_FAILED = 'WRITE_FAILED',
  TERRAFORM_NOT_FOUND = 'TERRAFORM_NOT_FOUND',
}

export class TfweaveError extends Error {
  readonly code: ErrorCode;
  readonly details?: unknown;

  constructor(code: ErrorCode, message: string, details?: unknown) {
    super(message, details instanceof Error ? { cause: details } : undefined);
    this.name = 'TfweaveError';
    this.code = code;
    this.details = details;
  }
}

function describe(value: unknown): string {
  if (value === undefined) return 'undefined';
  return JSON.stringify(value);
}

export class DuplicateBlockError extends TfweaveError {
  constructor(
    readonly key: string,
    readonly existingOwner: string,
    readonly newOwner: string,
  ) {
    super(
      ErrorCode.DUPLICATE_BLOCK,
      `${newOwner} cannot define ${key} because ${existingOwner} already defined it`,
    );
    this.name = 'DuplicateBlockError';
  }
}

export class MergeConflictError extends TfweaveError {
  constructor(
    readonly path: string,
    readonly sources: readonly string[],
    readonly existing: unknown,
    readonly incoming: unknown,
  ) {
    super(
      ErrorCode.MERGE_CONFLICT,
      `conflicting values for ${path}: ${describe(existing)} vs ${describe(incoming)} (sources: ${sources.join(', ')})`,
    );
    this.name = 'MergeConflictError';
  }
}

export class ShapeConflictError extends TfweaveError {
  constructor(
    readonly path: string,
    readonly sources: readonly string[],
    readonly existing: unknown,
    readonly incoming: unknown,
  ) {
    super(
      ErrorCode.SHAPE_CONFLICT,
      `cannot merge ${describe(incoming)} into ${describe(existing)} at ${path} (sources: ${sources.join(', ')})`,
    );
    this.name = 'ShapeConflictError';
  }
}

export class CycleError extends TfweaveError {
  constructor(readonly cycle: readonly string[]) {
    const loop = cycle.length > 0 ? [...cycle, cycle[0]] : [];
    super(ErrorCode.DEPENDENCY_CYCLE, `dependency cycle: ${loop.join(' -> ')}`);
    this.name = 'CycleError';
  }
}

export class SourceExecutionError extends TfweaveError {
  constructor(
    readonly source: string,
    cause: unknown,
  ) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(ErrorCode.SOURCE_EXECUTION_FAILED, `${source} failed: ${reason}`, cause);
    this.name = 'SourceExecutionError';
  }
}

export class WriteError extends TfweaveError {
  constructor(
    readonly target: string,
    cause: unknown,
  ) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(ErrorCode.WRITE_FAILED, `could not write ${target}: ${reason}`, cause);
    this.name = 'WriteError';
  }
}

export class UnknownSourceError extends TfweaveError {
  constructor(
    readonly consumer: string,
    readonly source: string,
  ) {
    super(
      ErrorCode.UNKNOWN_SOURCE,
      `${consumer} cannot read from ${source} because no such source exists`,
    );
    this.name = 'UnknownSourceError';
  }
}

export class ExportNotFoundError extends TfweaveError {
  constructor(
    readonly consumer: string,
    readonly source: string,
    readonly key: string,
  ) {
    super(
      ErrorCode.EXPORT_NOT_FOUND,
      `${consumer} cannot read ${source}:${key} because ${source} did not export it`,
    );
    this.name = 'ExportNotFoundError';
  }
}

export class VariableNotDefinedError extends TfweaveError {
  constructor(
    readonly variable: string,
    readonly consumer: string,
  ) {
    super(
      ErrorCode.VARIABLE_NOT_DEFINED,
      `${consumer} cannot access var.${variable} because it has not been defined`,
    );
    this.name = 'VariableNotDefinedError';
  }
}

export class VariableNotPopulatedError extends TfweaveError {
  constructor(
    readonly variable: string,
    readonly consumer: string,
  ) {
    super(
      ErrorCode.VARIABLE_NOT_POPULATED,
      `${consumer} cannot access var.${variable} because it has no value`,
    );
    this.name = 'VariableNotPopulatedError';
  }
}

export class ProducerNotFoundError extends TfweaveError {
  constructor(
    readonly file: string,
    readonly expected: readonly string[],
  ) {
    super(
      ErrorCode.PRODUCER_NOT_FOUND,
      `${file} exports no producer (expected a default export or ${expected.join(' / ')})`,
    );
    this.name = 'ProducerNotFoundError';
  }
}

export class ConfigError extends TfweaveError {
  constructor(
    readonly file: string,
    message: string,
    details?: unknown,
  ) {
    super(ErrorCode.CONFIG_INVALID, `${file}: ${message}`, details);
    this.name = 'ConfigError';
  }
}
