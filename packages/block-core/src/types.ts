/**
 * Shared type definitions for tfweave definition sources.
 * These types are used by the renderer and by the modules users author.
 */

export type Scalar = string | number | boolean | null;

export type ConfigValue = Scalar | ConfigValue[] | ConfigMap;

export interface ConfigMap {
  [key: string]: ConfigValue;
}

export type Category =
  | 'terraform'
  | 'provider'
  | 'resource'
  | 'data'
  | 'module'
  | 'variable'
  | 'output'
  | 'locals'
  | 'tfvars';

export interface Fragment {
  kind: 'fragment';
  category: Category;
  type: string;
  label?: string;
  body: ConfigValue;
}

export interface ExportDeclaration {
  kind: 'export';
  name: string;
  value: ConfigValue;
}

export interface ExportRequest {
  kind: 'request';
  from: 'export';
  source: string;
  key: string;
}

export interface VariableRequest {
  kind: 'request';
  from: 'variable';
  name: string;
}

export type ValueRequest = ExportRequest | VariableRequest;

export type BlockItem = Fragment | ExportDeclaration | ValueRequest;

/** What a producer may yield: a typed item or a plain Terraform JSON document. */
export type Yieldable = BlockItem | ConfigMap;

export type SourceKind = 'config' | 'values';

/** Request builders handed to every producer. */
export interface BlockContext {
  readonly name: string;
  readonly kind: SourceKind;
  lookup(source: string, key: string): ExportRequest;
  variable(name: string): VariableRequest;
}

export type BlockStream =
  | Generator<unknown, unknown, unknown>
  | AsyncGenerator<unknown, unknown, unknown>;

export type Producer = (ctx: BlockContext) => BlockStream;

/**
 * Error class for malformed items and documents.
 * Provides a simple, runtime-agnostic error type.
 */
export class BlockParseError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'BlockParseError';
  }
}
