/**
 * Builders for the items a definition source yields.
 *
 * @example
 * ```typescript
 * export default function* blocks(ctx: BlockContext) {
 *   const vpcId = yield* need(ctx.lookup('net.tf', 'vpcId'), z.string());
 *   yield resource('aws_instance', 'app', { subnet_id: vpcId });
 *   yield exportValue('instance', 'app');
 * }
 * ```
 */

import { BlockParseError } from './types.js';

import type {
  BlockContext,
  ConfigMap,
  ConfigValue,
  ExportDeclaration,
  ExportRequest,
  Fragment,
  SourceKind,
  ValueRequest,
  VariableRequest,
} from './types.js';
import type { ZodType } from 'zod';

export function resource(type: string, label: string, body: ConfigMap = {}): Fragment {
  return { kind: 'fragment', category: 'resource', type, label, body };
}

export function data(type: string, label: string, body: ConfigMap = {}): Fragment {
  return { kind: 'fragment', category: 'data', type, label, body };
}

export interface ProviderOptions {
  alias?: string;
}

/** Aliased providers carry the alias in their body, as Terraform expects. */
export function provider(name: string, body: ConfigMap = {}, options: ProviderOptions = {}): Fragment {
  if (options.alias === undefined) {
    return { kind: 'fragment', category: 'provider', type: name, body };
  }
  return {
    kind: 'fragment',
    category: 'provider',
    type: name,
    label: options.alias,
    body: { ...body, alias: options.alias },
  };
}

export function module(name: string, body: ConfigMap): Fragment {
  return { kind: 'fragment', category: 'module', type: name, body };
}

export function variable(name: string, body: ConfigMap = {}): Fragment {
  return { kind: 'fragment', category: 'variable', type: name, body };
}

export function output(name: string, body: ConfigMap): Fragment {
  return { kind: 'fragment', category: 'output', type: name, body };
}

export function local(name: string, value: ConfigValue): Fragment {
  return { kind: 'fragment', category: 'locals', type: name, body: value };
}

export function terraform(body: ConfigMap): Fragment {
  return { kind: 'fragment', category: 'terraform', type: 'terraform', body };
}

/** A variable value, yielded by *.tfvars sources. */
export function tfvar(name: string, value: ConfigValue): Fragment {
  return { kind: 'fragment', category: 'tfvars', type: name, body: value };
}

export function exportValue(name: string, value: ConfigValue): ExportDeclaration {
  return { kind: 'export', name, value };
}

export function lookup(source: string, key: string): ExportRequest {
  return { kind: 'request', from: 'export', source, key };
}

export function variableRequest(name: string): VariableRequest {
  return { kind: 'request', from: 'variable', name };
}

export function createBlockContext(name: string, kind: SourceKind): BlockContext {
  return {
    name,
    kind,
    lookup,
    variable: variableRequest,
  };
}

/**
 * Yield a request and hand back the answer, optionally validated.
 * Use with `yield*` so the answer is typed inside the producer.
 */
export function need(request: ValueRequest): Generator<ValueRequest, unknown, unknown>;
export function need<T>(
  request: ValueRequest,
  schema: ZodType<T>,
): Generator<ValueRequest, T, unknown>;
export function* need<T>(
  request: ValueRequest,
  schema?: ZodType<T>,
): Generator<ValueRequest, unknown, unknown> {
  const answer: unknown = yield request;
  if (!schema) return answer;
  const parsed = schema.safeParse(answer);
  if (!parsed.success) {
    const what =
      request.from === 'export' ? `${request.source}:${request.key}` : `var.${request.name}`;
    throw new BlockParseError(`${what} has an unexpected value: ${parsed.error.issues[0]?.message}`);
  }
  return parsed.data;
}
