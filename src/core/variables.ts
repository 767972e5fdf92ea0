import { promises as fs } from 'node:fs';
import path from 'node:path';

import { ConfigMapSchema, fromDocument } from '@tfweave/block-core';

import { ErrorCode, TfweaveError, VariableNotDefinedError, VariableNotPopulatedError } from './errors.js';

import type { ConfigMap, ConfigValue, Fragment } from '@tfweave/block-core';

export interface VariableDefinition {
  name: string;
  source: string;
  hasDefault: boolean;
  default?: ConfigValue;
}

export interface VariableValue {
  name: string;
  value: ConfigValue;
  source: string;
  /** Higher wins, mirroring Terraform's load order. */
  rank: number;
}

function isConfigMap(value: ConfigValue): value is ConfigMap {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export const ENV_RANK = 0;
const DEFAULT_TFVARS_RANK = 1;
const AUTO_TFVARS_RANK = 2;
const COMMAND_LINE_RANK = 1_000_000;

/**
 * Variable definitions and values visible to producers.
 * Definitions come from `variable` blocks; values are layered by rank.
 */
export class VariableStore {
  private readonly definitions = new Map<string, VariableDefinition>();
  private readonly values = new Map<string, VariableValue>();

  define(definition: VariableDefinition): void {
    if (!this.definitions.has(definition.name)) {
      this.definitions.set(definition.name, definition);
    }
  }

  defineFrom(fragment: Fragment, source: string): void {
    if (fragment.category !== 'variable') return;
    const body = fragment.body;
    if (isConfigMap(body) && Object.hasOwn(body, 'default')) {
      this.define({ name: fragment.type, source, hasDefault: true, default: body['default'] });
      return;
    }
    this.define({ name: fragment.type, source, hasDefault: false });
  }

  setValue(value: VariableValue): void {
    const current = this.values.get(value.name);
    if (current && current.rank > value.rank) return;
    this.values.set(value.name, value);
  }

  isDefined(name: string): boolean {
    return this.definitions.has(name);
  }

  definition(name: string): VariableDefinition | undefined {
    return this.definitions.get(name);
  }

  valueOf(name: string): VariableValue | undefined {
    return this.values.get(name);
  }

  resolve(name: string, consumer: string): ConfigValue {
    const definition = this.definitions.get(name);
    if (!definition) throw new VariableNotDefinedError(name, consumer);
    const value = this.values.get(name);
    if (value) return value.value;
    if (definition.hasDefault && definition.default !== undefined) return definition.default;
    throw new VariableNotPopulatedError(name, consumer);
  }
}

export interface ValueOrigin {
  /** Artifact name when inside the output directory, absolute path otherwise. */
  file: string;
  rank: number;
}

export interface ValuePlan {
  files: ValueOrigin[];
  inline: VariableValue[];
  /** `-var-file` targets in HCL; Terraform reads them, tfweave does not. */
  skipped: string[];
}

export function valuesFromEnv(env: NodeJS.ProcessEnv): VariableValue[] {
  const out: VariableValue[] = [];
  for (const [key, value] of Object.entries(env)) {
    if (!key.startsWith('TF_VAR_') || value === undefined) continue;
    out.push({ name: key.slice('TF_VAR_'.length), value, source: key, rank: ENV_RANK });
  }
  return out;
}

/**
 * Work out which tfvars files Terraform will read and in what order:
 * terraform.tfvars.json, then *.auto.tfvars.json lexically, then -var / -var-file in argument order.
 * Only JSON var files take part; HCL ones are listed in `skipped`.
 */
export function planValueOrigins(
  names: Iterable<string>,
  argv: readonly string[],
  outputDir: string,
): ValuePlan {
  const files: ValueOrigin[] = [];
  const inline: VariableValue[] = [];
  const skipped: string[] = [];
  const unique = [...new Set(names)].sort();

  for (const name of unique) {
    if (name === 'terraform.tfvars.json') files.push({ file: name, rank: DEFAULT_TFVARS_RANK });
  }
  unique
    .filter((name) => name.endsWith('.auto.tfvars.json'))
    .forEach((name, index) => files.push({ file: name, rank: AUTO_TFVARS_RANK + index }));

  const root = path.resolve(outputDir);
  let position = 0;
  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i] ?? '';
    let assignment: string | undefined;
    let varFile: string | undefined;
    if (arg.startsWith('-var=')) assignment = arg.slice('-var='.length);
    else if (arg === '-var') assignment = argv[++i];
    else if (arg.startsWith('-var-file=')) varFile = arg.slice('-var-file='.length);
    else if (arg === '-var-file') varFile = argv[++i];
    else continue;

    const rank = COMMAND_LINE_RANK + position++;
    if (assignment !== undefined) {
      const eq = assignment.indexOf('=');
      if (eq <= 0) {
        throw new TfweaveError(ErrorCode.INVALID_ARGUMENT, `invalid -var argument: ${assignment}`);
      }
      inline.push({
        name: assignment.slice(0, eq),
        value: assignment.slice(eq + 1),
        source: `-var=${assignment}`,
        rank,
      });
    } else if (varFile !== undefined) {
      if (!varFile.endsWith('.json')) {
        skipped.push(varFile);
        continue;
      }
      const abs = path.resolve(root, varFile);
      const file = path.dirname(abs) === root ? path.basename(abs) : abs;
      files.push({ file, rank });
    }
  }

  return { files, inline, skipped };
}

async function readJsonDocument(file: string): Promise<ConfigMap> {
  let raw: string;
  try {
    raw = await fs.readFile(file, 'utf8');
  } catch (error) {
    throw new TfweaveError(ErrorCode.FILE_NOT_FOUND, `File not found: ${file}`, error);
  }
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    throw new TfweaveError(ErrorCode.CONFIG_INVALID, `${file} is not valid JSON`, error);
  }
  const result = ConfigMapSchema.safeParse(parsed);
  if (!result.success) {
    throw new TfweaveError(ErrorCode.CONFIG_INVALID, `${file} must contain a JSON object`);
  }
  return result.data;
}

/** Values from a tfvars JSON file that this run does not produce. */
export async function readValueFile(file: string, rank: number): Promise<VariableValue[]> {
  const document = await readJsonDocument(file);
  const source = path.basename(file);
  return Object.entries(document).map(([name, value]) => ({ name, value, source, rank }));
}

/** Variable blocks declared in a *.tf.json file that this run does not produce. */
export async function readDefinitionFile(file: string): Promise<Fragment[]> {
  const document = await readJsonDocument(file);
  let fragments: Fragment[];
  try {
    fragments = fromDocument(document);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new TfweaveError(ErrorCode.CONFIG_INVALID, `${file}: ${reason}`, error);
  }
  return fragments.filter((fragment) => fragment.category === 'variable');
}
