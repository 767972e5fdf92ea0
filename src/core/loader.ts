import { promises as fs } from 'node:fs';
import path from 'node:path';
import { pathToFileURL } from 'node:url';

import { BlockParseError } from '@tfweave/block-core';
import { tsImport } from 'tsx/esm/api';

import { orderSources } from './block-source.js';
import { ErrorCode, ProducerNotFoundError, TfweaveError } from './errors.js';

import type { BlockSource } from './block-source.js';
import type { Logger } from '../utils/logger.js';
import type { BlockContext, BlockStream, SourceKind } from '@tfweave/block-core';

/** Loads a module file and returns its namespace object. */
export type ModuleImporter = (file: string) => Promise<unknown>;

const SOURCE_FILE = /^(.+\.(tf|tfvars))\.(ts|mts|js|mjs)$/;
const TYPESCRIPT = new Set(['.ts', '.mts']);

export interface DiscoveredSource {
  name: string;
  kind: SourceKind;
  file: string;
}

export interface LoadOptions {
  cwd?: string;
  importer?: ModuleImporter;
  logger?: Logger;
}

export const defaultImporter: ModuleImporter = async (file) => {
  const url = pathToFileURL(file).href;
  if (TYPESCRIPT.has(path.extname(file))) {
    return tsImport(url, import.meta.url);
  }
  return import(url);
};

/** `net.tf.ts` → `{ name: 'net.tf', kind: 'config' }`; undefined for anything else. */
export function classifySourceFile(fileName: string): Omit<DiscoveredSource, 'file'> | undefined {
  const match = SOURCE_FILE.exec(fileName);
  if (!match) return undefined;
  const [, name = fileName, suffix] = match;
  return { name, kind: suffix === 'tfvars' ? 'values' : 'config' };
}

/**
 * Find definition source files in `dirs`. When two directories hold a file with
 * the same source name, the later directory wins.
 */
export async function discoverSources(
  dirs: readonly string[],
  cwd: string = process.cwd(),
): Promise<DiscoveredSource[]> {
  const byName = new Map<string, DiscoveredSource>();
  for (const dir of dirs.length > 0 ? dirs : ['.']) {
    const abs = path.resolve(cwd, dir);
    let entries: string[];
    try {
      entries = await fs.readdir(abs);
    } catch (error) {
      throw new TfweaveError(ErrorCode.FILE_NOT_FOUND, `Source directory not found: ${abs}`, error);
    }
    for (const entry of entries.sort()) {
      const found = classifySourceFile(entry);
      if (!found) continue;
      byName.set(found.name, { ...found, file: path.join(abs, entry) });
    }
  }
  return [...byName.values()];
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

function isFunction(value: unknown): value is (ctx: BlockContext) => unknown {
  return typeof value === 'function';
}

function isBlockStream(value: unknown): value is BlockStream {
  return isRecord(value) && typeof value['next'] === 'function' && typeof value['throw'] === 'function';
}

/** Turn an imported module namespace into a block source. */
export function sourceFromModule(found: DiscoveredSource, namespace: unknown): BlockSource {
  const named = found.kind === 'values' ? 'variables' : 'blocks';
  const candidate = isRecord(namespace)
    ? isFunction(namespace['default'])
      ? namespace['default']
      : namespace[named]
    : undefined;
  if (!isFunction(candidate)) {
    throw new ProducerNotFoundError(found.file, [named]);
  }
  const priority = isRecord(namespace) ? namespace['priority'] : undefined;
  const fn = candidate;

  return {
    name: found.name,
    kind: found.kind,
    priority: typeof priority === 'number' && Number.isFinite(priority) ? priority : undefined,
    origin: found.file,
    produce(ctx) {
      const stream = fn(ctx);
      if (!isBlockStream(stream)) {
        throw new BlockParseError(`${path.basename(found.file)} producer must be a generator function`);
      }
      return stream;
    },
  };
}

export async function loadSources(
  dirs: readonly string[],
  options: LoadOptions = {},
): Promise<BlockSource[]> {
  const importer = options.importer ?? defaultImporter;
  const discovered = await discoverSources(dirs, options.cwd);
  const sources: BlockSource[] = [];
  for (const found of discovered) {
    options.logger?.debug(`load: ${found.file}`);
    let namespace: unknown;
    try {
      namespace = await importer(found.file);
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new TfweaveError(
        ErrorCode.SOURCE_LOAD_FAILED,
        `Failed to load ${found.file}: ${reason}`,
        error,
      );
    }
    sources.push(sourceFromModule(found, namespace));
  }
  return orderSources(sources);
}
