import { promises as fs } from 'node:fs';
import path from 'node:path';

import { encodeDocument } from '@tfweave/block-core';

import { WriteError } from './errors.js';
import { mergeFragment } from './merger.js';

import type { Logger } from '../utils/logger.js';
import type { ConfigMap, ConfigValue, Fragment, SourceKind } from '@tfweave/block-core';

export interface Artifact {
  source: string;
  kind: SourceKind;
  /** Absolute path of the file to write. */
  file: string;
  document: ConfigMap;
}

/** The file operations the writer needs; swapped out in tests. */
export interface WriterFileSystem {
  writeFile(file: string, data: string): Promise<void>;
  rename(from: string, to: string): Promise<void>;
  rm(file: string): Promise<void>;
  exists(file: string): Promise<boolean>;
  mkdir(dir: string): Promise<void>;
}

export const nodeFileSystem: WriterFileSystem = {
  writeFile: (file, data) => fs.writeFile(file, data, 'utf8'),
  rename: (from, to) => fs.rename(from, to),
  rm: (file) => fs.rm(file, { force: true }),
  exists: async (file) => {
    try {
      await fs.lstat(file);
      return true;
    } catch {
      return false;
    }
  },
  mkdir: async (dir) => {
    await fs.mkdir(dir, { recursive: true });
  },
};

export interface WriteOptions {
  indent?: number;
  dryRun?: boolean;
  fs?: WriterFileSystem;
  logger?: Logger;
}

export function artifactName(source: string): string {
  return `${source}.json`;
}

/** Build one source's document from its own fragments only. */
export function buildArtifact(
  source: string,
  kind: SourceKind,
  fragments: readonly Fragment[],
  outputDir: string,
): Artifact {
  const tree: ConfigMap = {};
  for (const fragment of fragments) {
    mergeFragment(tree, fragment, [source]);
  }
  return {
    source,
    kind,
    file: path.resolve(outputDir, artifactName(source)),
    document: encodeDocument(tree, kind),
  };
}

export function sortKeys(value: ConfigValue): ConfigValue {
  if (Array.isArray(value)) return value.map((entry) => sortKeys(entry));
  if (value !== null && typeof value === 'object') {
    const out: ConfigMap = {};
    for (const key of Object.keys(value).sort()) {
      const entry = value[key];
      if (entry !== undefined) out[key] = sortKeys(entry);
    }
    return out;
  }
  return value;
}

export function serializeDocument(document: ConfigMap, indent = 2): string {
  return `${JSON.stringify(sortKeys(document), null, indent)}\n`;
}

interface Staged {
  target: string;
  temp: string;
  backup?: string;
  swapped: boolean;
}

let sequence = 0;

function scratchName(target: string, tag: string): string {
  sequence += 1;
  const dir = path.dirname(target);
  return path.join(dir, `.${path.basename(target)}.${tag}-${process.pid}-${sequence}`);
}

async function discard(files: WriterFileSystem, file: string, logger?: Logger): Promise<void> {
  try {
    await files.rm(file);
  } catch (error) {
    logger?.debug(`could not remove ${file}: ${error instanceof Error ? error.message : String(error)}`);
  }
}

async function rollback(staged: readonly Staged[], files: WriterFileSystem, logger?: Logger): Promise<void> {
  for (const entry of [...staged].reverse()) {
    try {
      if (entry.swapped && !entry.backup) await files.rm(entry.target);
      if (entry.backup) await files.rename(entry.backup, entry.target);
    } catch (error) {
      logger?.warn(
        `could not restore ${entry.target}: ${error instanceof Error ? error.message : String(error)}`,
      );
    }
    if (!entry.swapped) await discard(files, entry.temp, logger);
  }
}

/**
 * Write every artifact or none of them.
 * All contents are staged into temp files first; then each target is swapped in,
 * with any previous file kept aside until every swap has succeeded.
 */
export async function writeArtifacts(
  artifacts: readonly Artifact[],
  options: WriteOptions = {},
): Promise<string[]> {
  const indent = options.indent ?? 2;
  const files = options.fs ?? nodeFileSystem;
  const logger = options.logger;

  const contents = artifacts.map((artifact) => {
    try {
      return { artifact, text: serializeDocument(artifact.document, indent) };
    } catch (error) {
      throw new WriteError(artifact.file, error);
    }
  });

  if (options.dryRun) {
    for (const { artifact } of contents) logger?.info(`would create: ${path.basename(artifact.file)}`);
    return [];
  }

  const staged: Staged[] = [];
  for (const { artifact, text } of contents) {
    const entry: Staged = { target: artifact.file, temp: scratchName(artifact.file, 'tmp'), swapped: false };
    try {
      await files.mkdir(path.dirname(artifact.file));
      await files.writeFile(entry.temp, text);
      staged.push(entry);
    } catch (error) {
      await rollback([...staged, entry], files, logger);
      throw new WriteError(artifact.file, error);
    }
  }

  for (const entry of staged) {
    try {
      if (await files.exists(entry.target)) {
        const backup = scratchName(entry.target, 'bak');
        await files.rename(entry.target, backup);
        entry.backup = backup;
      }
      await files.rename(entry.temp, entry.target);
      entry.swapped = true;
    } catch (error) {
      await rollback(staged, files, logger);
      throw new WriteError(entry.target, error);
    }
  }

  for (const entry of staged) {
    if (entry.backup) await discard(files, entry.backup, logger);
    logger?.info(`create: ${path.basename(entry.target)}`);
  }
  return staged.map((entry) => entry.target);
}
