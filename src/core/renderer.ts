import { promises as fs } from 'node:fs';
import path from 'node:path';

import { orderSources } from './block-source.js';
import { loadSources } from './loader.js';
import { RenderContext } from './render-context.js';
import { Scheduler } from './scheduler.js';
import {
  planValueOrigins,
  readDefinitionFile,
  readValueFile,
  valuesFromEnv,
} from './variables.js';
import { artifactName, buildArtifact, writeArtifacts } from './writer.js';

import type { BlockSource } from './block-source.js';
import type { ModuleImporter } from './loader.js';
import type { Artifact, WriterFileSystem } from './writer.js';
import type { Logger } from '../utils/logger.js';
import type { ConfigMap, ConfigValue } from '@tfweave/block-core';

export interface RenderOptions {
  /** Directory artifacts are written to and static files are read from. Defaults to `cwd`. */
  outputDir?: string;
  cwd?: string;
  /** Terraform arguments; `-var` and `-var-file` take part in variable precedence. */
  argv?: readonly string[];
  env?: NodeJS.ProcessEnv;
  indent?: number;
  dryRun?: boolean;
  fs?: WriterFileSystem;
  logger?: Logger;
}

export interface CreateOptions extends RenderOptions {
  sourceDirs?: readonly string[];
  importer?: ModuleImporter;
}

export interface RenderResult {
  artifacts: Artifact[];
  /** Files written, empty on a dry run. */
  written: string[];
  /** Every committed fragment merged into one tree. */
  tree: ConfigMap;
  exports: Record<string, Record<string, ConfigValue>>;
}

async function listDir(dir: string): Promise<string[]> {
  try {
    return (await fs.readdir(dir)).sort();
  } catch {
    return [];
  }
}

async function seedVariables(
  context: RenderContext,
  sources: readonly BlockSource[],
  outputDir: string,
  options: RenderOptions,
): Promise<void> {
  const produced = new Set(sources.map((source) => artifactName(source.name)));
  const existing = (await listDir(outputDir)).filter((name) => !produced.has(name));

  for (const name of existing.filter((entry) => entry.endsWith('.tf.json'))) {
    for (const fragment of await readDefinitionFile(path.join(outputDir, name))) {
      context.commit(name, fragment);
    }
  }

  for (const value of valuesFromEnv(options.env ?? process.env)) {
    context.variables.setValue(value);
  }

  const valueSources = new Map(
    sources
      .filter((source) => source.kind === 'values')
      .map((source) => [artifactName(source.name), source.name] as const),
  );
  const candidates = [
    ...valueSources.keys(),
    ...existing.filter((entry) => entry.endsWith('.tfvars.json')),
  ];
  const plan = planValueOrigins(candidates, options.argv ?? [], outputDir);
  for (const file of plan.skipped) {
    options.logger?.debug(`skip: ${file} (only JSON var files are read)`);
  }

  for (const origin of plan.files) {
    const source = valueSources.get(origin.file);
    if (source !== undefined) {
      context.setValueRank(source, origin.rank);
      continue;
    }
    for (const value of await readValueFile(path.resolve(outputDir, origin.file), origin.rank)) {
      context.variables.setValue(value);
    }
  }
  for (const value of plan.inline) {
    context.variables.setValue(value);
  }
}

/**
 * Run a set of block sources against a fresh context and write one JSON artifact per
 * source. Nothing is written unless every source finished.
 */
export async function renderSources(
  sources: readonly BlockSource[],
  options: RenderOptions = {},
): Promise<RenderResult> {
  const cwd = options.cwd ?? process.cwd();
  const outputDir = path.resolve(cwd, options.outputDir ?? '.');
  const context = new RenderContext();

  await seedVariables(context, sources, outputDir, options);

  const scheduler = new Scheduler(sources, context, { logger: options.logger });
  await scheduler.run();

  const artifacts = orderSources(sources).map((source) =>
    buildArtifact(source.name, source.kind, context.fragmentsOf(source.name), outputDir),
  );
  const written = await writeArtifacts(artifacts, {
    indent: options.indent,
    dryRun: options.dryRun,
    fs: options.fs,
    logger: options.logger,
  });

  return { artifacts, written, tree: context.tree, exports: context.allExports() };
}

/** Discover definition sources in `sourceDirs` and render them. */
export async function createFiles(options: CreateOptions = {}): Promise<RenderResult> {
  const sources = await loadSources(options.sourceDirs ?? ['.'], {
    cwd: options.cwd,
    importer: options.importer,
    logger: options.logger,
  });
  return renderSources(sources, options);
}
