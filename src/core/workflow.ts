import { promises as fs } from 'node:fs';
import path from 'node:path';

import { defaultImporter } from './loader.js';
import { createFiles } from './renderer.js';
import { executeTerraform } from '../integrations/terraform.js';
import { DEFAULT_CLEAN_PATTERNS, DEFAULT_MIRROR_EXCLUDE } from '../types/config.js';
import { parseArgs } from '../utils/args.js';
import { exists, isDirectory } from '../utils/fs.js';
import { findPaths } from '../utils/glob.js';

import type { ModuleImporter } from './loader.js';
import type { CreateOptions, RenderResult } from './renderer.js';
import type { ExecuteResult } from '../integrations/terraform.js';
import type { ResolvedConfig } from '../types/config.js';
import type { Logger } from '../utils/logger.js';

export interface FileOptions {
  patterns?: readonly string[];
  exclude?: readonly string[];
  cwd?: string;
  logger?: Logger;
}

/** Remove files matching `patterns` (by default the artifacts a render creates). */
export async function deleteFiles(options: FileOptions = {}): Promise<string[]> {
  const patterns = options.patterns ?? DEFAULT_CLEAN_PATTERNS;
  options.logger?.info(`remove: ${patterns.join(' ')}`);
  const paths = await findPaths(patterns, options.exclude ?? [], options.cwd);
  for (const file of paths) {
    await fs.unlink(file);
  }
  return paths;
}

/**
 * Symlink every match of `patterns` into `cwd`, after removing the symlinks
 * already there. Names matching `exclude` (dotfiles and `_` files by default) are skipped.
 */
export async function mirrorFiles(options: FileOptions & { patterns: readonly string[] }): Promise<string[]> {
  const cwd = options.cwd ?? process.cwd();
  options.logger?.info(`mirror: ${options.patterns.join(' ')}`);
  const paths = await findPaths(options.patterns, options.exclude ?? DEFAULT_MIRROR_EXCLUDE, cwd);

  for (const entry of await fs.readdir(cwd, { withFileTypes: true })) {
    if (entry.isSymbolicLink()) await fs.unlink(path.join(cwd, entry.name));
  }

  const created: string[] = [];
  for (const real of paths) {
    const link = path.join(cwd, path.basename(real));
    await fs.symlink(real, link);
    created.push(link);
  }
  return created;
}

export interface WorkflowOptions {
  /** Terraform arguments as given on the command line. */
  argv: readonly string[];
  cwd: string;
  env: NodeJS.ProcessEnv;
  config: ResolvedConfig;
  logger: Logger;
  importer?: ModuleImporter;
  selfPaths?: readonly string[];
}

/** What a custom workflow module's `run` receives. */
export interface WorkflowApi {
  argv: readonly string[];
  cwd: string;
  config: ResolvedConfig;
  logger: Logger;
  deleteFiles(options?: FileOptions): Promise<string[]>;
  mirrorFiles(options: FileOptions & { patterns: readonly string[] }): Promise<string[]>;
  createFiles(options?: CreateOptions): Promise<RenderResult>;
  executeTerraform(argv?: readonly string[]): Promise<number>;
  defaultWorkflow(): Promise<number>;
}

/** The directory Terraform will read, where artifacts belong. */
export function workingDirectory(argv: readonly string[], cwd: string): string {
  const { configDir } = parseArgs(argv, (target) => isDirectory(path.resolve(cwd, target)));
  return configDir ? path.resolve(cwd, configDir) : cwd;
}

async function runTerraform(options: WorkflowOptions, argv: readonly string[]): Promise<number> {
  const result: ExecuteResult = await executeTerraform(argv, {
    cwd: options.cwd,
    env: options.env,
    terraform: options.config.terraform,
    capture: options.config.captureOutput,
    selfPaths: options.selfPaths,
    logger: options.logger,
  });
  return result.exitCode;
}

function renderOptions(options: WorkflowOptions, dir: string): CreateOptions {
  return {
    cwd: dir,
    sourceDirs: options.config.sourceDirs,
    argv: options.argv,
    env: options.env,
    indent: options.config.indent,
    importer: options.importer,
    logger: options.logger,
  };
}

/** Remove old artifacts, mirror configured files, render, then run Terraform. */
export async function defaultWorkflow(options: WorkflowOptions): Promise<number> {
  const dir = workingDirectory(options.argv, options.cwd);
  const { config, logger } = options;
  await deleteFiles({ patterns: config.clean.patterns, exclude: config.clean.exclude, cwd: dir, logger });
  if (config.mirror.length > 0) {
    await mirrorFiles({ patterns: config.mirror, cwd: dir, logger });
  }
  await createFiles(renderOptions(options, dir));
  return runTerraform(options, options.argv);
}

export const WORKFLOW_FILES = [
  'tfweave.workflow.ts',
  'tfweave.workflow.mts',
  'tfweave.workflow.js',
  'tfweave.workflow.mjs',
] as const;

/** The nearest custom workflow file in `cwd` or one of its parents. */
export async function findWorkflowPath(cwd: string): Promise<string | undefined> {
  let dir = path.resolve(cwd);
  for (;;) {
    for (const name of WORKFLOW_FILES) {
      const candidate = path.join(dir, name);
      if (await exists(candidate)) return candidate;
    }
    const parent = path.dirname(dir);
    if (parent === dir) return undefined;
    dir = parent;
  }
}

export function createWorkflowApi(options: WorkflowOptions): WorkflowApi {
  const dir = workingDirectory(options.argv, options.cwd);
  return {
    argv: options.argv,
    cwd: dir,
    config: options.config,
    logger: options.logger,
    deleteFiles: (fileOptions = {}) => deleteFiles({ cwd: dir, logger: options.logger, ...fileOptions }),
    mirrorFiles: (fileOptions) => mirrorFiles({ cwd: dir, logger: options.logger, ...fileOptions }),
    createFiles: (createOptions = {}) =>
      createFiles({ ...renderOptions(options, dir), ...createOptions }),
    executeTerraform: (argv = options.argv) => runTerraform(options, argv),
    defaultWorkflow: () => defaultWorkflow(options),
  };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

/** Load a workflow module and call its `run(api)`; a numeric result is the exit code. */
export async function runCustomWorkflow(file: string, options: WorkflowOptions): Promise<number> {
  const importer = options.importer ?? defaultImporter;
  const namespace = await importer(file);
  const run = isRecord(namespace) ? namespace['run'] : undefined;
  if (typeof run !== 'function') {
    options.logger.error(`workflow: ${file} must export a run function`);
    return 1;
  }
  const result: unknown = await run(createWorkflowApi(options));
  return typeof result === 'number' ? result : 0;
}

/** Run the custom workflow when one exists, the default workflow otherwise. */
export async function runWorkflow(options: WorkflowOptions): Promise<number> {
  const custom = await findWorkflowPath(options.cwd);
  if (custom) {
    options.logger.debug(`workflow: ${custom}`);
    return runCustomWorkflow(custom, options);
  }
  return defaultWorkflow(options);
}
