import { promises as fs } from 'node:fs';
import path from 'node:path';

import * as TOML from '@iarna/toml';

import { ConfigError } from '../core/errors.js';
import { ProjectConfigSchema, type ResolvedConfig } from '../types/config.js';

export const CONFIG_FILENAME = 'tfweave.toml';

const TRUTHY = new Set(['1', 'true', 'yes', 'on']);

export function envFlag(value: string | undefined): boolean {
  return value !== undefined && TRUTHY.has(value.trim().toLowerCase());
}

export function parseProjectConfig(
  raw: unknown,
  file: string,
  env: NodeJS.ProcessEnv = process.env,
): ResolvedConfig {
  const result = ProjectConfigSchema.safeParse(raw ?? {});
  if (!result.success) {
    const issue = result.error.issues[0];
    const where = issue && issue.path.length > 0 ? `${issue.path.join('.')}: ` : '';
    throw new ConfigError(file, `${where}${issue?.message ?? 'invalid configuration'}`);
  }
  const cfg = result.data;
  const terraform = env.TFWEAVE_TERRAFORM?.trim() || cfg.terraform;
  return {
    sourceDirs: cfg.source_dirs,
    terraform,
    indent: cfg.indent,
    mirror: cfg.mirror,
    clean: { patterns: cfg.clean.patterns, exclude: cfg.clean.exclude },
    verbose: envFlag(env.TFWEAVE_VERBOSE),
    captureOutput: envFlag(env.TFWEAVE_CAPTURE_OUTPUT),
  };
}

/**
 * Read `tfweave.toml` from `cwd`. A missing file means defaults; a file that
 * does not parse or validate is an error.
 */
export async function loadConfig(
  cwd: string = process.cwd(),
  env: NodeJS.ProcessEnv = process.env,
): Promise<ResolvedConfig> {
  const file = path.join(cwd, CONFIG_FILENAME);
  let content: string;
  try {
    content = await fs.readFile(file, 'utf8');
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      return parseProjectConfig({}, file, env);
    }
    throw new ConfigError(file, 'could not be read', error);
  }

  let parsed: TOML.JsonMap;
  try {
    parsed = TOML.parse(content);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ConfigError(file, `invalid TOML: ${reason}`, error);
  }
  return { ...parseProjectConfig(parsed, file, env), file };
}
