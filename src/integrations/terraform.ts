import { spawn } from 'node:child_process';
import { constants, promises as fs } from 'node:fs';
import path from 'node:path';

import { ErrorCode, TfweaveError } from '../core/errors.js';

import type { Logger } from '../utils/logger.js';
import type { Writable } from 'node:stream';

export interface FindTerraformOptions {
  env?: NodeJS.ProcessEnv;
  /** Binary name or path to look for instead of `terraform`. */
  command?: string;
  /** Real paths that belong to this CLI; links resolving to them are skipped. */
  selfPaths?: readonly string[];
}

const SELF_NAME = 'tfweave';

async function isExecutableFile(candidate: string): Promise<boolean> {
  try {
    const stat = await fs.stat(candidate);
    if (!stat.isFile()) return false;
    await fs.access(candidate, constants.X_OK);
    return true;
  } catch {
    return false;
  }
}

async function pointsAtSelf(candidate: string, selfPaths: ReadonlySet<string>): Promise<boolean> {
  const real = await fs.realpath(candidate);
  return path.basename(real) === SELF_NAME || selfPaths.has(real);
}

/**
 * Locate the Terraform executable on PATH. Entries that are not executable, and links
 * back to this CLI (a `terraform` wrapper pointing here), are skipped.
 */
export async function findTerraform(options: FindTerraformOptions = {}): Promise<string | undefined> {
  const env = options.env ?? process.env;
  const command = options.command ?? 'terraform';
  const selfPaths = new Set(options.selfPaths ?? []);

  if (command.includes('/') || command.includes(path.sep)) {
    const abs = path.resolve(command);
    return (await isExecutableFile(abs)) ? abs : undefined;
  }

  for (const dir of (env.PATH ?? '').split(path.delimiter)) {
    if (!dir) continue;
    const candidate = path.join(dir, command);
    if (!(await isExecutableFile(candidate))) continue;
    if (await pointsAtSelf(candidate, selfPaths)) continue;
    return candidate;
  }
  return undefined;
}

export interface ExecuteOptions {
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  /** Explicit binary; searched for on PATH when not given. */
  terraform?: string;
  /** Tee output to the console and keep a copy. */
  capture?: boolean;
  stdout?: Writable;
  stderr?: Writable;
  selfPaths?: readonly string[];
  logger?: Logger;
}

export interface ExecuteResult {
  exitCode: number;
  stdout?: string;
  stderr?: string;
}

function quote(arg: string): string {
  return /^[\w@%+=:,./-]+$/.test(arg) ? arg : `'${arg.replaceAll("'", `'"'"'`)}'`;
}

/** Run Terraform with `argv` forwarded and resolve with its exit code. */
export async function executeTerraform(
  argv: readonly string[],
  options: ExecuteOptions = {},
): Promise<ExecuteResult> {
  const env = options.env ?? process.env;
  const binary = await findTerraform({ env, command: options.terraform, selfPaths: options.selfPaths });
  if (!binary) {
    throw new TfweaveError(
      ErrorCode.TERRAFORM_NOT_FOUND,
      `terraform: command not found (${options.terraform ?? 'terraform'})`,
    );
  }

  options.logger?.info(`run: ${['terraform', ...argv].map((arg) => quote(arg)).join(' ')}`);
  options.logger?.debug(`terraform binary: ${binary}`);

  return new Promise((resolve, reject) => {
    const child = spawn(binary, [...argv], {
      cwd: options.cwd ?? process.cwd(),
      env,
      shell: false,
      stdio: options.capture ? ['inherit', 'pipe', 'pipe'] : 'inherit',
    });

    const out: string[] = [];
    const err: string[] = [];
    if (options.capture) {
      const stdout = options.stdout ?? process.stdout;
      const stderr = options.stderr ?? process.stderr;
      child.stdout?.setEncoding('utf8');
      child.stderr?.setEncoding('utf8');
      child.stdout?.on('data', (chunk: string) => {
        out.push(chunk);
        stdout.write(chunk);
      });
      child.stderr?.on('data', (chunk: string) => {
        err.push(chunk);
        stderr.write(chunk);
      });
    }

    child.on('error', (error) => {
      reject(new TfweaveError(ErrorCode.TERRAFORM_NOT_FOUND, `could not run ${binary}: ${error.message}`, error));
    });

    child.on('close', (code, signal) => {
      const exitCode = code ?? (signal ? 1 : 0);
      resolve(
        options.capture
          ? { exitCode, stdout: out.join(''), stderr: err.join('') }
          : { exitCode },
      );
    });
  });
}
