import { realpathSync } from 'node:fs';

import { Command } from 'commander';

import { registerCleanCommand } from './commands/clean.js';
import { registerMirrorCommand } from './commands/mirror.js';
import { registerRenderCommand } from './commands/render.js';
import { runWorkflow } from './core/workflow.js';
import { loadConfig } from './utils/config.js';
import { createCLIContext } from './utils/context.js';
import { getCliVersion } from './utils/version.js';

import type { CLIContextOptions } from './utils/context.js';

const OWN_COMMANDS = new Set(['render', 'clean', 'mirror', 'help']);
const OWN_FLAGS = new Set(['--version', '--help', '-h']);
const VERBOSE_FLAGS = new Set(['-v', '--verbose']);

export function buildProgram(createCtx = createCLIContext): Command {
  const program = new Command();

  program
    .name('tfweave')
    .description('Render Terraform JSON from TypeScript definition sources, then run Terraform')
    .version(getCliVersion())
    .option('-v, --verbose', 'Enable verbose logging', false);

  registerRenderCommand(program, createCtx);
  registerCleanCommand(program, createCtx);
  registerMirrorCommand(program, createCtx);

  program.showHelpAfterError();
  program.showSuggestionAfterError();
  return program;
}

/** True when the arguments name one of tfweave's own commands rather than a Terraform one. */
export function isOwnInvocation(args: readonly string[]): boolean {
  const first = args.find((arg) => !VERBOSE_FLAGS.has(arg));
  if (first === undefined) return true;
  return OWN_COMMANDS.has(first) || OWN_FLAGS.has(first);
}

function selfPaths(entry: string | undefined): string[] {
  if (!entry) return [];
  try {
    return [realpathSync(entry)];
  } catch {
    return [];
  }
}

/** Run Terraform through the workflow with tfweave's own flags removed. */
export async function runTerraformCommand(
  args: readonly string[],
  ctxOptions: CLIContextOptions = {},
  entry: string | undefined = process.argv[1],
): Promise<number> {
  const verbose = args.some((arg) => VERBOSE_FLAGS.has(arg));
  const ctx = createCLIContext({ ...ctxOptions, verbose: ctxOptions.verbose ?? verbose });
  try {
    const config = await loadConfig(ctx.cwd, ctx.env);
    return await runWorkflow({
      argv: args.filter((arg) => !VERBOSE_FLAGS.has(arg)),
      cwd: ctx.cwd,
      env: ctx.env,
      config,
      logger: ctx.logger,
      selfPaths: selfPaths(entry),
    });
  } catch (error) {
    const msg = error instanceof Error ? error.message : String(error);
    ctx.logger.error(msg);
    return 1;
  }
}

export async function main(argv: string[]): Promise<number> {
  const args = argv.slice(2);
  if (!isOwnInvocation(args)) {
    return runTerraformCommand(args);
  }
  const program = buildProgram();
  if (args.length === 0) {
    program.outputHelp();
    return 0;
  }
  await program.parseAsync(argv);
  return typeof process.exitCode === 'number' ? process.exitCode : 0;
}
