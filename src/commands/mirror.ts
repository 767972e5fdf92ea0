import { mirrorFiles } from '../core/workflow.js';

import type { CLIContext } from '../utils/context.js';
import type { Command } from 'commander';

export function registerMirrorCommand(
  program: Command,
  createCtx: (opts: { verbose?: boolean }) => CLIContext,
): void {
  program
    .command('mirror')
    .argument('<patterns...>', 'Files or directories to link into the working directory')
    .option('--exclude <pattern...>', 'Name patterns to skip (default: .* _*)')
    .description('Replace the symlinks in the working directory with links to the matches')
    .action(async (patterns: string[], flags: { exclude?: string[] }) => {
      const opts = program.opts<{ verbose?: boolean }>();
      const ctx = createCtx({ verbose: opts.verbose });

      try {
        const created = await mirrorFiles({
          patterns,
          exclude: flags.exclude,
          cwd: ctx.cwd,
          logger: ctx.logger,
        });
        for (const link of created) ctx.logger.debug(`link: ${link}`);
      } catch (error) {
        const msg = error instanceof Error ? error.message : String(error);
        ctx.logger.error(msg);
        process.exitCode = 1;
      }
    });
}
