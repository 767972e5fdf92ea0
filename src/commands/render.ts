import path from 'node:path';

import { createFiles } from '../core/renderer.js';
import { loadConfig } from '../utils/config.js';

import type { CLIContext } from '../utils/context.js';
import type { Command } from 'commander';

interface RenderFlags {
  out?: string;
  dryRun?: boolean;
}

export function registerRenderCommand(
  program: Command,
  createCtx: (opts: { verbose?: boolean }) => CLIContext,
): void {
  program
    .command('render')
    .argument('[dirs...]', 'Directories holding *.tf.ts and *.tfvars.ts sources')
    .option('--out <dir>', 'Directory to write the JSON files to')
    .option('--dry-run', 'Render without writing anything', false)
    .description('Render definition sources into *.tf.json and *.tfvars.json files')
    .action(async (dirs: string[], flags: RenderFlags) => {
      const opts = program.opts<{ verbose?: boolean }>();
      const ctx = createCtx({ verbose: opts.verbose });

      try {
        const config = await loadConfig(ctx.cwd, ctx.env);
        const result = await createFiles({
          cwd: ctx.cwd,
          sourceDirs: dirs.length > 0 ? dirs : config.sourceDirs,
          outputDir: flags.out,
          env: ctx.env,
          indent: config.indent,
          dryRun: flags.dryRun,
          logger: ctx.logger,
        });
        if (flags.dryRun) {
          for (const artifact of result.artifacts) {
            ctx.logger.info(path.relative(ctx.cwd, artifact.file) || artifact.file);
          }
        }
        ctx.logger.debug(`rendered ${result.artifacts.length} file(s)`);
      } catch (error) {
        const msg = error instanceof Error ? error.message : String(error);
        ctx.logger.error(msg);
        process.exitCode = 1;
      }
    });
}
