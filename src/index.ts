#!/usr/bin/env node
import { main } from './cli.js';

// Always execute when invoked as CLI entry
main(process.argv).then(
  (code) => {
    process.exitCode = code;
  },
  (error: unknown) => {
    console.error(error instanceof Error ? error.message : String(error));
    process.exitCode = 1;
  },
);
