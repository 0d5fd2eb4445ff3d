#!/usr/bin/env node

/**
 * jwt-session-kit CLI entry point
 */

import { createProgram } from './program';

const program = createProgram();

if (!process.argv.slice(2).length) {
  program.outputHelp();
} else {
  program.parseAsync(process.argv).catch((err: unknown) => {
    console.error(err instanceof Error ? err.message : String(err));
    process.exitCode = 1;
  });
}
