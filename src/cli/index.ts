#!/usr/bin/env node

/**
 * phasegate CLI entry point.
 */

import { main } from './cli.js';

main(process.argv.slice(2))
  .then((exitCode) => {
    process.exitCode = exitCode;
  })
  .catch((error: unknown) => {
    const errorMessage = error instanceof Error ? error.message : String(error);
    process.stderr.write(`Fatal error: ${errorMessage}\n`);
    process.exitCode = 1;
  });
