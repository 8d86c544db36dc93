#!/usr/bin/env node

/**
 * Entry point for the `xi` command.
 */

import { executeCommand } from './cli.js';

/**
 * Runs the CLI and writes the result. Failures go to stderr.
 *
 * @param args - Command line arguments.
 * @returns Exit code.
 */
async function main(args: readonly string[]): Promise<number> {
  const result = await executeCommand(args);

  if (result.success) {
    process.stdout.write(result.message + '\n');
  } else {
    process.stderr.write(result.message + '\n');
  }

  return result.exitCode;
}

main(process.argv.slice(2))
  .then((exitCode) => {
    process.exitCode = exitCode;
  })
  .catch((error: unknown) => {
    const errorMessage = error instanceof Error ? error.message : String(error);
    process.stderr.write(`Fatal error: ${errorMessage}\n`);
    process.exitCode = 1;
  });
