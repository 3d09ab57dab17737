#!/usr/bin/env node

import { Command } from 'commander';
import * as path from 'path';
import { realpathSync } from 'fs';
import { fileURLToPath } from 'url';
import { logger } from './utils/logger.js';
import { getVersion, isDirectory } from './utils/fs.js';

// Import command setup functions
import { setupResolveCommand } from './commands/resolve.js';
import { setupLocateCommand } from './commands/locate.js';

/**
 * chain CLI - Main entry point
 *
 * Resolves build flows, their dependencies and the tool versions they use.
 */

// Create the main program
const program = new Command();

// Configure the main program
program
  .name('chain')
  .description('Resolve build flows and their tool versions from layered configuration')
  .version(getVersion())
  .option('--cwd <dir>', 'directory relative configuration paths are resolved against')
  .configureHelp({ sortSubcommands: true });

setupResolveCommand(program);
setupLocateCommand(program);

program.hook('preAction', () => {
  const opts = program.opts<{ cwd?: string }>();

  if (opts.cwd) {
    const resolvedCwd = path.resolve(process.cwd(), opts.cwd);
    if (!isDirectory(resolvedCwd)) {
      logger.error('Invalid --cwd provided', { cwd: opts.cwd });
      console.error(`❌ Invalid --cwd '${opts.cwd}': not a directory`);
      process.exit(1);
    }
    logger.debug(`Working directory will be: ${resolvedCwd}`);
  } else {
    logger.debug(`Working directory: ${process.cwd()}`);
  }
});

// === GLOBAL ERROR HANDLING ===

process.on('uncaughtException', (error) => {
  logger.error('Uncaught exception occurred', { error: error.message, stack: error.stack });
  console.error('❌ An unexpected error occurred. Run with CHAIN_VERBOSE=1 for details.');
  process.exit(1);
});

process.on('unhandledRejection', (reason) => {
  logger.error('Unhandled promise rejection', { reason });
  console.error('❌ An unexpected error occurred. Run with CHAIN_VERBOSE=1 for details.');
  process.exit(1);
});

/**
 * Main execution function
 */
export async function run(argv: string[] = process.argv): Promise<void> {
  try {
    // Just 'chain': show help and exit successfully
    if (argv.length <= 2) {
      program.outputHelp();
      process.exit(0);
    }

    await program.parseAsync(argv);
  } catch (error) {
    logger.error('CLI execution failed', { error });
    console.error('❌ Command execution failed. Use --help for usage information.');
    process.exit(1);
  }
}

/**
 * True when this file is the process entry point, also through the `chain` bin link
 */
function isMainModule(): boolean {
  const entry = process.argv[1];
  if (!entry) return false;
  try {
    return realpathSync(entry) === fileURLToPath(import.meta.url);
  } catch {
    return false;
  }
}

// Only run main if this file is executed directly
if (isMainModule()) {
  run().catch((error: unknown) => {
    logger.error('Fatal error in main execution', { error });
    console.error('❌ Fatal error occurred. Exiting.');
    process.exit(1);
  });
}

// Export the program for testing purposes
export { program };
