/**
 * CLI Context Factory
 *
 * Picks the OutputPort for the current session and applies the
 * verbosity flags to the logger handed to the resolution core.
 */

import type { OutputPort } from '../core/ports/output.js';
import { consoleOutput } from '../core/ports/console-output.js';
import { LogLevel, type Logger } from '../types/index.js';
import { logger } from '../utils/logger.js';
import { createClackOutput } from './clack-output-adapter.js';

export interface CliContextOptions {
  /** Override interactive mode detection (undefined = auto-detect from TTY) */
  interactive?: boolean;
  debug?: boolean;
  quiet?: boolean;
}

export interface CliContext {
  output: OutputPort;
  logger: Logger;
}

/** Cached port for the lifetime of the CLI process. */
let cachedClackOutput: OutputPort | undefined;

/** Detect whether the current session is interactive (TTY, no CI). */
function detectInteractive(override?: boolean): boolean {
  if (override !== undefined) return override;
  const isTTY = process.stdout.isTTY === true;
  return isTTY && process.env.CI !== 'true';
}

/**
 * Interactive sessions get Clack output; CI and piped output get plain console lines.
 * `--debug` wins over `--quiet`.
 */
export function createCliContext(options: CliContextOptions = {}): CliContext {
  if (options.debug) {
    logger.setLevel(LogLevel.DEBUG);
  } else if (options.quiet) {
    logger.setLevel(LogLevel.ERROR);
  }

  let output: OutputPort = consoleOutput;
  if (detectInteractive(options.interactive)) {
    cachedClackOutput ??= createClackOutput();
    output = cachedClackOutput;
  }

  return { output, logger };
}
