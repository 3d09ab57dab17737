/**
 * Clack Output Adapter
 *
 * CLI-specific OutputPort implementation that routes to @clack/prompts
 * for rich interactive terminal UI.
 */

import { log } from '@clack/prompts';
import type { OutputPort } from '../core/ports/output.js';

/**
 * Create a Clack-based OutputPort for interactive terminal sessions.
 */
export function createClackOutput(): OutputPort {
  return {
    info(message: string): void {
      log.info(message);
    },

    message(message: string): void {
      log.message(message);
    },

    success(message: string): void {
      log.success(message);
    },

    error(message: string): void {
      log.error(message);
    }
  };
}
