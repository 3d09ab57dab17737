/**
 * Console Output Adapter (Default/CI)
 *
 * Plain console.log-based implementation of OutputPort.
 * Used as the default fallback when no interactive UI is available.
 */

import type { OutputPort } from './output.js';

export const consoleOutput: OutputPort = {
  info(message: string): void {
    console.log(message);
  },

  message(message: string): void {
    console.log(message);
  },

  success(message: string): void {
    console.log(`✓ ${message}`);
  },

  error(message: string): void {
    console.error(`✗ ${message}`);
  }
};
