/**
 * Port Resolution Helpers
 *
 * Resolves the OutputPort from a context, falling back to plain console
 * output when none was provided.
 */

import type { OutputPort } from './output.js';
import { consoleOutput } from './console-output.js';

export function resolveOutput(ctx?: { output?: OutputPort }): OutputPort {
  return ctx?.output ?? consoleOutput;
}
