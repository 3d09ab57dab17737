/**
 * @fileoverview Command setup for 'chain resolve'
 *
 * Resolves a flow, its dependency flows and the tool versions they bind.
 */

import { Command } from 'commander';
import type { CommandResult } from '../types/index.js';
import { resolveEnvironment, type LocateOptions } from '../core/environment.js';
import { displayEnvironment, serializeEnvironment, type SerializedEnvironment } from '../core/display.js';
import { createCliContext, type CliContext } from '../cli/context.js';
import { handleError, withErrorHandling } from '../utils/errors.js';
import { addConfigLocationOptions, globalLocateOptions, toLocateOptions, type ConfigLocationCliOptions } from './config-options.js';

export interface ResolveCommandOptions extends ConfigLocationCliOptions {
  json?: boolean;
}

export function resolveCommand(
  flowName: string,
  options: ResolveCommandOptions,
  cli: CliContext,
  base: LocateOptions = {}
): CommandResult<SerializedEnvironment> {
  try {
    const environment = resolveEnvironment({
      ...toLocateOptions(options, base),
      targetFlow: flowName,
      logger: cli.logger
    });
    const data = serializeEnvironment(environment);

    if (options.json) {
      cli.output.message(JSON.stringify(data, null, 2));
    } else if (options.quiet) {
      cli.output.message(Array.from(environment.flows.keys()).join('\n'));
    } else {
      displayEnvironment(environment, cli.output);
    }

    return { success: true, data };
  } catch (error) {
    const result = handleError<SerializedEnvironment>(error);
    cli.output.error(result.error ?? 'Flow resolution failed');
    return result;
  }
}

/**
 * Setup the 'chain resolve' command
 */
export function setupResolveCommand(program: Command): void {
  addConfigLocationOptions(
    program
      .command('resolve')
      .argument('<flow>', 'name of the flow to resolve')
      .description('Resolve a flow, its dependencies and their tool versions')
  )
    .option('--json', 'print the resolved environment as JSON')
    .action(
      withErrorHandling(async (flowName: string, options: ResolveCommandOptions, command: Command) => {
        const cli = createCliContext({ debug: options.debug, quiet: options.quiet });
        const result = resolveCommand(flowName, options, cli, globalLocateOptions(command));
        if (!result.success) {
          process.exit(1);
        }
      })
    );
}
