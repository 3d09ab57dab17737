/**
 * @fileoverview Command setup for 'chain locate'
 *
 * Shows which configuration files each domain would use, and why.
 */

import { Command } from 'commander';
import type { CommandResult } from '../types/index.js';
import { locateConfigFiles, type ConfigDomainKey, type LocateOptions } from '../core/environment.js';
import { createCliContext, type CliContext } from '../cli/context.js';
import { handleError, withErrorHandling } from '../utils/errors.js';
import { addConfigLocationOptions, globalLocateOptions, toLocateOptions, type ConfigLocationCliOptions } from './config-options.js';

export interface LocatedFile {
  domain: ConfigDomainKey;
  path: string;
  location: string;
}

const DOMAIN_ORDER: ConfigDomainKey[] = ['tools', 'flows'];

export function locateCommand(
  options: ConfigLocationCliOptions,
  cli: CliContext,
  base: LocateOptions = {}
): CommandResult<LocatedFile[]> {
  try {
    const locateOptions = toLocateOptions(options, base);
    const ctx = { logger: cli.logger };
    const files: LocatedFile[] = [];

    for (const domain of DOMAIN_ORDER) {
      for (const match of locateConfigFiles(domain, locateOptions, ctx)) {
        files.push({ domain, path: match.path, location: match.location.name });
      }
    }

    for (const file of files) {
      cli.output.message(`${file.domain}: ${file.path} (${file.location})`);
    }
    if (!options.quiet) {
      cli.output.success(`${files.length} configuration ${files.length === 1 ? 'file' : 'files'} found`);
    }

    return { success: true, data: files };
  } catch (error) {
    const result = handleError<LocatedFile[]>(error);
    cli.output.error(result.error ?? 'Locating configuration failed');
    return result;
  }
}

/**
 * Setup the 'chain locate' command
 */
export function setupLocateCommand(program: Command): void {
  addConfigLocationOptions(
    program
      .command('locate')
      .description('Show the configuration files in use and where they were found')
  ).action(
    withErrorHandling(async (options: ConfigLocationCliOptions, command: Command) => {
      const cli = createCliContext({ debug: options.debug, quiet: options.quiet });
      const result = locateCommand(options, cli, globalLocateOptions(command));
      if (!result.success) {
        process.exit(1);
      }
    })
  );
}
