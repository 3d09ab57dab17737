/**
 * Location options shared by every command that reads configuration.
 */

import { Command } from 'commander';
import * as path from 'path';
import type { LocateOptions } from '../core/environment.js';

export interface ConfigLocationCliOptions {
  flowsConfig?: string;
  toolsConfig?: string;
  projectRoot?: string;
  configHome?: string;
  singleFlowsFile?: boolean;
  debug?: boolean;
  quiet?: boolean;
}

export function addConfigLocationOptions(command: Command): Command {
  return command
    .option('--flows-config <file>', 'flows configuration file (searched locations are used too)')
    .option('--tools-config <file>', 'tools configuration file')
    .option('-p, --project-root <dir>', 'project root to search for configuration files')
    .option('--config-home <dir>', 'directory with configuration files')
    .option('--single-flows-file', 'use only the first flows file found instead of merging all of them')
    .option('-d, --debug', 'print debug diagnostics')
    .option('-q, --quiet', 'print only results and errors');
}

/**
 * Command-line options mapped onto locate options.
 * `base` carries what the command line cannot set (environment, working directory).
 */
export function toLocateOptions(options: ConfigLocationCliOptions, base: LocateOptions = {}): LocateOptions {
  return {
    ...base,
    flowsConfig: options.flowsConfig,
    toolsConfig: options.toolsConfig,
    projectRoot: options.projectRoot,
    configHome: options.configHome,
    singleFlowsFile: options.singleFlowsFile
  };
}

/**
 * Locate options from the program-wide flags (`--cwd`).
 */
export function globalLocateOptions(command: Command): LocateOptions {
  const { cwd } = command.optsWithGlobals<{ cwd?: string }>();
  return cwd ? { cwd: path.resolve(process.cwd(), cwd) } : {};
}
