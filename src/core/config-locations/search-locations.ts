/**
 * Standard search order for configuration files.
 *
 * Searching is performed in the following order:
 *
 *   - file given explicitly (`--flows-config`, `--tools-config`);
 *   - project root (usually the current working directory of a build);
 *   - config home given on the command line (`--config-home`);
 *   - `$CHAIN_CONFIG_HOME`;
 *   - `$XDG_CONFIG_HOME/<dir>`;
 *   - `~/.config/<dir>`;
 *   - the `config` directory of the installation.
 *
 * `<dir>` is `$CHAIN_CONFIG_DIR_NAME`, or `chain` when unset.
 */

import { join } from 'path';
import type { SearchLocation } from '../../types/index.js';
import { DIR_PATTERNS, ENV_VARS } from '../../constants/index.js';
import { getInstallRoot } from '../../utils/fs.js';

export interface ConfigSearchOptions {
  /** Path of the file itself; a wrong value is a user error */
  explicitFile?: string;
  projectRoot?: string;
  configHome?: string;
  /** Last fallback; defaults to `<install root>/config` */
  defaultConfigDir?: string;
  /** Base for relative command-line values; defaults to process.cwd() */
  cwd?: string;
  /** Defaults to process.env */
  env?: NodeJS.ProcessEnv;
}

export function getDefaultConfigDir(): string {
  return join(getInstallRoot(), DIR_PATTERNS.INSTALL_CONFIG);
}

export function buildSearchLocations(options: ConfigSearchOptions = {}): SearchLocation[] {
  const env = options.env ?? process.env;
  const cwd = options.cwd ?? process.cwd();
  const configDirName = env[ENV_VARS.CONFIG_DIR_NAME] || DIR_PATTERNS.DEFAULT_CONFIG_DIR_NAME;

  return [
    {
      kind: 'explicit-value',
      name: 'command-line argument',
      rawValue: options.explicitFile,
      isDirectory: false,
      pathPrefix: cwd,
      mustExist: true
    },
    {
      kind: 'explicit-value',
      name: 'project root',
      rawValue: options.projectRoot,
      isDirectory: true,
      pathPrefix: cwd,
      mustExist: false
    },
    {
      kind: 'explicit-value',
      name: 'config home',
      rawValue: options.configHome,
      isDirectory: true,
      pathPrefix: cwd,
      mustExist: true
    },
    {
      kind: 'environment-variable',
      name: `$${ENV_VARS.CONFIG_HOME}`,
      rawValue: env[ENV_VARS.CONFIG_HOME],
      isDirectory: true,
      mustExist: false
    },
    {
      kind: 'environment-variable',
      name: `$${ENV_VARS.XDG_CONFIG_HOME}/${configDirName}`,
      rawValue: env[ENV_VARS.XDG_CONFIG_HOME],
      isDirectory: true,
      subdirectory: configDirName,
      mustExist: false
    },
    {
      kind: 'environment-variable',
      name: `$${ENV_VARS.HOME}/${DIR_PATTERNS.USER_CONFIG}/${configDirName}`,
      rawValue: env[ENV_VARS.HOME],
      isDirectory: true,
      subdirectory: join(DIR_PATTERNS.USER_CONFIG, configDirName),
      mustExist: false
    },
    {
      kind: 'fixed-path',
      name: 'default path',
      rawValue: options.defaultConfigDir ?? getDefaultConfigDir(),
      isDirectory: true,
      mustExist: false
    }
  ];
}
