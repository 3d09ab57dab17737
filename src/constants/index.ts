/**
 * Shared constants for the chain build environment.
 * Single source of truth for file names, table keys and environment variables.
 */

export const CONFIG_FILES = {
  TOOLS: 'tools.toml',
  FLOWS: 'flows.toml'
} as const;

export const CONFIG_TABLES = {
  FLOW: 'flow',
  TOOL: 'tool'
} as const;

export const FLOW_KEYS = {
  PATH: 'path',
  TOOLS: 'tools',
  FLOWS: 'flows'
} as const;

export const TOOL_KEYS = {
  PATH: 'path',
  VERSIONS: 'versions'
} as const;

export const ENV_VARS = {
  CONFIG_HOME: 'CHAIN_CONFIG_HOME',
  CONFIG_DIR_NAME: 'CHAIN_CONFIG_DIR_NAME',
  XDG_CONFIG_HOME: 'XDG_CONFIG_HOME',
  HOME: 'HOME',
  VERBOSE: 'CHAIN_VERBOSE'
} as const;

export const DIR_PATTERNS = {
  DEFAULT_CONFIG_DIR_NAME: 'chain',
  USER_CONFIG: '.config',
  INSTALL_CONFIG: 'config'
} as const;

/**
 * What each configuration domain is called in diagnostics
 */
export const CONFIG_DOMAINS = {
  TOOLS: 'build tools',
  FLOWS: 'build flow'
} as const;

export const TOOL_LOCATION_SEPARATOR = ':';

export type ConfigFileName = typeof CONFIG_FILES[keyof typeof CONFIG_FILES];
export type ConfigDomain = typeof CONFIG_DOMAINS[keyof typeof CONFIG_DOMAINS];
