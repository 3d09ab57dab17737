/**
 * Build environment resolution.
 *
 * Locates and loads the tools and flows configuration domains, merges every
 * flows document, then resolves the target flow and its dependencies.
 * Loading finishes completely before resolution starts, so a flow declared
 * in any discovered document can satisfy any dependency.
 */

import type {
  FlowTable,
  FlowUniverse,
  LocationMatch,
  Logger,
  ResolutionContext,
  ResolvedEnvironment,
  ToolsDomain
} from '../types/index.js';
import { CONFIG_DOMAINS, CONFIG_FILES, CONFIG_TABLES } from '../constants/index.js';
import { ConfigFileNotFoundError, EmptyConfigDataError } from '../utils/errors.js';
import { logger as defaultLogger } from '../utils/logger.js';
import type { VersionMatcher } from '../utils/version-pattern.js';
import { LocationChain } from './config-locations/location-chain.js';
import { buildSearchLocations } from './config-locations/search-locations.js';
import { createDocumentLoader, type DocumentLoader } from './documents/document-loader.js';
import { parseFlowTable, parseToolTable } from './documents/config-validation.js';
import { mergeFlowTables } from './flows/flow-merge.js';
import { resolveFlowGraph } from './flows/flow-resolver.js';

export interface LocateOptions {
  /** `--flows-config` */
  flowsConfig?: string;
  /** `--tools-config` */
  toolsConfig?: string;
  projectRoot?: string;
  configHome?: string;
  defaultConfigDir?: string;
  /** Use only the first flows document found instead of all of them */
  singleFlowsFile?: boolean;
  cwd?: string;
  env?: NodeJS.ProcessEnv;
}

export interface EnvironmentOptions extends LocateOptions {
  targetFlow: string;
  logger?: Logger;
  loader?: DocumentLoader;
  matcher?: VersionMatcher;
}

export type ConfigDomainKey = 'tools' | 'flows';

interface DomainDescriptor {
  forWhat: string;
  fileName: string;
}

const DOMAINS: Record<ConfigDomainKey, DomainDescriptor> = {
  tools: { forWhat: CONFIG_DOMAINS.TOOLS, fileName: CONFIG_FILES.TOOLS },
  flows: { forWhat: CONFIG_DOMAINS.FLOWS, fileName: CONFIG_FILES.FLOWS }
};

/**
 * Find the configuration files of one domain. Fails when there are none.
 */
export function locateConfigFiles(
  domain: ConfigDomainKey,
  options: LocateOptions,
  ctx: ResolutionContext
): LocationMatch[] {
  const descriptor = DOMAINS[domain];
  const locations = buildSearchLocations({
    explicitFile: domain === 'tools' ? options.toolsConfig : options.flowsConfig,
    projectRoot: options.projectRoot,
    configHome: options.configHome,
    defaultConfigDir: options.defaultConfigDir,
    cwd: options.cwd,
    env: options.env
  });

  const stopOnFirst = domain === 'tools' || options.singleFlowsFile === true;
  const chain = new LocationChain(descriptor.fileName, locations, { stopOnFirst }, ctx);
  const matches = chain.resolveMatches();

  if (matches.length === 0) {
    const error = new ConfigFileNotFoundError(
      descriptor.forWhat,
      descriptor.fileName,
      locations.filter(location => location.rawValue).map(location => location.name)
    );
    ctx.logger.error(error.message);
    throw error;
  }

  for (const match of matches) {
    ctx.logger.debug(`Configuration for ${descriptor.forWhat} is used from ${match.location.name}: '${match.path}'`);
  }

  return matches;
}

export function loadToolsDomain(path: string, loader: DocumentLoader, ctx: ResolutionContext): ToolsDomain {
  const document = loader.load(path);
  const domain = parseToolTable(document, ctx);

  if (!domain) {
    const error = new EmptyConfigDataError(CONFIG_DOMAINS.TOOLS, [document.path]);
    ctx.logger.error(`No '${CONFIG_TABLES.TOOL}' table in the configuration file: ${document.path}`);
    throw error;
  }

  return domain;
}

export function loadFlowUniverse(paths: readonly string[], loader: DocumentLoader, ctx: ResolutionContext): FlowUniverse {
  const tables: FlowTable[] = [];

  for (const path of paths) {
    const table = parseFlowTable(loader.load(path), ctx);
    if (table) {
      tables.push(table);
    }
  }

  const universe = mergeFlowTables(tables, ctx);

  if (universe.size === 0) {
    ctx.logger.error('No flows were found in configuration files');
    throw new EmptyConfigDataError(CONFIG_DOMAINS.FLOWS, [...paths]);
  }

  return universe;
}

/**
 * Full pass: locate, load, merge, resolve.
 */
export function resolveEnvironment(options: EnvironmentOptions): ResolvedEnvironment {
  const ctx: ResolutionContext = { logger: options.logger ?? defaultLogger };
  const loader = options.loader ?? createDocumentLoader(ctx);

  const [toolsMatch] = locateConfigFiles('tools', options, ctx);
  const tools = loadToolsDomain(toolsMatch.path, loader, ctx);

  const flowPaths = locateConfigFiles('flows', options, ctx).map(match => match.path);
  const universe = loadFlowUniverse(flowPaths, loader, ctx);

  const resolved = resolveFlowGraph(universe, tools, options.targetFlow, ctx, { matcher: options.matcher });

  return {
    targetFlow: options.targetFlow,
    flows: resolved.flows,
    tools: resolved.tools,
    sources: {
      tools: tools.documentPath,
      flows: flowPaths
    }
  };
}
