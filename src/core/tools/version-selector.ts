/**
 * Tool Registry & Version Selector
 *
 * Picks a concrete version of a tool for one flow requirement and records
 * it both on the flow and in the pass-wide tool registry.
 */

import type {
  ResolutionContext,
  ResolvedFlow,
  ResolvedTool,
  ToolRegistry,
  ToolsDomain,
  ToolVersion
} from '../../types/index.js';
import { CONFIG_DOMAINS, TOOL_KEYS } from '../../constants/index.js';
import {
  BackendPathNotFoundError,
  MissingConfigKeyError,
  NoSuitableVersionError,
  ToolNotFoundError,
  VersionConflictError
} from '../../utils/errors.js';
import { exists, normalizeDeclaredPath } from '../../utils/fs.js';
import { globVersionMatcher, normalizeRequirementPatterns, type VersionMatcher } from '../../utils/version-pattern.js';

export interface ToolBindingRequest {
  /** Registered flow the binding is recorded on */
  flow: ResolvedFlow;
  toolName: string;
  patterns: string | readonly string[];
  tools: ToolsDomain;
  registry: ToolRegistry;
  matcher?: VersionMatcher;
}

export interface ToolBinding {
  toolName: string;
  version: string;
  /** True when this call added the binding; false for a same-version re-bind */
  added: boolean;
}

/**
 * First match under pattern-major, version-minor iteration, in declared orders.
 */
export function selectVersion(
  patterns: readonly string[],
  availableVersions: readonly string[],
  matcher: VersionMatcher = globVersionMatcher
): string | undefined {
  return selectCandidate(patterns, availableVersions.map(id => ({ id })), matcher)?.id;
}

function selectCandidate<T extends { id: string }>(
  patterns: readonly string[],
  candidates: readonly T[],
  matcher: VersionMatcher
): T | undefined {
  for (const pattern of patterns) {
    for (const candidate of candidates) {
      if (matcher(candidate.id, pattern)) {
        return candidate;
      }
    }
  }
  return undefined;
}

/**
 * Select a version of `toolName` for `flow` and bind it.
 */
export function selectAndBind(request: ToolBindingRequest, ctx: ResolutionContext): ToolBinding {
  const { flow, toolName, tools, registry } = request;
  const patterns = normalizeRequirementPatterns(request.patterns);

  const definition = tools.tools.get(toolName);
  if (!definition) {
    ctx.logger.error(`Tool '${toolName}' required by flow '${flow.name}' not found in ${tools.documentPath}`);
    throw new ToolNotFoundError(toolName, flow.name);
  }

  if (definition.path === undefined) {
    ctx.logger.error(`Required key '${TOOL_KEYS.PATH}' not found for the tool '${toolName}'`);
    throw new MissingConfigKeyError(TOOL_KEYS.PATH, CONFIG_DOMAINS.TOOLS, toolName);
  }

  if (definition.versions.length === 0) {
    ctx.logger.error(`Required key '${TOOL_KEYS.VERSIONS}' not found (or empty) for the tool '${toolName}'`);
    throw new MissingConfigKeyError(TOOL_KEYS.VERSIONS, CONFIG_DOMAINS.TOOLS, toolName);
  }

  const selectedVersion = selectCandidate(patterns, definition.versions, request.matcher ?? globVersionMatcher);

  if (!selectedVersion) {
    const error = new NoSuitableVersionError(toolName, {
      flowName: flow.name,
      patterns,
      availableVersions: definition.versions.map(version => version.id)
    });
    ctx.logger.error(error.message);
    throw error;
  }

  const backendPath = normalizeDeclaredPath(tools.directory, definition.path);
  if (!exists(backendPath)) {
    ctx.logger.error(`Path to the handler of the tool '${toolName}' does not exist: ${backendPath}`);
    throw new BackendPathNotFoundError(CONFIG_DOMAINS.TOOLS, toolName, backendPath);
  }

  const selected = selectedVersion.id;
  const bound = flow.toolVersions.get(toolName);
  if (bound !== undefined && bound !== selected) {
    const error = new VersionConflictError(toolName, {
      flowName: flow.name,
      boundVersion: bound,
      requestedVersion: selected
    });
    ctx.logger.error(error.message);
    throw error;
  }

  flow.toolVersions.set(toolName, selected);
  recordToolVersion(registry, toolName, backendPath, selectedVersion);

  ctx.logger.debug(`Flow '${flow.name}' uses ${toolName}@${selected} (requested: ${patterns.join(', ')})`);

  return { toolName, version: selected, added: bound === undefined };
}

function recordToolVersion(
  registry: ToolRegistry,
  toolName: string,
  backendPath: string,
  version: ToolVersion
): void {
  let entry: ResolvedTool | undefined = registry.get(toolName);
  if (!entry) {
    entry = { name: toolName, backendPath, versions: new Map() };
    registry.set(toolName, entry);
  }

  if (!entry.versions.has(version.id)) {
    entry.versions.set(version.id, version.location);
  }
}
