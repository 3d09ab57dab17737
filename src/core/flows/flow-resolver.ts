/**
 * Flow Dependency Resolver
 *
 * Walks from a target flow through its `flows` dependencies, registering
 * each flow and binding its tool requirements. Every flow is visited once;
 * a flow met again while still in progress is a dependency cycle.
 */

import type {
  FlowGraph,
  FlowUniverse,
  ResolutionContext,
  ResolvedFlow,
  ToolRegistry,
  ToolsDomain
} from '../../types/index.js';
import { CONFIG_DOMAINS, FLOW_KEYS } from '../../constants/index.js';
import {
  BackendPathNotFoundError,
  DependencyCycleError,
  FlowNotFoundError,
  MissingConfigKeyError,
  VersionConflictError
} from '../../utils/errors.js';
import { exists } from '../../utils/fs.js';
import type { VersionMatcher } from '../../utils/version-pattern.js';
import { selectAndBind } from '../tools/version-selector.js';

type VisitState = 'in-progress' | 'resolved';

export interface FlowResolverOptions {
  matcher?: VersionMatcher;
}

export interface FlowResolutionResult {
  flows: FlowGraph;
  tools: ToolRegistry;
}

/**
 * Tool bindings of a flow together with those of its whole dependency closure.
 * The nearest binding wins; the resolver guarantees they agree.
 */
export function effectiveToolVersions(graph: FlowGraph, name: string): Map<string, string> {
  const result = new Map<string, string>();
  const visited = new Set<string>();
  const pending = [name];

  while (pending.length > 0) {
    const current = pending.shift();
    if (current === undefined || visited.has(current)) continue;
    visited.add(current);

    const flow = graph.get(current);
    if (!flow) continue;

    for (const [tool, version] of flow.toolVersions) {
      if (!result.has(tool)) {
        result.set(tool, version);
      }
    }
    pending.push(...flow.dependsOn);
  }

  return result;
}

export class FlowDependencyResolver {
  readonly flows: FlowGraph = new Map();
  readonly tools: ToolRegistry = new Map();

  private readonly state = new Map<string, VisitState>();
  private readonly stack: string[] = [];

  constructor(
    private readonly universe: FlowUniverse,
    private readonly toolsDomain: ToolsDomain,
    private readonly ctx: ResolutionContext,
    private readonly options: FlowResolverOptions = {}
  ) {}

  /**
   * Resolve `name` and everything it depends on.
   */
  resolve(name: string, requestedBy?: string): void {
    if (this.state.get(name) === 'resolved') {
      return;
    }

    const definition = this.universe.get(name);
    if (!definition) {
      this.ctx.logger.error(
        `Configuration for flow '${name}' not found${requestedBy ? ` (dependency of '${requestedBy}')` : ''}`
      );
      throw new FlowNotFoundError(name, requestedBy);
    }

    if (definition.path === undefined) {
      this.ctx.logger.error(`Required configuration key '${FLOW_KEYS.PATH}' not found for the flow '${name}'`);
      throw new MissingConfigKeyError(FLOW_KEYS.PATH, CONFIG_DOMAINS.FLOWS, name);
    }

    if (!exists(definition.path)) {
      this.ctx.logger.error(`Backend path for the '${name}' flow does not exist: ${definition.path}`);
      throw new BackendPathNotFoundError(CONFIG_DOMAINS.FLOWS, name, definition.path);
    }

    const flow: ResolvedFlow = {
      name,
      backendPath: definition.path,
      toolVersions: new Map(),
      dependsOn: [...(definition.dependsOn ?? [])],
      params: { ...definition.params }
    };
    this.flows.set(name, flow);
    this.state.set(name, 'in-progress');
    this.stack.push(name);

    for (const requirement of definition.toolRequirements ?? []) {
      selectAndBind(
        {
          flow,
          toolName: requirement.tool,
          patterns: requirement.patterns,
          tools: this.toolsDomain,
          registry: this.tools,
          matcher: this.options.matcher
        },
        this.ctx
      );
    }

    for (const dependency of flow.dependsOn) {
      const dependencyState = this.state.get(dependency);
      if (dependencyState === 'resolved') {
        continue;
      }
      if (dependencyState === 'in-progress') {
        const cycle = [...this.stack.slice(this.stack.indexOf(dependency)), dependency];
        const error = new DependencyCycleError(cycle);
        this.ctx.logger.error(error.message);
        throw error;
      }
      this.resolve(dependency, name);
    }

    this.checkInheritedVersions(flow);

    this.stack.pop();
    this.state.set(name, 'resolved');
    this.ctx.logger.debug(`Resolved flow '${name}': ${flow.backendPath}`);
  }

  /**
   * A flow and its dependency closure must agree on every tool version.
   */
  private checkInheritedVersions(flow: ResolvedFlow): void {
    const inherited = new Map<string, string>();

    for (const dependency of flow.dependsOn) {
      for (const [tool, version] of effectiveToolVersions(this.flows, dependency)) {
        const earlier = inherited.get(tool);
        const boundVersion = flow.toolVersions.get(tool) ?? earlier;

        if (boundVersion !== undefined && boundVersion !== version) {
          const error = new VersionConflictError(tool, {
            flowName: flow.name,
            boundVersion,
            requestedVersion: version,
            via: dependency
          });
          this.ctx.logger.error(error.message);
          throw error;
        }

        if (earlier === undefined) {
          inherited.set(tool, version);
        }
      }
    }
  }
}

/**
 * Resolve `target` against a merged flow universe and the tools domain.
 */
export function resolveFlowGraph(
  universe: FlowUniverse,
  tools: ToolsDomain,
  target: string,
  ctx: ResolutionContext,
  options: FlowResolverOptions = {}
): FlowResolutionResult {
  const resolver = new FlowDependencyResolver(universe, tools, ctx, options);
  resolver.resolve(target);

  ctx.logger.debug(`Loaded flows: ${Array.from(resolver.flows.keys()).join(', ')}`);

  return { flows: resolver.flows, tools: resolver.tools };
}
