import type { Logger } from './index.js';
import type { ToolLocation } from './config.js';

/**
 * Diagnostics and collaborators handed to every resolution call.
 */
export interface ResolutionContext {
  logger: Logger;
}

export interface ResolvedFlow {
  name: string;
  /** Absolute and existence-checked */
  backendPath: string;
  /** tool name -> chosen version id, bound once per tool */
  toolVersions: Map<string, string>;
  dependsOn: string[];
  params: Record<string, unknown>;
}

export interface ResolvedTool {
  name: string;
  backendPath: string;
  /** Every version bound by some flow in this pass */
  versions: Map<string, ToolLocation>;
}

/** Resolved flows in registration order */
export type FlowGraph = Map<string, ResolvedFlow>;

export type ToolRegistry = Map<string, ResolvedTool>;

export interface ResolvedEnvironment {
  targetFlow: string;
  flows: FlowGraph;
  tools: ToolRegistry;
  sources: {
    tools: string;
    flows: string[];
  };
}
