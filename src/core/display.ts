/**
 * Display utilities for a resolved build environment.
 */

import type { ResolvedEnvironment } from '../types/index.js';
import type { OutputPort } from './ports/output.js';
import { resolveOutput } from './ports/resolve.js';
import { formatToolLocation } from './tools/tool-location.js';

export interface SerializedEnvironment {
  targetFlow: string;
  flows: Record<string, {
    backendPath: string;
    tools: Record<string, string>;
    flows: string[];
    params: Record<string, unknown>;
  }>;
  tools: Record<string, {
    backendPath: string;
    versions: Record<string, string>;
  }>;
  sources: {
    tools: string;
    flows: string[];
  };
}

function branch(items: string[]): string[] {
  return items.map((item, index) => `${index === items.length - 1 ? '└──' : '├──'} ${item}`);
}

/**
 * Tree lines: every flow with its tool versions and dependencies, then every tool.
 */
export function formatEnvironmentTree(environment: ResolvedEnvironment): string[] {
  const lines: string[] = [];

  for (const flow of environment.flows.values()) {
    const marker = flow.name === environment.targetFlow ? ' (target)' : '';
    lines.push(`${flow.name}${marker} -> ${flow.backendPath}`);
    lines.push(...branch([
      ...Array.from(flow.toolVersions, ([tool, version]) => `${tool}@${version}`),
      ...flow.dependsOn.map(dependency => `flow ${dependency}`)
    ]));
  }

  if (environment.tools.size > 0) {
    lines.push('');
    lines.push('Tools:');
    for (const tool of environment.tools.values()) {
      lines.push(`${tool.name} -> ${tool.backendPath}`);
      lines.push(...branch(
        Array.from(tool.versions, ([version, location]) => `${version}: ${formatToolLocation(location)}`)
      ));
    }
  }

  return lines;
}

/**
 * Plain JSON-friendly form (Maps become objects)
 */
export function serializeEnvironment(environment: ResolvedEnvironment): SerializedEnvironment {
  const flows: SerializedEnvironment['flows'] = {};
  for (const flow of environment.flows.values()) {
    flows[flow.name] = {
      backendPath: flow.backendPath,
      tools: Object.fromEntries(flow.toolVersions),
      flows: [...flow.dependsOn],
      params: { ...flow.params }
    };
  }

  const tools: SerializedEnvironment['tools'] = {};
  for (const tool of environment.tools.values()) {
    tools[tool.name] = {
      backendPath: tool.backendPath,
      versions: Object.fromEntries(
        Array.from(tool.versions, ([version, location]) => [version, formatToolLocation(location)])
      )
    };
  }

  return {
    targetFlow: environment.targetFlow,
    flows,
    tools,
    sources: {
      tools: environment.sources.tools,
      flows: [...environment.sources.flows]
    }
  };
}

/**
 * Print the resolved environment through an output port
 */
export function displayEnvironment(environment: ResolvedEnvironment, output?: OutputPort): void {
  const out = resolveOutput({ output });

  out.info(`Resolved flow '${environment.targetFlow}' (${environment.flows.size} flows, ${environment.tools.size} tools)`);
  out.message(formatEnvironmentTree(environment).join('\n'));
}
