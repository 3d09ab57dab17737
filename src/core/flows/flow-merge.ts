/**
 * Flow Merge Engine
 *
 * Combines the flow tables of every discovered flows document into one
 * universe. Per key, the earliest document wins: later documents only fill
 * keys a flow does not have yet. Paths are made absolute against the
 * directory of the document that declared them.
 */

import type { FlowDefinition, FlowTable, FlowUniverse, ResolutionContext } from '../../types/index.js';
import { FLOW_KEYS } from '../../constants/index.js';
import { normalizeDeclaredPath } from '../../utils/fs.js';

function copyFlow(flow: FlowDefinition, directory: string): FlowDefinition {
  const copy: FlowDefinition = {
    name: flow.name,
    params: { ...flow.params },
    sources: []
  };
  if (flow.path !== undefined) {
    copy.path = normalizeDeclaredPath(directory, flow.path);
  }
  if (flow.toolRequirements !== undefined) {
    copy.toolRequirements = flow.toolRequirements.map(req => ({ tool: req.tool, patterns: [...req.patterns] }));
  }
  if (flow.dependsOn !== undefined) {
    copy.dependsOn = [...flow.dependsOn];
  }
  return copy;
}

/**
 * Fill the keys `existing` lacks from `incoming`. Returns the keys copied.
 */
function fillMissingKeys(existing: FlowDefinition, incoming: FlowDefinition, directory: string): string[] {
  const filled: string[] = [];

  if (existing.path === undefined && incoming.path !== undefined) {
    existing.path = normalizeDeclaredPath(directory, incoming.path);
    filled.push(FLOW_KEYS.PATH);
  }
  if (existing.toolRequirements === undefined && incoming.toolRequirements !== undefined) {
    existing.toolRequirements = incoming.toolRequirements.map(req => ({ tool: req.tool, patterns: [...req.patterns] }));
    filled.push(FLOW_KEYS.TOOLS);
  }
  if (existing.dependsOn === undefined && incoming.dependsOn !== undefined) {
    existing.dependsOn = [...incoming.dependsOn];
    filled.push(FLOW_KEYS.FLOWS);
  }
  for (const [key, value] of Object.entries(incoming.params)) {
    if (!Object.prototype.hasOwnProperty.call(existing.params, key)) {
      existing.params[key] = value;
      filled.push(key);
    }
  }

  return filled;
}

/**
 * Merge flow tables given in discovery order.
 */
export function mergeFlowTables(tables: readonly FlowTable[], ctx: ResolutionContext): FlowUniverse {
  const universe: FlowUniverse = new Map();

  for (const table of tables) {
    for (const [name, flow] of table.flows) {
      const existing = universe.get(name);

      if (!existing) {
        const merged = copyFlow(flow, table.directory);
        merged.sources.push(table.documentPath);
        universe.set(name, merged);
        continue;
      }

      const filled = fillMissingKeys(existing, flow, table.directory);
      if (filled.length > 0) {
        existing.sources.push(table.documentPath);
        ctx.logger.debug(`Flow '${name}': keys ${filled.join(', ')} taken from ${table.documentPath}`);
      } else {
        ctx.logger.debug(`Flow '${name}': nothing new in ${table.documentPath}`);
      }
    }
  }

  return universe;
}
