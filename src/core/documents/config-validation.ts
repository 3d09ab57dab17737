/**
 * Validation pass run right after a document is loaded.
 *
 * Turns the opaque `flow` and `tool` tables into typed records. Shape
 * problems are collected and reported together; required keys that are
 * merely absent are left for the resolver, which knows whether they matter.
 */

import type {
  ConfigDocument,
  FlowDefinition,
  FlowTable,
  ResolutionContext,
  ToolDefinition,
  ToolRequirement,
  ToolsDomain,
  ToolVersion
} from '../../types/index.js';
import { CONFIG_TABLES, FLOW_KEYS, TOOL_KEYS } from '../../constants/index.js';
import { ConfigValidationError } from '../../utils/errors.js';
import { decodeToolLocation } from '../tools/tool-location.js';
import { isNestedMapping } from './document-loader.js';

// Objects enumerate integer-like keys first, in ascending order.
const INTEGER_LIKE_KEY = /^(0|[1-9]\d*)$/;

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every(item => typeof item === 'string');
}

function fail(document: ConfigDocument, problems: string[], ctx: ResolutionContext): never {
  const error = new ConfigValidationError(document.path, problems);
  ctx.logger.error(error.message);
  throw error;
}

/**
 * Validate a flow entry's `tools` value: tool name -> pattern or non-empty pattern list.
 */
function parseToolRequirements(
  flowName: string,
  value: unknown,
  problems: string[]
): ToolRequirement[] | undefined {
  if (!isNestedMapping(value)) {
    problems.push(`flow '${flowName}': '${FLOW_KEYS.TOOLS}' must be a table of tool requirements`);
    return undefined;
  }

  const requirements: ToolRequirement[] = [];
  for (const [tool, requirement] of Object.entries(value)) {
    if (typeof requirement === 'string') {
      requirements.push({ tool, patterns: [requirement] });
    } else if (isStringArray(requirement) && requirement.length > 0) {
      requirements.push({ tool, patterns: [...requirement] });
    } else {
      problems.push(`flow '${flowName}', tool '${tool}': requirement must be a pattern or a non-empty list of patterns`);
    }
  }
  return requirements;
}

function parseFlowEntry(name: string, value: unknown, problems: string[]): FlowDefinition | undefined {
  if (!isNestedMapping(value)) {
    problems.push(`flow '${name}': entry must be a table`);
    return undefined;
  }

  const flow: FlowDefinition = { name, params: {}, sources: [] };

  for (const [key, field] of Object.entries(value)) {
    switch (key) {
      case FLOW_KEYS.PATH:
        if (typeof field === 'string' && field.trim() !== '') {
          flow.path = field;
        } else {
          problems.push(`flow '${name}': '${FLOW_KEYS.PATH}' must be a non-empty string`);
        }
        break;
      case FLOW_KEYS.TOOLS:
        flow.toolRequirements = parseToolRequirements(name, field, problems);
        break;
      case FLOW_KEYS.FLOWS:
        if (isStringArray(field)) {
          flow.dependsOn = [...field];
        } else {
          problems.push(`flow '${name}': '${FLOW_KEYS.FLOWS}' must be a list of flow names`);
        }
        break;
      default:
        flow.params[key] = field;
    }
  }

  return flow;
}

/**
 * Read the `flow` table of a document. Returns undefined when the document
 * has none. Paths are left as declared; the merge engine normalizes them.
 */
export function parseFlowTable(document: ConfigDocument, ctx: ResolutionContext): FlowTable | undefined {
  const table = document.content[CONFIG_TABLES.FLOW];
  if (table === undefined) {
    ctx.logger.debug(`No '${CONFIG_TABLES.FLOW}' table in ${document.path}, skipping`);
    return undefined;
  }

  if (!isNestedMapping(table)) {
    fail(document, [`'${CONFIG_TABLES.FLOW}' must be a table of flows`], ctx);
  }

  const problems: string[] = [];
  const flows = new Map<string, FlowDefinition>();

  for (const [name, entry] of Object.entries(table)) {
    const flow = parseFlowEntry(name, entry, problems);
    if (flow) {
      flow.sources.push(document.path);
      flows.set(name, flow);
    }
  }

  if (problems.length > 0) {
    fail(document, problems, ctx);
  }

  return { documentPath: document.path, directory: document.directory, flows };
}

function parseToolEntry(
  name: string,
  value: unknown,
  baseDir: string,
  problems: string[]
): ToolDefinition | undefined {
  if (!isNestedMapping(value)) {
    problems.push(`tool '${name}': entry must be a table`);
    return undefined;
  }

  const tool: ToolDefinition = { name, versions: [] };

  const path = value[TOOL_KEYS.PATH];
  if (path !== undefined) {
    if (typeof path === 'string' && path.trim() !== '') {
      tool.path = path;
    } else {
      problems.push(`tool '${name}': '${TOOL_KEYS.PATH}' must be a non-empty string`);
    }
  }

  const versions = value[TOOL_KEYS.VERSIONS];
  if (versions !== undefined) {
    if (!isNestedMapping(versions)) {
      problems.push(`tool '${name}': '${TOOL_KEYS.VERSIONS}' must be a table of version locations`);
    } else {
      for (const [id, spec] of Object.entries(versions)) {
        if (INTEGER_LIKE_KEY.test(id)) {
          problems.push(
            `tool '${name}', version '${id}': integer-like version ids cannot keep their declared order; ` +
            `use an id such as '${id}.0' or 'v${id}'`
          );
          continue;
        }
        if (typeof spec !== 'string') {
          problems.push(`tool '${name}', version '${id}': location must be a string`);
          continue;
        }
        const decoded = decodeToolLocation(spec, baseDir);
        if (decoded.ok) {
          const version: ToolVersion = { id, location: decoded.location, spec };
          tool.versions.push(version);
        } else {
          problems.push(`tool '${name}', version '${id}': ${decoded.reason}`);
        }
      }
    }
  }

  return tool;
}

/**
 * Read the `tool` table of the tools document. Returns undefined when the
 * document has none.
 */
export function parseToolTable(document: ConfigDocument, ctx: ResolutionContext): ToolsDomain | undefined {
  const table = document.content[CONFIG_TABLES.TOOL];
  if (table === undefined) {
    return undefined;
  }

  if (!isNestedMapping(table)) {
    fail(document, [`'${CONFIG_TABLES.TOOL}' must be a table of tools`], ctx);
  }

  const problems: string[] = [];
  const tools = new Map<string, ToolDefinition>();

  for (const [name, entry] of Object.entries(table)) {
    const tool = parseToolEntry(name, entry, document.directory, problems);
    if (tool) {
      tools.set(name, tool);
    }
  }

  if (problems.length > 0) {
    fail(document, problems, ctx);
  }

  return { documentPath: document.path, directory: document.directory, tools };
}
