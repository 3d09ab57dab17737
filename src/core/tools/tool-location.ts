/**
 * Tool location codec.
 *
 * The tools document writes a version's location as `<kind>:<locator>`.
 * It is decoded once, at load time, into a tagged variant.
 */

import type { ToolLocation, ToolLocationKind } from '../../types/index.js';
import { TOOL_LOCATION_SEPARATOR } from '../../constants/index.js';
import { normalizeDeclaredPath } from '../../utils/fs.js';

export const TOOL_LOCATION_KINDS: readonly ToolLocationKind[] = ['path', 'service'];

export type DecodeResult =
  | { ok: true; location: ToolLocation }
  | { ok: false; reason: string };

function isToolLocationKind(value: string): value is ToolLocationKind {
  return TOOL_LOCATION_KINDS.some(kind => kind === value);
}

/**
 * Decode a location spec. `path` locators are made absolute against `baseDir`.
 */
export function decodeToolLocation(spec: string, baseDir: string): DecodeResult {
  const separator = spec.indexOf(TOOL_LOCATION_SEPARATOR);
  if (separator < 0) {
    return { ok: false, reason: `expected '<kind>:<locator>', got '${spec}'` };
  }

  const kind = spec.slice(0, separator).trim();
  const locator = spec.slice(separator + 1).trim();

  if (!isToolLocationKind(kind)) {
    return {
      ok: false,
      reason: `unknown location kind '${kind}' (expected one of: ${TOOL_LOCATION_KINDS.join(', ')})`
    };
  }

  if (locator === '') {
    return { ok: false, reason: `empty locator in '${spec}'` };
  }

  switch (kind) {
    case 'path':
      return { ok: true, location: { kind: 'path', path: normalizeDeclaredPath(baseDir, locator) } };
    case 'service':
      return { ok: true, location: { kind: 'service', endpoint: locator } };
  }
}

export function formatToolLocation(location: ToolLocation): string {
  switch (location.kind) {
    case 'path':
      return `path:${location.path}`;
    case 'service':
      return `service:${location.endpoint}`;
  }
}
