/**
 * Version pattern matching.
 *
 * Flows request tool versions with shell-glob patterns (`1.*`, `2.?`,
 * `v[12].0`). Matching is kept behind a plain function type so selection
 * never depends on how a pattern is interpreted.
 */

import { minimatch, type MinimatchOptions } from 'minimatch';

export type VersionMatcher = (version: string, pattern: string) => boolean;

const GLOB_OPTIONS: MinimatchOptions = {
  // Version ids are not file names: `*` matches a leading dot too
  dot: true,
  nobrace: true,
  noext: true,
  nocomment: true,
  nonegate: true
};

/**
 * `*`, `?` and character classes (`[...]`, `[!...]`)
 */
export const globVersionMatcher: VersionMatcher = (version, pattern) =>
  minimatch(version, pattern, GLOB_OPTIONS);

/**
 * Exact comparison, for callers that want pinned versions only
 */
export const exactVersionMatcher: VersionMatcher = (version, pattern) => version === pattern;

/**
 * A single pattern is a one-element list
 */
export function normalizeRequirementPatterns(patterns: string | readonly string[]): string[] {
  return typeof patterns === 'string' ? [patterns] : [...patterns];
}
