/**
 * Configuration document and entity types
 */

/**
 * Nested, string-keyed mapping as returned by a document loader.
 * Values stay opaque until the validation pass narrows them.
 */
export type NestedMapping = Record<string, unknown>;

export interface ConfigDocument {
  /** Absolute path of the loaded file */
  path: string;
  /** Directory containing the file; relative paths in the document resolve against it */
  directory: string;
  content: NestedMapping;
}

export type SearchLocationKind = 'explicit-value' | 'environment-variable' | 'fixed-path';

/**
 * One candidate source in a location chain.
 */
export interface SearchLocation {
  readonly kind: SearchLocationKind;
  /** Label used in diagnostics, e.g. `$XDG_CONFIG_HOME/chain` */
  readonly name: string;
  readonly rawValue?: string;
  /** When true the chain's file name is appended to the value */
  readonly isDirectory: boolean;
  /** Appended to the value before the file name (e.g. `.config/chain` under `$HOME`) */
  readonly subdirectory?: string;
  /** Base for relative values; without it a relative value is an error */
  readonly pathPrefix?: string;
  /** A missing directory or file is an error instead of "no candidate here" */
  readonly mustExist: boolean;
}

export interface LocationMatch {
  path: string;
  location: SearchLocation;
}

export interface ToolRequirement {
  tool: string;
  /** Glob patterns in preference order */
  patterns: string[];
}

/**
 * A flow as declared by one document or merged across several.
 * Only the keys this system consumes are typed; everything else rides in `params`.
 */
export interface FlowDefinition {
  name: string;
  path?: string;
  toolRequirements?: ToolRequirement[];
  dependsOn?: string[];
  params: Record<string, unknown>;
  /** Documents that contributed at least one key, in discovery order */
  sources: string[];
}

export type FlowUniverse = Map<string, FlowDefinition>;

export interface FlowTable {
  documentPath: string;
  directory: string;
  flows: Map<string, FlowDefinition>;
}

export type ToolLocationKind = 'path' | 'service';

export type ToolLocation =
  | { kind: 'path'; path: string }
  | { kind: 'service'; endpoint: string };

export interface ToolVersion {
  id: string;
  location: ToolLocation;
  /** The location as written in the document (`<kind>:<locator>`) */
  spec: string;
}

export interface ToolDefinition {
  name: string;
  /** Handler path as declared; resolved against the tools document directory when bound */
  path?: string;
  /** Declared order is significant for version selection */
  versions: ToolVersion[];
}

export interface ToolsDomain {
  documentPath: string;
  directory: string;
  tools: Map<string, ToolDefinition>;
}
