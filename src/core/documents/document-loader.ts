/**
 * Document Loader
 *
 * Reads a configuration file and decodes it into a nested, string-keyed
 * mapping. The format is picked from the file extension; the rest of the
 * system never looks at the serialization.
 */

import { dirname, extname, resolve } from 'path';
import * as TOML from 'smol-toml';
import * as yaml from 'js-yaml';
import { parse as parseJsonc, printParseErrorCode, type ParseError } from 'jsonc-parser';
import type { ConfigDocument, NestedMapping, ResolutionContext } from '../../types/index.js';
import { DocumentOpenError, DocumentParseError, UnsupportedFormatError } from '../../utils/errors.js';
import { readTextFileSync } from '../../utils/fs.js';

export interface DocumentLoader {
  load(path: string): ConfigDocument;
}

type Decoder = (content: string) => unknown;

const decodeToml: Decoder = content => TOML.parse(content);

// The default schema minus float resolution: `1.10:` stays the key "1.10"
// instead of becoming 1.1, and float-looking values load as strings.
const YAML_SCHEMA = yaml.FAILSAFE_SCHEMA.extend({
  implicit: [yaml.types.null, yaml.types.bool, yaml.types.int, yaml.types.timestamp, yaml.types.merge],
  explicit: [yaml.types.binary, yaml.types.omap, yaml.types.pairs, yaml.types.set]
});

const decodeYaml: Decoder = content => yaml.load(content, { schema: YAML_SCHEMA });

const decodeJsonc: Decoder = content => {
  const errors: ParseError[] = [];
  const value: unknown = parseJsonc(content, errors, { allowTrailingComma: true });
  if (errors.length > 0) {
    const first = errors[0];
    throw new Error(`${printParseErrorCode(first.error)} at offset ${first.offset}`);
  }
  return value;
};

const DECODERS: Record<string, Decoder> = {
  '.toml': decodeToml,
  '.json': decodeJsonc,
  '.jsonc': decodeJsonc,
  '.yml': decodeYaml,
  '.yaml': decodeYaml
};

export function getSupportedExtensions(): string[] {
  return Object.keys(DECODERS);
}

export function isNestedMapping(value: unknown): value is NestedMapping {
  return typeof value === 'object' && value !== null && !Array.isArray(value) && !(value instanceof Date);
}

/**
 * Load one document. Open, decode and shape failures raise distinct errors.
 */
export function loadConfigDocument(path: string, ctx: ResolutionContext): ConfigDocument {
  const absolutePath = resolve(path);
  const extension = extname(absolutePath).toLowerCase();
  const decode = DECODERS[extension];

  if (!decode) {
    const error = new UnsupportedFormatError(absolutePath, extension);
    ctx.logger.error(error.message);
    throw error;
  }

  let text: string;
  try {
    text = readTextFileSync(absolutePath);
  } catch (cause) {
    const error = new DocumentOpenError(absolutePath, cause);
    ctx.logger.error(error.message, error.details);
    throw error;
  }

  let content: unknown;
  if (text.trim() === '') {
    content = {};
  } else {
    try {
      content = decode(text);
    } catch (cause) {
      const error = new DocumentParseError(absolutePath, cause instanceof Error ? cause.message : String(cause));
      ctx.logger.error(error.message);
      throw error;
    }
  }

  if (content === undefined || content === null) {
    content = {};
  }

  if (!isNestedMapping(content)) {
    const error = new DocumentParseError(absolutePath, 'top level must be a table/mapping');
    ctx.logger.error(error.message);
    throw error;
  }

  ctx.logger.debug(`Loaded configuration document: ${absolutePath}`);

  return {
    path: absolutePath,
    directory: dirname(absolutePath),
    content
  };
}

/**
 * Default loader, bound to a resolution context
 */
export function createDocumentLoader(ctx: ResolutionContext): DocumentLoader {
  return {
    load(path: string): ConfigDocument {
      return loadConfigDocument(path, ctx);
    }
  };
}
