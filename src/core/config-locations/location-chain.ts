/**
 * Location Chain
 *
 * Searches an ordered list of candidate sources for one configuration file.
 * Each source is either skipped (no value), a hard error (bad value), empty
 * (nothing there) or a match. The chain either stops at the first match or
 * collects every match in location order.
 */

import { isAbsolute, join, resolve } from 'path';
import type { LocationMatch, ResolutionContext, SearchLocation } from '../../types/index.js';
import { ConfigPathError, type ConfigPathErrorKind } from '../../utils/errors.js';
import { exists, isDirectory } from '../../utils/fs.js';

export interface LocationChainOptions {
  /** Halt at the first real candidate instead of collecting all of them */
  stopOnFirst: boolean;
}

export class LocationChain {
  constructor(
    readonly fileName: string,
    readonly locations: readonly SearchLocation[],
    readonly options: LocationChainOptions,
    private readonly ctx: ResolutionContext
  ) {}

  /**
   * Absolute paths of every candidate found, in location order.
   */
  resolve(): string[] {
    return this.resolveMatches().map(match => match.path);
  }

  /**
   * Like resolve(), keeping the location each file came from.
   */
  resolveMatches(): LocationMatch[] {
    const matches: LocationMatch[] = [];

    for (const location of this.locations) {
      const path = this.resolveLocation(location);
      if (path === undefined) {
        continue;
      }

      this.ctx.logger.debug(`Found '${this.fileName}' in ${location.name}: ${path}`);
      matches.push({ path, location });

      if (this.options.stopOnFirst) {
        break;
      }
    }

    return matches;
  }

  /**
   * Candidate file for a single location, or undefined when there is none.
   */
  private resolveLocation(location: SearchLocation): string | undefined {
    const raw = location.rawValue;
    if (raw === undefined || raw === '') {
      return undefined;
    }

    let basePath: string;
    if (isAbsolute(raw)) {
      basePath = raw;
    } else if (location.pathPrefix !== undefined) {
      basePath = join(location.pathPrefix, raw);
    } else {
      throw this.pathError('not-absolute', raw, location);
    }

    if (location.subdirectory) {
      basePath = join(basePath, location.subdirectory);
    }
    basePath = resolve(basePath);

    let candidate = basePath;

    if (location.isDirectory) {
      if (!exists(basePath)) {
        if (location.mustExist) {
          throw this.pathError('not-exist', basePath, location);
        }
        return undefined;
      }
      if (!isDirectory(basePath)) {
        throw this.pathError('not-directory', basePath, location);
      }
      candidate = join(basePath, this.fileName);
    }

    if (!exists(candidate)) {
      if (location.mustExist) {
        throw this.pathError('not-exist', candidate, location);
      }
      return undefined;
    }

    if (isDirectory(candidate)) {
      throw this.pathError('not-file', candidate, location);
    }

    return candidate;
  }

  private pathError(kind: ConfigPathErrorKind, path: string, location: SearchLocation): ConfigPathError {
    const error = new ConfigPathError(kind, path, location.name);
    this.ctx.logger.error(`Searching for '${this.fileName}': ${error.message}`);
    return error;
  }
}
