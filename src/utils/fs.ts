import { existsSync, readFileSync, statSync } from 'fs';
import { dirname, isAbsolute, join, resolve } from 'path';
import { fileURLToPath } from 'url';

/**
 * Synchronous file system helpers. Resolution is a single blocking pass
 * over static local files, so nothing here is async.
 */

/**
 * Check if a file or directory exists
 */
export function exists(path: string): boolean {
  return existsSync(path);
}

/**
 * Check if a path is a directory
 */
export function isDirectory(path: string): boolean {
  try {
    return statSync(path).isDirectory();
  } catch {
    return false;
  }
}

/**
 * Read a file as text. Errors propagate to the caller.
 */
export function readTextFileSync(path: string, encoding: BufferEncoding = 'utf8'): string {
  return readFileSync(path, encoding);
}

/**
 * Resolve a path declared in a document against that document's directory.
 * Absolute paths are returned normalized.
 */
export function normalizeDeclaredPath(baseDir: string, declared: string): string {
  if (isAbsolute(declared)) {
    return resolve(declared);
  }
  return resolve(baseDir, declared);
}

/**
 * Walk up from this module until a package.json is found.
 *
 * Works from both src/ (tsx) and dist/src/ (compiled) layouts.
 */
export function getInstallRoot(): string {
  let dir = dirname(fileURLToPath(import.meta.url));

  for (let i = 0; i < 10; i++) {
    if (existsSync(join(dir, 'package.json'))) {
      return dir;
    }
    const parent = dirname(dir);
    if (parent === dir) break; // reached filesystem root
    dir = parent;
  }

  return resolve(dirname(fileURLToPath(import.meta.url)), '..', '..');
}

/**
 * Read this package's version from its package.json
 */
export function getVersion(): string {
  let content: unknown;
  try {
    content = JSON.parse(readFileSync(join(getInstallRoot(), 'package.json'), 'utf8'));
  } catch {
    return '0.0.0';
  }
  if (content && typeof content === 'object' && 'version' in content && typeof content.version === 'string') {
    return content.version;
  }
  return '0.0.0';
}
