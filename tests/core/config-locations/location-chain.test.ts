import { describe, it, beforeEach, afterEach } from 'node:test';
import assert from 'node:assert';
import { mkdtemp, mkdir, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { LocationChain } from '../../../src/core/config-locations/location-chain.js';
import type { SearchLocation } from '../../../src/types/index.js';
import { ConfigPathError, type ConfigPathErrorKind } from '../../../src/utils/errors.js';
import { silentContext, writeFixture } from '../../test-helpers.js';

function directoryLocation(name: string, rawValue: string | undefined, extra: Partial<SearchLocation> = {}): SearchLocation {
  return { kind: 'explicit-value', name, rawValue, isDirectory: true, mustExist: false, ...extra };
}

function expectPathError(kind: ConfigPathErrorKind, path: string, location: string) {
  return (error: unknown): boolean => {
    assert.ok(error instanceof ConfigPathError);
    assert.strictEqual(error.kind, kind);
    assert.strictEqual(error.path, path);
    assert.strictEqual(error.location, location);
    return true;
  };
}

describe('LocationChain', () => {
  let root: string;

  beforeEach(async () => {
    root = await mkdtemp(join(tmpdir(), 'chain-locations-'));
    await writeFixture(root, 'a/flows.toml', '');
    await writeFixture(root, 'b/flows.toml', '');
    await mkdir(join(root, 'empty'));
  });

  afterEach(async () => {
    await rm(root, { recursive: true, force: true });
  });

  it('collects every candidate in location order', () => {
    const chain = new LocationChain('flows.toml', [
      directoryLocation('first', join(root, 'a')),
      directoryLocation('empty', join(root, 'empty')),
      directoryLocation('second', join(root, 'b'))
    ], { stopOnFirst: false }, silentContext);

    assert.deepStrictEqual(chain.resolve(), [join(root, 'a', 'flows.toml'), join(root, 'b', 'flows.toml')]);
  });

  it('stops at the first candidate when asked to', () => {
    const chain = new LocationChain('flows.toml', [
      directoryLocation('missing', join(root, 'missing')),
      directoryLocation('second', join(root, 'b')),
      directoryLocation('first', join(root, 'a'))
    ], { stopOnFirst: true }, silentContext);

    const matches = chain.resolveMatches();
    assert.strictEqual(matches.length, 1);
    assert.strictEqual(matches[0].path, join(root, 'b', 'flows.toml'));
    assert.strictEqual(matches[0].location.name, 'second');
  });

  it('skips locations without a value', () => {
    const chain = new LocationChain('flows.toml', [
      directoryLocation('unset', undefined),
      directoryLocation('empty string', ''),
      directoryLocation('first', join(root, 'a'))
    ], { stopOnFirst: false }, silentContext);

    assert.deepStrictEqual(chain.resolve(), [join(root, 'a', 'flows.toml')]);
  });

  it('returns nothing when no location has the file', () => {
    const chain = new LocationChain('tools.toml', [
      directoryLocation('first', join(root, 'a')),
      directoryLocation('empty', join(root, 'empty'))
    ], { stopOnFirst: true }, silentContext);

    assert.deepStrictEqual(chain.resolve(), []);
  });

  it('rejects a relative value that has no prefix', () => {
    const chain = new LocationChain('flows.toml', [
      directoryLocation('$SOME_HOME', 'relative/dir')
    ], { stopOnFirst: false }, silentContext);

    assert.throws(() => chain.resolve(), expectPathError('not-absolute', 'relative/dir', '$SOME_HOME'));
  });

  it('joins a relative value onto its prefix', () => {
    const chain = new LocationChain('flows.toml', [
      directoryLocation('project root', 'a', { pathPrefix: root })
    ], { stopOnFirst: false }, silentContext);

    assert.deepStrictEqual(chain.resolve(), [join(root, 'a', 'flows.toml')]);
  });

  it('appends the subdirectory before the file name', () => {
    const chain = new LocationChain('flows.toml', [
      directoryLocation('$HOME/b', root, { subdirectory: 'b' })
    ], { stopOnFirst: false }, silentContext);

    assert.deepStrictEqual(chain.resolve(), [join(root, 'b', 'flows.toml')]);
  });

  it('fails on a missing directory that must exist', () => {
    const chain = new LocationChain('flows.toml', [
      directoryLocation('config home', join(root, 'missing'), { mustExist: true })
    ], { stopOnFirst: false }, silentContext);

    assert.throws(() => chain.resolve(), expectPathError('not-exist', join(root, 'missing'), 'config home'));
  });

  it('fails on a missing file in a directory that must have it', () => {
    const chain = new LocationChain('flows.toml', [
      directoryLocation('config home', join(root, 'empty'), { mustExist: true })
    ], { stopOnFirst: false }, silentContext);

    assert.throws(() => chain.resolve(), expectPathError('not-exist', join(root, 'empty', 'flows.toml'), 'config home'));
  });

  it('fails when a directory location points at a file', () => {
    const file = join(root, 'a', 'flows.toml');
    const chain = new LocationChain('flows.toml', [
      directoryLocation('project root', file)
    ], { stopOnFirst: false }, silentContext);

    assert.throws(() => chain.resolve(), expectPathError('not-directory', file, 'project root'));
  });

  it('fails when a file location points at a directory', () => {
    const chain = new LocationChain('flows.toml', [
      directoryLocation('command-line argument', join(root, 'a'), { isDirectory: false, mustExist: true })
    ], { stopOnFirst: false }, silentContext);

    assert.throws(() => chain.resolve(), expectPathError('not-file', join(root, 'a'), 'command-line argument'));
  });

  it('uses a file location as the candidate itself', () => {
    const file = join(root, 'b', 'flows.toml');
    const chain = new LocationChain('ignored.toml', [
      directoryLocation('command-line argument', file, { isDirectory: false, mustExist: true })
    ], { stopOnFirst: false }, silentContext);

    assert.deepStrictEqual(chain.resolve(), [file]);
  });

  it('stops before a bad location once a match is found', () => {
    const chain = new LocationChain('flows.toml', [
      directoryLocation('first', join(root, 'a')),
      directoryLocation('broken', 'relative/dir')
    ], { stopOnFirst: true }, silentContext);

    assert.deepStrictEqual(chain.resolve(), [join(root, 'a', 'flows.toml')]);
  });
});
