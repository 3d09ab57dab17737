import { describe, it, beforeEach, afterEach } from 'node:test';
import assert from 'node:assert';
import { mkdtemp, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { selectAndBind, selectVersion } from '../../../src/core/tools/version-selector.js';
import type { ResolvedFlow, ToolDefinition, ToolRegistry, ToolsDomain } from '../../../src/types/index.js';
import { ErrorCodes } from '../../../src/types/index.js';
import {
  BackendPathNotFoundError,
  MissingConfigKeyError,
  NoSuitableVersionError,
  ToolNotFoundError,
  VersionConflictError
} from '../../../src/utils/errors.js';
import { exactVersionMatcher } from '../../../src/utils/version-pattern.js';
import { silentContext, writeFixture } from '../../test-helpers.js';

function flow(name: string): ResolvedFlow {
  return { name, backendPath: `/flows/${name}`, toolVersions: new Map(), dependsOn: [], params: {} };
}

describe('selectVersion', () => {
  it('walks patterns first, then versions in declared order', () => {
    assert.strictEqual(selectVersion(['v2.*', 'v1.*'], ['v1.0', 'v2.0']), 'v2.0');
    assert.strictEqual(selectVersion(['v2.*', 'v1.*'], ['v1.0', 'v2.0', 'v2.1']), 'v2.0');
    assert.strictEqual(selectVersion(['1.*'], ['1.2', '1.0']), '1.2');
    assert.strictEqual(selectVersion(['*'], ['b', 'a']), 'b');
  });

  it('returns undefined when nothing matches', () => {
    assert.strictEqual(selectVersion(['3.*'], ['1.0', '2.0']), undefined);
    assert.strictEqual(selectVersion([], ['1.0']), undefined);
  });

  it('uses the matcher it is given', () => {
    assert.strictEqual(selectVersion(['1.*', '2.0'], ['1.0', '2.0'], exactVersionMatcher), '2.0');
  });
});

describe('selectAndBind', () => {
  let root: string;
  let tools: ToolsDomain;
  let registry: ToolRegistry;

  function addTool(definition: ToolDefinition): void {
    tools.tools.set(definition.name, definition);
  }

  beforeEach(async () => {
    root = await mkdtemp(join(tmpdir(), 'chain-tools-'));
    await writeFixture(root, 'handlers/yosys.py', '');
    tools = { documentPath: join(root, 'tools.toml'), directory: root, tools: new Map() };
    registry = new Map();
    addTool({
      name: 'yosys',
      path: 'handlers/yosys.py',
      versions: [
        { id: '1.0', location: { kind: 'path', path: '/opt/yosys-1.0' }, spec: 'path:/opt/yosys-1.0' },
        { id: '2.0', location: { kind: 'service', endpoint: 'build-farm' }, spec: 'service:build-farm' }
      ]
    });
  });

  afterEach(async () => {
    await rm(root, { recursive: true, force: true });
  });

  it('binds the selected version on the flow and in the registry', () => {
    const synth = flow('synth');

    const binding = selectAndBind({ flow: synth, toolName: 'yosys', patterns: ['2.*', '1.*'], tools, registry }, silentContext);

    assert.deepStrictEqual(binding, { toolName: 'yosys', version: '2.0', added: true });
    assert.strictEqual(synth.toolVersions.get('yosys'), '2.0');
    assert.deepStrictEqual(registry.get('yosys'), {
      name: 'yosys',
      backendPath: join(root, 'handlers', 'yosys.py'),
      versions: new Map([['2.0', { kind: 'service', endpoint: 'build-farm' }]])
    });
  });

  it('accepts a single pattern', () => {
    const synth = flow('synth');

    selectAndBind({ flow: synth, toolName: 'yosys', patterns: '1.*', tools, registry }, silentContext);

    assert.strictEqual(synth.toolVersions.get('yosys'), '1.0');
  });

  it('treats binding the same version again as a no-op', () => {
    const synth = flow('synth');
    selectAndBind({ flow: synth, toolName: 'yosys', patterns: '1.*', tools, registry }, silentContext);

    const again = selectAndBind({ flow: synth, toolName: 'yosys', patterns: '1.0', tools, registry }, silentContext);

    assert.deepStrictEqual(again, { toolName: 'yosys', version: '1.0', added: false });
    assert.strictEqual(registry.get('yosys')?.versions.size, 1);
  });

  it('rejects a second, different version for the same flow', () => {
    const synth = flow('synth');
    selectAndBind({ flow: synth, toolName: 'yosys', patterns: '1.*', tools, registry }, silentContext);

    assert.throws(
      () => selectAndBind({ flow: synth, toolName: 'yosys', patterns: '2.*', tools, registry }, silentContext),
      (error: unknown) => {
        assert.ok(error instanceof VersionConflictError);
        assert.strictEqual(error.code, ErrorCodes.VERSION_CONFLICT);
        assert.strictEqual(
          error.message,
          "Version conflict for tool 'yosys' in flow 'synth': '1.0' is bound, '2.0' requested"
        );
        return true;
      }
    );
    assert.strictEqual(synth.toolVersions.get('yosys'), '1.0');
  });

  it('records every version bound across flows once', () => {
    selectAndBind({ flow: flow('synth'), toolName: 'yosys', patterns: '1.*', tools, registry }, silentContext);
    selectAndBind({ flow: flow('lint'), toolName: 'yosys', patterns: '1.*', tools, registry }, silentContext);
    selectAndBind({ flow: flow('pack'), toolName: 'yosys', patterns: '2.*', tools, registry }, silentContext);

    assert.deepStrictEqual(Array.from(registry.get('yosys')?.versions.keys() ?? []), ['1.0', '2.0']);
  });

  it('fails for an unknown tool', () => {
    assert.throws(
      () => selectAndBind({ flow: flow('synth'), toolName: 'nextpnr', patterns: '*', tools, registry }, silentContext),
      { name: 'ToolNotFoundError', message: "Tool 'nextpnr' required by flow 'synth' not found" }
    );
    assert.throws(
      () => selectAndBind({ flow: flow('synth'), toolName: 'nextpnr', patterns: '*', tools, registry }, silentContext),
      ToolNotFoundError
    );
  });

  it('fails for a tool without a handler path', () => {
    addTool({ name: 'nextpnr', versions: [{ id: '1.0', location: { kind: 'path', path: '/opt/nextpnr' }, spec: 'path:/opt/nextpnr' }] });

    assert.throws(
      () => selectAndBind({ flow: flow('synth'), toolName: 'nextpnr', patterns: '*', tools, registry }, silentContext),
      (error: unknown) => error instanceof MissingConfigKeyError && error.key === 'path'
    );
  });

  it('fails for a tool without versions', () => {
    addTool({ name: 'nextpnr', path: 'handlers/yosys.py', versions: [] });

    assert.throws(
      () => selectAndBind({ flow: flow('synth'), toolName: 'nextpnr', patterns: '*', tools, registry }, silentContext),
      (error: unknown) => error instanceof MissingConfigKeyError && error.key === 'versions'
    );
  });

  it('fails when no version matches', () => {
    assert.throws(
      () => selectAndBind({ flow: flow('synth'), toolName: 'yosys', patterns: ['3.*'], tools, registry }, silentContext),
      (error: unknown) => {
        assert.ok(error instanceof NoSuitableVersionError);
        assert.strictEqual(
          error.message,
          "No version of tool 'yosys' (required by flow 'synth') matches: 3.*. Available: 1.0, 2.0"
        );
        return true;
      }
    );
    assert.strictEqual(registry.size, 0);
  });

  it('checks versions before the handler path', () => {
    addTool({ name: 'nextpnr', path: 'missing.py', versions: [{ id: '1.0', location: { kind: 'path', path: '/opt/nextpnr' }, spec: 'path:/opt/nextpnr' }] });

    assert.throws(
      () => selectAndBind({ flow: flow('synth'), toolName: 'nextpnr', patterns: '2.*', tools, registry }, silentContext),
      NoSuitableVersionError
    );
  });

  it('fails when the handler path does not exist', () => {
    addTool({ name: 'nextpnr', path: 'missing.py', versions: [{ id: '1.0', location: { kind: 'path', path: '/opt/nextpnr' }, spec: 'path:/opt/nextpnr' }] });

    assert.throws(
      () => selectAndBind({ flow: flow('synth'), toolName: 'nextpnr', patterns: '1.*', tools, registry }, silentContext),
      (error: unknown) => {
        assert.ok(error instanceof BackendPathNotFoundError);
        assert.strictEqual(
          error.message,
          `Backend path for build tools 'nextpnr' does not exist: ${join(root, 'missing.py')}`
        );
        return true;
      }
    );
  });

  it('uses the matcher from the request', () => {
    assert.throws(
      () => selectAndBind(
        { flow: flow('synth'), toolName: 'yosys', patterns: '1.*', tools, registry, matcher: exactVersionMatcher },
        silentContext
      ),
      NoSuitableVersionError
    );
  });
});
