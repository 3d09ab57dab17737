import { describe, it } from 'node:test';
import assert from 'node:assert';
import { resolve } from 'node:path';
import { decodeToolLocation, formatToolLocation } from '../../../src/core/tools/tool-location.js';

const BASE = resolve('/cfg');

describe('decodeToolLocation', () => {
  it('makes a relative path locator absolute against the document directory', () => {
    assert.deepStrictEqual(decodeToolLocation('path:bin/yosys', BASE), {
      ok: true,
      location: { kind: 'path', path: resolve(BASE, 'bin/yosys') }
    });
  });

  it('keeps an absolute path locator', () => {
    assert.deepStrictEqual(decodeToolLocation('path:/opt/yosys-1.0', BASE), {
      ok: true,
      location: { kind: 'path', path: resolve('/opt/yosys-1.0') }
    });
  });

  it('splits on the first separator only', () => {
    assert.deepStrictEqual(decodeToolLocation('service:http://localhost:9000', BASE), {
      ok: true,
      location: { kind: 'service', endpoint: 'http://localhost:9000' }
    });
  });

  it('trims whitespace around kind and locator', () => {
    assert.deepStrictEqual(decodeToolLocation(' service : build-farm ', BASE), {
      ok: true,
      location: { kind: 'service', endpoint: 'build-farm' }
    });
  });

  it('explains what is wrong with a malformed location', () => {
    assert.deepStrictEqual(decodeToolLocation('bin/yosys', BASE), {
      ok: false,
      reason: "expected '<kind>:<locator>', got 'bin/yosys'"
    });
    assert.deepStrictEqual(decodeToolLocation('docker:yosys', BASE), {
      ok: false,
      reason: "unknown location kind 'docker' (expected one of: path, service)"
    });
    assert.deepStrictEqual(decodeToolLocation('path:', BASE), {
      ok: false,
      reason: "empty locator in 'path:'"
    });
  });
});

describe('formatToolLocation', () => {
  it('writes the kind back in front of the locator', () => {
    assert.strictEqual(formatToolLocation({ kind: 'path', path: '/opt/yosys-1.0' }), 'path:/opt/yosys-1.0');
    assert.strictEqual(formatToolLocation({ kind: 'service', endpoint: 'build-farm' }), 'service:build-farm');
  });
});
