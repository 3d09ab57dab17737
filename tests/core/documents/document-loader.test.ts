import { describe, it, beforeEach, afterEach } from 'node:test';
import assert from 'node:assert';
import { mkdtemp, mkdir, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import {
  createDocumentLoader,
  getSupportedExtensions,
  isNestedMapping,
  loadConfigDocument
} from '../../../src/core/documents/document-loader.js';
import { ErrorCodes } from '../../../src/types/index.js';
import {
  DocumentOpenError,
  DocumentParseError,
  UnsupportedFormatError
} from '../../../src/utils/errors.js';
import { plain, silentContext, writeFixture } from '../../test-helpers.js';

describe('document loader', () => {
  let root: string;

  beforeEach(async () => {
    root = await mkdtemp(join(tmpdir(), 'chain-documents-'));
  });

  afterEach(async () => {
    await rm(root, { recursive: true, force: true });
  });

  it('decodes TOML into a nested mapping', async () => {
    const file = await writeFixture(root, 'flows.toml', '[flow.synth]\npath = "synth.py"\njobs = 4\n');

    const document = loadConfigDocument(file, silentContext);

    assert.strictEqual(document.path, file);
    assert.strictEqual(document.directory, root);
    assert.deepStrictEqual(plain(document.content), { flow: { synth: { path: 'synth.py', jobs: 4 } } });
  });

  it('decodes JSON with comments and trailing commas', async () => {
    const file = await writeFixture(root, 'tools.json', `{
  // handlers live next to this file
  "tool": {
    "yosys": { "path": "run_yosys", "versions": { "1.0": "path:/opt/yosys-1.0", }, },
  },
}
`);

    const document = loadConfigDocument(file, silentContext);

    assert.deepStrictEqual(plain(document.content), {
      tool: { yosys: { path: 'run_yosys', versions: { '1.0': 'path:/opt/yosys-1.0' } } }
    });
  });

  it('decodes YAML', async () => {
    const file = await writeFixture(root, 'flows.yaml', 'flow:\n  pack:\n    path: ../pack\n    flows: [synth]\n');

    const document = createDocumentLoader(silentContext).load(file);

    assert.deepStrictEqual(plain(document.content), { flow: { pack: { path: '../pack', flows: ['synth'] } } });
  });

  it('keeps unquoted decimal YAML keys as written', async () => {
    const file = await writeFixture(root, 'tools.yaml', 'tool:\n  yosys:\n    versions:\n      1.10: path:/opt/yosys-1.10\n      1.9: path:/opt/yosys-1.9\n    jobs: 4\n    fast: true\n');

    const document = loadConfigDocument(file, silentContext);

    assert.deepStrictEqual(plain(document.content), {
      tool: {
        yosys: {
          versions: { '1.10': 'path:/opt/yosys-1.10', '1.9': 'path:/opt/yosys-1.9' },
          jobs: 4,
          fast: true
        }
      }
    });
  });

  it('treats an empty file as an empty mapping', async () => {
    const file = await writeFixture(root, 'flows.toml', '\n\n');

    assert.deepStrictEqual(plain(loadConfigDocument(file, silentContext).content), {});
  });

  it('treats a YAML document with only comments as an empty mapping', async () => {
    const file = await writeFixture(root, 'flows.yml', '# nothing configured yet\n');

    assert.deepStrictEqual(plain(loadConfigDocument(file, silentContext).content), {});
  });

  it('rejects an unknown extension', async () => {
    const file = await writeFixture(root, 'flows.ini', '[flow]\n');

    assert.throws(
      () => loadConfigDocument(file, silentContext),
      (error: unknown) => {
        assert.ok(error instanceof UnsupportedFormatError);
        assert.strictEqual(error.code, ErrorCodes.UNSUPPORTED_FORMAT);
        assert.strictEqual(error.message, `Unsupported configuration format '.ini': ${file}`);
        return true;
      }
    );
  });

  it('reports a file that cannot be opened', async () => {
    const file = join(root, 'missing.toml');

    assert.throws(() => loadConfigDocument(file, silentContext), DocumentOpenError);
  });

  it('reports a directory as a file that cannot be opened', async () => {
    await mkdir(join(root, 'dir.toml'));

    assert.throws(() => loadConfigDocument(join(root, 'dir.toml'), silentContext), DocumentOpenError);
  });

  it('reports malformed content', async () => {
    const file = await writeFixture(root, 'flows.toml', '[flow.synth\npath = \n');

    assert.throws(
      () => loadConfigDocument(file, silentContext),
      (error: unknown) => {
        assert.ok(error instanceof DocumentParseError);
        assert.strictEqual(error.code, ErrorCodes.DOCUMENT_PARSE_ERROR);
        return true;
      }
    );
  });

  it('reports malformed JSON', async () => {
    const file = await writeFixture(root, 'flows.json', '{ "flow": ');

    assert.throws(() => loadConfigDocument(file, silentContext), DocumentParseError);
  });

  it('requires a mapping at the top level', async () => {
    const file = await writeFixture(root, 'flows.json', '["synth", "pack"]');

    assert.throws(
      () => loadConfigDocument(file, silentContext),
      {
        name: 'DocumentParseError',
        message: `Failed to parse configuration file: ${file}: top level must be a table/mapping`
      }
    );
  });

  it('lists the supported extensions', () => {
    assert.deepStrictEqual(getSupportedExtensions(), ['.toml', '.json', '.jsonc', '.yml', '.yaml']);
  });
});

describe('isNestedMapping', () => {
  it('accepts plain objects only', () => {
    assert.strictEqual(isNestedMapping({ a: 1 }), true);
    assert.strictEqual(isNestedMapping([]), false);
    assert.strictEqual(isNestedMapping(null), false);
    assert.strictEqual(isNestedMapping('flow'), false);
    assert.strictEqual(isNestedMapping(new Date(0)), false);
  });
});
