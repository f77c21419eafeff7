/**
 * json-configuration.test.ts - Tests for JsonConfiguration and the pretty printer
 *
 * Tests verify:
 * 1. Loading from objects and JSON files
 * 2. Nested lookups and section creation
 * 3. Writing back to objects and files, with exclusions and backups
 * 4. Pretty-print layout and options
 * 5. URLs and class instances kept as they are for registered formatters
 *
 * Run with: node --import tsx --test src/config/json-configuration.test.ts
 */

import { after, before, describe, test } from 'node:test';
import * as assert from 'node:assert';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { JsonConfiguration } from './json-configuration.js';
import { ConfigurationError } from './errors.js';
import { prettyPrint } from './pretty-print.js';
import { FormatterRegistry, dateFormatter, formatterRegistry } from './formatters.js';
import { isPlainObject } from './values.js';
import type { ConfigObject } from './values.js';

function sample(): ConfigObject {
  return {
    name: 'demo',
    server: { host: 'localhost', ports: [80, 443] },
    debug: true,
  };
}

const SAMPLE_FLAT = [
  '{',
  '"name": "demo",',
  '"server": {',
  '    "host": "localhost",',
  '    "ports": [ 80, 443 ]',
  '},',
  '"debug": true',
  '}',
].join('\n');

const SAMPLE_INDENTED = [
  '{',
  '    "name": "demo",',
  '    "server": {',
  '        "host": "localhost",',
  '        "ports": [ 80, 443 ]',
  '    },',
  '    "debug": true',
  '}',
].join('\n');

let tmpDir = '';

before(() => {
  tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'keytrie-config-'));
});

after(() => {
  fs.rmSync(tmpDir, { recursive: true, force: true });
});

function tmpFile(name: string, contents?: string): string {
  const file = path.join(tmpDir, name);
  if (contents !== undefined) {
    fs.writeFileSync(file, contents, 'utf-8');
  }
  return file;
}

describe('JsonConfiguration loading', () => {
  test('copies an object source', () => {
    const source = sample();
    const config = new JsonConfiguration(source);
    assert.deepStrictEqual(config.data, sample());

    config.checkPath('server').host = 'example.test';
    assert.deepStrictEqual(source, sample());
  });

  test('reads a JSON file', () => {
    const file = tmpFile('load.json', JSON.stringify(sample()));
    const config = new JsonConfiguration(file);
    assert.deepStrictEqual(config.data, sample());
  });

  test('rejects a non-object root', () => {
    const file = tmpFile('array.json', '[1, 2]');
    assert.throws(
      () => new JsonConfiguration(file),
      (error: unknown) =>
        error instanceof ConfigurationError &&
        error.message === `Configuration in ${file} must be a JSON object, got Array`,
    );
  });

  test('rejects invalid JSON', () => {
    const file = tmpFile('broken.json', '{ "name": ');
    assert.throws(() => new JsonConfiguration(file), ConfigurationError);
  });

  test('missing files raise the file system error', () => {
    assert.throws(() => new JsonConfiguration(path.join(tmpDir, 'absent.json')), /ENOENT/);
  });

  test('reload picks up changes and can switch sources', () => {
    const file = tmpFile('reload.json', '{"a": 1}');
    const config = new JsonConfiguration(file);
    fs.writeFileSync(file, '{"a": 2}', 'utf-8');
    config.reload();
    assert.deepStrictEqual(config.data, { a: 2 });

    config.reload({ b: 3 });
    assert.deepStrictEqual(config.data, { b: 3 });
  });
});

describe('JsonConfiguration lookups', () => {
  test('get follows nested keys', () => {
    const config = new JsonConfiguration(sample());
    assert.strictEqual(config.get('server', 'host'), 'localhost');
    assert.deepStrictEqual(config.get('server', 'ports'), [80, 443]);
    assert.strictEqual(config.get('server', 'missing'), undefined);
    assert.strictEqual(config.get('missing', 'host'), undefined);
    assert.strictEqual(config.get('name', 'length'), undefined);
    assert.strictEqual(config.get(), config.data);
  });

  test('checkPath creates missing sections', () => {
    const config = new JsonConfiguration({});
    const section = config.checkPath('a', 'b');
    section.c = 1;
    assert.deepStrictEqual(config.data, { a: { b: { c: 1 } } });
    assert.strictEqual(config.checkPath('a', 'b'), section);
  });

  test('checkPath with no keys is the root', () => {
    const config = new JsonConfiguration(sample());
    assert.strictEqual(config.checkPath(), config.data);
  });

  test('checkPath refuses to descend into values', () => {
    const config = new JsonConfiguration(sample());
    assert.throws(
      () => config.checkPath('server', 'host', 'name'),
      (error: unknown) =>
        error instanceof ConfigurationError &&
        error.message === 'Cannot use "server.host" as a section: it holds a string',
    );
  });
});

describe('JsonConfiguration update', () => {
  test('writes back into the source object by default', () => {
    const source = sample();
    const config = new JsonConfiguration(source);
    config.checkPath().name = 'changed';
    config.update();
    assert.strictEqual(source.name, 'changed');
  });

  test('replaces the target object contents, minus exclusions', () => {
    const config = new JsonConfiguration(sample());
    const target: ConfigObject = { stale: 1 };
    config.update(target, 'debug', ['server', 'host']);
    assert.deepStrictEqual(target, { name: 'demo', server: { ports: [80, 443] } });
  });

  test('writes copies, not shared references', () => {
    const config = new JsonConfiguration(sample());
    const target: ConfigObject = {};
    config.update(target);
    const server = target.server;
    assert.ok(isPlainObject(server));
    assert.notStrictEqual(server, config.data.server);
    assert.notStrictEqual(server.ports, config.get('server', 'ports'));
    assert.deepStrictEqual(server.ports, [80, 443]);
  });

  test('does not replace the source', () => {
    const source = sample();
    const config = new JsonConfiguration(source);
    config.update({});
    config.checkPath().name = 'again';
    config.update();
    assert.strictEqual(source.name, 'again');
  });

  test('writes a file and keeps a backup of the old one', () => {
    const file = tmpFile('update.json', JSON.stringify(sample()));
    const original = fs.readFileSync(file, 'utf-8');
    const config = new JsonConfiguration(file);

    config.update(undefined, ['server', 'ports']);

    assert.strictEqual(fs.readFileSync(`${file}.bak`, 'utf-8'), original);
    const expected = [
      '{',
      '"name": "demo",',
      '"server": {',
      '    "host": "localhost"',
      '},',
      '"debug": true',
      '}',
      '',
    ].join('\n');
    assert.strictEqual(fs.readFileSync(file, 'utf-8'), expected);
  });

  test('new files get no backup', () => {
    const config = new JsonConfiguration({ a: 1 });
    const file = tmpFile('fresh.json');
    config.update(file);
    assert.strictEqual(fs.existsSync(`${file}.bak`), false);
    assert.strictEqual(fs.readFileSync(file, 'utf-8'), '{\n"a": 1\n}\n');
    assert.deepStrictEqual(new JsonConfiguration(file).data, { a: 1 });
  });
});

class Point {
  x: number;
  y: number;

  constructor(x: number, y: number) {
    this.x = x;
    this.y = y;
  }
}

describe('JsonConfiguration with registered value types', () => {
  before(() => {
    formatterRegistry.register({
      accepts: (value: unknown): value is URL => value instanceof URL,
      format: (url) => JSON.stringify(url.href),
    });
    formatterRegistry.register({
      accepts: (value: unknown): value is Point => value instanceof Point,
      format: (point) => `[ ${point.x}, ${point.y} ]`,
    });
  });

  test('loading keeps URLs and class instances', () => {
    const site = new URL('https://example.com/');
    const origin = new Point(1, 2);
    const config = new JsonConfiguration({ site, view: { origin }, marks: [origin] });
    assert.strictEqual(config.data.site, site);
    assert.strictEqual(config.get('view', 'origin'), origin);
    const marks = config.data.marks;
    assert.ok(Array.isArray(marks));
    assert.strictEqual(marks[0], origin);
  });

  test('class instances are values, not sections', () => {
    const config = new JsonConfiguration({ origin: new Point(1, 2) });
    assert.strictEqual(config.get('origin', 'x'), undefined);
    assert.throws(
      () => config.checkPath('origin'),
      (error: unknown) =>
        error instanceof ConfigurationError &&
        error.message === 'Cannot use "origin" as a section: it holds a Point',
    );
  });

  test('format uses the registered formatters', () => {
    const config = new JsonConfiguration({ site: new URL('https://example.com/'), origin: new Point(1, 2) });
    assert.strictEqual(config.format(), '{\n"site": "https://example.com/",\n"origin": [ 1, 2 ]\n}');
  });

  test('update into an object shares the values', () => {
    const site = new URL('https://example.com/');
    const origin = new Point(1, 2);
    const config = new JsonConfiguration({ site, view: { origin, zoom: 2 } });
    const target: ConfigObject = {};
    config.update(target, ['view', 'zoom']);
    assert.strictEqual(target.site, site);
    const view = target.view;
    assert.ok(isPlainObject(view));
    assert.strictEqual(view.origin, origin);
    assert.deepStrictEqual(Object.keys(view), ['origin']);
  });

  test('update into a file uses the registered formatters', () => {
    const config = new JsonConfiguration({ site: new URL('https://example.com/') });
    const file = tmpFile('values.json');
    config.update(file);
    assert.strictEqual(fs.readFileSync(file, 'utf-8'), '{\n"site": "https://example.com/"\n}\n');
  });
});

describe('JsonConfiguration format', () => {
  test('root entries start at column 0 by default', () => {
    const config = new JsonConfiguration(sample());
    assert.strictEqual(config.format(), SAMPLE_FLAT);
    assert.strictEqual(config.toString(), SAMPLE_FLAT);
  });

  test('rootIndent indents the root entries', () => {
    const config = new JsonConfiguration(sample());
    assert.strictEqual(config.format({ rootIndent: true }), SAMPLE_INDENTED);
  });

  test('excluded entries are left out', () => {
    const config = new JsonConfiguration(sample());
    const expected = [
      '{',
      '    "name": "demo",',
      '    "server": {',
      '        "ports": [ 80, 443 ]',
      '    }',
      '}',
    ].join('\n');
    assert.strictEqual(config.format({ rootIndent: true, exclude: ['debug', ['server', 'host']] }), expected);
  });

  test('a section emptied by exclusion prints as {}', () => {
    const config = new JsonConfiguration({ s: { only: 1 } });
    assert.strictEqual(config.format({ exclude: [['s', 'only']] }), '{\n"s": {}\n}');
  });

  test('pprint writes to a file', () => {
    const config = new JsonConfiguration(sample());
    const file = tmpFile('pprint.json');
    config.pprint(file, { rootIndent: true });
    assert.strictEqual(fs.readFileSync(file, 'utf-8'), SAMPLE_INDENTED + '\n');
  });
});

describe('prettyPrint', () => {
  test('empty objects and arrays', () => {
    assert.strictEqual(prettyPrint({}), '{}');
    assert.strictEqual(prettyPrint({ list: [] }), '{\n"list": []\n}');
  });

  test('arrays holding containers go multi-line', () => {
    const text = prettyPrint({ list: [[1, 2], 'x'] }, { indent: 2 });
    assert.strictEqual(text, ['{', '"list": [', '  [ 1, 2 ],', '  "x"', ']', '}'].join('\n'));
  });

  test('objects inside arrays are indented below the array', () => {
    const text = prettyPrint({ a: [{ b: 1 }] });
    assert.strictEqual(text, ['{', '"a": [', '    {', '        "b": 1', '    }', ']', '}'].join('\n'));
  });

  test('long arrays break at the line width', () => {
    const text = prettyPrint({ words: ['alpha', 'beta'] }, { indent: 2, rootIndent: true, lineWidth: 10 });
    assert.strictEqual(text, ['{', '  "words": [', '    "alpha",', '    "beta"', '  ]', '}'].join('\n'));
  });

  test('exclusion does not apply inside arrays', () => {
    const text = prettyPrint({ a: [{ b: 1 }] }, { exclude: [['a', 'b']] });
    assert.strictEqual(text, ['{', '"a": [', '    {', '        "b": 1', '    }', ']', '}'].join('\n'));
  });

  test('booleans as numbers', () => {
    assert.strictEqual(prettyPrint({ on: true, off: false }, { boolFormat: false }), '{\n"on": 1,\n"off": 0\n}');
  });

  test('strings are escaped', () => {
    assert.strictEqual(prettyPrint({ q: 'say "hi"\\' }), '{\n"q": "say \\"hi\\"\\\\"\n}');
  });

  test('byte arrays as text or hex', () => {
    const data = { raw: new Uint8Array([104, 105]) };
    assert.strictEqual(prettyPrint(data), '{\n"raw": "hi"\n}');
    assert.strictEqual(prettyPrint(data, { bytesFormat: null }), '{\n"raw": [ "68", "69" ]\n}');
  });

  test('null and numbers', () => {
    assert.strictEqual(prettyPrint({ n: null, x: 1.5, big: 10n }), '{\n"n": null,\n"x": 1.5,\n"big": 10\n}');
  });

  test('dates use the default registry', () => {
    const text = prettyPrint({ at: new Date('2024-01-02T03:04:05.000Z') });
    assert.strictEqual(text, '{\n"at": "2024-01-02T03:04:05.000Z"\n}');
  });

  test('custom registries', () => {
    const registry = new FormatterRegistry();
    registry.register({
      accepts: (value: unknown): value is URL => value instanceof URL,
      format: (url) => JSON.stringify(url.href),
    });
    assert.strictEqual(prettyPrint({ site: new URL('https://example.com/') }, {}, registry), '{\n"site": "https://example.com/"\n}');
    assert.throws(() => prettyPrint({ at: new Date(0) }, {}, registry), ConfigurationError);

    registry.register(dateFormatter);
    assert.strictEqual(prettyPrint({ at: new Date(0) }, {}, registry), '{\n"at": "1970-01-01T00:00:00.000Z"\n}');

    registry.clear();
    assert.throws(() => prettyPrint({ site: new URL('https://example.com/') }, {}, registry), ConfigurationError);
  });

  test('unknown values raise ConfigurationError', () => {
    assert.throws(
      () => prettyPrint({ m: new Map() }),
      (error: unknown) => error instanceof ConfigurationError && error.message === "Don't know how to encode Map",
    );
  });

  test('invalid options raise ConfigurationError', () => {
    assert.throws(() => prettyPrint({}, { indent: -1 }), /Invalid print options: indent/);
    assert.throws(() => prettyPrint({}, { bytesFormat: 'no-such-encoding' }), /Invalid print options: bytesFormat/);
  });
});
