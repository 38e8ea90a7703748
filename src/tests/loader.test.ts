import * as test from 'node:test';
import * as assert from 'node:assert';
import * as fs from 'node:fs';
import * as path from 'node:path';
import * as os from 'node:os';
import { createSite, loadSite } from '../loader.js';
import { loadConfig, parseConfig } from '../config.js';
import { ConfigError, MalformedModelError } from '../errors.js';
import { setLogLevel } from '../logger.js';
import { BEETLE_KEY } from './fixtures.js';

const { describe, it, before, beforeEach, afterEach } = test;

before(() => {
  setLogLevel('silent');
});

describe('parseConfig', () => {
  it('should resolve paths against the configuration file', () => {
    const config = parseConfig(
      { title: 'Beetles', model: 'model.json', definitions: 'defs.json', translation: 'pl.json' },
      '/keys/beetles/config.json'
    );

    assert.deepStrictEqual(config, {
      title: 'Beetles',
      modelPath: path.resolve('/keys/beetles/model.json'),
      definitionPaths: [path.resolve('/keys/beetles/defs.json')],
      translationPath: path.resolve('/keys/beetles/pl.json'),
      singlePage: false,
      copyImages: true,
      strict: false
    });
  });

  it('should let overrides win over the file', () => {
    const config = parseConfig(
      { model: 'm.json', definitions: ['a.json', 'b.json'], singlePage: false, copyImages: true },
      '/keys/config.json',
      { singlePage: true, copyImages: false }
    );

    assert.strictEqual(config.title, 'Identification key');
    assert.strictEqual(config.singlePage, true);
    assert.strictEqual(config.copyImages, false);
    assert.strictEqual(config.definitionPaths.length, 2);
  });

  it('should require a model', () => {
    assert.throws(
      () => parseConfig({ title: 'x' }, '/keys/config.json'),
      (err: unknown) => err instanceof ConfigError && err.message === '"model" is required'
    );
  });

  it('should reject switches that are not booleans', () => {
    assert.throws(() => parseConfig({ model: 'm.json', strict: 'yes' }, '/keys/config.json'), ConfigError);
  });
});

describe('createSite', () => {
  it('should build every index from decoded inputs', () => {
    const site = createSite({ model: BEETLE_KEY });

    assert.strictEqual(site.title, 'Identification key');
    assert.deepStrictEqual(site.index.ancestorChain('SpeciesB'), ['1', '2', 'SpeciesB']);
    assert.deepStrictEqual(Array.from(site.closure.closureOf('1')).sort(), ['SpeciesA', 'SpeciesB', 'SpeciesC']);
    assert.strictEqual(site.catalog.size, 0);
    assert.strictEqual(site.pages.pageOf('SpeciesB', 'species'), 'page/speciesb');
    assert.deepStrictEqual(site.warnings, []);
  });

  it('should give a species named like a characteristic a page of its own', () => {
    const site = createSite({
      model: { start: 'a', data: { a: [{ description: 'x', target: ['A', null] }] } }
    });

    assert.strictEqual(site.pages.pageOf('a', 'characteristic'), 'page/a');
    assert.strictEqual(site.pages.pageOf('A', 'species'), 'page/a_2');
    assert.strictEqual(site.pages.pageOf('a'), 'page/a');
    assert.deepStrictEqual(site.warnings, [{
      kind: 'NameCollision',
      message: 'species "A" shares the file name of "a"; using page/a_2.html',
      subject: 'A'
    }]);
  });

  it('should gather warnings in stage order', () => {
    const site = createSite({
      model: {
        start: 'a',
        data: {
          a: [{ description: 'x', next: 'b' }, { description: 'y', next: 'b' }, { description: 'z', next: 'q' }],
          b: [{ description: 'w', target: ['S', null] }]
        }
      },
      definitions: [{ path: '/keys/defs.json', data: { defs: ['w'], items: [{ image: 'w.png' }] } }],
      assetExists: () => false
    });

    assert.deepStrictEqual(site.warnings.map(w => w.kind), ['DanglingReference', 'AmbiguousParent', 'MissingAsset']);
  });
});

describe('loadSite', () => {
  let tempDir: string;

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'keypages-test-'));
  });

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  function writeJson(name: string, data: unknown): void {
    fs.writeFileSync(path.join(tempDir, name), JSON.stringify(data));
  }

  it('should read the files named by the configuration', async () => {
    writeJson('model.json', BEETLE_KEY);
    writeJson('defs.json', [{ defs: ['legs'], items: [{ image: 'legs.jpg' }, { image: 'none.jpg' }] }]);
    writeJson('pl.json', { Species: 'Gatunki' });
    writeJson('config.json', {
      title: 'Beetles',
      description: 'Common beetles',
      model: 'model.json',
      definitions: ['defs.json'],
      translation: 'pl.json'
    });
    fs.writeFileSync(path.join(tempDir, 'legs.jpg'), 'jpeg');

    const site = await loadSite(await loadConfig(path.join(tempDir, 'config.json')));

    assert.strictEqual(site.title, 'Beetles');
    assert.strictEqual(site.description, 'Common beetles');
    assert.strictEqual(site.model.nodes.size, 2);
    assert.deepStrictEqual(site.catalog.entriesFor('legs').map(e => e.image), [path.join(tempDir, 'legs.jpg'), undefined]);
    assert.deepStrictEqual(site.warnings.map(w => w.kind), ['MissingAsset']);
    assert.strictEqual(site.translator.translate('Species'), 'Gatunki');
  });

  it('should report an unreadable configuration', async () => {
    await assert.rejects(loadConfig(path.join(tempDir, 'missing.json')), ConfigError);
  });

  it('should report a model file that is not JSON', async () => {
    fs.writeFileSync(path.join(tempDir, 'model.json'), '{ start: ');
    writeJson('config.json', { model: 'model.json' });

    await assert.rejects(
      loadSite(await loadConfig(path.join(tempDir, 'config.json'))),
      (err: unknown) => err instanceof MalformedModelError && err.source === path.join(tempDir, 'model.json')
    );
  });
});
