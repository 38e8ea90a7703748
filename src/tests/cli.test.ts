import * as test from 'node:test';
import * as assert from 'node:assert';
import * as fs from 'node:fs';
import * as path from 'node:path';
import * as os from 'node:os';
import { main, parseArgs } from '../cli.js';
import { BEETLE_KEY } from './fixtures.js';

const { describe, it, mock, beforeEach, afterEach } = test;

describe('parseArgs', () => {
  it('should split the command, options and flags', () => {
    const args = parseArgs(['generate', '--config=key/config.json', '--outdir=out', '--single-page']);

    assert.strictEqual(args.tool, 'generate');
    assert.strictEqual(args.options.get('config'), 'key/config.json');
    assert.strictEqual(args.options.get('outdir'), 'out');
    assert.ok(args.flags.has('single-page'));
    assert.strictEqual(args.unknown, undefined);
  });

  it('should keep everything after the first = in a value', () => {
    assert.strictEqual(parseArgs(['dot', '--highlight=a=b']).options.get('highlight'), 'a=b');
  });

  it('should remember an unknown command', () => {
    const args = parseArgs(['draw', 'info']);

    assert.strictEqual(args.tool, undefined);
    assert.strictEqual(args.unknown, 'draw');
  });
});

describe('main', () => {
  let tempDir: string;
  let printed: string[];

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'keypages-test-'));
    printed = [];
    mock.method(console, 'log', (message: unknown) => {
      printed.push(String(message));
    });
    mock.method(console, 'error', () => {});
    mock.method(console, 'warn', () => {});
  });

  afterEach(() => {
    mock.restoreAll();
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  it('should print usage and fail without a command', async () => {
    assert.strictEqual(await main([]), 1);
    assert.ok(printed[0].startsWith('usage: keypages <command> [options]'));
  });

  it('should list the commands', async () => {
    assert.strictEqual(await main(['--listtools']), 0);
    assert.deepStrictEqual(printed, ['generate, info, dot, serve']);
  });

  it('should fail when a required option is missing', async () => {
    assert.strictEqual(await main(['info']), 1);
  });

  it('should summarize a model', async () => {
    const modelPath = path.join(tempDir, 'model.json');
    fs.writeFileSync(modelPath, JSON.stringify(BEETLE_KEY));

    assert.strictEqual(await main(['info', `--data=${modelPath}`]), 0);
    assert.deepStrictEqual(printed, [
      'start:           1',
      'characteristics: 2',
      'choices:         4',
      'leaves:          1',
      'unknown choices: 0',
      'species:         3',
      '  SpeciesA',
      '  SpeciesB',
      '  SpeciesC'
    ]);
  });

  it('should generate pages into the output directory', async () => {
    fs.writeFileSync(path.join(tempDir, 'model.json'), JSON.stringify(BEETLE_KEY));
    fs.writeFileSync(path.join(tempDir, 'config.json'), JSON.stringify({ title: 'Beetles', model: 'model.json' }));
    const outDir = path.join(tempDir, 'out');

    const code = await main(['generate', `--config=${path.join(tempDir, 'config.json')}`, `--outdir=${outDir}`]);

    assert.strictEqual(code, 0);
    assert.ok(fs.existsSync(path.join(outDir, 'index.html')));
    assert.ok(fs.existsSync(path.join(outDir, 'page', 'speciesb.html')));
    assert.ok(fs.existsSync(path.join(outDir, 'styles.css')));
  });
});
