#!/usr/bin/env node
import fs from 'fs-extra';
import * as path from 'node:path';
import { fileURLToPath } from 'node:url';
import { loadConfig } from './config.js';
import { createSite, loadSite, readModelFile } from './loader.js';
import { generateSite, writeOutput } from './generator.js';
import { DotGraphRenderer, graphView } from './graph-render.js';
import { modelInfo } from './model.js';
import { startServer } from './server.js';
import { describeError } from './errors.js';
import { logger, logWarnings, setLogLevel } from './logger.js';

export const TOOLS = ['generate', 'info', 'dot', 'serve'] as const;
export type Tool = typeof TOOLS[number];

/**
 * Parsed command line: the command plus `--key=value` and `--flag` options
 */
export interface CliArgs {
  tool?: Tool;
  options: Map<string, string>;
  flags: Set<string>;
  /** Unrecognized command, if any */
  unknown?: string;
}

const USAGE = `usage: keypages <command> [options]

commands:
  generate --config=PATH --outdir=PATH [--single-page] [--strict] [--nophotos]
  info     --data=MODEL
  dot      --data=MODEL [--highlight=ID]
  serve    --config=PATH [--outdir=PATH] [--port=3000]

options:
  --logall     log all messages
  --listtools  list commands`;

function isTool(value: string): value is Tool {
  return TOOLS.some(tool => tool === value);
}

export function parseArgs(argv: readonly string[]): CliArgs {
  const options = new Map<string, string>();
  const flags = new Set<string>();
  const parsed: CliArgs = { options, flags };

  for (const arg of argv) {
    if (arg.startsWith('--')) {
      const eq = arg.indexOf('=');
      if (eq > 2) {
        options.set(arg.slice(2, eq), arg.slice(eq + 1));
      } else {
        flags.add(arg.slice(2));
      }
    } else if (parsed.tool === undefined && parsed.unknown === undefined) {
      if (isTool(arg)) {
        parsed.tool = arg;
      } else {
        parsed.unknown = arg;
      }
    }
  }
  return parsed;
}

function requireOption(args: CliArgs, name: string): string {
  const value = args.options.get(name);
  if (!value) {
    throw new Error(`missing --${name}=...`);
  }
  return value;
}

async function runGenerate(args: CliArgs): Promise<number> {
  const config = await loadConfig(requireOption(args, 'config'), {
    singlePage: args.flags.has('single-page') ? true : undefined,
    copyImages: args.flags.has('nophotos') ? false : undefined,
    strict: args.flags.has('strict') ? true : undefined
  });
  const outDir = path.resolve(requireOption(args, 'outdir'));

  logger.info('starting generator');
  const site = await loadSite(config);
  const result = generateSite(site, { singlePage: config.singlePage, copyImages: config.copyImages });
  const written = await writeOutput(outDir, result.files, result.images);

  logWarnings([...result.warnings, ...written.warnings]);
  for (const failure of result.failures) {
    logger.error(`${failure.pageId}: ${describeError(failure.error)}`);
  }
  logger.info(`Wrote ${written.written} files to ${outDir}`);
  logger.info(`generated page: file://${path.join(outDir, 'index.html')}`);
  return result.failures.length > 0 ? 1 : 0;
}

async function runInfo(args: CliArgs): Promise<number> {
  const modelPath = requireOption(args, 'data');
  const site = createSite({ model: await readModelFile(modelPath), modelSource: modelPath });
  const info = modelInfo(site.model);

  console.log(`start:           ${info.start}`);
  console.log(`characteristics: ${info.characteristics}`);
  console.log(`choices:         ${info.choices}`);
  console.log(`leaves:          ${info.leaves}`);
  console.log(`unknown choices: ${info.unknownChoices}`);
  console.log(`species:         ${info.species}`);
  for (const label of site.closure.allSpecies()) {
    console.log(`  ${label}`);
  }
  logWarnings(site.warnings);
  return 0;
}

async function runDot(args: CliArgs): Promise<number> {
  const modelPath = requireOption(args, 'data');
  const site = createSite({ model: await readModelFile(modelPath), modelSource: modelPath });
  const { nodes, edges } = graphView(site.index);
  process.stdout.write(new DotGraphRenderer().render(nodes, edges, args.options.get('highlight')));
  logWarnings(site.warnings);
  return 0;
}

async function runServe(args: CliArgs): Promise<number> {
  const config = await loadConfig(requireOption(args, 'config'));
  const site = await loadSite(config);
  logWarnings(site.warnings);

  const portArg = args.options.get('port');
  const port = portArg ? parseInt(portArg, 10) : 3000;
  if (isNaN(port) || port <= 0) {
    throw new Error(`invalid --port=${portArg}`);
  }
  const outdir = args.options.get('outdir');
  startServer(site, { port, staticDir: outdir ? path.resolve(outdir) : undefined });
  return 0;
}

const HANDLERS: Record<Tool, (args: CliArgs) => Promise<number>> = {
  generate: runGenerate,
  info: runInfo,
  dot: runDot,
  serve: runServe
};

export async function main(argv: readonly string[]): Promise<number> {
  const args = parseArgs(argv);

  if (args.flags.has('listtools')) {
    console.log(TOOLS.join(', '));
    return 0;
  }

  setLogLevel(args.flags.has('logall') ? 'debug' : 'info');

  if (!args.tool) {
    if (args.unknown) {
      logger.error(`unknown command: ${args.unknown}`);
    }
    console.log(USAGE);
    return 1;
  }

  try {
    return await HANDLERS[args.tool](args);
  } catch (err) {
    logger.error(describeError(err));
    return 1;
  }
}

function isEntryPoint(): boolean {
  const entry = process.argv[1];
  // npm links the bin, so compare real paths
  return entry !== undefined && fs.existsSync(entry) && fs.realpathSync(entry) === fs.realpathSync(fileURLToPath(import.meta.url));
}

if (isEntryPoint()) {
  main(process.argv.slice(2)).then(
    code => {
      // serve keeps running until a signal arrives
      if (code !== 0) process.exitCode = code;
    },
    (err: unknown) => {
      logger.error(describeError(err));
      process.exitCode = 1;
    }
  );
}
