#!/usr/bin/env node

import * as fs from 'fs';
import * as path from 'path';
import { fileURLToPath } from 'url';
import { Command, InvalidArgumentError } from 'commander';
import { compileStateMachine, serializeStateMachine } from '../compiler/stateMachine.js';
import { loadConfig } from '../config.js';
import { formatGraph } from '../graph/resolver.js';
import { createLogger } from '../logging.js';
import { runFlow } from '../runtime/FlowExecutor.js';
import type { FlowParams } from '../types/step.js';
import { importModule, loadFlow, type ModuleImporter } from './loadFlows.js';

/**
 * Parse one `key=value` pair. Values are JSON when they parse as JSON,
 * strings otherwise.
 */
export function parseParam(pair: string, previous: FlowParams = {}): FlowParams {
  const separator = pair.indexOf('=');
  if (separator <= 0) {
    throw new InvalidArgumentError(`Expected key=value, got '${pair}'`);
  }
  const key = pair.slice(0, separator).trim();
  const raw = pair.slice(separator + 1);
  let value: unknown;
  try {
    value = JSON.parse(raw);
  } catch {
    value = raw;
  }
  return { ...previous, [key]: value };
}

function parsePositiveInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new InvalidArgumentError(`Expected a positive integer, got '${value}'`);
  }
  return parsed;
}

export interface ProgramOptions {
  importer?: ModuleImporter;
  print?: (line: string) => void;
}

interface CommonOptions {
  flow?: string;
  param: FlowParams;
}

interface ConfiguredOptions extends CommonOptions {
  config?: string;
}

interface CompileOptions extends ConfiguredOptions {
  out?: string;
}

interface RunCommandOptions extends ConfiguredOptions {
  maxWorkers?: number;
  storeDir?: string;
  keep?: boolean;
}

export function createProgram(options: ProgramOptions = {}): Command {
  const importer = options.importer ?? importModule;
  const print = options.print ?? ((line: string) => console.log(line));
  const program = new Command();

  program
    .name('stepline')
    .description('Declare data pipelines as chained steps; run them locally or compile them to a state machine')
    .version('0.1.0');

  const withCommonOptions = (command: Command): Command =>
    command
      .option('-f, --flow <name>', 'Flow to use when the module exports several')
      .option('-p, --param <key=value>', 'Flow parameter (repeatable)', parseParam, {});

  // graph never reads configuration
  const withConfigOptions = (command: Command): Command =>
    withCommonOptions(command).option('-c, --config <path>', 'Config file used in place of ./stepline.yaml');

  withConfigOptions(
    program
      .command('compile <module>')
      .description('Compile a flow into a state-machine document')
      .option('-o, --out <dir>', 'Output directory (default: buildDir from config)')
  ).action(async (modulePath: string, opts: CompileOptions) => {
    const config = await loadConfig({ configFile: opts.config });
    const declared = await loadFlow(modulePath, opts.flow, importer);
    const graph = declared(opts.param);
    const document = compileStateMachine(graph, config);

    const outDir = path.resolve(opts.out ?? config.buildDir, graph.name);
    await fs.promises.mkdir(outDir, { recursive: true });
    const target = path.join(outDir, 'statemachine.json');
    await fs.promises.writeFile(target, `${serializeStateMachine(document)}\n`);
    print(`Compiled flow '${graph.name}' (${Object.keys(document.States).length} states) to ${target}`);
    if (graph.schedule) {
      print(`Schedule: ${graph.schedule}`);
    }
  });

  withConfigOptions(
    program
      .command('run <module>')
      .description('Run a flow on this machine')
      .option('-w, --max-workers <n>', 'Bound on in-flight fan-out elements', parsePositiveInt)
      .option('--store-dir <dir>', 'Directory for intermediate values (default: a temp dir)')
      .option('--keep', 'Keep intermediate values after the run')
  ).action(async (modulePath: string, opts: RunCommandOptions) => {
    const config = await loadConfig({ configFile: opts.config });
    const declared = await loadFlow(modulePath, opts.flow, importer);
    const graph = declared(opts.param);
    const logger = createLogger('stepline.runner', config.logging);

    const storeDir = opts.storeDir ?? config.local.storeDir;
    const result = await runFlow(graph, opts.param, {
      config: { ...config, local: { ...config.local, storeDir } },
      logger,
      maxWorkers: opts.maxWorkers,
      keepIntermediate: opts.keep,
    });
    print(result === undefined ? 'undefined' : JSON.stringify(result, null, 2));
  });

  withCommonOptions(
    program.command('graph <module>').description('Print the resolved entries of a flow')
  ).action(async (modulePath: string, opts: CommonOptions) => {
    const declared = await loadFlow(modulePath, opts.flow, importer);
    const graph = declared(opts.param);
    print(`flow ${graph.name}${graph.schedule ? ` (${graph.schedule})` : ''}`);
    print(formatGraph(graph));
  });

  return program;
}

async function main(): Promise<void> {
  const program = createProgram();

  try {
    await program.parseAsync(process.argv);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    console.error(message);
    process.exitCode = 1;
  }
}

function isEntryPoint(): boolean {
  const script = process.argv[1];
  if (!script) {
    return false;
  }
  try {
    return fs.realpathSync(script) === fs.realpathSync(fileURLToPath(import.meta.url));
  } catch {
    return false;
  }
}

if (isEntryPoint()) {
  void main();
}
