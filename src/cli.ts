#!/usr/bin/env node
/**
 * begend CLI - Tokenize and parse begend programs
 *
 * Usage:
 *   begend program.bg other.bg
 *   begend --tokens --json '{name}.json' program.bg
 *   begend --help
 */

import * as fs from 'fs/promises';
import {
  CONFIG_FILE_NAME,
  loadConfig,
  withOverrides,
  type BegendConfig,
  type OutputConfig,
} from './config.js';
import {
  consoleIO,
  DEMO_NAME,
  DEMO_PROGRAM,
  formatFailure,
  processBatch,
  readVersion,
  type SourceInput,
} from './cli-shared.js';

/**
 * Parsed command-line arguments
 */
export type ParsedCliArgs =
  | {
      mode: 'run';
      files: string[];
      configPath: string | undefined;
      overrides: Partial<OutputConfig>;
    }
  | { mode: 'help' }
  | { mode: 'version' };

const VALUE_FLAGS = new Set(['--json', '--indent', '--config']);

/**
 * Parse command-line arguments
 *
 * @param argv - Raw command-line arguments (typically process.argv.slice(2))
 * @returns Parsed command object
 */
export function parseCliArgs(argv: string[]): ParsedCliArgs {
  if (argv.includes('--help') || argv.includes('-h')) {
    return { mode: 'help' };
  }
  if (argv.includes('--version') || argv.includes('-v')) {
    return { mode: 'version' };
  }

  const files: string[] = [];
  const overrides: { -readonly [K in keyof OutputConfig]?: OutputConfig[K] } =
    {};
  let configPath: string | undefined;

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (arg === undefined) continue;

    if (!arg.startsWith('-')) {
      files.push(arg);
      continue;
    }

    let value: string | undefined;
    if (VALUE_FLAGS.has(arg)) {
      value = argv[i + 1];
      if (value === undefined || value.startsWith('-')) {
        throw new Error(`${arg} requires an argument`);
      }
      i++; // Skip the flag's value
    }

    switch (arg) {
      case '--tokens':
        overrides.tokens = true;
        break;
      case '--no-tokens':
        overrides.tokens = false;
        break;
      case '--no-tree':
        overrides.tree = false;
        break;
      case '--no-json':
        overrides.json = null;
        break;
      case '--json':
        overrides.json = value;
        break;
      case '--indent': {
        const indent = Number(value);
        if (!Number.isInteger(indent) || indent < 0) {
          throw new Error(
            `Invalid indent: ${value}. Expected a non-negative integer`
          );
        }
        overrides.indent = indent;
        break;
      }
      case '--config':
        configPath = value;
        break;
      default:
        throw new Error(`Unknown option: ${arg}`);
    }
  }

  return { mode: 'run', files, configPath, overrides };
}

/**
 * Display help information
 */
function showHelp(): void {
  console.log(`begend - tokenize and parse begend programs

Usage:
  begend [options] [files...]   Parse each file (a demo program when none given)
  begend --help                 Show this help message
  begend --version              Show version information

Options:
  --tokens / --no-tokens        Print the token listing
  --no-tree                     Do not print the syntax tree
  --json <path>                 Write the JSON tree to <path> ({name} = input name)
  --no-json                     Do not write JSON
  --indent <n>                  JSON indentation (default 2)
  --config <path>               Configuration file (default ./begend.yaml)

Exit codes:
  0  every input parsed
  1  at least one input failed
  2  usage or configuration error`);
}

/**
 * Read every input file. Unreadable files are reported and left out.
 */
async function readInputs(
  files: string[]
): Promise<{ inputs: SourceInput[]; unreadable: number }> {
  const inputs: SourceInput[] = [];
  let unreadable = 0;
  for (const file of files) {
    try {
      inputs.push({ name: file, source: await fs.readFile(file, 'utf-8') });
    } catch (err) {
      for (const line of formatFailure(file, err)) console.error(line);
      unreadable++;
    }
  }
  return { inputs, unreadable };
}

/**
 * Entry point for begend binary
 */
async function main(): Promise<number> {
  let args: ParsedCliArgs;
  try {
    args = parseCliArgs(process.argv.slice(2));
  } catch (err) {
    console.error(`Error: ${err instanceof Error ? err.message : String(err)}`);
    return 2;
  }

  if (args.mode === 'help') {
    showHelp();
    return 0;
  }
  if (args.mode === 'version') {
    console.log(`begend ${readVersion()}`);
    return 0;
  }

  let config: BegendConfig;
  try {
    config = withOverrides(
      loadConfig(process.cwd(), args.configPath),
      args.overrides
    );
  } catch (err) {
    for (const line of formatFailure(args.configPath ?? CONFIG_FILE_NAME, err)) {
      console.error(line);
    }
    return 2;
  }

  const { inputs, unreadable } =
    args.files.length > 0
      ? await readInputs(args.files)
      : { inputs: [{ name: DEMO_NAME, source: DEMO_PROGRAM }], unreadable: 0 };

  const failures = processBatch(inputs, config, consoleIO) + unreadable;
  return failures > 0 ? 1 : 0;
}

// Only run main if this is the entry point (not imported)
const shouldRunMain =
  process.env['NODE_ENV'] !== 'test' &&
  !process.env['VITEST'] &&
  !process.env['VITEST_WORKER_ID'];

if (shouldRunMain) {
  main().then(
    (code) => {
      process.exitCode = code;
    },
    (err: unknown) => {
      console.error(`Error: ${err instanceof Error ? err.message : String(err)}`);
      process.exitCode = 1;
    }
  );
}
