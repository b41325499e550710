#!/usr/bin/env node
/**
 * CLI Execution Entry Point
 *
 * Implements main(), parseArgs(), and executeScript() for the
 * lua-bridge-exec binary. Handles file execution and stdin input.
 */

import * as fs from 'fs/promises';
import * as fsSync from 'fs';
import * as path from 'path';
import { fileURLToPath } from 'url';
import { createDefaultConfig, loadConfig } from './config.js';
import {
  close,
  encodeInt,
  encodeString,
  encodeTable,
  init,
  run,
  runFile,
  set,
  unwrap,
} from './index.js';
import type { LuaValue } from './index.js';
import { formatOutput, formatError, determineExitCode } from './cli-shared.js';

/**
 * Parsed command-line arguments
 */
export type ParsedArgs =
  | { mode: 'exec'; file: string; args: string[] }
  | { mode: 'help' | 'version' };

/**
 * Parse command-line arguments into structured command
 *
 * @param argv - Raw command-line arguments (typically process.argv.slice(2))
 * @returns Parsed command object
 */
export function parseArgs(argv: string[]): ParsedArgs {
  // Check for --help or --version flags in any position
  if (argv.includes('--help') || argv.includes('-h')) {
    return { mode: 'help' };
  }
  if (argv.includes('--version') || argv.includes('-v')) {
    return { mode: 'version' };
  }

  const firstArg = argv[0];
  if (!firstArg) {
    throw new Error('Missing file argument');
  }
  if (firstArg.startsWith('-') && firstArg !== '-') {
    throw new Error(`Unknown option: ${firstArg}`);
  }

  // Everything after the script belongs to the script
  return { mode: 'exec', file: firstArg, args: argv.slice(1) };
}

/**
 * Execute a script file with arguments
 *
 * Options come from .lua-bridge.yaml in the working directory. The script
 * sees its name as arg[0] and its arguments as arg[1..n].
 *
 * @param file - File path or '-' for stdin
 * @param args - Command-line arguments for the script
 * @returns The values the script returned
 * @throws the LuaError of a failed run
 */
export function executeScript(file: string, args: string[]): LuaValue[] {
  const config = loadConfig(process.cwd()) ?? createDefaultConfig();
  let state = init({
    libraries: config.libraries,
    ...(config.packagePath !== undefined
      ? { packagePath: config.packagePath }
      : {}),
  });

  try {
    const argTable = encodeTable(
      state,
      [file, ...args].map((value, index) => [index, value] as const),
      encodeInt,
      encodeString
    );
    state = unwrap(set(argTable.state, ['arg'], argTable.value));

    const result =
      file === '-'
        ? run(state, fsSync.readFileSync(0, 'utf-8'), { chunkName: 'stdin' })
        : runFile(state, file);
    const returned = unwrap(result);
    state = returned.state;
    return returned.values;
  } finally {
    close(state);
  }
}

async function readVersion(): Promise<string> {
  const packageJsonPath = path.resolve(
    path.dirname(fileURLToPath(import.meta.url)),
    '../package.json'
  );
  const packageJson: unknown = JSON.parse(
    await fs.readFile(packageJsonPath, 'utf-8')
  );
  if (
    typeof packageJson === 'object' &&
    packageJson !== null &&
    'version' in packageJson &&
    typeof packageJson.version === 'string'
  ) {
    return packageJson.version;
  }
  throw new Error(`No version in ${packageJsonPath}`);
}

/**
 * Entry point for the lua-bridge-exec binary
 *
 * Parses command-line arguments, executes scripts, and handles errors.
 * Writes results to stdout and errors to stderr.
 * Sets process.exit(1) on any error.
 */
export async function main(): Promise<void> {
  try {
    const parsed = parseArgs(process.argv.slice(2));

    switch (parsed.mode) {
      case 'help':
        console.log(`Usage:
  lua-bridge-exec <script.lua> [args...]  Execute a Lua script file
  lua-bridge-exec -                       Read script from stdin
  lua-bridge-exec --help                  Show this help message
  lua-bridge-exec --version               Show version information

Arguments:
  args are passed to the script in the global table arg (arg[0] is the script)

Exit status:
  true or no result exits 0, false or nil exits 1, an integer 0..255 is used
  as is; a string second result is printed

Examples:
  lua-bridge-exec script.lua
  lua-bridge-exec script.lua arg1 arg2
  echo "print('hello')" | lua-bridge-exec -`);
        return;

      case 'version':
        console.log(await readVersion());
        return;

      case 'exec': {
        const values = executeScript(parsed.file, parsed.args);
        const { code, message } = determineExitCode(values);

        // Output message if present, otherwise output the results
        if (message !== undefined) {
          console.log(message);
        } else if (values.length > 0) {
          console.log(values.map(formatOutput).join('\t'));
        }

        process.exit(code);
      }
    }
  } catch (err) {
    if (err instanceof Error) {
      console.error(formatError(err));
    } else {
      console.error(formatError(new Error(String(err))));
    }
    process.exit(1);
  }
}

// Only run main if not in test environment
const shouldRunMain =
  process.env['NODE_ENV'] !== 'test' &&
  !process.env['VITEST'] &&
  !process.env['VITEST_WORKER_ID'];

if (shouldRunMain) {
  main().catch((err: unknown) => {
    console.error(String(err));
    process.exit(1);
  });
}
