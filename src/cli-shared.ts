/**
 * CLI Shared Utilities
 * Formatting and exit-code helpers for lua-bridge-exec
 */

import {
  IoError,
  LuaRuntimeError,
  LuaSyntaxError,
  isLuaError,
} from './error-classes.js';
import type { LuaValue } from './runtime/index.js';

/** Format a float the way the guest prints it */
function formatFloat(value: number): string {
  if (Number.isNaN(value)) return 'nan';
  if (value === Infinity) return 'inf';
  if (value === -Infinity) return '-inf';
  return Number.isInteger(value) ? `${value}.0` : String(value);
}

/**
 * Convert a result value to a human-readable string
 *
 * @param value - The value to format
 * @returns Formatted string representation
 */
export function formatOutput(value: LuaValue): string {
  switch (value.kind) {
    case 'nil':
      return 'nil';
    case 'bool':
    case 'int':
      return String(value.value);
    case 'float':
      return formatFloat(value.value);
    case 'string':
      return value.value;
    default:
      return `[${value.kind}]`;
  }
}

/**
 * Format error for stderr output
 *
 * @param err - The error to format
 * @returns Formatted error message
 */
export function formatError(err: Error): string {
  if (err instanceof LuaSyntaxError) {
    return `Syntax error: ${err.message}`;
  }

  if (err instanceof LuaRuntimeError) {
    const base = `Runtime error: ${err.message}`;
    return err.traceback !== undefined ? `${base}\n${err.traceback}` : base;
  }

  if (err instanceof IoError) {
    const cause = err.cause;
    if (
      cause instanceof Error &&
      'code' in cause &&
      cause.code === 'ENOENT'
    ) {
      return `File not found: ${err.path}`;
    }
    return err.message;
  }

  if (isLuaError(err)) {
    return `${err.errorId}: ${err.message}`;
  }

  return err.message;
}

/**
 * Determine exit code from script results
 *
 * - no results / true: exit 0
 * - false / nil: exit 1
 * - integer 0..255: exit with that code, other integers exit 1
 * - anything else: exit 0
 * A non-empty string second result is printed as the message.
 *
 * @param values - The values the script returned
 * @returns Exit code and optional message
 */
export function determineExitCode(values: readonly LuaValue[]): {
  code: number;
  message?: string;
} {
  const [first, second] = values;
  const code = exitCodeOf(first);
  if (second?.kind === 'string' && second.value !== '') {
    return { code, message: second.value };
  }
  return { code };
}

function exitCodeOf(value: LuaValue | undefined): number {
  if (value === undefined) return 0;
  switch (value.kind) {
    case 'nil':
      return 1;
    case 'bool':
      return value.value ? 0 : 1;
    case 'int':
      return value.value >= 0 && value.value <= 255 ? value.value : 1;
    default:
      return 0;
  }
}
