/**
 * Lua Bridge Error Classes and Factory
 * Discriminated error kinds with registry-based error codes
 */

import type { LuaValue } from './runtime/core/values.js';
import type { GuestLocation } from './source-location.js';
import {
  ERROR_REGISTRY,
  renderMessage,
  type ErrorCategory,
} from './error-registry.js';

// ============================================================
// ERROR DATA
// ============================================================

/** Discriminant shared by every bridge error */
export type LuaErrorKind =
  | 'syntax'
  | 'runtime'
  | 'undefined-path'
  | 'invalid-path'
  | 'path-collision'
  | 'decode'
  | 'io'
  | 'lineage';

/** Structured error data for host applications */
export interface LuaErrorData {
  readonly kind: LuaErrorKind;
  readonly errorId: string;
  readonly message: string;
  readonly location?: GuestLocation | undefined;
  readonly context?: Record<string, unknown> | undefined;
}

/** Look up a definition and render its template, checking the category */
function render(
  errorId: string,
  category: ErrorCategory,
  context: Record<string, unknown>
): string {
  const definition = ERROR_REGISTRY.get(errorId);
  if (!definition) {
    throw new TypeError(`Unknown error ID: ${errorId}`);
  }
  if (definition.category !== category) {
    throw new TypeError(`Expected ${category} error ID, got: ${errorId}`);
  }
  return renderMessage(definition.messageTemplate, context);
}

function formatPath(keys: readonly string[]): string {
  return keys.join('.');
}

// ============================================================
// BASE ERROR CLASS
// ============================================================

/**
 * Base class for all bridge errors.
 * `kind` tells callers which subclass they hold; narrow on it or use instanceof.
 */
export abstract class LuaError extends Error {
  abstract readonly kind: LuaErrorKind;
  readonly errorId: string;
  readonly location: GuestLocation | undefined;
  readonly context: Record<string, unknown>;

  protected constructor(
    errorId: string,
    message: string,
    context: Record<string, unknown>,
    location?: GuestLocation,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.errorId = errorId;
    this.location = location;
    this.context = context;
  }

  /** Get structured error data for custom formatting */
  toData(): LuaErrorData {
    return {
      kind: this.kind,
      errorId: this.errorId,
      message: this.message,
      location: this.location,
      context: this.context,
    };
  }

  /** Format error for display (can be overridden by host) */
  format(formatter?: (data: LuaErrorData) => string): string {
    if (formatter) return formatter(this.toData());
    return this.message;
  }
}

// ============================================================
// SPECIALIZED ERROR CLASSES
// ============================================================

/** Guest source failed to compile */
export class LuaSyntaxError extends LuaError {
  readonly kind = 'syntax' as const;

  constructor(message: string, location?: GuestLocation) {
    super('LUA-S001', render('LUA-S001', 'syntax', { message }), {}, location);
    this.name = 'LuaSyntaxError';
  }
}

/** Guest execution failed, or a host function failed while the guest ran */
export class LuaRuntimeError extends LuaError {
  readonly kind = 'runtime' as const;
  /** Guest stack traceback captured when the error was raised */
  readonly traceback: string | undefined;
  /** The raw error object when the guest raised something other than a string */
  readonly errorValue: LuaValue | undefined;

  constructor(
    errorId: 'LUA-R001' | 'LUA-R002' | 'LUA-R003',
    context: Record<string, unknown> & { message: string },
    details: {
      location?: GuestLocation | undefined;
      traceback?: string | undefined;
      errorValue?: LuaValue | undefined;
      cause?: unknown;
    } = {}
  ) {
    super(
      errorId,
      render(errorId, 'runtime', context),
      context,
      details.location,
      'cause' in details ? { cause: details.cause } : undefined
    );
    this.name = 'LuaRuntimeError';
    this.traceback = details.traceback;
    this.errorValue = details.errorValue;
  }
}

/** Path is absent, nil, or not callable where a function was required */
export class UndefinedPathError extends LuaError {
  readonly kind = 'undefined-path' as const;
  readonly keys: readonly string[];

  constructor(keys: readonly string[], notCallable?: { observed: string }) {
    const errorId = notCallable ? 'LUA-P004' : 'LUA-P001';
    const context = { path: formatPath(keys), ...notCallable };
    super(errorId, render(errorId, 'path', context), context);
    this.name = 'UndefinedPathError';
    this.keys = keys;
  }
}

/** Empty key path */
export class InvalidPathError extends LuaError {
  readonly kind = 'invalid-path' as const;

  constructor() {
    super('LUA-P002', render('LUA-P002', 'path', {}), {});
    this.name = 'InvalidPathError';
  }
}

/** Assignment walked into an existing value that is not a table */
export class PathCollisionError extends LuaError {
  readonly kind = 'path-collision' as const;
  readonly keys: readonly string[];
  /** Prefix of `keys` that holds the non-table value */
  readonly at: readonly string[];

  constructor(keys: readonly string[], at: readonly string[], observed: string) {
    const context = { path: formatPath(keys), at: formatPath(at), observed };
    super('LUA-P003', render('LUA-P003', 'path', context), context);
    this.name = 'PathCollisionError';
    this.keys = keys;
    this.at = at;
  }
}

/** Value did not match the decoder's expected shape */
export class DecodeFailure extends LuaError {
  readonly kind = 'decode' as const;
  readonly expected: string;
  readonly observed: string;
  /** Position inside a composite value, outermost first (empty at top level) */
  readonly path: readonly string[];

  constructor(expected: string, observed: string, path: readonly string[] = []) {
    const where = path.length > 0 ? ` at ${path.join('')}` : '';
    const context = { expected, observed, where };
    super('LUA-D001', render('LUA-D001', 'decode', context), context);
    this.name = 'DecodeFailure';
    this.expected = expected;
    this.observed = observed;
    this.path = path;
  }

  /** Same failure, nested one level deeper */
  within(segment: string): DecodeFailure {
    return new DecodeFailure(this.expected, this.observed, [
      segment,
      ...this.path,
    ]);
  }
}

/** A file could not be read */
export class IoError extends LuaError {
  readonly kind = 'io' as const;
  readonly path: string;

  constructor(path: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    const context = { path, reason };
    super('LUA-I001', render('LUA-I001', 'io', context), context, undefined, {
      cause,
    });
    this.name = 'IoError';
    this.path = path;
  }
}

/** Why a handle or value was rejected */
export type LineageViolation =
  | 'stale-state'
  | 'foreign-value'
  | 'closed'
  | 'released';

const LINEAGE_IDS: Record<LineageViolation, string> = {
  'stale-state': 'LUA-L001',
  'foreign-value': 'LUA-L002',
  closed: 'LUA-L003',
  released: 'LUA-L004',
};

/**
 * A state handle, value or reference was used outside its lineage.
 * Thrown rather than returned: it signals caller misuse.
 */
export class LineageError extends LuaError {
  readonly kind = 'lineage' as const;
  readonly reason: LineageViolation;

  constructor(reason: LineageViolation, context: Record<string, unknown> = {}) {
    const errorId = LINEAGE_IDS[reason];
    super(errorId, render(errorId, 'lineage', context), context);
    this.name = 'LineageError';
    this.reason = reason;
  }
}

/** Union of concrete error classes; a switch on `kind` is exhaustive */
export type AnyLuaError =
  | LuaSyntaxError
  | LuaRuntimeError
  | UndefinedPathError
  | InvalidPathError
  | PathCollisionError
  | DecodeFailure
  | IoError
  | LineageError;

/** Type guard for bridge errors */
export function isLuaError(value: unknown): value is AnyLuaError {
  return value instanceof LuaError;
}
