/**
 * Error Registry
 * Central error definition registry with message template rendering.
 */

// ============================================================
// ERROR CATEGORIES
// ============================================================

/** Error category determining error ID prefix */
export type ErrorCategory =
  | 'syntax'
  | 'runtime'
  | 'path'
  | 'decode'
  | 'io'
  | 'lineage';

/** Error registry entry containing all metadata for a single error condition */
export interface ErrorDefinition {
  /** Format: LUA-{category letter}{3-digit} (e.g., LUA-R001) */
  readonly errorId: string;
  readonly category: ErrorCategory;
  /** Human-readable description (max 50 characters) */
  readonly description: string;
  /** Message template with {placeholder} syntax */
  readonly messageTemplate: string;
  /** What causes this error */
  readonly cause?: string | undefined;
  /** How to resolve this error */
  readonly resolution?: string | undefined;
}

// ============================================================
// ERROR REGISTRY
// ============================================================

/**
 * Registry of all error definitions with O(1) lookup.
 * Immutable after initialization.
 */
export interface ErrorRegistry {
  get(errorId: string): ErrorDefinition | undefined;
  has(errorId: string): boolean;
  readonly size: number;
  entries(): IterableIterator<[string, ErrorDefinition]>;
}

class ErrorRegistryImpl implements ErrorRegistry {
  private readonly byId: ReadonlyMap<string, ErrorDefinition>;

  constructor(definitions: readonly ErrorDefinition[]) {
    this.byId = new Map(definitions.map((def) => [def.errorId, def]));
  }

  get(errorId: string): ErrorDefinition | undefined {
    return this.byId.get(errorId);
  }

  has(errorId: string): boolean {
    return this.byId.has(errorId);
  }

  get size(): number {
    return this.byId.size;
  }

  entries(): IterableIterator<[string, ErrorDefinition]> {
    return this.byId.entries();
  }
}

const ERROR_DEFINITIONS: readonly ErrorDefinition[] = [
  // Syntax Errors (LUA-S0xx)
  {
    errorId: 'LUA-S001',
    category: 'syntax',
    description: 'Guest source failed to compile',
    messageTemplate: '{message}',
    cause: 'The source text is not valid Lua.',
    resolution:
      'Fix the source at the reported chunk and line. The message is the compiler output, unchanged.',
  },

  // Runtime Errors (LUA-R0xx)
  {
    errorId: 'LUA-R001',
    category: 'runtime',
    description: 'Guest code raised an error',
    messageTemplate: '{message}',
    cause:
      'A guest script called error(), or an operation failed at run time (e.g. calling nil).',
    resolution: 'Inspect the message and traceback; both are guest output.',
  },
  {
    errorId: 'LUA-R002',
    category: 'runtime',
    description: 'Interpreter failure',
    messageTemplate: 'Interpreter failure ({status}): {message}',
    cause:
      'The interpreter ran out of memory, or the error handler itself failed.',
  },
  {
    errorId: 'LUA-R003',
    category: 'runtime',
    description: 'Host function failed',
    messageTemplate: '{message}',
    cause: 'A host function exposed to the guest threw a non-bridge error.',
    resolution: 'The original error is available as the cause.',
  },

  // Path Errors (LUA-P0xx)
  {
    errorId: 'LUA-P001',
    category: 'path',
    description: 'Path does not resolve to a value',
    messageTemplate: 'Undefined path: {path}',
    cause:
      'A key along the path is absent, an intermediate value is not a table, or the final value is nil.',
  },
  {
    errorId: 'LUA-P002',
    category: 'path',
    description: 'Empty key path',
    messageTemplate: 'Invalid path: a key path needs at least one key',
    resolution: 'Pass at least one key. The global table is never addressed directly.',
  },
  {
    errorId: 'LUA-P003',
    category: 'path',
    description: 'Intermediate value is not a table',
    messageTemplate: 'Cannot assign {path}: {at} holds a {observed}, not a table',
    cause:
      'Assignment only creates missing tables; it never replaces an existing non-table value.',
    resolution: 'Overwrite the intermediate key first, or choose another path.',
  },
  {
    errorId: 'LUA-P004',
    category: 'path',
    description: 'Path does not resolve to a callable',
    messageTemplate: 'Undefined path: {path} is a {observed}, not a function',
  },

  // Decode Errors (LUA-D0xx)
  {
    errorId: 'LUA-D001',
    category: 'decode',
    description: 'Value does not match decoder',
    messageTemplate: 'Expected {expected}, got {observed}{where}',
  },

  // I/O Errors (LUA-I0xx)
  {
    errorId: 'LUA-I001',
    category: 'io',
    description: 'File could not be read',
    messageTemplate: 'Cannot read {path}: {reason}',
  },

  // Lineage Errors (LUA-L0xx)
  {
    errorId: 'LUA-L001',
    category: 'lineage',
    description: 'Stale VM state handle',
    messageTemplate:
      'Stale VM state: generation {generation} was consumed (current is {current})',
    cause: 'A handle was reused after being passed to an operation.',
    resolution: 'Always continue with the state an operation returned.',
  },
  {
    errorId: 'LUA-L002',
    category: 'lineage',
    description: 'Value belongs to another VM',
    messageTemplate: 'A {kind} value from another VM cannot be used here',
  },
  {
    errorId: 'LUA-L003',
    category: 'lineage',
    description: 'VM is closed',
    messageTemplate: 'The VM has been closed',
  },
  {
    errorId: 'LUA-L004',
    category: 'lineage',
    description: 'Value was released',
    messageTemplate: 'A {kind} value was released and cannot be used here',
    resolution: 'Read the value again with get() or refGet().',
  },
];

/**
 * Global error registry instance.
 * Read-only singleton initialized at module load.
 */
export const ERROR_REGISTRY: ErrorRegistry = new ErrorRegistryImpl(
  ERROR_DEFINITIONS
);

// ============================================================
// TEMPLATE RENDERING
// ============================================================

/**
 * Renders a message template by replacing placeholders with context values.
 *
 * Placeholder format: {varName}
 * Missing context values render as empty string.
 * Non-string values are coerced via String().
 * Invalid templates (unclosed braces) return template unchanged.
 *
 * @example
 * renderMessage("Expected {expected}, got {observed}", {expected: "int", observed: "float"})
 * // Returns: "Expected int, got float"
 */
export function renderMessage(
  template: string,
  context: Record<string, unknown>
): string {
  let result = '';
  let i = 0;

  while (i < template.length) {
    const open = template.indexOf('{', i);
    if (open === -1) {
      result += template.slice(i);
      break;
    }

    const close = template.indexOf('}', open + 1);
    if (close === -1) return template;

    result += template.slice(i, open);
    const value = context[template.slice(open + 1, close)];
    if (value !== undefined) {
      try {
        result += String(value);
      } catch {
        // Objects without a usable toString (e.g. null prototype)
        result += Object.prototype.toString.call(value);
      }
    }
    i = close + 1;
  }

  return result;
}
