/**
 * Lua Bridge Module
 * Exports the runtime, result helpers, errors and configuration
 */

export * from './runtime/index.js';

export { err, ok, unwrap } from './result.js';
export type { Err, Ok, Result } from './result.js';

export type { GuestLocation } from './source-location.js';
export { parseGuestLocation } from './source-location.js';

// ============================================================
// ERROR TAXONOMY
// ============================================================
export {
  type ErrorCategory,
  type ErrorDefinition,
  type ErrorRegistry,
  ERROR_REGISTRY,
  renderMessage,
} from './error-registry.js';

export {
  type AnyLuaError,
  DecodeFailure,
  InvalidPathError,
  IoError,
  isLuaError,
  LineageError,
  type LineageViolation,
  LuaError,
  type LuaErrorData,
  type LuaErrorKind,
  LuaRuntimeError,
  LuaSyntaxError,
  PathCollisionError,
  UndefinedPathError,
} from './error-classes.js';

// ============================================================
// CONFIGURATION
// ============================================================
export {
  type BridgeConfig,
  CONFIG_FILE_NAME,
  createDefaultConfig,
  loadConfig,
} from './config.js';
