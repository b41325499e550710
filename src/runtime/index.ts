/**
 * Lua Bridge Runtime
 *
 * Public API for embedding the guest interpreter.
 *
 * Module Structure:
 * - core/: Bridge implementation
 *   - types.ts: Public types (BridgeOptions, callbacks, results)
 *   - values.ts: LuaValue, ValueRef and value utilities
 *   - session.ts: VmState handles and the session behind them
 *   - stack.ts: Stack marshalling (internal)
 *   - codec.ts: Encoders and decoders
 *   - paths.ts: Key path accessor (get, refGet, set)
 *   - chunks.ts: Loading and running source
 *   - callable.ts: Host function exposure and calls
 *   - context.ts: VM factory (init, close)
 */

// ============================================================
// PUBLIC TYPES
// ============================================================

export type {
  BridgeCallbacks,
  BridgeOptions,
  Encoded,
  ErrorEvent,
  ExposeOptions,
  HostCallEvent,
  HostFunction,
  HostReturnEvent,
  LoadOptions,
  ObservabilityCallbacks,
  Returned,
  StandardLibrary,
} from './core/types.js';

export { STANDARD_LIBRARIES } from './core/types.js';

// ============================================================
// VALUE TYPES AND UTILITIES
// ============================================================

export type {
  CompositeKind,
  LuaBool,
  LuaComposite,
  LuaFloat,
  LuaInt,
  LuaNil,
  LuaNonNil,
  LuaPrimitive,
  LuaString,
  LuaValue,
  LuaValueKind,
} from './core/values.js';

export {
  describeValue,
  GuestHandle,
  isComposite,
  isValueRef,
  NIL,
  release,
  ValueRef,
} from './core/values.js';

// ============================================================
// VM LIFECYCLE
// ============================================================

export type { LuaSession, VmState } from './core/session.js';

export { close, init } from './core/context.js';

// ============================================================
// CODEC
// ============================================================

export type { Decoder, Encoder } from './core/codec.js';

export {
  decode,
  decoders,
  encodeBool,
  encodeFloat,
  encodeInt,
  encodeList,
  encodeNil,
  encodeRecord,
  encodeString,
  encodeTable,
  INT_MAX,
  INT_MIN,
} from './core/codec.js';

// ============================================================
// PATHS, CHUNKS AND CALLS
// ============================================================

export type { KeyPath } from './core/paths.js';

export { get, refGet, set } from './core/paths.js';

export type { Loaded } from './core/chunks.js';

export {
  Chunk,
  load,
  loadFile,
  run,
  runChunk,
  runFile,
} from './core/chunks.js';

export {
  call,
  callByName,
  encodeFunction,
  expose,
} from './core/callable.js';
