/**
 * Function Exposure Bridge
 *
 * Host closures become guest functions, and guest functions (or host
 * functions exposed earlier) are called from the host. Both directions
 * share one VM lineage, so a host closure may call back into the guest.
 *
 * Host closures signal failure by throwing. The adapter catches every
 * thrown value and raises it in the guest as a host error object; a
 * LuaError travels unchanged and reaches the outermost host operation.
 */

import fengari, { type lua_CFunction, type lua_State } from 'fengari';
import { LineageError, UndefinedPathError } from '../../error-classes.js';
import { ok, type Result } from '../../result.js';
import { refGet, type KeyPath } from './paths.js';
import {
  current,
  raiseHostError,
  type LuaSession,
  type VmState,
} from './session.js';
import { pin, pushValue, pushValues, readValues } from './stack.js';
import type {
  Encoded,
  ExposeOptions,
  HostFunction,
  Returned,
} from './types.js';
import {
  release,
  type LuaValue,
  type LuaValueKind,
  type ValueRef,
} from './values.js';

const { lua, lauxlib, to_luastring } = fengari;

const CALL_EVENT = to_luastring('__call');

/** Guest type names for messages */
const GUEST_TYPE_NAMES: Record<LuaValueKind, string> = {
  nil: 'nil',
  bool: 'boolean',
  int: 'number',
  float: 'number',
  string: 'string',
  table: 'table',
  function: 'function',
  userdata: 'userdata',
  thread: 'thread',
};

// ============================================================
// HOST TO GUEST
// ============================================================

/** Run a host closure for a guest call and return the values to push */
function invoke(
  session: LuaSession,
  L1: lua_State,
  name: string,
  fn: HostFunction
): LuaValue[] {
  const args = readValues(session, L1, 1, lua.lua_gettop(L1));
  session.observability.onHostCall?.({ name, args });
  const startTime = performance.now();

  const returned = fn(session.advance(), args);
  if (returned.state.session !== session) {
    throw new LineageError('foreign-value', { kind: 'state' });
  }
  current(returned.state);
  session.claim(returned.values);
  if (!lua.lua_checkstack(L1, returned.values.length)) {
    throw new RangeError(
      `Cannot return ${returned.values.length} values: stack overflow`
    );
  }

  session.observability.onHostReturn?.({
    name,
    values: returned.values,
    durationMs: performance.now() - startTime,
  });
  return returned.values;
}

function adapt(session: LuaSession, name: string, fn: HostFunction): lua_CFunction {
  return (L1) => {
    let values: LuaValue[];
    try {
      values = invoke(session, L1, name, fn);
    } catch (error) {
      return raiseHostError(L1, error);
    }
    for (const value of values) pushValue(L1, value);
    return values.length;
  };
}

/**
 * Expose a host closure as a guest function value.
 * Store it with set() to make it callable by name.
 */
export function expose(
  state: VmState,
  fn: HostFunction,
  options: ExposeOptions = {}
): Encoded {
  const session = current(state);
  const L = session.L;
  lua.lua_pushcfunction(L, adapt(session, options.name ?? 'anonymous', fn));
  const handle = pin(session, L, -1);
  lua.lua_pop(L, 1);
  return { state: session.advance(), value: { kind: 'function', handle } };
}

/** Alias of expose() for symmetry with the other encoders */
export const encodeFunction = expose;

// ============================================================
// GUEST FROM HOST
// ============================================================

/** Call a referenced function (guest or host) with arguments */
export function call(
  state: VmState,
  ref: ValueRef,
  args: readonly LuaValue[] = []
): Result<Returned> {
  const session = current(state);
  session.claim([ref, ...args]);

  const values = session.callForValues((L) => {
    pushValue(L, ref);
    pushValues(L, args);
    return args.length;
  });
  if (!values.ok) return values;
  return ok({ state: session.advance(), values: values.value });
}

/** True if the referenced value has a __call metamethod */
function hasCallMetamethod(session: LuaSession, ref: ValueRef): boolean {
  const L = session.L;
  pushValue(L, ref);
  const type = lauxlib.luaL_getmetafield(L, -1, CALL_EVENT);
  const found = type !== lua.LUA_TNIL;
  lua.lua_pop(L, found ? 2 : 1);
  return found;
}

/**
 * Resolve `keys` and call the result.
 * A value that is neither a function nor callable through __call is an
 * undefined path.
 */
export function callByName(
  state: VmState,
  keys: KeyPath,
  args: readonly LuaValue[] = []
): Result<Returned> {
  const session = current(state);
  const target = refGet(state, keys);
  if (!target.ok) return target;

  // The reference is private to this call
  const ref = target.value;
  try {
    if (ref.kind !== 'function' && !hasCallMetamethod(session, ref)) {
      return session.fail(
        new UndefinedPathError(keys, { observed: GUEST_TYPE_NAMES[ref.kind] })
      );
    }
    return call(state, ref, args);
  } finally {
    release(ref);
  }
}
