/**
 * Table Path Accessor
 *
 * Reads and writes values at key paths rooted in the global table.
 * Walks run as host functions inside a protected call, so __index and
 * __newindex metamethods apply and a failing metamethod is a runtime error.
 */

import fengari, { type lua_State } from 'fengari';
import {
  InvalidPathError,
  PathCollisionError,
  UndefinedPathError,
} from '../../error-classes.js';
import { ok, type Result } from '../../result.js';
import { current, type VmState } from './session.js';
import { guestTypeName, pushValue, readValue } from './stack.js';
import { ValueRef, type LuaValue } from './values.js';

const { lua, to_luastring } = fengari;

/** Non-empty sequence of string keys from the global table */
export type KeyPath = readonly string[];

/** Grow the stack or raise a guest error */
function reserve(L1: lua_State, slots: number): void {
  if (!lua.lua_checkstack(L1, slots)) {
    lua.lua_pushstring(L1, to_luastring('stack overflow (key path too long)'));
    lua.lua_error(L1);
  }
}

/**
 * Push the value at `keys` onto L1's stack, or return false when the
 * walk meets a non-table or the value is nil.
 */
function walk(L1: lua_State, keys: KeyPath): boolean {
  reserve(L1, keys.length + 1);
  lua.lua_pushglobaltable(L1);
  for (const key of keys) {
    if (lua.lua_type(L1, -1) !== lua.LUA_TTABLE) return false;
    lua.lua_getfield(L1, -1, to_luastring(key));
  }
  return lua.lua_type(L1, -1) !== lua.LUA_TNIL;
}

/** Resolve `keys` to a value (`__index` applies) */
export function get(state: VmState, keys: KeyPath): Result<LuaValue> {
  const resolved = refGet(state, keys);
  return resolved.ok ? ok(resolved.value.value) : resolved;
}

/** Resolve `keys` to a reference, for call() */
export function refGet(state: VmState, keys: KeyPath): Result<ValueRef> {
  const session = current(state);
  if (keys.length === 0) return session.fail(new InvalidPathError());

  const read = session.protectedCall(
    (L) => {
      lua.lua_pushcfunction(L, (L1) => (walk(L1, keys) ? 1 : 0));
      return 0;
    },
    (L, from, to): LuaValue | undefined =>
      from > to ? undefined : readValue(session, L, from)
  );
  if (!read.ok) return read;

  const value = read.value;
  if (value === undefined || value.kind === 'nil') {
    return session.fail(new UndefinedPathError(keys));
  }
  return ok(new ValueRef(value));
}

/**
 * Assign `value` at `keys`, creating missing intermediate tables.
 * An intermediate that exists and is not a table is a collision; nothing
 * is created in that case.
 */
export function set(
  state: VmState,
  keys: KeyPath,
  value: LuaValue | ValueRef
): Result<VmState> {
  const session = current(state);
  if (keys.length === 0) return session.fail(new InvalidPathError());
  session.claim([value]);

  const outcome: { collision?: { at: number; observed: string } } = {};
  const written = session.protectedCall(
    (L) => {
      lua.lua_pushcfunction(L, (L1) => {
        reserve(L1, keys.length + 3);
        lua.lua_pushglobaltable(L1);
        for (let index = 0; index < keys.length - 1; index++) {
          const key = to_luastring(keys[index] ?? '');
          lua.lua_getfield(L1, -1, key);
          const type = lua.lua_type(L1, -1);
          if (type === lua.LUA_TNIL) {
            lua.lua_pop(L1, 1);
            lua.lua_createtable(L1, 0, 0);
            lua.lua_pushvalue(L1, -1);
            lua.lua_setfield(L1, -3, key);
          } else if (type !== lua.LUA_TTABLE) {
            outcome.collision = { at: index + 1, observed: guestTypeName(L1, -1) };
            return 0;
          }
        }
        pushValue(L1, value);
        lua.lua_setfield(L1, -2, to_luastring(keys[keys.length - 1] ?? ''));
        return 0;
      });
      return 0;
    },
    () => undefined
  );
  if (!written.ok) return written;

  const { collision } = outcome;
  if (collision) {
    return session.fail(
      new PathCollisionError(
        keys,
        keys.slice(0, collision.at),
        collision.observed
      )
    );
  }
  return ok(session.advance());
}
