/**
 * Stack Marshalling
 *
 * Moves LuaValues on and off the interpreter stack.
 * Callers validate lineage first; these helpers assume every handle
 * belongs to the session whose stack they touch.
 * @internal
 */

import fengari, { type lua_State } from 'fengari';
import type { LuaSession } from './session.js';
import { GuestHandle, ValueRef, type LuaValue } from './values.js';

const { lua, lauxlib, to_luastring } = fengari;

/** Push a value (or the value behind a reference) */
export function pushValue(L: lua_State, value: LuaValue | ValueRef): void {
  if (value instanceof ValueRef) {
    pushValue(L, value.value);
    return;
  }
  if ('handle' in value) {
    lua.lua_rawgeti(L, lua.LUA_REGISTRYINDEX, value.handle.ref);
    return;
  }
  switch (value.kind) {
    case 'nil':
      lua.lua_pushnil(L);
      return;
    case 'bool':
      lua.lua_pushboolean(L, value.value);
      return;
    case 'int':
      lua.lua_pushinteger(L, value.value);
      return;
    case 'float':
      lua.lua_pushnumber(L, value.value);
      return;
    case 'string':
      lua.lua_pushstring(L, to_luastring(value.value));
      return;
  }
}

/** Push several values, growing the stack first */
export function pushValues(
  L: lua_State,
  values: readonly (LuaValue | ValueRef)[]
): void {
  if (!lua.lua_checkstack(L, values.length)) {
    throw new RangeError(`Cannot push ${values.length} values: stack overflow`);
  }
  for (const value of values) pushValue(L, value);
}

/** Pin the value at `idx` in the registry, leaving the stack unchanged */
export function pin(session: LuaSession, L: lua_State, idx: number): GuestHandle {
  lua.lua_pushvalue(L, idx);
  return new GuestHandle(session, lauxlib.luaL_ref(L, lua.LUA_REGISTRYINDEX));
}

/** Read the value at `idx` without popping it */
export function readValue(
  session: LuaSession,
  L: lua_State,
  idx: number
): LuaValue {
  const type = lua.lua_type(L, idx);
  switch (type) {
    case lua.LUA_TNONE:
    case lua.LUA_TNIL:
      return { kind: 'nil' };
    case lua.LUA_TBOOLEAN:
      return { kind: 'bool', value: lua.lua_toboolean(L, idx) };
    case lua.LUA_TNUMBER:
      return lua.lua_isinteger(L, idx)
        ? { kind: 'int', value: lua.lua_tointeger(L, idx) }
        : { kind: 'float', value: lua.lua_tonumber(L, idx) };
    case lua.LUA_TSTRING:
      return { kind: 'string', value: lua.lua_tojsstring(L, idx) };
    case lua.LUA_TTABLE:
      return { kind: 'table', handle: pin(session, L, idx) };
    case lua.LUA_TFUNCTION:
      return { kind: 'function', handle: pin(session, L, idx) };
    case lua.LUA_TTHREAD:
      return { kind: 'thread', handle: pin(session, L, idx) };
    default:
      // full and light userdata
      return { kind: 'userdata', handle: pin(session, L, idx) };
  }
}

/** Read stack slots `from..to` (inclusive, absolute indices) */
export function readValues(
  session: LuaSession,
  L: lua_State,
  from: number,
  to: number
): LuaValue[] {
  const values: LuaValue[] = [];
  for (let idx = from; idx <= to; idx++) {
    values.push(readValue(session, L, idx));
  }
  return values;
}

const TYPE_NAMES = new Map<number, string>([
  [lua.LUA_TNONE, 'no value'],
  [lua.LUA_TNIL, 'nil'],
  [lua.LUA_TBOOLEAN, 'boolean'],
  [lua.LUA_TLIGHTUSERDATA, 'userdata'],
  [lua.LUA_TNUMBER, 'number'],
  [lua.LUA_TSTRING, 'string'],
  [lua.LUA_TTABLE, 'table'],
  [lua.LUA_TFUNCTION, 'function'],
  [lua.LUA_TUSERDATA, 'userdata'],
  [lua.LUA_TTHREAD, 'thread'],
]);

/** Guest type name of the value at `idx` ("number", "table", ...) */
export function guestTypeName(L: lua_State, idx: number): string {
  return TYPE_NAMES.get(lua.lua_type(L, idx)) ?? 'unknown';
}
