/**
 * Type declarations for the parts of fengari the bridge uses.
 * @see https://github.com/fengari-lua/fengari
 *
 * fengari mirrors the Lua 5.3 C API. Lua strings are byte arrays
 * (Uint8Array); convert with to_luastring() before passing them in.
 */

declare module 'fengari' {
  export type LuaString = Uint8Array;

  /** Opaque interpreter thread */
  export interface lua_State {
    readonly __luaState: never;
  }

  export type lua_CFunction = (L: lua_State) => number;

  export interface LuaApi {
    readonly LUA_OK: number;
    readonly LUA_ERRRUN: number;
    readonly LUA_ERRSYNTAX: number;
    readonly LUA_ERRMEM: number;
    readonly LUA_ERRGCMM: number;
    readonly LUA_ERRERR: number;
    readonly LUA_MULTRET: number;
    readonly LUA_REGISTRYINDEX: number;

    readonly LUA_TNONE: number;
    readonly LUA_TNIL: number;
    readonly LUA_TBOOLEAN: number;
    readonly LUA_TLIGHTUSERDATA: number;
    readonly LUA_TNUMBER: number;
    readonly LUA_TSTRING: number;
    readonly LUA_TTABLE: number;
    readonly LUA_TFUNCTION: number;
    readonly LUA_TUSERDATA: number;
    readonly LUA_TTHREAD: number;

    lua_close(L: lua_State): void;
    lua_gettop(L: lua_State): number;
    lua_settop(L: lua_State, idx: number): void;
    lua_pop(L: lua_State, n: number): void;
    lua_pushvalue(L: lua_State, idx: number): void;
    lua_checkstack(L: lua_State, n: number): boolean;

    lua_type(L: lua_State, idx: number): number;
    lua_isinteger(L: lua_State, idx: number): boolean;
    lua_rawequal(L: lua_State, idx1: number, idx2: number): boolean;

    lua_toboolean(L: lua_State, idx: number): boolean;
    lua_tonumber(L: lua_State, idx: number): number;
    lua_tointeger(L: lua_State, idx: number): number;
    lua_tojsstring(L: lua_State, idx: number): string;
    lua_touserdata(L: lua_State, idx: number): unknown;

    lua_pushnil(L: lua_State): void;
    lua_pushboolean(L: lua_State, b: boolean): void;
    lua_pushinteger(L: lua_State, n: number): void;
    lua_pushnumber(L: lua_State, n: number): void;
    lua_pushstring(L: lua_State, s: LuaString): LuaString;
    lua_pushlightuserdata(L: lua_State, p: unknown): void;
    lua_pushcfunction(L: lua_State, fn: lua_CFunction): void;
    lua_pushglobaltable(L: lua_State): void;

    lua_createtable(L: lua_State, narr: number, nrec: number): void;
    lua_getfield(L: lua_State, idx: number, k: LuaString): number;
    lua_setfield(L: lua_State, idx: number, k: LuaString): void;
    lua_rawget(L: lua_State, idx: number): number;
    lua_rawset(L: lua_State, idx: number): void;
    lua_rawgeti(L: lua_State, idx: number, n: number): number;
    lua_rawlen(L: lua_State, idx: number): number;
    lua_next(L: lua_State, idx: number): number;
    lua_getmetatable(L: lua_State, idx: number): boolean;
    lua_setmetatable(L: lua_State, idx: number): void;
    lua_setglobal(L: lua_State, name: LuaString): void;

    lua_pcall(
      L: lua_State,
      nargs: number,
      nresults: number,
      msgh: number
    ): number;
    lua_error(L: lua_State): never;
  }

  export interface LauxLib {
    luaL_newstate(): lua_State;
    luaL_loadbufferx(
      L: lua_State,
      buff: Uint8Array,
      size: number,
      name: LuaString,
      mode: LuaString | null
    ): number;
    luaL_ref(L: lua_State, t: number): number;
    luaL_unref(L: lua_State, t: number, ref: number): void;
    luaL_traceback(
      L: lua_State,
      L1: lua_State,
      msg: LuaString | null,
      level: number
    ): void;
    luaL_tolstring(L: lua_State, idx: number): LuaString;
    luaL_getmetafield(L: lua_State, obj: number, e: LuaString): number;
    luaL_newmetatable(L: lua_State, tname: LuaString): number;
    luaL_getmetatable(L: lua_State, tname: LuaString): number;
    luaL_requiref(
      L: lua_State,
      modname: LuaString,
      openf: lua_CFunction,
      glb: boolean
    ): void;
  }

  export interface LuaLib {
    luaL_openlibs(L: lua_State): void;
    luaopen_base: lua_CFunction;
    luaopen_package: lua_CFunction;
    luaopen_coroutine: lua_CFunction;
    luaopen_table: lua_CFunction;
    luaopen_io: lua_CFunction;
    luaopen_os: lua_CFunction;
    luaopen_string: lua_CFunction;
    luaopen_utf8: lua_CFunction;
    luaopen_math: lua_CFunction;
    luaopen_debug: lua_CFunction;
  }

  export interface Fengari {
    readonly lua: LuaApi;
    readonly lauxlib: LauxLib;
    readonly lualib: LuaLib;
    to_luastring(str: string): LuaString;
  }

  const fengari: Fengari;
  export default fengari;
}
