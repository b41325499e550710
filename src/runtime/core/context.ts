/**
 * VM Factory
 *
 * Creates and configures the guest interpreter.
 * Public API for host applications.
 */

import fengari, { type lua_CFunction, type lua_State } from 'fengari';
import {
  installHostErrorType,
  LuaSession,
  raiseHostError,
  type VmState,
} from './session.js';
import type {
  BridgeCallbacks,
  BridgeOptions,
  StandardLibrary,
} from './types.js';

const { lua, lauxlib, lualib, to_luastring } = fengari;

const defaultCallbacks: BridgeCallbacks = {
  onLog: (line) => {
    console.log(line);
  },
};

const OPENERS: Record<StandardLibrary, lua_CFunction> = {
  base: lualib.luaopen_base,
  package: lualib.luaopen_package,
  coroutine: lualib.luaopen_coroutine,
  table: lualib.luaopen_table,
  io: lualib.luaopen_io,
  os: lualib.luaopen_os,
  string: lualib.luaopen_string,
  utf8: lualib.luaopen_utf8,
  math: lualib.luaopen_math,
  debug: lualib.luaopen_debug,
};

function openLibraries(
  L: lua_State,
  libraries: 'all' | readonly StandardLibrary[]
): void {
  if (libraries === 'all') {
    lualib.luaL_openlibs(L);
    return;
  }
  for (const library of libraries) {
    const name = library === 'base' ? '_G' : library;
    lauxlib.luaL_requiref(L, to_luastring(name), OPENERS[library], true);
    lua.lua_pop(L, 1);
  }
}

/** Replace print() so guest output goes through callbacks.onLog */
function installPrint(session: LuaSession): void {
  const L = session.L;
  lua.lua_pushcfunction(L, (L1) => {
    const count = lua.lua_gettop(L1);
    const parts: string[] = [];
    for (let index = 1; index <= count; index++) {
      lauxlib.luaL_tolstring(L1, index);
      parts.push(lua.lua_tojsstring(L1, -1));
      lua.lua_pop(L1, 1);
    }
    try {
      session.callbacks.onLog(parts.join('\t'));
    } catch (error) {
      return raiseHostError(L1, error);
    }
    return 0;
  });
  lua.lua_setglobal(L, to_luastring('print'));
}

function setPackagePath(L: lua_State, path: string): void {
  lua.lua_pushglobaltable(L);
  lua.lua_getfield(L, -1, to_luastring('package'));
  if (lua.lua_type(L, -1) === lua.LUA_TTABLE) {
    lua.lua_pushstring(L, to_luastring(path));
    lua.lua_setfield(L, -2, to_luastring('path'));
  }
  lua.lua_pop(L, 2);
}

/**
 * Create a VM.
 * This is the main entry point; every other operation threads the
 * returned handle.
 */
export function init(options: BridgeOptions = {}): VmState {
  const libraries = options.libraries ?? 'all';
  const L = lauxlib.luaL_newstate();
  const session = new LuaSession(
    L,
    { ...defaultCallbacks, ...options.callbacks },
    options.observability ?? {}
  );

  openLibraries(L, libraries);
  installHostErrorType(L);
  if (libraries === 'all' || libraries.includes('base')) {
    installPrint(session);
  }
  if (options.packagePath !== undefined) {
    setPackagePath(L, options.packagePath);
  }
  return session.head;
}

/**
 * Release the interpreter.
 * Accepts any handle of the VM, stale or not; closing twice is a no-op.
 * Every handle, value and reference of the VM is rejected afterwards.
 */
export function close(state: VmState): void {
  state.session.close();
}
