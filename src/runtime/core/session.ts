/**
 * VM Sessions and State Handles
 *
 * The guest interpreter is mutable; the bridge presents it as a chain of
 * immutable handles. One LuaSession wraps the interpreter created by
 * init(). Every VmState records its session and generation, and only the
 * session's head handle is accepted. Mutating operations replace the head
 * and return it; a failed operation restores the head it was given.
 *
 * Single lineage per session is a caller precondition. Divergent lineages
 * are never merged: reusing an ancestor handle throws LineageError.
 */

import fengari, { type lua_State } from 'fengari';
import {
  isLuaError,
  LineageError,
  LuaRuntimeError,
  type AnyLuaError,
} from '../../error-classes.js';
import { err, ok, type Err, type Result } from '../../result.js';
import { parseGuestLocation } from '../../source-location.js';
import { guestTypeName, readValue, readValues } from './stack.js';
import type { BridgeCallbacks, ObservabilityCallbacks } from './types.js';
import { ValueRef, type LuaValue } from './values.js';

const { lua, lauxlib, to_luastring } = fengari;

const HOST_ERROR_TYPE = to_luastring('lua-bridge.HostError');
const MESSAGE_KEY = to_luastring('message');
const ERROR_KEY = to_luastring('error');

const STATUS_NAMES = new Map<number, string>([
  [lua.LUA_ERRRUN, 'runtime error'],
  [lua.LUA_ERRSYNTAX, 'syntax error'],
  [lua.LUA_ERRMEM, 'out of memory'],
  [lua.LUA_ERRGCMM, 'error in __gc metamethod'],
  [lua.LUA_ERRERR, 'error in error handler'],
]);

// ============================================================
// STATE HANDLE
// ============================================================

/**
 * Opaque handle to one snapshot of a VM.
 * Pass it to exactly one operation and continue with the handle returned.
 */
export class VmState {
  constructor(
    readonly session: LuaSession,
    /** Position in the lineage; 0 for the handle returned by init() */
    readonly generation: number
  ) {}
}

// ============================================================
// SESSION
// ============================================================

export class LuaSession {
  readonly L: lua_State;
  readonly callbacks: BridgeCallbacks;
  readonly observability: ObservabilityCallbacks;
  private counter = 0;
  private current: VmState;
  private isClosed = false;

  constructor(
    L: lua_State,
    callbacks: BridgeCallbacks,
    observability: ObservabilityCallbacks
  ) {
    this.L = L;
    this.callbacks = callbacks;
    this.observability = observability;
    this.current = new VmState(this, 0);
  }

  /** The only handle operations currently accept */
  get head(): VmState {
    return this.current;
  }

  get closed(): boolean {
    return this.isClosed;
  }

  /** Consume the head and return its successor */
  advance(): VmState {
    this.counter += 1;
    this.current = new VmState(this, this.counter);
    return this.current;
  }

  /** Make `state` the head again after a failed operation */
  restore(state: VmState): void {
    this.current = state;
  }

  /** Reject values and references of another session, or released ones */
  claim(values: readonly (LuaValue | ValueRef)[]): void {
    if (this.isClosed) throw new LineageError('closed');
    for (const item of values) {
      const value = item instanceof ValueRef ? item.value : item;
      if (!('handle' in value)) continue;
      if (value.handle.session !== this) {
        throw new LineageError('foreign-value', { kind: value.kind });
      }
      if (value.handle.released) {
        throw new LineageError('released', { kind: value.kind });
      }
    }
  }

  close(): void {
    if (this.isClosed) return;
    lua.lua_close(this.L);
    this.isClosed = true;
  }

  /** Report a failure to observability and wrap it */
  fail<E extends AnyLuaError>(error: E): Err<E> {
    this.observability.onError?.({ error });
    return err(error);
  }

  /**
   * Push a function and its arguments with `push` (which returns the
   * argument count), call it in protected mode, and read its results.
   * The stack and the head handle are restored whatever happens; handles
   * created by host functions during the call do not outlive it.
   */
  protectedCall<T>(
    push: (L: lua_State) => number,
    read: (L: lua_State, from: number, to: number) => T
  ): Result<T> {
    const L = this.L;
    const base = lua.lua_gettop(L);
    const entry = this.current;
    let traceback: string | undefined;

    lua.lua_pushcfunction(L, (L1) => {
      lauxlib.luaL_traceback(L1, L1, null, 1);
      traceback = lua.lua_tojsstring(L1, -1);
      lua.lua_pop(L1, 1);
      return 1;
    });

    try {
      const nargs = push(L);
      const status = lua.lua_pcall(L, nargs, lua.LUA_MULTRET, base + 1);
      if (status !== lua.LUA_OK) {
        return this.fail(this.readFailure(status, traceback));
      }
      return ok(read(L, base + 2, lua.lua_gettop(L)));
    } catch (error) {
      return this.fail(classifyUnexpected(error));
    } finally {
      lua.lua_settop(L, base);
      this.current = entry;
    }
  }

  /** protectedCall() that reads every result as a LuaValue */
  callForValues(push: (L: lua_State) => number): Result<LuaValue[]> {
    return this.protectedCall(push, (L, from, to) =>
      readValues(this, L, from, to)
    );
  }

  /** Classify the error object a failed pcall left on top of the stack */
  private readFailure(
    status: number,
    traceback: string | undefined
  ): AnyLuaError {
    const L = this.L;
    const top = lua.lua_gettop(L);

    if (status !== lua.LUA_ERRRUN) {
      const message =
        lua.lua_type(L, top) === lua.LUA_TSTRING
          ? lua.lua_tojsstring(L, top)
          : '';
      return new LuaRuntimeError('LUA-R002', {
        status: STATUS_NAMES.get(status) ?? String(status),
        message,
      });
    }

    const hostError = hostErrorAt(L, top);
    if (hostError) return hostError;

    if (lua.lua_type(L, top) === lua.LUA_TSTRING) {
      const message = lua.lua_tojsstring(L, top);
      return new LuaRuntimeError(
        'LUA-R001',
        { message },
        { location: parseGuestLocation(message), traceback }
      );
    }

    const errorValue = readValue(this, L, top);
    const message =
      errorValue.kind === 'int' || errorValue.kind === 'float'
        ? String(errorValue.value)
        : `(error object is a ${guestTypeName(L, top)} value)`;
    return new LuaRuntimeError(
      'LUA-R001',
      { message },
      { traceback, errorValue }
    );
  }
}

/**
 * Resolve the session of `state`, rejecting closed VMs and stale handles.
 * Every public operation starts here.
 */
export function current(state: VmState): LuaSession {
  const session = state.session;
  if (session.closed) throw new LineageError('closed');
  if (state !== session.head) {
    throw new LineageError('stale-state', {
      generation: state.generation,
      current: session.head.generation,
    });
  }
  return session;
}

function classifyUnexpected(error: unknown): AnyLuaError {
  if (isLuaError(error)) return error;
  const message = error instanceof Error ? error.message : String(error);
  return new LuaRuntimeError('LUA-R001', { message }, { cause: error });
}

// ============================================================
// HOST ERRORS
// ============================================================

/**
 * Register the metatable for host error objects.
 * Guest code sees them as tables whose tostring() is the host message.
 */
export function installHostErrorType(L: lua_State): void {
  lauxlib.luaL_newmetatable(L, HOST_ERROR_TYPE);
  lua.lua_pushcfunction(L, (L1) => {
    lua.lua_pushstring(L1, MESSAGE_KEY);
    lua.lua_rawget(L1, 1);
    return 1;
  });
  lua.lua_setfield(L, -2, to_luastring('__tostring'));
  lua.lua_pop(L, 1);
}

/**
 * Raise a host failure in the guest.
 * Bridge errors travel unchanged; anything else becomes LUA-R003.
 */
export function raiseHostError(L: lua_State, error: unknown): never {
  const failure = isLuaError(error)
    ? error
    : new LuaRuntimeError(
        'LUA-R003',
        { message: error instanceof Error ? error.message : String(error) },
        { cause: error }
      );

  lua.lua_createtable(L, 0, 2);
  lua.lua_pushstring(L, to_luastring(failure.message));
  lua.lua_setfield(L, -2, MESSAGE_KEY);
  lua.lua_pushlightuserdata(L, failure);
  lua.lua_setfield(L, -2, ERROR_KEY);
  lauxlib.luaL_getmetatable(L, HOST_ERROR_TYPE);
  lua.lua_setmetatable(L, -2);
  return lua.lua_error(L);
}

/** The bridge error carried by a host error object at absolute index `idx` */
function hostErrorAt(L: lua_State, idx: number): AnyLuaError | undefined {
  if (lua.lua_type(L, idx) !== lua.LUA_TTABLE) return undefined;
  if (!lua.lua_getmetatable(L, idx)) return undefined;
  lauxlib.luaL_getmetatable(L, HOST_ERROR_TYPE);
  const matches = lua.lua_rawequal(L, -1, -2);
  lua.lua_pop(L, 2);
  if (!matches) return undefined;

  lua.lua_pushstring(L, ERROR_KEY);
  lua.lua_rawget(L, idx);
  const payload = lua.lua_touserdata(L, -1);
  lua.lua_pop(L, 1);
  return isLuaError(payload) ? payload : undefined;
}
