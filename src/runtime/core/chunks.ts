/**
 * Chunks
 *
 * A Chunk is guest source compiled but not yet run. It is compiled once per
 * VM on first use there, so one chunk can run against several VMs.
 */

import { readFileSync } from 'node:fs';
import fengari from 'fengari';
import { IoError, LuaRuntimeError, LuaSyntaxError } from '../../error-classes.js';
import { err, ok, type Result } from '../../result.js';
import { parseGuestLocation } from '../../source-location.js';
import { current, type LuaSession, type VmState } from './session.js';
import { pin } from './stack.js';
import type { LoadOptions, Returned } from './types.js';
import type { GuestHandle } from './values.js';

const { lua, lauxlib, to_luastring } = fengari;

const NEWLINE = 0x0a;
const HASH = 0x23;

export class Chunk {
  /** Compiled function, per VM */
  private readonly compiled = new WeakMap<LuaSession, GuestHandle>();

  constructor(
    /** Source bytes as the guest sees them */
    readonly source: Uint8Array,
    /** Chunk name as the guest prints it in messages */
    readonly chunkName: string
  ) {}

  /** Compiled function for `session`, compiling on first use */
  compile(session: LuaSession): Result<GuestHandle> {
    const cached = this.compiled.get(session);
    if (cached !== undefined) return ok(cached);

    const L = session.L;
    const status = lauxlib.luaL_loadbufferx(
      L,
      this.source,
      this.source.length,
      to_luastring(this.chunkName),
      null
    );
    if (status !== lua.LUA_OK) {
      const message = lua.lua_tojsstring(L, -1);
      lua.lua_pop(L, 1);
      return session.fail(
        status === lua.LUA_ERRSYNTAX
          ? new LuaSyntaxError(message, parseGuestLocation(message))
          : new LuaRuntimeError('LUA-R002', { status: 'out of memory', message })
      );
    }

    const handle = pin(session, L, -1);
    lua.lua_pop(L, 1);
    this.compiled.set(session, handle);
    return ok(handle);
  }

  /** Free the compiled function for `session`; the next run recompiles */
  release(session: LuaSession): void {
    this.compiled.get(session)?.release();
    this.compiled.delete(session);
  }
}

/** Result of load() and loadFile() */
export interface Loaded {
  chunk: Chunk;
  state: VmState;
}

/**
 * Name under which the guest reports a chunk.
 * `=` keeps the name verbatim; source text is shown as `[string "..."]`.
 */
function chunkNameFor(source: string, options: LoadOptions): string {
  return options.chunkName !== undefined ? `=${options.chunkName}` : source;
}

function compileInto(state: VmState, chunk: Chunk): Result<Loaded> {
  const session = current(state);
  const compiled = chunk.compile(session);
  if (!compiled.ok) return compiled;
  return ok({ chunk, state: session.advance() });
}

/** Compile source without running it */
export function load(
  state: VmState,
  source: string,
  options: LoadOptions = {}
): Result<Loaded> {
  return compileInto(
    state,
    new Chunk(to_luastring(source), chunkNameFor(source, options))
  );
}

/** Read a file, skipping a leading `#` line */
function readChunkFile(path: string): Result<Chunk, IoError> {
  let bytes: Uint8Array;
  try {
    bytes = new Uint8Array(readFileSync(path));
  } catch (error) {
    return err(new IoError(path, error));
  }
  if (bytes[0] === HASH) {
    // Keep the newline so line numbers still match the file
    const end = bytes.indexOf(NEWLINE);
    bytes = end === -1 ? new Uint8Array(0) : bytes.subarray(end);
  }
  return ok(new Chunk(bytes, `@${path}`));
}

/** Compile a file without running it */
export function loadFile(state: VmState, path: string): Result<Loaded> {
  const session = current(state);
  const chunk = readChunkFile(path);
  if (!chunk.ok) return session.fail(chunk.error);
  return compileInto(state, chunk.value);
}

/** Run a loaded chunk. Compiles it for this VM first if needed. */
export function runChunk(state: VmState, chunk: Chunk): Result<Returned> {
  const session = current(state);
  const compiled = chunk.compile(session);
  if (!compiled.ok) return compiled;

  const values = session.callForValues((L) => {
    lua.lua_rawgeti(L, lua.LUA_REGISTRYINDEX, compiled.value.ref);
    return 0;
  });
  if (!values.ok) return values;
  return ok({ state: session.advance(), values: values.value });
}

/** Compile and run source */
export function run(
  state: VmState,
  source: string,
  options: LoadOptions = {}
): Result<Returned> {
  const loaded = load(state, source, options);
  if (!loaded.ok) return loaded;
  return settle(state, runOnce(loaded.value));
}

/** Read, compile and run a file */
export function runFile(state: VmState, path: string): Result<Returned> {
  const loaded = loadFile(state, path);
  if (!loaded.ok) return loaded;
  return settle(state, runOnce(loaded.value));
}

/** Run a chunk nobody else holds, then free it */
function runOnce({ chunk, state }: Loaded): Result<Returned> {
  try {
    return runChunk(state, chunk);
  } finally {
    chunk.release(state.session);
  }
}

/** A failed run leaves the caller's handle current */
function settle(state: VmState, result: Result<Returned>): Result<Returned> {
  if (!result.ok) state.session.restore(state);
  return result;
}
