/**
 * Value Codec
 *
 * Encoders turn host values into LuaValues against a VmState and return the
 * successor state. Encoding is total for valid input; contract violations
 * throw. Decoders turn LuaValues back into host values and are partial:
 * a mismatch is a DecodeFailure result.
 */

import fengari from 'fengari';
import { DecodeFailure, LineageError } from '../../error-classes.js';
import { err, ok, type Result } from '../../result.js';
import { current, type LuaSession, type VmState } from './session.js';
import { pin, pushValue, readValue } from './stack.js';
import type { Encoded } from './types.js';
import {
  describeValue,
  NIL,
  ValueRef,
  type LuaComposite,
  type LuaValue,
} from './values.js';

const { lua } = fengari;

/** Smallest and largest guest integers (fengari integers are 32-bit) */
export const INT_MIN = -2147483648;
export const INT_MAX = 2147483647;

// ============================================================
// ENCODERS
// ============================================================

/** Encodes one host value, threading the state */
export type Encoder<T> = (state: VmState, value: T) => Encoded;

function primitive(state: VmState, value: LuaValue): Encoded {
  const session = current(state);
  return { state: session.advance(), value };
}

export function encodeNil(state: VmState): Encoded {
  return primitive(state, NIL);
}

export function encodeBool(state: VmState, value: boolean): Encoded {
  return primitive(state, { kind: 'bool', value });
}

/**
 * Encode a guest integer.
 * @throws {RangeError} value is not an integer in INT_MIN..INT_MAX
 */
export function encodeInt(state: VmState, value: number): Encoded {
  if (!Number.isInteger(value) || value < INT_MIN || value > INT_MAX) {
    throw new RangeError(
      `Cannot encode ${value} as an integer: expected a whole number in ${INT_MIN}..${INT_MAX}`
    );
  }
  return primitive(state, { kind: 'int', value });
}

/** Encode a guest float. Whole numbers stay floats. */
export function encodeFloat(state: VmState, value: number): Encoded {
  return primitive(state, { kind: 'float', value });
}

export function encodeString(state: VmState, value: string): Encoded {
  return primitive(state, { kind: 'string', value });
}

/**
 * Build a guest table from ordered pairs.
 * Keys and values are encoded in order with the given encoders; a later
 * duplicate key overwrites an earlier one. When anything throws, `state`
 * stays current.
 * @throws {TypeError} a key encodes to nil or NaN
 */
export function encodeTable<K, V>(
  state: VmState,
  pairs: readonly (readonly [K, V])[],
  encodeKey: Encoder<K>,
  encodeValue: Encoder<V>
): Encoded {
  const session = current(state);
  try {
    return buildTable(state, pairs, encodeKey, encodeValue);
  } catch (error) {
    session.restore(state);
    throw error;
  }
}

function buildTable<K, V>(
  state: VmState,
  pairs: readonly (readonly [K, V])[],
  encodeKey: Encoder<K>,
  encodeValue: Encoder<V>
): Encoded {
  let next = state;
  const entries: [LuaValue, LuaValue][] = [];
  for (const [hostKey, hostValue] of pairs) {
    const key = encodeKey(next, hostKey);
    if (key.value.kind === 'nil' || Number.isNaN(numericValue(key.value))) {
      throw new TypeError(`Invalid table key: ${describeValue(key.value)}`);
    }
    const value = encodeValue(key.state, hostValue);
    next = value.state;
    entries.push([key.value, value.value]);
  }

  const session = current(next);
  session.claim(entries.flat());

  const L = session.L;
  if (!lua.lua_checkstack(L, 3)) {
    throw new RangeError('Cannot build table: stack overflow');
  }
  lua.lua_createtable(L, 0, entries.length);
  for (const [key, value] of entries) {
    pushValue(L, key);
    pushValue(L, value);
    lua.lua_rawset(L, -3);
  }
  const handle = pin(session, L, -1);
  lua.lua_pop(L, 1);

  return { state: session.advance(), value: { kind: 'table', handle } };
}

function numericValue(value: LuaValue): number {
  return value.kind === 'float' ? value.value : 0;
}

/** Build a sequence with keys 1..n */
export function encodeList<T>(
  state: VmState,
  items: readonly T[],
  encodeItem: Encoder<T>
): Encoded {
  return encodeTable(
    state,
    items.map((item, index) => [index + 1, item] as const),
    encodeInt,
    encodeItem
  );
}

/** Build a table keyed by the record's own string keys */
export function encodeRecord<V>(
  state: VmState,
  record: Readonly<Record<string, V>>,
  encodeValue: Encoder<V>
): Encoded {
  return encodeTable(state, Object.entries(record), encodeString, encodeValue);
}

// ============================================================
// DECODERS
// ============================================================

/** Partial conversion from a LuaValue to a host value */
export interface Decoder<T> {
  /** Shape named in DecodeFailure messages */
  readonly expected: string;
  decode(value: LuaValue): Result<T, DecodeFailure>;
}

/** Apply a decoder */
export function decode<T>(
  value: LuaValue,
  decoder: Decoder<T>
): Result<T, DecodeFailure> {
  return decoder.decode(value);
}

function mismatch(expected: string, value: LuaValue): Result<never, DecodeFailure> {
  return err(new DecodeFailure(expected, value.kind));
}

const nilDecoder: Decoder<null> = {
  expected: 'nil',
  decode: (value) => (value.kind === 'nil' ? ok(null) : mismatch('nil', value)),
};

const boolDecoder: Decoder<boolean> = {
  expected: 'bool',
  decode: (value) =>
    value.kind === 'bool' ? ok(value.value) : mismatch('bool', value),
};

const intDecoder: Decoder<number> = {
  expected: 'int',
  decode: (value) =>
    value.kind === 'int' ? ok(value.value) : mismatch('int', value),
};

const floatDecoder: Decoder<number> = {
  expected: 'float',
  decode: (value) =>
    value.kind === 'float' ? ok(value.value) : mismatch('float', value),
};

const numberDecoder: Decoder<number> = {
  expected: 'number',
  decode: (value) =>
    value.kind === 'int' || value.kind === 'float'
      ? ok(value.value)
      : mismatch('number', value),
};

const stringDecoder: Decoder<string> = {
  expected: 'string',
  decode: (value) =>
    value.kind === 'string' ? ok(value.value) : mismatch('string', value),
};

const valueDecoder: Decoder<LuaValue> = {
  expected: 'value',
  decode: (value) => ok(value),
};

const refDecoder: Decoder<ValueRef> = {
  expected: 'non-nil value',
  decode: (value) =>
    value.kind === 'nil'
      ? mismatch('non-nil value', value)
      : ok(new ValueRef(value)),
};

function optional<T>(inner: Decoder<T>): Decoder<T | undefined> {
  return {
    expected: `optional ${inner.expected}`,
    decode: (value) => (value.kind === 'nil' ? ok(undefined) : inner.decode(value)),
  };
}

/** Session of a table value, rejecting closed VMs */
function openSession(value: LuaComposite): LuaSession {
  const session = value.handle.session;
  if (session.closed) throw new LineageError('closed');
  if (value.handle.released) {
    throw new LineageError('released', { kind: value.kind });
  }
  return session;
}

/** Decode the sequence 1..#t (raw length, no metamethods) */
function list<T>(item: Decoder<T>): Decoder<T[]> {
  const expected = `list of ${item.expected}`;
  return {
    expected,
    decode: (value) => {
      if (value.kind !== 'table') return mismatch(expected, value);
      const session = openSession(value);
      const L = session.L;
      const base = lua.lua_gettop(L);
      try {
        pushValue(L, value);
        const length = lua.lua_rawlen(L, -1);
        const items: T[] = [];
        for (let index = 1; index <= length; index++) {
          lua.lua_rawgeti(L, base + 1, index);
          const element = readValue(session, L, -1);
          lua.lua_pop(L, 1);
          const decoded = item.decode(element);
          if (!decoded.ok) return err(decoded.error.within(`[${index}]`));
          items.push(decoded.value);
        }
        return ok(items);
      } finally {
        lua.lua_settop(L, base);
      }
    },
  };
}

/**
 * Decode every pair in guest traversal order.
 * Fails as a whole when any key or value fails.
 */
function table<K, V>(
  key: Decoder<K>,
  entry: Decoder<V>
): Decoder<Array<[K, V]>> {
  const expected = `table of ${key.expected} to ${entry.expected}`;
  return {
    expected,
    decode: (value) => {
      if (value.kind !== 'table') return mismatch(expected, value);
      const session = openSession(value);
      const L = session.L;
      const base = lua.lua_gettop(L);
      try {
        pushValue(L, value);
        lua.lua_pushnil(L);
        const pairs: Array<[K, V]> = [];
        while (lua.lua_next(L, base + 1)) {
          const rawKey = readValue(session, L, -2);
          const rawValue = readValue(session, L, -1);
          lua.lua_pop(L, 1);
          const segment = `[${describeValue(rawKey)}]`;
          const decodedKey = key.decode(rawKey);
          if (!decodedKey.ok) return err(decodedKey.error.within(segment));
          const decodedValue = entry.decode(rawValue);
          if (!decodedValue.ok) return err(decodedValue.error.within(segment));
          pairs.push([decodedKey.value, decodedValue.value]);
        }
        return ok(pairs);
      } finally {
        lua.lua_settop(L, base);
      }
    },
  };
}

/** Built-in decoders */
export const decoders = {
  nil: nilDecoder,
  bool: boolDecoder,
  int: intDecoder,
  float: floatDecoder,
  number: numberDecoder,
  string: stringDecoder,
  value: valueDecoder,
  ref: refDecoder,
  optional,
  list,
  table,
} as const;
