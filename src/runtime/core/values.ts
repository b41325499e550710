/**
 * Guest Value Types
 *
 * Values that cross the host/guest boundary.
 * Public API for host applications.
 *
 * Primitives are copied into plain host objects. Tables, functions,
 * userdata and threads stay in the guest: the host holds a GuestHandle
 * (a slot in the interpreter's registry) and never walks them eagerly.
 *
 * Guest strings are byte strings. They are read as UTF-8, so bytes that
 * are not valid UTF-8 come back as U+FFFD and do not survive a round trip.
 */

import fengari from 'fengari';
import type { LuaSession } from './session.js';

const { lua, lauxlib } = fengari;

// ============================================================
// GUEST HANDLES
// ============================================================

interface Slot {
  readonly session: LuaSession;
  readonly ref: number;
}

function releaseSlot(slot: Slot): void {
  // lua_close() already dropped the whole registry
  if (slot.session.closed) return;
  lauxlib.luaL_unref(slot.session.L, lua.LUA_REGISTRYINDEX, slot.ref);
}

// A handle the host no longer references gives its slot back
const slotFinalizationRegistry = new FinalizationRegistry<Slot>(releaseSlot);

/**
 * Registry slot pinning a guest value for one session.
 * Freed by release(), or once the handle is garbage collected.
 */
export class GuestHandle {
  private isReleased = false;

  constructor(
    readonly session: LuaSession,
    readonly ref: number
  ) {
    slotFinalizationRegistry.register(this, { session, ref }, this);
  }

  get released(): boolean {
    return this.isReleased;
  }

  /** Free the slot now. Releasing twice is a no-op. */
  release(): void {
    if (this.isReleased) return;
    this.isReleased = true;
    slotFinalizationRegistry.unregister(this);
    releaseSlot(this);
  }
}

// ============================================================
// VALUES
// ============================================================

export interface LuaNil {
  readonly kind: 'nil';
}

export interface LuaBool {
  readonly kind: 'bool';
  readonly value: boolean;
}

/** Guest integer (32-bit signed under fengari) */
export interface LuaInt {
  readonly kind: 'int';
  readonly value: number;
}

export interface LuaFloat {
  readonly kind: 'float';
  readonly value: number;
}

/** Guest string decoded as UTF-8 (invalid bytes become U+FFFD) */
export interface LuaString {
  readonly kind: 'string';
  readonly value: string;
}

export type CompositeKind = 'table' | 'function' | 'userdata' | 'thread';

/** A guest-resident value, not decoded */
export interface LuaComposite {
  readonly kind: CompositeKind;
  readonly handle: GuestHandle;
}

export type LuaPrimitive = LuaNil | LuaBool | LuaInt | LuaFloat | LuaString;

/** Any value as seen from the host */
export type LuaValue = LuaPrimitive | LuaComposite;

export type LuaValueKind = LuaValue['kind'];

export const NIL: LuaNil = Object.freeze({ kind: 'nil' });

/** Type guard for values held in the guest heap */
export function isComposite(value: LuaValue): value is LuaComposite {
  return (
    value.kind === 'table' ||
    value.kind === 'function' ||
    value.kind === 'userdata' ||
    value.kind === 'thread'
  );
}

// ============================================================
// REFERENCES
// ============================================================

/** Any value except nil */
export type LuaNonNil = Exclude<LuaValue, LuaNil>;

/**
 * Opaque reference to a guest value.
 * Produced by refGet or the `ref` decoder; the only thing `call` accepts.
 */
export class ValueRef {
  readonly __type = 'ref' as const;

  constructor(private readonly target: LuaNonNil) {}

  /** Kind of the referenced value at the time the reference was taken */
  get kind(): LuaNonNil['kind'] {
    return this.target.kind;
  }

  /** Value pushed when the reference is passed back to the guest */
  get value(): LuaNonNil {
    return this.target;
  }
}

/**
 * Free the registry slot behind a composite value or reference.
 * Primitives hold no slot. Using a released value throws LineageError.
 */
export function release(value: LuaValue | ValueRef): void {
  const target = value instanceof ValueRef ? value.value : value;
  if ('handle' in target) target.handle.release();
}

/** Type guard for references */
export function isValueRef(value: unknown): value is ValueRef {
  return value instanceof ValueRef;
}

/** Short description of a value for messages */
export function describeValue(value: LuaValue): string {
  switch (value.kind) {
    case 'nil':
      return 'nil';
    case 'bool':
    case 'int':
    case 'float':
      return String(value.value);
    case 'string':
      return JSON.stringify(value.value);
    default:
      return `<${value.kind}>`;
  }
}
