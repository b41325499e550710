/**
 * lua-bridge Tests: Function Exposure
 * expose, call, callByName and host error propagation
 */

import {
  call,
  callByName,
  decode,
  decoders,
  encodeInt,
  expose,
  init,
  LineageError,
  LuaRuntimeError,
  NIL,
  refGet,
  run,
  set,
  UndefinedPathError,
  unwrap,
  type HostFunction,
  type VmState,
} from '../../src/index.js';
import { describe, expect, it } from 'vitest';

import { bool, int, runIn, str } from '../helpers/runtime.js';

/** Expose `fn` and store it at global `name` */
function define(state: VmState, name: string, fn: HostFunction): VmState {
  const exposed = expose(state, fn, { name });
  return unwrap(set(exposed.state, [name], exposed.value));
}

const negate: HostFunction = (state, args) => {
  const n = unwrap(decode(args[0] ?? NIL, decoders.number));
  const result = encodeInt(state, -n);
  return { state: result.state, values: [result.value] };
};

describe('lua-bridge: Function Exposure', () => {
  describe('expose', () => {
    it('makes a host closure callable from the guest', () => {
      const state = define(init(), 'negate', negate);
      expect(runIn(state, 'return negate(5)').values).toEqual([int(-5)]);
    });

    it('passes every guest argument', () => {
      const state = define(init(), 'count', (s, args) => {
        const result = encodeInt(s, args.length);
        return { state: result.state, values: [result.value] };
      });
      expect(runIn(state, 'return count(1, nil, "x")').values).toEqual([
        int(3),
      ]);
    });

    it('returns multiple values', () => {
      const state = define(init(), 'pair', (s) => ({
        state: s,
        values: [str('a'), bool(true)],
      }));
      expect(runIn(state, 'local a, b = pair(); return b, a').values).toEqual([
        bool(true),
        str('a'),
      ]);
    });

    it('lets a host closure call back into the guest', () => {
      let state = runIn(init(), 'function double(x) return x * 2 end').state;
      state = define(state, 'quadruple', (s, args) => {
        const once = unwrap(callByName(s, ['double'], args));
        return unwrap(callByName(once.state, ['double'], once.values));
      });
      expect(runIn(state, 'return quadruple(3)').values).toEqual([int(12)]);
    });

    it('supports nested guest and host calls', () => {
      let state = define(init(), 'negate', negate);
      state = runIn(state, 'function twice(x) return negate(negate(x)) end').state;
      state = define(state, 'viaGuest', (s, args) =>
        unwrap(callByName(s, ['twice'], args))
      );
      expect(runIn(state, 'return viaGuest(9)').values).toEqual([int(9)]);
    });
  });

  describe('host errors', () => {
    it('carries a thrown LuaError to the caller unchanged', () => {
      const thrown = new UndefinedPathError(['settings', 'missing']);
      const state = define(init(), 'fail', () => {
        throw thrown;
      });
      const result = run(state, 'return fail()');
      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.error).toBe(thrown);
    });

    it('wraps other thrown values as host function failures', () => {
      const cause = new Error('nope');
      const state = define(init(), 'fail', () => {
        throw cause;
      });
      const result = run(state, 'fail()');
      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.error).toBeInstanceOf(LuaRuntimeError);
      expect(result.error.errorId).toBe('LUA-R003');
      expect(result.error.message).toBe('nope');
      expect(result.error.cause).toBe(cause);
    });

    it('lets the guest catch a host failure with pcall', () => {
      const state = define(init(), 'fail', () => {
        throw new Error('nope');
      });
      expect(
        runIn(state, 'local ok, e = pcall(fail); return ok, tostring(e)').values
      ).toEqual([bool(false), str('nope')]);
    });

    it('rejects a stale state returned by the closure', () => {
      const state = define(init(), 'sloppy', (s) => {
        encodeInt(s, 1);
        return { state: s, values: [] };
      });
      const result = run(state, 'sloppy()');
      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.error).toBeInstanceOf(LineageError);
      expect(result.error.errorId).toBe('LUA-L001');
    });
  });

  describe('call', () => {
    it('calls a guest function through a reference', () => {
      const state = init();
      const upper = unwrap(refGet(state, ['string', 'upper']));
      expect(unwrap(call(state, upper, [str('abc')])).values).toEqual([
        str('ABC'),
      ]);
    });

    it('calls host and guest functions the same way', () => {
      let state = define(init(), 'negate', negate);
      state = runIn(state, 'function inc(x) return x + 1 end').state;
      const host = unwrap(refGet(state, ['negate']));
      const guest = unwrap(refGet(state, ['inc']));
      const first = unwrap(call(state, host, [int(4)]));
      const second = unwrap(call(first.state, guest, first.values));
      expect(second.values).toEqual([int(-3)]);
    });

    it('reports a guest error as a failure', () => {
      const state = runIn(init(), 'function boom() error("kaput", 0) end').state;
      const boom = unwrap(refGet(state, ['boom']));
      const result = call(state, boom);
      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.error.message).toBe('kaput');
    });
  });

  describe('callByName', () => {
    it('calls a standard library function', () => {
      expect(
        unwrap(
          callByName(init(), ['math', 'max'], [int(1), int(20), int(7), int(18)])
        ).values
      ).toEqual([int(20)]);
    });

    it('calls a table with __call', () => {
      const state = runIn(
        init(),
        'doubler = setmetatable({}, {__call = function(self, x) return x * 2 end})'
      ).state;
      expect(unwrap(callByName(state, ['doubler'], [int(4)])).values).toEqual([
        int(8),
      ]);
    });

    it('rejects a value that is not callable', () => {
      const result = callByName(init(), ['math', 'pi']);
      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.error.kind).toBe('undefined-path');
      expect(result.error.errorId).toBe('LUA-P004');
      expect(result.error.message).toBe(
        'Undefined path: math.pi is a number, not a function'
      );
    });

    it('rejects a missing function', () => {
      const result = callByName(init(), ['nowhere']);
      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.error.errorId).toBe('LUA-P001');
    });
  });
});
