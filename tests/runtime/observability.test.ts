/**
 * lua-bridge Tests: Options and Observability
 * print() capture, library selection, package.path and event callbacks
 */

import {
  encodeInt,
  expose,
  init,
  run,
  set,
  unwrap,
  type ErrorEvent,
  type HostCallEvent,
  type HostReturnEvent,
} from '../../src/index.js';
import { describe, expect, it } from 'vitest';

import { initWithLog, int, runIn, runValues, str } from '../helpers/runtime.js';

describe('lua-bridge: Options and Observability', () => {
  describe('print', () => {
    it('sends print output to onLog', () => {
      const { state, lines } = initWithLog();
      runIn(state, 'print("a", 1, nil, true, 1.5)');
      expect(lines).toEqual(['a\t1\tnil\ttrue\t1.5']);
    });

    it('uses __tostring for tables', () => {
      const { state, lines } = initWithLog();
      runIn(state, 'print(setmetatable({}, {__tostring = function() return "obj" end}))');
      expect(lines).toEqual(['obj']);
    });

    it('reports a failing onLog as a host function failure', () => {
      const state = init({
        callbacks: {
          onLog: () => {
            throw new Error('sink closed');
          },
        },
      });
      const result = run(state, 'print("x")');
      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.error.errorId).toBe('LUA-R003');
      expect(result.error.message).toBe('sink closed');
    });
  });

  describe('libraries', () => {
    it('opens only the requested libraries', () => {
      expect(runValues('return string, type(1)', { libraries: ['base'] })).toEqual([
        { kind: 'nil' },
        str('number'),
      ]);
    });

    it('opens a library subset under its usual names', () => {
      expect(
        runValues('return math.floor(2.5)', { libraries: ['base', 'math'] })
      ).toEqual([int(2)]);
    });

    it('sets package.path', () => {
      expect(
        runValues('return package.path', { packagePath: './lib/?.lua' })
      ).toEqual([str('./lib/?.lua')]);
    });
  });

  describe('events', () => {
    it('reports host calls and returns', () => {
      const calls: HostCallEvent[] = [];
      const returns: HostReturnEvent[] = [];
      let state = init({
        observability: {
          onHostCall: (event) => calls.push(event),
          onHostReturn: (event) => returns.push(event),
        },
      });
      const exposed = expose(
        state,
        (s) => {
          const result = encodeInt(s, 10);
          return { state: result.state, values: [result.value] };
        },
        { name: 'ten' }
      );
      state = unwrap(set(exposed.state, ['ten'], exposed.value));
      runIn(state, 'return ten(1)');

      expect(calls).toEqual([{ name: 'ten', args: [int(1)] }]);
      expect(returns).toHaveLength(1);
      expect(returns[0]?.name).toBe('ten');
      expect(returns[0]?.values).toEqual([int(10)]);
      expect(returns[0]?.durationMs).toBeGreaterThanOrEqual(0);
    });

    it('names unnamed host functions anonymous', () => {
      const calls: HostCallEvent[] = [];
      let state = init({
        observability: { onHostCall: (event) => calls.push(event) },
      });
      const exposed = expose(state, (s) => ({ state: s, values: [] }));
      state = unwrap(set(exposed.state, ['f'], exposed.value));
      runIn(state, 'f()');
      expect(calls.map((event) => event.name)).toEqual(['anonymous']);
    });

    it('reports each failure once', () => {
      const errors: ErrorEvent[] = [];
      const state = init({
        observability: { onError: (event) => errors.push(event) },
      });
      const result = run(state, 'error("bad", 0)');
      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(errors).toHaveLength(1);
      expect(errors[0]?.error).toBe(result.error);
    });
  });
});
