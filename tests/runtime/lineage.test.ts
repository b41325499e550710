/**
 * lua-bridge Tests: VM State Lineage
 * Stale handles, foreign values and closed VMs
 */

import {
  call,
  close,
  decode,
  decoders,
  encodeNil,
  get,
  init,
  LineageError,
  refGet,
  run,
  set,
  unwrap,
} from '../../src/index.js';
import { describe, expect, it } from 'vitest';

import { runIn } from '../helpers/runtime.js';

/** Capture the LineageError thrown by `fn` */
function lineageErrorOf(fn: () => unknown): LineageError {
  try {
    fn();
  } catch (error) {
    if (error instanceof LineageError) return error;
    throw error;
  }
  throw new Error('expected a LineageError');
}

describe('lua-bridge: VM State Lineage', () => {
  it('starts at generation 0 and advances on each mutation', () => {
    const start = init();
    const encoded = encodeNil(start);
    const ran = runIn(encoded.state, 'x = 1');
    expect(start.generation).toBe(0);
    expect(encoded.state.generation).toBe(1);
    // load and run each advance once
    expect(ran.state.generation).toBe(3);
  });

  it('rejects a consumed state', () => {
    const start = init();
    runIn(start, 'x = 1');
    const error = lineageErrorOf(() => run(start, 'return x'));
    expect(error.reason).toBe('stale-state');
    expect(error.errorId).toBe('LUA-L001');
    expect(error.message).toBe(
      'Stale VM state: generation 0 was consumed (current is 2)'
    );
  });

  it('rejects a reference from another VM', () => {
    const first = init();
    const second = init();
    const upper = unwrap(refGet(first, ['string', 'upper']));
    const error = lineageErrorOf(() => call(second, upper));
    expect(error.reason).toBe('foreign-value');
    expect(error.message).toBe(
      'A function value from another VM cannot be used here'
    );
  });

  it('rejects a value from another VM', () => {
    const table = unwrap(get(init(), ['math']));
    const error = lineageErrorOf(() => set(init(), ['m'], table));
    expect(error.reason).toBe('foreign-value');
  });

  it('rejects every operation after close', () => {
    const state = init();
    close(state);
    const error = lineageErrorOf(() => run(state, 'return 1'));
    expect(error.reason).toBe('closed');
    expect(error.message).toBe('The VM has been closed');
  });

  it('rejects decoding a table of a closed VM', () => {
    const state = init();
    const table = unwrap(run(state, 'return {1, 2}')).values[0];
    close(state);
    if (table === undefined) throw new Error('no table returned');
    expect(() => decode(table, decoders.list(decoders.int))).toThrow(
      LineageError
    );
  });

  it('closes through a stale handle and ignores a second close', () => {
    const start = init();
    const { state } = runIn(start, 'x = 1');
    close(start);
    close(state);
    expect(() => get(state, ['x'])).toThrow(LineageError);
  });
});
