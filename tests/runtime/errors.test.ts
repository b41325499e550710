/**
 * lua-bridge Tests: Error Taxonomy
 * Registry, message rendering and error classes
 */

import {
  DecodeFailure,
  ERROR_REGISTRY,
  err,
  InvalidPathError,
  IoError,
  isLuaError,
  LineageError,
  LuaRuntimeError,
  LuaSyntaxError,
  ok,
  PathCollisionError,
  renderMessage,
  UndefinedPathError,
  unwrap,
  type AnyLuaError,
} from '../../src/index.js';
import { describe, expect, it } from 'vitest';

describe('lua-bridge: Error Taxonomy', () => {
  describe('ERROR_REGISTRY', () => {
    it('holds every error definition', () => {
      expect(ERROR_REGISTRY.size).toBe(14);
      expect(ERROR_REGISTRY.has('LUA-S001')).toBe(true);
      expect(ERROR_REGISTRY.has('LUA-X999')).toBe(false);
    });

    it('assigns categories by prefix', () => {
      for (const [errorId, definition] of ERROR_REGISTRY.entries()) {
        const letter = errorId.charAt(4);
        expect(definition.category.charAt(0).toUpperCase()).toBe(letter);
      }
    });
  });

  describe('renderMessage', () => {
    it('replaces placeholders', () => {
      expect(
        renderMessage('Expected {expected}, got {observed}', {
          expected: 'int',
          observed: 'float',
        })
      ).toBe('Expected int, got float');
    });

    it('renders missing values as empty strings', () => {
      expect(renderMessage('a{gap}b', {})).toBe('ab');
    });

    it('does not expand braces inside values', () => {
      expect(renderMessage('{message}', { message: '{message}' })).toBe(
        '{message}'
      );
    });

    it('returns templates with unclosed braces unchanged', () => {
      expect(renderMessage('broken {x', { x: 1 })).toBe('broken {x');
    });
  });

  describe('error classes', () => {
    it('renders path errors', () => {
      expect(new UndefinedPathError(['a', 'b']).message).toBe(
        'Undefined path: a.b'
      );
      expect(
        new UndefinedPathError(['f'], { observed: 'string' }).message
      ).toBe('Undefined path: f is a string, not a function');
      expect(new PathCollisionError(['a', 'b', 'c'], ['a', 'b'], 'boolean').message).toBe(
        'Cannot assign a.b.c: a.b holds a boolean, not a table'
      );
    });

    it('nests decode failures outermost first', () => {
      const failure = new DecodeFailure('int', 'float').within('[1]').within('["k"]');
      expect(failure.path).toEqual(['["k"]', '[1]']);
      expect(failure.message).toBe('Expected int, got float at ["k"][1]');
    });

    it('keeps the I/O cause', () => {
      const cause = new Error('EACCES: permission denied');
      const error = new IoError('/srv/app.lua', cause);
      expect(error.cause).toBe(cause);
      expect(error.message).toBe(
        'Cannot read /srv/app.lua: EACCES: permission denied'
      );
    });

    it('renders interpreter failures', () => {
      const error = new LuaRuntimeError('LUA-R002', {
        status: 'out of memory',
        message: 'not enough memory',
      });
      expect(error.message).toBe(
        'Interpreter failure (out of memory): not enough memory'
      );
    });

    it('exposes structured data', () => {
      const error = new LuaSyntaxError('main:3: unexpected symbol', {
        chunkName: 'main',
        line: 3,
      });
      expect(error.toData()).toEqual({
        kind: 'syntax',
        errorId: 'LUA-S001',
        message: 'main:3: unexpected symbol',
        location: { chunkName: 'main', line: 3 },
        context: {},
      });
      expect(error.format((data) => `${data.errorId} ${data.message}`)).toBe(
        'LUA-S001 main:3: unexpected symbol'
      );
    });

    it('narrows on kind', () => {
      const errors: AnyLuaError[] = [
        new InvalidPathError(),
        new LineageError('closed'),
      ];
      const kinds = errors.map((error) => {
        switch (error.kind) {
          case 'invalid-path':
            return error.errorId;
          case 'lineage':
            return error.reason;
          default:
            return 'other';
        }
      });
      expect(kinds).toEqual(['LUA-P002', 'closed']);
    });

    it('recognises bridge errors', () => {
      expect(isLuaError(new InvalidPathError())).toBe(true);
      expect(isLuaError(new Error('plain'))).toBe(false);
    });
  });

  describe('Result', () => {
    it('unwraps values and throws errors', () => {
      const failure = new InvalidPathError();
      expect(unwrap(ok(3))).toBe(3);
      expect(() => unwrap(err(failure))).toThrow(failure);
    });
  });
});
