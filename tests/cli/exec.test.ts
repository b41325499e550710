/**
 * lua-bridge CLI Tests: lua-bridge-exec command
 */

import { describe, expect, it, beforeAll, afterAll } from 'vitest';
import { parseArgs, executeScript } from '../../src/cli-exec.js';
import { determineExitCode } from '../../src/cli-shared.js';
import { LuaRuntimeError, LuaSyntaxError } from '../../src/index.js';
import * as fs from 'fs/promises';
import * as path from 'path';
import * as os from 'os';

describe('lua-bridge-exec', () => {
  let tempDir: string;

  beforeAll(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'lua-bridge-test-'));
  });

  afterAll(async () => {
    await fs.rm(tempDir, { recursive: true });
  });

  async function writeScript(name: string, content: string): Promise<string> {
    const scriptPath = path.join(tempDir, name);
    await fs.writeFile(scriptPath, content);
    return scriptPath;
  }

  describe('parseArgs', () => {
    it('parses a file with arguments', () => {
      expect(parseArgs(['script.lua', 'a', '--flag'])).toEqual({
        mode: 'exec',
        file: 'script.lua',
        args: ['a', '--flag'],
      });
    });

    it('parses stdin mode', () => {
      expect(parseArgs(['-'])).toEqual({ mode: 'exec', file: '-', args: [] });
    });

    it('parses --help and -h', () => {
      expect(parseArgs(['--help'])).toEqual({ mode: 'help' });
      expect(parseArgs(['-h'])).toEqual({ mode: 'help' });
    });

    it('parses --version and -v', () => {
      expect(parseArgs(['--version'])).toEqual({ mode: 'version' });
      expect(parseArgs(['-v'])).toEqual({ mode: 'version' });
    });

    it('throws on a missing file', () => {
      expect(() => parseArgs([])).toThrow('Missing file argument');
    });

    it('throws on an unknown option', () => {
      expect(() => parseArgs(['-x', 'script.lua'])).toThrow(
        'Unknown option: -x'
      );
    });
  });

  describe('executeScript', () => {
    it('passes arguments in the arg table', async () => {
      const script = await writeScript(
        'args.lua',
        'return arg[1] .. arg[2], #arg'
      );
      expect(executeScript(script, ['a', 'b'])).toEqual([
        { kind: 'string', value: 'ab' },
        { kind: 'int', value: 2 },
      ]);
    });

    it('passes the script name as arg[0]', async () => {
      const script = await writeScript('name.lua', 'return arg[0]');
      expect(executeScript(script, [])).toEqual([
        { kind: 'string', value: script },
      ]);
    });

    it('computes the exit code from the results', async () => {
      const script = await writeScript('exit.lua', 'return 3, "partial"');
      expect(determineExitCode(executeScript(script, []))).toEqual({
        code: 3,
        message: 'partial',
      });
    });

    it('throws guest runtime errors', async () => {
      const script = await writeScript('fail.lua', 'error("bad input", 0)');
      expect(() => executeScript(script, [])).toThrow(LuaRuntimeError);
      expect(() => executeScript(script, [])).toThrow('bad input');
    });

    it('throws syntax errors', async () => {
      const script = await writeScript('broken.lua', 'return (');
      expect(() => executeScript(script, [])).toThrow(LuaSyntaxError);
    });
  });
});
