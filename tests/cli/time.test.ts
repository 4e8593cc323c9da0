/**
 * sylt CLI Tests: sylt-time command
 */

import { afterEach, describe, expect, it, vi } from 'vitest';
import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';

import { main, parseTimeArgs, timeRuns } from '../../src/cli-time.js';
import { compileSource } from '../helpers/runtime.js';

/** A clock returning the given milliseconds in order */
function clock(times: number[]): () => number {
  let i = 0;
  return () => times[i++] ?? 0;
}

describe('sylt-time', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe('parseTimeArgs', () => {
    it('parses limits', () => {
      expect(parseTimeArgs(['-r', '3', '--time', '10', 'prog.sy'])).toEqual({
        mode: 'time',
        file: 'prog.sy',
        maxRuns: 3,
        maxSeconds: 10,
      });
      expect(parseTimeArgs(['prog.sy'])).toEqual({
        mode: 'time',
        file: 'prog.sy',
        maxRuns: undefined,
        maxSeconds: undefined,
      });
    });

    it('rejects bad limits', () => {
      expect(() => parseTimeArgs(['-t', 'soon', 'prog.sy'])).toThrow(
        '-t expects a non-negative integer'
      );
      expect(() => parseTimeArgs(['prog.sy', '--runs'])).toThrow(
        '--runs expects a non-negative integer'
      );
    });
  });

  describe('timeRuns', () => {
    const program = compileSource('x := 1 + 2');

    it('reports each run in microseconds', () => {
      expect(timeRuns(program, { maxRuns: 2 }, clock([0, 1, 1.5, 2, 2.25]))).toEqual([500, 250]);
    });

    it('stops starting runs once the time limit has passed', () => {
      expect(timeRuns(program, { maxSeconds: 0 }, clock([0, 0]))).toEqual([]);
    });

    it('throws the error of a failing run', () => {
      expect(() => timeRuns(compileSource('print 1 / 0'), { maxRuns: 1 })).toThrow(
        'Division by zero'
      );
    });
  });

  describe('main', () => {
    it('prints one timing per run', async () => {
      const dir = await fs.mkdtemp(path.join(os.tmpdir(), 'sylt-time-'));
      try {
        const file = path.join(dir, 'bench.sy');
        await fs.writeFile(file, 'x := 1 + 2');
        const log = vi.spyOn(console, 'log').mockImplementation(() => undefined);
        const error = vi.spyOn(console, 'error').mockImplementation(() => undefined);

        expect(await main(['--runs', '2', file])).toBe(0);
        expect(log).toHaveBeenCalledTimes(2);
        expect(error.mock.calls.map(([line]) => line)).toEqual([
          'Compiling',
          'Running once',
          'Starting runs',
        ]);
      } finally {
        await fs.rm(dir, { recursive: true });
      }
    });
  });
});
