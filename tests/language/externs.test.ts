/**
 * sylt Language Tests: Extern Functions
 * Standard externs, iterators and host-defined functions
 */

import { describe, expect, it } from 'vitest';

import {
  defineExtern,
  INT,
  int,
  listOf,
  NIL,
  STANDARD_EXTERNS,
  VOID,
} from '../../src/index.js';
import { output, runError } from '../helpers/runtime.js';

describe('sylt Language: externs', () => {
  describe('collections', () => {
    it('measures strings by character', () => {
      expect(output('print len("héj")')).toEqual(['3']);
    });

    it('pops the last element', () => {
      expect(output('xs := [1, 2]\nprint pop(xs)\nprint xs')).toEqual(['2', '[1]']);
    });

    it('measures and prints a list that contains itself', () => {
      expect(output('xs := [1]\npush(xs, xs)\nprint len(xs)\nprint xs\nprint as_str(xs)')).toEqual([
        '2',
        '[1, [...]]',
        '[1, [...]]',
      ]);
    });

    it('grows a large list one push at a time', () => {
      const source = [
        'xs := []',
        'i := 0',
        'loop i < 50000 {',
        '  push(xs, [i])',
        '  i += 1',
        '}',
        'print len(xs)',
        'print pop(xs)',
      ].join('\n');
      expect(output(source)).toEqual(['50000', '[49999]']);
    });

    it('fails to pop an empty list', () => {
      const err = runError('xs := [1]\npop(xs)\npop(xs)');
      expect(err.errorId).toBe('SYLT-R010');
      expect(err.format()).toBe("main.sy:3: Extern function 'pop' failed: the list is empty");
    });
  });

  describe('numbers', () => {
    it('picks the overload for the argument type', () => {
      expect(
        output('print sqrt(4.0)\nprint abs(-3)\nprint abs(-2.5)\nprint as_int(2.9)\nprint as_float(2)')
      ).toEqual(['2.0', '3', '2.5', '2', '2.0']);
    });

    it('rejects arguments no overload takes', () => {
      const err = runError('print sqrt(4)');
      expect(err.errorId).toBe('SYLT-R009');
      expect(err.message).toBe("Extern function 'sqrt' cannot take arguments (int)");
    });

    it('refuses to convert a float beyond the int range', () => {
      const err = runError('print as_int(1000000000.0 * 1000000000.0)');
      expect(err.errorId).toBe('SYLT-R016');
      expect(err.message).toBe(
        'Integer overflow: 1000000000000000000 is outside the int range'
      );
    });

    it('reports failures inside the function', () => {
      expect(runError('print sqrt(-1.0)').message).toBe(
        "Extern function 'sqrt' failed: cannot take the square root of -1"
      );
    });

    it('returns random floats in [0, 1)', () => {
      expect(output('r := random()\nprint r >= 0.0 && r < 1.0')).toEqual(['true']);
    });
  });

  describe('strings', () => {
    it('formats any value', () => {
      expect(output('print as_str((1, "a"))\nprint as_str(1) + "!"')).toEqual(['(1, "a")', '1!']);
    });
  });

  describe('iterators', () => {
    it('counts with range', () => {
      expect(output('it := range(3)\nprint next(it)\nprint take(it, 5)\nprint next(it)')).toEqual([
        '0',
        '[1, 2]',
        'nil',
      ]);
      expect(output('print take(range(2, 5), 10)')).toEqual(['[2, 3, 4]']);
    });

    it('walks a list live', () => {
      const source = 'xs := [1]\nit := iter(xs)\nprint next(it)\npush(xs, 2)\nprint next(it)\nprint next(it)';
      expect(output(source)).toEqual(['1', '2', 'nil']);
    });

    it('walks a set', () => {
      expect(output('print take(iter({1, 2}), 5)')).toEqual(['[1, 2]']);
    });

    it('formats iterators and externs', () => {
      expect(output('print range(1)\nprint push')).toEqual(['<iter int>', '<extern push>']);
    });
  });

  describe('host externs', () => {
    const double = defineExtern('double', [
      {
        params: [INT],
        returns: INT,
        invoke: ([x]) => (x?.type === 'Int' ? int(x.value * 2) : NIL),
      },
    ]);
    const boom = defineExtern('boom', [
      {
        params: [],
        returns: VOID,
        invoke: () => {
          throw new Error('kaput');
        },
      },
    ]);
    const total = defineExtern('total', [
      {
        params: [listOf(INT)],
        returns: INT,
        invoke: ([xs]) =>
          int(
            xs?.type === 'List'
              ? xs.elements.reduce((sum, x) => sum + (x.type === 'Int' ? x.value : 0), 0)
              : 0
          ),
      },
    ]);
    const externs = [...STANDARD_EXTERNS, double, boom, total];

    it('calls a function the host registers', () => {
      expect(output('print double(21)', { externs })).toEqual(['42']);
    });

    it('checks list elements against a declared element type', () => {
      expect(output('print total([1, 2, 3])\nprint total([])', { externs })).toEqual(['6', '0']);
      const err = runError('print total([1, "a"])', { externs });
      expect(err.errorId).toBe('SYLT-R009');
      expect(err.message).toBe("Extern function 'total' cannot take arguments ([int | str])");
    });

    it('wraps host exceptions', () => {
      expect(runError('boom()', { externs }).message).toBe("Extern function 'boom' failed: kaput");
    });
  });
});
