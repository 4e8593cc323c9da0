/**
 * sylt Language Tests: Operators
 * Arithmetic, comparison, logic, membership and assertions
 */

import { describe, expect, it } from 'vitest';

import { output, runError } from '../helpers/runtime.js';

describe('sylt Language: operators', () => {
  describe('arithmetic', () => {
    it('follows precedence', () => {
      expect(output('print 1 + 2 * 3')).toEqual(['7']);
      expect(output('print (1 + 2) * 3')).toEqual(['9']);
      expect(output('print -2 * 3 + 1')).toEqual(['-5']);
    });

    it('truncates int division', () => {
      expect(output('print 7 / 2\nprint -7 / 2')).toEqual(['3', '-3']);
    });

    it('keeps floats as floats', () => {
      expect(output('print 1.5 + 1.0\nprint 2.0 * 1.0')).toEqual(['2.5', '2.0']);
    });

    it('concatenates strings', () => {
      expect(output('print "ab" + "cd"')).toEqual(['abcd']);
    });

    it('combines tuples element-wise', () => {
      expect(output('print (1, 2) + (3, 4)\nprint -(1, 2.5)')).toEqual(['(4, 6)', '(-1, -2.5)']);
    });

    it('does not mix ints and floats', () => {
      const err = runError('print 1 + 1.0');
      expect(err.errorId).toBe('SYLT-R001');
      expect(err.message).toBe("Cannot apply '+' to int and float");
    });

    it('stops when an int result leaves the exact range', () => {
      expect(output('print 9007199254740990 + 1')).toEqual(['9007199254740991']);

      const err = runError('print 9007199254740991 + 2');
      expect(err.errorId).toBe('SYLT-R016');
      expect(err.message).toBe('Integer overflow: 9007199254740992 is outside the int range');
      expect(runError('print 3037000499 * 3037000499').errorId).toBe('SYLT-R016');
      expect(runError('print -9007199254740991 - 1').errorId).toBe('SYLT-R016');
    });

    it('reports division by zero with its line', () => {
      expect(runError('a := 1\nprint a / 0').format()).toBe('main.sy:2: Division by zero');
    });
  });

  describe('comparison and logic', () => {
    it('compares numbers and strings', () => {
      expect(
        output('print 1 < 2\nprint 2 <= 2\nprint 3 >= 4\nprint "a" < "b"\nprint 1 != 2')
      ).toEqual(['true', 'true', 'false', 'true', 'true']);
    });

    it('never equates an int with a float', () => {
      expect(output('print 1 == 1.0\nprint 1 == 1')).toEqual(['false', 'true']);
    });

    it('combines bools', () => {
      expect(output('print true && false\nprint true || false\nprint !true')).toEqual([
        'false',
        'true',
        'false',
      ]);
    });

    it('rejects comparisons across types', () => {
      expect(runError('print 1 < "a"').message).toBe("Cannot apply '<' to int and str");
    });

    it('rejects logic on non-bools', () => {
      expect(runError('print 1 && true').message).toBe("Cannot apply '&&' to int and bool");
    });
  });

  describe('membership', () => {
    it('tests containers and substrings', () => {
      expect(
        output(
          'print 3 in [1, 2]\nprint 2 in (1, 2)\nprint "el" in "hello"\nprint "a" in {"a": 1}\nx := {1, 2}\nprint 1 in x'
        )
      ).toEqual(['false', 'true', 'true', 'true', 'true']);
    });
  });

  describe('assertions', () => {
    it('passes when both sides are equal', () => {
      expect(output('1 + 1 <=> 2\nprint "ok"')).toEqual(['ok']);
    });

    it('fails with the line of the assertion', () => {
      const err = runError('x := 1\nx <=> 2');
      expect(err.errorId).toBe('SYLT-R008');
      expect(err.format()).toBe('main.sy:2: Assertion failed');
    });
  });
});
