/**
 * sylt Language Tests: Collections
 * Lists, tuples, sets, dicts and strings
 */

import { describe, expect, it } from 'vitest';

import { output, runError } from '../helpers/runtime.js';

describe('sylt Language: collections', () => {
  describe('lists', () => {
    it('indexes and assigns elements', () => {
      expect(output('xs := [1, 2, 3]\nprint xs[1]\nxs[0] = 5\nprint xs')).toEqual([
        '2',
        '[5, 2, 3]',
      ]);
    });

    it('applies compound assignment to an element', () => {
      expect(output('xs := [1, 2]\nxs[1] += 10\nprint xs')).toEqual(['[1, 12]']);
    });

    it('shares one list between aliases', () => {
      expect(output('xs := [1]\nys := xs\npush(ys, 2)\nprint xs')).toEqual(['[1, 2]']);
    });

    it('compares structurally', () => {
      expect(output('print [1, 2] == [1, 2]\nprint [1] == [2]')).toEqual(['true', 'false']);
    });

    it('quotes nested strings', () => {
      expect(output('print ["a", ("b", 1)]')).toEqual(['["a", ("b", 1)]']);
    });

    it('reports indices out of range', () => {
      expect(runError('xs := [1]\nprint xs[3]').message).toBe(
        'Index 3 is out of range for a list of length 1'
      );
      expect(runError('xs := [1]\nxs[-1] = 2').message).toBe(
        'Index -1 is out of range for a list of length 1'
      );
    });

    it('rejects non-int indices', () => {
      expect(runError('xs := [1]\nprint xs["a"]').message).toBe('Cannot index [int] with a');
    });
  });

  describe('tuples', () => {
    it('indexes and formats tuples', () => {
      expect(output('t := (1, "a")\nprint t[1]\nprint t\nprint (1,)\nprint ()')).toEqual([
        'a',
        '(1, "a")',
        '(1,)',
        '()',
      ]);
    });
  });

  describe('strings', () => {
    it('indexes by character', () => {
      expect(output('s := "héj"\nprint s[1]\nprint len(s)')).toEqual(['é', '3']);
    });

    it('cannot index other values', () => {
      expect(runError('x := 1\nprint x[0]').message).toBe('Cannot index int with 0');
    });
  });

  describe('sets', () => {
    it('drops duplicates', () => {
      expect(output('s := {1, 2, 2}\nprint len(s)\nprint s')).toEqual(['2', '{1, 2}']);
    });

    it('compares by contents', () => {
      expect(output('print {1, 2} == {2, 1}')).toEqual(['true']);
    });
  });

  describe('dicts', () => {
    it('reads, writes and measures entries', () => {
      expect(output('d := {"a": 1}\nd["b"] = 2\nprint d["b"]\nprint len(d)\nprint d')).toEqual([
        '2',
        '2',
        '{"a": 1, "b": 2}',
      ]);
    });

    it('formats the empty dict', () => {
      expect(output('print {:}')).toEqual(['{:}']);
    });

    it('reports missing keys', () => {
      const err = runError('d := {1: 2}\nprint d[3]');
      expect(err.errorId).toBe('SYLT-R004');
      expect(err.message).toBe('Key 3 is not in the dict');
    });

    it('compares by contents', () => {
      expect(output('print {1: 2} == {1: 2}\nprint {1: 2} == {1: 3}')).toEqual([
        'true',
        'false',
      ]);
    });
  });
});
