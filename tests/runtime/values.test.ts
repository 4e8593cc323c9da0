/**
 * sylt Runtime Tests: Values and Types
 */

import { describe, expect, it } from 'vitest';

import {
  dict,
  float,
  FLOAT,
  formatType,
  formatValue,
  functionOf,
  INT,
  int,
  iter,
  list,
  listOf,
  NIL,
  RuntimeError,
  set,
  shapeOf,
  str,
  STRING,
  tuple,
  typeFits,
  typeOf,
  typeToValue,
  UNKNOWN_TYPE,
  unionOf,
  valueFits,
  valuesEqual,
  VOID,
  type BlobShape,
  type Value,
} from '../../src/index.js';

/** `[1, <itself>]` */
function selfContaining(): Value {
  const elements: Value[] = [int(1)];
  const looped = list(elements);
  elements.push(looped);
  return looped;
}

describe('sylt Values', () => {
  describe('formatValue', () => {
    it('formats scalars', () => {
      expect([NIL, int(-3), float(2), float(0.5), str('hi')].map(formatValue)).toEqual([
        'nil',
        '-3',
        '2.0',
        '0.5',
        'hi',
      ]);
    });

    it('quotes strings inside containers', () => {
      expect(formatValue(list([str('a'), tuple([int(1)])]))).toBe('["a", (1,)]');
      expect(formatValue(dict([[str('k'), set([str('v')])]]))).toBe('{"k": {"v"}}');
    });

    it('marks containers that hold themselves', () => {
      expect(formatValue(selfContaining())).toBe('[1, [...]]');

      const table = dict([]);
      if (table.type === 'Dict') table.entries.set(str('me'), table);
      expect(formatValue(table)).toBe('{"me": {...}}');

      const fields = new Map<string, Value>();
      const node: Value = { type: 'Instance', blob: 0, name: 'Node', fields };
      fields.set('next', node);
      expect(formatValue(node)).toBe('Node { next: Node {...} }');
    });

    it('prints a shared container in full at each place', () => {
      const inner = list([int(1)]);
      expect(formatValue(list([inner, inner]))).toBe('[[1], [1]]');
    });

    it('formats empty containers', () => {
      expect([tuple([]), list([]), set([]), dict([])].map(formatValue)).toEqual([
        '()',
        '[]',
        '{}',
        '{:}',
      ]);
    });
  });

  describe('valuesEqual', () => {
    it('compares structurally', () => {
      expect(valuesEqual(tuple([int(1), str('a')]), tuple([int(1), str('a')]))).toBe(true);
      expect(valuesEqual(list([int(1)]), list([int(1), int(2)]))).toBe(false);
    });

    it('never equates values of different tags', () => {
      expect(valuesEqual(int(1), float(1))).toBe(false);
      expect(valuesEqual(NIL, list([]))).toBe(false);
    });

    it('matches any variant of a union', () => {
      const union: Value = { type: 'Union', variants: [int(1), str('a')] };
      expect(valuesEqual(union, str('a'))).toBe(true);
      expect(valuesEqual(int(2), union)).toBe(false);
    });
  });

  describe('sets and dicts', () => {
    it('drop duplicate keys', () => {
      const s = set([tuple([int(1)]), tuple([int(1)]), int(1)]);
      expect(s.type === 'Set' && s.entries.size).toBe(2);

      const d = dict([
        [str('a'), int(1)],
        [str('a'), int(2)],
      ]);
      expect(formatValue(d)).toBe('{"a": 2}');
    });

    it('refuses to hash NaN', () => {
      const build = (): Value => set([float(Number.NaN)]);
      expect(build).toThrow(RuntimeError);
      expect(build).toThrow('Cannot hash non-finite float NaN');
    });
  });

  describe('iterators', () => {
    it('stay exhausted once the end is reached', () => {
      let calls = 0;
      const seq = iter(INT, () => (calls++ === 0 ? int(7) : undefined));
      if (seq.type !== 'Iter') throw new Error('expected an iterator');
      expect(seq.source.next()).toEqual(int(7));
      expect(seq.source.next()).toBeUndefined();
      expect(seq.source.done).toBe(true);
      expect(seq.source.next()).toBeUndefined();
      expect(calls).toBe(2);
    });
  });

  describe('typeOf', () => {
    it('infers element types from contents', () => {
      expect(formatType(typeOf(list([])))).toBe('[*]');
      expect(formatType(typeOf(list([int(1), str('a'), int(2)])))).toBe('[int | str]');
      expect(formatType(typeOf(dict([[str('a'), int(1)]])))).toBe('{str: int}');
      expect(formatType(typeOf(tuple([int(1)])))).toBe('(int,)');
      expect(formatType(typeOf(NIL))).toBe('void');
    });

    it('stops at a container reached through itself', () => {
      expect(formatType(typeOf(selfContaining()))).toBe('[int | [*]]');
    });
  });

  describe('shapeOf', () => {
    it('leaves container elements unknown', () => {
      expect(formatType(shapeOf(list([int(1)])))).toBe('[*]');
      expect(formatType(shapeOf(tuple([int(1), str('a')])))).toBe('(*, *)');
      expect(formatType(shapeOf(float(1)))).toBe('float');
    });
  });

  describe('valueFits', () => {
    it('checks elements the type spells out', () => {
      expect(valueFits(listOf(INT), list([int(1), int(2)]))).toBe(true);
      expect(valueFits(listOf(INT), list([int(1), str('a')]))).toBe(false);
      expect(valueFits(listOf(INT), list([]))).toBe(true);
      expect(valueFits(INT, list([]))).toBe(false);
    });

    it('accepts any list for an unknown element type', () => {
      expect(valueFits(listOf(UNKNOWN_TYPE), selfContaining())).toBe(true);
    });

    it('treats unions as any-of when expected', () => {
      expect(valueFits(unionOf([INT, STRING]), str('a'))).toBe(true);
      expect(valueFits(unionOf([INT, STRING]), float(1))).toBe(false);
    });
  });

  describe('typeFits', () => {
    it('accepts unknown in both directions', () => {
      expect(typeFits(UNKNOWN_TYPE, INT)).toBe(true);
      expect(typeFits(listOf(INT), listOf(UNKNOWN_TYPE))).toBe(true);
    });

    it('treats unions as any-of when expected and all-of when given', () => {
      const intOrStr = unionOf([INT, STRING]);
      expect(typeFits(intOrStr, INT)).toBe(true);
      expect(typeFits(INT, intOrStr)).toBe(false);
      expect(typeFits(unionOf([INT, STRING, FLOAT]), intOrStr)).toBe(true);
    });

    it('compares function parameters contravariantly', () => {
      const takesInt = functionOf([INT], VOID);
      const takesEither = functionOf([unionOf([INT, STRING])], VOID);
      expect(typeFits(takesInt, takesEither)).toBe(true);
      expect(typeFits(takesEither, takesInt)).toBe(false);
    });
  });

  describe('unionOf', () => {
    it('flattens and deduplicates', () => {
      expect(unionOf([INT, INT])).toEqual(INT);
      expect(unionOf([])).toEqual(VOID);
      expect(formatType(unionOf([INT, unionOf([STRING, INT])]))).toBe('int | str');
    });
  });

  describe('typeToValue', () => {
    it('builds one placeholder element per container', () => {
      expect(typeToValue(listOf(INT))).toEqual(list([int(1)]));
      expect(formatValue(typeToValue(unionOf([INT, STRING])))).toBe('1 | ""');
    });

    it('cuts recursive blobs with an unknown field', () => {
      const blobs: BlobShape[] = [
        {
          name: 'Node',
          file: 'main.sy',
          fields: [{ name: 'next', type: { kind: 'Instance', blob: 0, name: 'Node' } }],
        },
      ];
      const value = typeToValue({ kind: 'Instance', blob: 0, name: 'Node' }, blobs);
      expect(formatValue(value)).toBe('Node { next: <unknown> }');
    });
  });
});
