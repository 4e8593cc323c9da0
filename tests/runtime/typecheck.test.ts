/**
 * sylt Runtime Tests: Typecheck
 * The typecheck pass runs every block once on placeholder values
 */

import { describe, expect, it } from 'vitest';

import {
  defineExtern,
  INT,
  int,
  list,
  listOf,
  STANDARD_EXTERNS,
  type SyltError,
} from '../../src/index.js';
import { typecheckSource, typeErrors } from '../helpers/runtime.js';

const POINT = 'blob P { x: int, y: int }\n';

const TWO_BAD_FUNCTIONS = [
  'f := fn -> int {',
  '  ret "a"',
  '}',
  'g := fn -> str {',
  '  ret 1',
  '}',
].join('\n');

describe('sylt Typecheck', () => {
  describe('definitions and assignments', () => {
    it('checks annotated definitions', () => {
      expect(typeErrors('a: int = "x"')).toEqual(["Cannot define 'a' of type int as str"]);
    });

    it('keeps the type a variable was first given', () => {
      expect(typeErrors('a := 1\na = "x"')).toEqual(['Cannot assign str where int is stored']);
    });

    it('accepts any variant of a declared union', () => {
      expect(typeErrors('a: int | str = 1\na = "x"')).toEqual([]);
    });

    it('accepts anything for an unknown annotation', () => {
      expect(typeErrors('a: * = 1\na = "x"')).toEqual([]);
    });

    it('uses the result type of extern functions', () => {
      expect(typeErrors('a := 1\na = as_str(1)')).toEqual([
        'Cannot assign str where int is stored',
      ]);
    });

    it('checks list element assignments', () => {
      expect(typeErrors('xs := [1]\nxs[0] = "a"')).toEqual([
        'Cannot assign str where int is stored',
      ]);
    });
  });

  describe('functions', () => {
    it('checks argument types', () => {
      expect(typeErrors('f := fn a: int {}\nf("x")')).toEqual([
        'Argument 1 has type str, expected int',
      ]);
    });

    it('checks returned values', () => {
      expect(typeErrors('f := fn -> int {\n  ret "x"\n}')).toEqual([
        'Function returns str, declared int',
      ]);
    });

    it('checks the implicit return of a block without ret', () => {
      expect(typeErrors('f := fn -> int {}')).toEqual(['Function returns void, declared int']);
    });

    it('ignores the implicit return after an explicit one', () => {
      expect(typeErrors('f := fn -> int {\n  ret 1\n}')).toEqual([]);
    });

    it('runs bodies on placeholders of the parameter types', () => {
      expect(typeErrors('f := fn a: int -> str {\n  ret a\n}')).toEqual([
        'Function returns int, declared str',
      ]);
    });

    it('checks closures against the values they capture', () => {
      const source = [
        'f := fn -> int {',
        '  x := 1',
        '  g := fn -> int {',
        '    ret x',
        '  }',
        '  ret g()',
        '}',
      ].join('\n');
      expect(typeErrors(source)).toEqual([]);
    });

    it('reports one error per function', () => {
      expect(typeErrors(TWO_BAD_FUNCTIONS)).toEqual([
        'Function returns str, declared int',
        'Function returns int, declared str',
      ]);
    });

    it('stops checking a block at its first error', () => {
      const source = 'f := fn {\n  a := 1 + "x"\n  b := 2 + "y"\n}';
      expect(typeErrors(source)).toEqual(["Cannot apply '+' to int and str"]);
    });
  });

  describe('blobs', () => {
    it('checks field types', () => {
      expect(typeErrors(POINT + 'p := P { x: "a", y: 1 }')).toEqual([
        "Field 'x' of blob 'P' expects int, got str",
      ]);
    });

    it('requires every field that cannot be void', () => {
      expect(typeErrors(POINT + 'p := P { x: 1 }')).toEqual(["Blob 'P' is missing field 'y'"]);
      expect(typeErrors('blob Q { x: int, y: int | void }\nq := Q { x: 1 }')).toEqual([]);
    });
  });

  describe('operations', () => {
    it('reports operator errors as type errors', () => {
      const result = typecheckSource('print 1 + "a"');
      expect(result.success).toBe(false);
      expect(result.errors.map((err) => err.errorId)).toEqual(['SYLT-T007']);
      expect(result.errors[0]?.message).toBe("Cannot apply '+' to int and str");
    });

    it('checks branches that would not run', () => {
      expect(typeErrors('if true {\n  print 1\n} else {\n  print 1 + "a"\n}')).toEqual([
        "Cannot apply '+' to int and str",
      ]);
    });
  });

  describe('reporting', () => {
    it('sites errors at their line', () => {
      expect(typecheckSource('a := 1\na = "x"').errors[0]?.format()).toBe(
        'main.sy:2: Cannot assign str where int is stored'
      );
    });

    it('calls onError for every error', () => {
      const seen: SyltError[] = [];
      typecheckSource(TWO_BAD_FUNCTIONS, {
        observability: { onError: (event) => seen.push(event.error) },
      });
      expect(seen.map((err) => err.errorId)).toEqual(['SYLT-T004', 'SYLT-T004']);
    });

    it('succeeds on a well-typed program', () => {
      expect(typecheckSource('a := 1\nprint a + 2').success).toBe(true);
    });
  });

  describe('host externs', () => {
    it('checks against the declared result without invoking the extern', () => {
      let calls = 0;
      const load = defineExtern('load', [
        {
          params: [],
          returns: listOf(INT),
          invoke: () => {
            calls += 1;
            return list([int(7)]);
          },
        },
      ]);
      const externs = [...STANDARD_EXTERNS, load];
      const messages = (source: string): string[] =>
        typecheckSource(source, { externs }).errors.map((err) => err.message);

      expect(messages('xs := load()\nxs[0] = 2')).toEqual([]);
      expect(messages('xs := load()\nxs[0] = "a"')).toEqual([
        'Cannot assign str where int is stored',
      ]);
      expect(messages('a: [str] = load()')).toEqual(["Cannot define 'a' of type [str] as [int]"]);
      expect(messages('x := load()[0] + "s"')).toEqual(["Cannot apply '+' to int and str"]);
      expect(calls).toBe(0);
    });
  });
});
