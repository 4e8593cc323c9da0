/**
 * sylt Compiler Tests
 * Op sequences, constant pool, scopes, closures and compile errors
 */

import { describe, expect, it } from 'vitest';

import {
  compile,
  formatType,
  parseSource,
  STANDARD_EXTERNS,
  type Program,
} from '../../src/index.js';
import { compileErrors, compileSource, compileSources } from '../helpers/runtime.js';

function entryOps(program: Program): unknown[] {
  return program.blocks[0]?.ops ?? [];
}

function messages(source: string): string[] {
  return compileErrors(source).map((err) => err.message);
}

describe('sylt Compiler', () => {
  describe('entry block', () => {
    it('compiles arithmetic into stack ops', () => {
      const program = compileSource('print 1 + 2');
      expect(entryOps(program)).toEqual([
        { op: 'Constant', index: 1 },
        { op: 'Constant', index: 2 },
        { op: 'Add' },
        { op: 'Print' },
        { op: 'Constant', index: 0 },
        { op: 'Return' },
      ]);
      expect(program.constants).toEqual([
        { type: 'Nil' },
        { type: 'Int', value: 1 },
        { type: 'Int', value: 2 },
      ]);
    });

    it('names the entry block and types it as a void function', () => {
      const [entry] = compileSource('print 1').blocks;
      expect(entry?.name).toBe('/preamble');
      expect(entry && formatType(entry.ty)).toBe('fn -> void');
    });

    it('reserves a nil placeholder per global', () => {
      const program = compileSource('a := 1\nb := 2');
      expect(program.globals).toBe(2);
      expect(entryOps(program)).toEqual([
        { op: 'Constant', index: 0 },
        { op: 'Constant', index: 0 },
        { op: 'Constant', index: 1 },
        { op: 'AssignGlobal', slot: 1 },
        { op: 'Constant', index: 2 },
        { op: 'AssignGlobal', slot: 2 },
        { op: 'Constant', index: 0 },
        { op: 'Return' },
      ]);
    });

    it('emits Define only for annotated definitions', () => {
      const program = compileSource('a: int = 1');
      expect(entryOps(program)).toContainEqual({
        op: 'Define',
        name: 'a',
        ty: { kind: 'Int' },
      });
      expect(entryOps(compileSource('a := 1'))).not.toContainEqual(
        expect.objectContaining({ op: 'Define' })
      );
    });
  });

  describe('constant pool', () => {
    it('deduplicates equal constants', () => {
      const program = compileSource('print 7\nprint 7\nprint "7"');
      expect(program.constants).toEqual([
        { type: 'Nil' },
        { type: 'Int', value: 7 },
        { type: 'String', value: '7' },
      ]);
    });

    it('keeps ints and floats of the same magnitude apart', () => {
      const program = compileSource('print 1\nprint 1.0');
      expect(program.constants).toEqual([
        { type: 'Nil' },
        { type: 'Int', value: 1 },
        { type: 'Float', value: 1 },
      ]);
    });

    it('interns field names in the string table', () => {
      const program = compileSource('blob P { x: int }\np := P { x: 1 }\nprint p.x\np.x = 2');
      expect(program.strings).toEqual(['x']);
    });
  });

  describe('globals', () => {
    it('resolves globals defined later from inside functions', () => {
      const program = compileSource('f :: fn -> int {\nret g\n}\ng := 5');
      expect(program.blocks[1]?.name).toBe('f');
      expect(program.blocks[1]?.ops).toEqual([
        { op: 'ReadGlobal', slot: 2 },
        { op: 'Return' },
        { op: 'Constant', index: 0 },
        { op: 'Return' },
      ]);
      expect(entryOps(program).slice(2, 6)).toEqual([
        { op: 'Closure', block: 1 },
        { op: 'AssignGlobal', slot: 1 },
        { op: 'Constant', index: 1 },
        { op: 'AssignGlobal', slot: 2 },
      ]);
    });

    it('gives blobs no global slot', () => {
      const program = compileSource('blob P { x: int }\np := P { x: 1 }');
      expect(program.globals).toBe(1);
      expect(program.blobs).toEqual([
        { name: 'P', file: 'main.sy', fields: [{ name: 'x', type: { kind: 'Int' } }] },
      ]);
    });
  });

  describe('control flow', () => {
    it('patches if and else jumps', () => {
      const program = compileSource('if true {\nprint 1\n} else {\nprint 2\n}');
      const ops = entryOps(program);
      expect(ops[1]).toEqual({ op: 'JumpIfFalse', target: 5 });
      expect(ops[4]).toEqual({ op: 'Jump', target: 7 });
      expect(ops.length).toBe(9);
    });

    it('unwinds loop locals on break', () => {
      const program = compileSource('loop {\nx := 1\nbreak\n}');
      expect(entryOps(program)).toEqual([
        { op: 'Constant', index: 1 },
        { op: 'Unwind', count: 1, target: 4 },
        { op: 'Pop' },
        { op: 'Jump', target: 0 },
        { op: 'Constant', index: 0 },
        { op: 'Return' },
      ]);
    });

    it('compiles compound index assignment with a copy of target and index', () => {
      const program = compileSource('xs := [1]\nxs[0] += 2');
      expect(entryOps(program).slice(4, 11)).toEqual([
        { op: 'ReadGlobal', slot: 1 },
        { op: 'Constant', index: 2 },
        { op: 'Copy', count: 2 },
        { op: 'GetIndex' },
        { op: 'Constant', index: 3 },
        { op: 'Add' },
        { op: 'AssignIndex' },
      ]);
    });
  });

  describe('functions and closures', () => {
    const counter = [
      'make := fn -> fn -> int {',
      '  n := 0',
      '  ret fn -> int {',
      '    n += 1',
      '    ret n',
      '  }',
      '}',
    ].join('\n');

    it('captures enclosing locals as upvalues', () => {
      const program = compileSource(counter);
      const inner = program.blocks[2];
      expect(inner?.name).toBe('fn@3');
      expect(inner?.upvalues).toEqual([{ isLocal: true, index: 1 }]);
      expect(inner?.ops).toEqual([
        { op: 'ReadUpvalue', slot: 0 },
        { op: 'Constant', index: 2 },
        { op: 'Add' },
        { op: 'AssignUpvalue', slot: 0 },
        { op: 'ReadUpvalue', slot: 0 },
        { op: 'Return' },
        { op: 'Constant', index: 0 },
        { op: 'Return' },
      ]);
    });

    it('types function blocks from their signature', () => {
      const program = compileSource(counter);
      const make = program.blocks[1];
      expect(make?.name).toBe('make');
      expect(make && formatType(make.ty)).toBe('fn -> fn -> int');
    });

    it('relays captures through intermediate functions', () => {
      const program = compileSource(
        'a := fn {\nx := 1\nb := fn {\nc := fn {\nprint x\n}\n}\n}'
      );
      expect(program.blocks[2]?.upvalues).toEqual([{ isLocal: true, index: 1 }]);
      expect(program.blocks[3]?.upvalues).toEqual([{ isLocal: false, index: 0 }]);
    });

    it('closes captured block locals instead of popping them', () => {
      const program = compileSource('{\nx := 1\nf := fn {\nprint x\n}\n}');
      expect(entryOps(program).slice(-4, -2)).toEqual([
        { op: 'Pop' },
        { op: 'CloseUpvalue' },
      ]);
    });
  });

  describe('errors', () => {
    it('reports one error per statement', () => {
      const errors = compileErrors('print x + y\nprint z');
      expect(errors.map((err) => err.format())).toEqual([
        "main.sy:1: No active variable called 'x' could be found",
        "main.sy:2: No active variable called 'z' could be found",
      ]);
    });

    it('rejects assignment to constants and calls', () => {
      expect(messages('a :: 1\na = 2')).toEqual(["Cannot assign to constant 'a'"]);
      expect(messages('f := fn {}\nf() = 1')).toEqual([
        'Cannot assign to result from function call',
      ]);
      expect(messages('len = 1')).toEqual(["Cannot assign to constant 'len'"]);
    });

    it('rejects duplicate names', () => {
      expect(messages('a := 1\na := 2')).toEqual([
        "A global variable with the name 'a' already exists",
      ]);
      expect(messages('f := fn {\na := 1\na := 2\n}')).toEqual([
        "A variable called 'a' is already defined in this scope",
      ]);
      expect(messages('blob P { x: int, x: float }')).toEqual([
        "Field 'x' is declared twice in blob 'P'",
      ]);
    });

    it('allows shadowing in a nested block', () => {
      expect(messages('f := fn {\na := 1\n{\na := 2\n}\n}')).toEqual([]);
    });

    it('rejects statements outside their context', () => {
      expect(messages('ret 1')).toEqual(["'ret' is only allowed inside a function"]);
      expect(messages('break')).toEqual(["'break' is only allowed inside a loop"]);
      expect(messages('f := fn {\nblob B { x: int }\n}')).toEqual([
        "'blob' is only allowed at the top level of a module",
      ]);
    });

    it('rejects unknown types and non-finite floats', () => {
      expect(messages('x: Foo = 1')).toEqual(["Unknown type 'Foo'"]);
      const digits = '9'.repeat(400);
      expect(messages(`x := ${digits}.0`)).toEqual([
        `Float literal '${digits}.0' is not finite`,
      ]);
    });

    it('rejects statements that failed to parse', () => {
      const parsed = parseSource('a := )\nprint 1', 'main.sy');
      const result = compile({ type: 'Program', modules: [parsed.ast] });
      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.errors.map((err) => err.errorId)).toEqual(['SYLT-C015']);
      }
    });

    it('rejects externs registered twice', () => {
      const [len] = STANDARD_EXTERNS;
      const result = compileSources(
        { 'main.sy': 'print 1' },
        { externs: len ? [len, len] : [] }
      );
      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.errors[0]?.message).toBe("Extern function 'len' is registered twice");
        expect(result.errors[0]?.site).toBeUndefined();
      }
    });
  });
});
