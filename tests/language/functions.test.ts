/**
 * sylt Language Tests: Functions and Closures
 */

import { describe, expect, it } from 'vitest';

import { output, runError } from '../helpers/runtime.js';

const COUNTER = [
  'make := fn -> fn -> int {',
  '  n := 0',
  '  ret fn -> int {',
  '    n += 1',
  '    ret n',
  '  }',
  '}',
].join('\n');

describe('sylt Language: functions', () => {
  it('calls with arguments and returns a value', () => {
    expect(output('add := fn a: int, b: int -> int {\n  ret a + b\n}\nprint add(1, 2)')).toEqual([
      '3',
    ]);
  });

  it('returns nil without an explicit return', () => {
    expect(output('f := fn {}\nprint f()')).toEqual(['nil']);
  });

  it('recurses through a global', () => {
    const source = [
      'fib :: fn n: int -> int {',
      '  if n < 2 {',
      '    ret n',
      '  }',
      '  ret fib(n - 1) + fib(n - 2)',
      '}',
      'print fib(10)',
    ].join('\n');
    expect(output(source)).toEqual(['55']);
  });

  it('recurses through a local', () => {
    const source = [
      'f := fn {',
      '  fact := fn n: int -> int {',
      '    if n <= 1 {',
      '      ret 1',
      '    }',
      '    ret n * fact(n - 1)',
      '  }',
      '  print fact(5)',
      '}',
      'f()',
    ].join('\n');
    expect(output(source)).toEqual(['120']);
  });

  it('calls a function defined further down', () => {
    expect(output('first := fn -> int {\n  ret second()\n}\nsecond := fn -> int {\n  ret 2\n}\nprint first()')).toEqual(['2']);
  });

  it('passes the left side of an arrow as first argument', () => {
    const source = 'inc := fn x: int -> int {\n  ret x + 1\n}\nprint 1 -> inc()\nprint 1 -> inc() -> inc()';
    expect(output(source)).toEqual(['2', '3']);
  });

  it('returns from inside a loop', () => {
    const source = [
      'f := fn -> int {',
      '  i := 0',
      '  loop {',
      '    i += 1',
      '    if i == 3 {',
      '      ret i',
      '    }',
      '  }',
      '  ret 0',
      '}',
      'print f()',
    ].join('\n');
    expect(output(source)).toEqual(['3']);
  });

  it('formats functions by their type', () => {
    expect(output('f := fn a: int -> str {\n  ret ""\n}\nprint f\nprint len')).toEqual([
      '<fn int -> str>',
      '<extern len>',
    ]);
  });

  describe('closures', () => {
    it('keeps captured state between calls', () => {
      expect(output(COUNTER + '\nc := make()\nc()\nc()\nprint c()')).toEqual(['3']);
    });

    it('gives each closure instance its own state', () => {
      expect(output(COUNTER + '\na := make()\nb := make()\na()\nprint a()\nprint b()')).toEqual([
        '2',
        '1',
      ]);
    });

    it('sees writes made after capture', () => {
      const source = [
        'f := fn {',
        '  x := 1',
        '  g := fn -> int {',
        '    ret x',
        '  }',
        '  x = 5',
        '  print g()',
        '}',
        'f()',
      ].join('\n');
      expect(output(source)).toEqual(['5']);
    });

    it('captures a fresh variable on every loop iteration', () => {
      const source = [
        'fs := []',
        'i := 0',
        'loop i < 3 {',
        '  j := i',
        '  push(fs, fn -> int { ret j })',
        '  i += 1',
        '}',
        'print fs[0]() + fs[2]()',
      ].join('\n');
      expect(output(source)).toEqual(['2']);
    });

    it('captures through nested functions', () => {
      const source = [
        'outer := fn -> int {',
        '  x := 10',
        '  middle := fn -> int {',
        '    inner := fn -> int {',
        '      ret x + 1',
        '    }',
        '    ret inner()',
        '  }',
        '  ret middle()',
        '}',
        'print outer()',
      ].join('\n');
      expect(output(source)).toEqual(['11']);
    });
  });

  describe('errors', () => {
    it('checks the number of arguments', () => {
      const err = runError('f := fn a: int {}\nf()');
      expect(err.errorId).toBe('SYLT-R007');
      expect(err.message).toBe('Function expects 1 arguments, got 0');
    });

    it('rejects calling a non-function', () => {
      expect(runError('x := 1\nx()').message).toBe('Cannot call a value of type int');
    });

    it('reports errors at the line inside the function', () => {
      const err = runError('f := fn {\n  print 1 / 0\n}\nf()');
      expect(err.format()).toBe('main.sy:2: Division by zero');
    });
  });
});
