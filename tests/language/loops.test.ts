/**
 * sylt Language Tests: Control Flow
 * if/else chains, conditional and infinite loops, break
 */

import { describe, expect, it } from 'vitest';

import { output, runError } from '../helpers/runtime.js';

describe('sylt Language: control flow', () => {
  describe('if', () => {
    it('takes the first matching branch of an else-if chain', () => {
      const source = [
        'x := 2',
        'if x == 1 {',
        '  print "one"',
        '} else if x == 2 {',
        '  print "two"',
        '} else {',
        '  print "other"',
        '}',
      ].join('\n');
      expect(output(source)).toEqual(['two']);
    });

    it('falls through to else', () => {
      expect(output('if false {\n  print 1\n} else {\n  print 2\n}')).toEqual(['2']);
    });

    it('rejects conditions that are not bools', () => {
      const err = runError('if nil {\n}');
      expect(err.errorId).toBe('SYLT-R013');
      expect(err.message).toBe('Expected a bool condition, got void');
    });
  });

  describe('loop', () => {
    it('repeats while the condition holds', () => {
      const source = ['i := 1', 'sum := 0', 'loop i <= 5 {', '  sum += i', '  i += 1', '}', 'print sum'];
      expect(output(source.join('\n'))).toEqual(['15']);
    });

    it('leaves an infinite loop with break', () => {
      const source = [
        'i := 0',
        'loop {',
        '  i += 1',
        '  if i == 4 {',
        '    break',
        '  }',
        '}',
        'print i',
      ].join('\n');
      expect(output(source)).toEqual(['4']);
    });

    it('drops locals of nested blocks on break', () => {
      const source = [
        'f := fn {',
        '  i := 0',
        '  loop {',
        '    a := 1',
        '    if i == 2 {',
        '      b := 2',
        '      break',
        '    }',
        '    i += a',
        '  }',
        '  after := 10',
        '  print i + after',
        '}',
        'f()',
      ].join('\n');
      expect(output(source)).toEqual(['12']);
    });

    it('rejects conditions that are not bools', () => {
      expect(runError('loop 1 {\n}').message).toBe('Expected a bool condition, got int');
    });
  });
});
