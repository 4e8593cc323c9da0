/**
 * sylt Disassembler Tests
 */

import { describe, expect, it } from 'vitest';

import { disassemble, formatOp } from '../../src/index.js';
import { compileSource } from '../helpers/runtime.js';

describe('disassemble', () => {
  it('lists ops with their index and line', () => {
    expect(disassemble(compileSource('print 1 + 2')).split('\n')).toEqual([
      '== 0 /preamble : fn -> void ==',
      '0000     1 Constant      1 (1)',
      '0001     | Constant      2 (2)',
      '0002     | Add',
      '0003     | Print',
      '0004     | Constant      0 (nil)',
      '0005     | Return',
    ]);
  });

  it('shows upvalues and separates blocks with a blank line', () => {
    const program = compileSource('a := fn {\nx := 1\nf := fn {\nprint x\n}\n}');
    const listing = disassemble(program);
    expect(listing).toContain('\n\n== 1 a : fn -> void ==\n');
    expect(listing).toContain('== 2 f : fn -> void ==\n   upvalues: local 1\n');
  });

  it('renders operands', () => {
    const program = compileSource('blob P { x: int }\np: P = P { x: 1 }\nprint p.x');
    const ops = program.blocks[0]?.ops ?? [];
    expect(ops.map((op) => formatOp(op, program))).toEqual([
      'Constant      0 (nil)',
      'Constant      1 (<blob P>)',
      'Constant      2 (.x)',
      'Constant      3 (1)',
      'Instance      1',
      'Define        p: P',
      'AssignGlobal  1',
      'ReadGlobal    1',
      'GetField      0 (.x)',
      'Print',
      'Constant      0 (nil)',
      'Return',
    ]);
  });
});
