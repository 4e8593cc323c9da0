/**
 * Bytecode Listing
 * Human-readable dump of a compiled program, used by `sylt -v`
 */

import { formatType } from '../runtime/core/value-types.js';
import { formatValue } from '../runtime/core/values.js';
import type { Op } from './opcodes.js';
import type { Block, Program } from './program.js';

/** Operand text of one op, with the constant or string it refers to */
export function formatOp(op: Op, program: Program): string {
  const name = op.op.padEnd(14);
  switch (op.op) {
    case 'Constant': {
      const value = program.constants[op.index];
      return `${name}${op.index} (${value ? formatValue(value) : '?'})`;
    }
    case 'GetField':
    case 'AssignField':
      return `${name}${op.field} (.${program.strings[op.field] ?? '?'})`;
    case 'ReadLocal':
    case 'AssignLocal':
    case 'ReadUpvalue':
    case 'AssignUpvalue':
    case 'ReadGlobal':
    case 'AssignGlobal':
      return `${name}${op.slot}`;
    case 'Copy':
    case 'Tuple':
    case 'List':
    case 'Set':
    case 'Dict':
    case 'Instance':
      return `${name}${op.count}`;
    case 'Call':
      return `${name}${op.args}`;
    case 'Jump':
    case 'JumpIfFalse':
      return `${name}-> ${op.target}`;
    case 'Unwind':
      return `${name}${op.count} -> ${op.target}`;
    case 'Closure': {
      const block = program.blocks[op.block];
      return `${name}${op.block} (${block?.name ?? '?'})`;
    }
    case 'Define':
      return `${name}${op.name}: ${formatType(op.ty)}`;
    default:
      return op.op;
  }
}

function disassembleBlock(block: Block, index: number, program: Program): string[] {
  const upvalues = block.upvalues
    .map((up) => `${up.isLocal ? 'local' : 'up'} ${up.index}`)
    .join(', ');
  const lines = [
    `== ${index} ${block.name} : ${formatType(block.ty)} ==`,
    ...(upvalues ? [`   upvalues: ${upvalues}`] : []),
  ];
  block.ops.forEach((op, ip) => {
    const line = block.lines[ip];
    const sameLine = ip > 0 && block.lines[ip - 1] === line;
    const where = sameLine ? '|'.padStart(5) : String(line ?? '?').padStart(5);
    lines.push(`${String(ip).padStart(4, '0')} ${where} ${formatOp(op, program)}`);
  });
  return lines;
}

/** Listing of every block in order, blank line between blocks */
export function disassemble(program: Program): string {
  return program.blocks
    .map((block, index) => disassembleBlock(block, index, program).join('\n'))
    .join('\n\n');
}
