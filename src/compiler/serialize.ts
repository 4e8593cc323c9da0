/**
 * Program Serialization
 *
 * Compiled programs are stored as JSON. Blocks, constants, strings, blobs
 * and externs keep their order, since ops refer to them by index. Extern
 * functions are stored by name and relinked against the host's table when
 * the program is loaded.
 */

import { CompileError } from '../types.js';
import type { ExternFunction } from '../runtime/core/extern.js';
import type { BlobShape, Type } from '../runtime/core/value-types.js';
import type { Value } from '../runtime/core/values.js';
import type { CompileResult } from './compiler.js';
import { isNullaryOp, type Op } from './opcodes.js';
import type { Block, Program, UpvalueDescriptor } from './program.js';

export const PROGRAM_FORMAT = 'sylt-program';
export const PROGRAM_VERSION = 1;

export function serializeProgram(program: Program): string {
  return JSON.stringify({
    format: PROGRAM_FORMAT,
    version: PROGRAM_VERSION,
    globals: program.globals,
    blocks: program.blocks,
    constants: program.constants,
    strings: program.strings,
    blobs: program.blobs,
    externs: program.externs.map((extern) => extern.name),
  });
}

/**
 * Load a serialized program, linking extern names against `externs`.
 * Malformed input and unknown externs are reported as compile errors.
 */
export function deserializeProgram(
  text: string,
  externs: readonly ExternFunction[]
): CompileResult {
  try {
    return { success: true, program: readProgram(parseJson(text), externs) };
  } catch (err) {
    if (err instanceof CompileError) return { success: false, errors: [err] };
    throw err;
  }
}

// ============================================================
// VALIDATION
// ============================================================

function invalid(reason: string): CompileError {
  return new CompileError('SYLT-C017', { reason });
}

function parseJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    throw invalid('not a JSON document');
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function record(value: unknown, what: string): Record<string, unknown> {
  if (!isRecord(value)) throw invalid(`${what} must be an object`);
  return value;
}

function array(value: unknown, what: string): unknown[] {
  if (!Array.isArray(value)) throw invalid(`${what} must be an array`);
  return value;
}

function string(value: unknown, what: string): string {
  if (typeof value !== 'string') throw invalid(`${what} must be a string`);
  return value;
}

function number(value: unknown, what: string): number {
  if (typeof value !== 'number') throw invalid(`${what} must be a number`);
  return value;
}

function index(value: unknown, what: string): number {
  const n = number(value, what);
  if (!Number.isInteger(n) || n < 0) throw invalid(`${what} must be a non-negative integer`);
  return n;
}

function boolean(value: unknown, what: string): boolean {
  if (typeof value !== 'boolean') throw invalid(`${what} must be a boolean`);
  return value;
}

// ============================================================
// READERS
// ============================================================

function readProgram(raw: unknown, externs: readonly ExternFunction[]): Program {
  const doc = record(raw, 'program');
  if (doc['format'] !== PROGRAM_FORMAT) throw invalid(`format must be '${PROGRAM_FORMAT}'`);
  if (doc['version'] !== PROGRAM_VERSION) {
    throw invalid(`unsupported version ${String(doc['version'])}`);
  }

  const linked = array(doc['externs'], 'externs').map((name, i) => {
    const wanted = string(name, `externs[${i}]`);
    const extern = externs.find((candidate) => candidate.name === wanted);
    if (!extern) throw new CompileError('SYLT-C012', { name: wanted });
    return extern;
  });

  const blocks = array(doc['blocks'], 'blocks').map((block, i) => readBlock(block, `blocks[${i}]`));
  if (blocks.length === 0) throw invalid('a program needs an entry block');

  return {
    blocks,
    constants: array(doc['constants'], 'constants').map((value, i) =>
      readConstant(value, `constants[${i}]`)
    ),
    strings: array(doc['strings'], 'strings').map((text, i) => string(text, `strings[${i}]`)),
    blobs: array(doc['blobs'], 'blobs').map((blob, i) => readBlob(blob, `blobs[${i}]`)),
    externs: linked,
    globals: index(doc['globals'], 'globals'),
  };
}

function readBlock(raw: unknown, what: string): Block {
  const block = record(raw, what);
  const ops = array(block['ops'], `${what}.ops`).map((op, i) => readOp(op, `${what}.ops[${i}]`));
  const lines = array(block['lines'], `${what}.lines`).map((line) => index(line, `${what}.lines`));
  const files = array(block['files'], `${what}.files`).map((file) => string(file, `${what}.files`));
  if (lines.length !== ops.length || files.length !== ops.length) {
    throw invalid(`${what} needs one line and file per op`);
  }
  const upvalues = array(block['upvalues'], `${what}.upvalues`).map(
    (up): UpvalueDescriptor => {
      const entry = record(up, `${what}.upvalues`);
      return {
        isLocal: boolean(entry['isLocal'], `${what}.upvalues.isLocal`),
        index: index(entry['index'], `${what}.upvalues.index`),
      };
    }
  );
  return {
    name: string(block['name'], `${what}.name`),
    ops,
    lines,
    files,
    upvalues,
    ty: readType(block['ty'], `${what}.ty`),
  };
}

function readOp(raw: unknown, what: string): Op {
  const op = record(raw, what);
  const name = string(op['op'], `${what}.op`);
  if (isNullaryOp(name)) return { op: name };

  switch (name) {
    case 'Constant':
      return { op: name, index: index(op['index'], `${what}.index`) };
    case 'ReadLocal':
    case 'AssignLocal':
    case 'ReadUpvalue':
    case 'AssignUpvalue':
    case 'ReadGlobal':
    case 'AssignGlobal':
      return { op: name, slot: index(op['slot'], `${what}.slot`) };
    case 'Copy':
    case 'Tuple':
    case 'List':
    case 'Set':
    case 'Dict':
    case 'Instance':
      return { op: name, count: index(op['count'], `${what}.count`) };
    case 'GetField':
    case 'AssignField':
      return { op: name, field: index(op['field'], `${what}.field`) };
    case 'Call':
      return { op: name, args: index(op['args'], `${what}.args`) };
    case 'Jump':
    case 'JumpIfFalse':
      return { op: name, target: index(op['target'], `${what}.target`) };
    case 'Unwind':
      return {
        op: name,
        count: index(op['count'], `${what}.count`),
        target: index(op['target'], `${what}.target`),
      };
    case 'Closure':
      return { op: name, block: index(op['block'], `${what}.block`) };
    case 'Define':
      return {
        op: name,
        name: string(op['name'], `${what}.name`),
        ty: readType(op['ty'], `${what}.ty`),
      };
    default:
      throw invalid(`${what} has unknown op '${name}'`);
  }
}

function readTypes(raw: unknown, what: string): Type[] {
  return array(raw, what).map((ty, i) => readType(ty, `${what}[${i}]`));
}

function readType(raw: unknown, what: string): Type {
  const ty = record(raw, what);
  const kind = string(ty['kind'], `${what}.kind`);
  switch (kind) {
    case 'Void':
    case 'Unknown':
    case 'Invalid':
    case 'Int':
    case 'Float':
    case 'Bool':
    case 'String':
    case 'Ty':
      return { kind };
    case 'Tuple':
      return { kind, elements: readTypes(ty['elements'], `${what}.elements`) };
    case 'List':
    case 'Set':
    case 'Iter':
      return { kind, element: readType(ty['element'], `${what}.element`) };
    case 'Dict':
      return {
        kind,
        key: readType(ty['key'], `${what}.key`),
        value: readType(ty['value'], `${what}.value`),
      };
    case 'Function':
      return {
        kind,
        params: readTypes(ty['params'], `${what}.params`),
        ret: readType(ty['ret'], `${what}.ret`),
      };
    case 'ExternFunction':
      return {
        kind,
        index: index(ty['index'], `${what}.index`),
        name: string(ty['name'], `${what}.name`),
      };
    case 'Union':
      return { kind, variants: readTypes(ty['variants'], `${what}.variants`) };
    case 'Instance':
    case 'Blob':
      return {
        kind,
        blob: index(ty['blob'], `${what}.blob`),
        name: string(ty['name'], `${what}.name`),
      };
    case 'Field':
      return { kind, name: string(ty['name'], `${what}.name`) };
    default:
      throw invalid(`${what} has unknown kind '${kind}'`);
  }
}

/** Only literal-like values ever reach the constant pool */
function readConstant(raw: unknown, what: string): Value {
  const value = record(raw, what);
  const type = string(value['type'], `${what}.type`);
  switch (type) {
    case 'Nil':
      return { type };
    case 'Bool':
      return { type, value: boolean(value['value'], `${what}.value`) };
    case 'Int':
    case 'Float':
      return { type, value: number(value['value'], `${what}.value`) };
    case 'String':
      return { type, value: string(value['value'], `${what}.value`) };
    case 'Tuple':
      return {
        type,
        elements: array(value['elements'], `${what}.elements`).map((element, i) =>
          readConstant(element, `${what}.elements[${i}]`)
        ),
      };
    case 'Field':
      return { type, name: string(value['name'], `${what}.name`) };
    case 'Blob':
      return {
        type,
        blob: index(value['blob'], `${what}.blob`),
        name: string(value['name'], `${what}.name`),
      };
    case 'ExternFunction':
      return {
        type,
        index: index(value['index'], `${what}.index`),
        name: string(value['name'], `${what}.name`),
      };
    default:
      throw invalid(`${what} cannot hold a ${type} value`);
  }
}

function readBlob(raw: unknown, what: string): BlobShape {
  const blob = record(raw, what);
  return {
    name: string(blob['name'], `${what}.name`),
    file: string(blob['file'], `${what}.file`),
    fields: array(blob['fields'], `${what}.fields`).map((field, i) => {
      const entry = record(field, `${what}.fields[${i}]`);
      return {
        name: string(entry['name'], `${what}.fields[${i}].name`),
        type: readType(entry['type'], `${what}.fields[${i}].type`),
      };
    }),
  };
}
