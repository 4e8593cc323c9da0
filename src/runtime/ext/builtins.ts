/**
 * Standard Externs
 *
 * Extern functions linked into every program unless the host passes its
 * own table. Overloads are matched on argument types; failures inside a
 * function are reported as ExternError.
 */

import { ExternError, ExternTypeMismatchError } from '../../error-classes.js';
import { defineExtern, type ExternFunction, type ParamPattern } from '../core/extern.js';
import { checkedInt } from '../core/operators.js';
import {
  FLOAT,
  INT,
  STRING,
  UNKNOWN_TYPE,
  VOID,
  iterOf,
  listOf,
  type Type,
} from '../core/value-types.js';
import {
  NIL,
  float,
  formatValue,
  int,
  iter,
  list,
  str,
  typeOf,
  type Value,
  type ValueOf,
  type ValueTag,
} from '../core/values.js';

// ============================================================
// ARGUMENT HELPERS
// ============================================================

const ANY: ParamPattern = UNKNOWN_TYPE;
const ANY_LIST: ParamPattern = (ty) => ty.kind === 'List';
const ANY_ITER: ParamPattern = (ty) => ty.kind === 'Iter';
const SIZED: ParamPattern = (ty) =>
  ty.kind === 'List' ||
  ty.kind === 'Set' ||
  ty.kind === 'Dict' ||
  ty.kind === 'Tuple' ||
  ty.kind === 'String';
const ITERABLE: ParamPattern = (ty) => ty.kind === 'List' || ty.kind === 'Set';

function hasTag<T extends ValueTag>(value: Value, tag: T): value is ValueOf<T> {
  return value.type === tag;
}

/** Argument `i`, which overload matching has already checked */
function arg<T extends ValueTag>(
  name: string,
  args: readonly Value[],
  i: number,
  tag: T
): ValueOf<T> {
  const value = args[i];
  if (value === undefined || !hasTag(value, tag)) {
    throw new ExternTypeMismatchError(name, args.map(typeOf));
  }
  return value;
}

/** Element type of a list, set or iterator type */
function elementOf(ty: Type | undefined): Type {
  if (ty?.kind === 'List' || ty?.kind === 'Set' || ty?.kind === 'Iter') {
    return ty.element;
  }
  return UNKNOWN_TYPE;
}

function lengthOf(value: Value | undefined): number {
  switch (value?.type) {
    case 'List':
      return value.elements.length;
    case 'Set':
    case 'Dict':
      return value.entries.size;
    case 'Tuple':
      return value.elements.length;
    case 'String':
      return [...value.value].length;
    default:
      throw new ExternError('len', `cannot measure ${value ? formatValue(value) : 'nothing'}`);
  }
}

function countingIterator(from: number, to: number): Value {
  let next = from;
  return iter(INT, () => (next < to ? int(next++) : undefined));
}

// ============================================================
// COLLECTIONS
// ============================================================

const len = defineExtern('len', [
  { params: [SIZED], returns: INT, invoke: ([value]) => int(lengthOf(value)) },
]);

const push = defineExtern('push', [
  {
    params: [ANY_LIST, ANY],
    returns: VOID,
    invoke: (args) => {
      const target = arg('push', args, 0, 'List');
      target.elements.push(args[1] ?? NIL);
      return NIL;
    },
  },
]);

const pop = defineExtern('pop', [
  {
    params: [ANY_LIST],
    returns: ([ty]) => elementOf(ty),
    invoke: (args) => {
      const value = arg('pop', args, 0, 'List').elements.pop();
      if (value === undefined) throw new ExternError('pop', 'the list is empty');
      return value;
    },
  },
]);

// ============================================================
// NUMBERS
// ============================================================

const sqrt = defineExtern('sqrt', [
  {
    params: [FLOAT],
    returns: FLOAT,
    invoke: (args) => {
      const x = arg('sqrt', args, 0, 'Float').value;
      if (x < 0) throw new ExternError('sqrt', `cannot take the square root of ${x}`);
      return float(Math.sqrt(x));
    },
  },
]);

const abs = defineExtern('abs', [
  { params: [INT], returns: INT, invoke: (args) => int(Math.abs(arg('abs', args, 0, 'Int').value)) },
  {
    params: [FLOAT],
    returns: FLOAT,
    invoke: (args) => float(Math.abs(arg('abs', args, 0, 'Float').value)),
  },
]);

const asInt = defineExtern('as_int', [
  { params: [INT], returns: INT, invoke: (args) => arg('as_int', args, 0, 'Int') },
  {
    params: [FLOAT],
    returns: INT,
    invoke: (args) => {
      const x = arg('as_int', args, 0, 'Float').value;
      if (!Number.isFinite(x)) throw new ExternError('as_int', `${x} has no integer value`);
      return checkedInt(Math.trunc(x));
    },
  },
]);

const asFloat = defineExtern('as_float', [
  { params: [INT], returns: FLOAT, invoke: (args) => float(arg('as_float', args, 0, 'Int').value) },
  { params: [FLOAT], returns: FLOAT, invoke: (args) => arg('as_float', args, 0, 'Float') },
]);

const asStr = defineExtern('as_str', [
  {
    params: [ANY],
    returns: STRING,
    invoke: ([value]) => str(value ? formatValue(value) : 'nil'),
  },
]);

const random = defineExtern('random', [
  { params: [], returns: FLOAT, invoke: () => float(Math.random()) },
]);

// ============================================================
// ITERATORS
// ============================================================

const range = defineExtern('range', [
  {
    params: [INT],
    returns: iterOf(INT),
    invoke: (args) => countingIterator(0, arg('range', args, 0, 'Int').value),
  },
  {
    params: [INT, INT],
    returns: iterOf(INT),
    invoke: (args) =>
      countingIterator(arg('range', args, 0, 'Int').value, arg('range', args, 1, 'Int').value),
  },
]);

/** Lists are walked live: elements pushed before the end is reached are seen */
const iterExtern = defineExtern('iter', [
  {
    params: [ITERABLE],
    returns: ([ty]) => iterOf(elementOf(ty)),
    invoke: ([source]) => {
      const element = source ? elementOf(typeOf(source)) : UNKNOWN_TYPE;
      if (source?.type === 'List') {
        const items = source.elements;
        let i = 0;
        return iter(element, () => items[i++]);
      }
      if (source?.type === 'Set') {
        const values = [...source.entries];
        let i = 0;
        return iter(element, () => values[i++]);
      }
      throw new ExternError('iter', 'expected a list or a set');
    },
  },
]);

const next = defineExtern('next', [
  {
    params: [ANY_ITER],
    returns: ([ty]) => elementOf(ty),
    invoke: (args) => arg('next', args, 0, 'Iter').source.next() ?? NIL,
  },
]);

const take = defineExtern('take', [
  {
    params: [ANY_ITER, INT],
    returns: ([ty]) => listOf(elementOf(ty)),
    invoke: (args) => {
      const { source } = arg('take', args, 0, 'Iter');
      const count = arg('take', args, 1, 'Int').value;
      const taken: Value[] = [];
      while (taken.length < count) {
        const value = source.next();
        if (value === undefined) break;
        taken.push(value);
      }
      return list(taken);
    },
  },
]);

/** Linked in this order; ExternFunction values refer to these indices */
export const STANDARD_EXTERNS: readonly ExternFunction[] = [
  len,
  push,
  pop,
  sqrt,
  abs,
  asInt,
  asFloat,
  asStr,
  random,
  range,
  iterExtern,
  next,
  take,
];
