/**
 * Operator Semantics
 *
 * Arithmetic, comparison, membership and indexing on values. With
 * `checking` set (the typecheck pass) unknown operands propagate as
 * placeholders, unions are applied variant by variant, and failures that
 * depend on concrete values (division by zero, list bounds) yield a
 * placeholder instead.
 */

import { RuntimeError } from '../../error-classes.js';
import { formatType, typeKey, unionOf, type Type } from './value-types.js';
import {
  TRUE,
  UNKNOWN,
  bool,
  float,
  formatValue,
  int,
  str,
  tuple,
  typeOf,
  typeToValue,
  valuesEqual,
  type Value,
} from './values.js';

export type ArithmeticOp = 'Add' | 'Sub' | 'Mul' | 'Div';
export type ComparisonOp = 'Less' | 'Greater';

const SYMBOLS: Record<ArithmeticOp | ComparisonOp | 'And' | 'Or', string> = {
  Add: '+',
  Sub: '-',
  Mul: '*',
  Div: '/',
  Less: '<',
  Greater: '>',
  And: '&&',
  Or: '||',
};

export function typeError(op: string, ...values: Value[]): RuntimeError {
  const types = values.map((value) => formatType(typeOf(value))).join(' and ');
  return new RuntimeError('SYLT-R001', { op, types });
}

// ============================================================
// UNIONS
// ============================================================

/** Collapse results to one value per distinct type */
export function unionValue(variants: readonly Value[]): Value {
  const byType = new Map<string, Value>();
  for (const variant of variants) {
    const nested = variant.type === 'Union' ? variant.variants : [variant];
    for (const value of nested) {
      const key = typeKey(typeOf(value));
      if (!byType.has(key)) byType.set(key, value);
    }
  }
  const distinct = [...byType.values()];
  const [only] = distinct;
  if (distinct.length === 1 && only) return only;
  return { type: 'Union', variants: distinct };
}

/** Apply `f` to every combination of union variants */
export function lift(a: Value, b: Value, f: (a: Value, b: Value) => Value): Value {
  if (a.type === 'Union') return unionValue(a.variants.map((v) => lift(v, b, f)));
  if (b.type === 'Union') return unionValue(b.variants.map((v) => lift(a, v, f)));
  return f(a, b);
}

function lift1(a: Value, f: (a: Value) => Value): Value {
  if (a.type === 'Union') return unionValue(a.variants.map((v) => lift1(v, f)));
  return f(a);
}

// ============================================================
// ARITHMETIC
// ============================================================

function numeric(op: ArithmeticOp, a: number, b: number): number {
  switch (op) {
    case 'Add':
      return a + b;
    case 'Sub':
      return a - b;
    case 'Mul':
      return a * b;
    case 'Div':
      return a / b;
  }
}

/** Ints hold exactly the integers a double represents without gaps */
export function checkedInt(value: number): Value {
  if (!Number.isSafeInteger(value)) {
    throw new RuntimeError('SYLT-R016', { value: String(value) });
  }
  return int(value);
}

/** Int division truncates; tuples combine element-wise */
export function arithmetic(op: ArithmeticOp, a: Value, b: Value, checking: boolean): Value {
  return lift(a, b, (x, y) => {
    if (checking && (x.type === 'Unknown' || y.type === 'Unknown')) return UNKNOWN;

    if (x.type === 'Int' && y.type === 'Int') {
      if (op === 'Div') {
        if (y.value === 0) {
          if (checking) return int(1);
          throw new RuntimeError('SYLT-R002', {});
        }
        return int(Math.trunc(x.value / y.value));
      }
      return checkedInt(numeric(op, x.value, y.value));
    }
    if (x.type === 'Float' && y.type === 'Float') {
      return float(numeric(op, x.value, y.value));
    }
    if (op === 'Add' && x.type === 'String' && y.type === 'String') {
      return str(x.value + y.value);
    }
    if (x.type === 'Tuple' && y.type === 'Tuple' && x.elements.length === y.elements.length) {
      return tuple(
        x.elements.map((element, i) => {
          const other = y.elements[i];
          if (other === undefined) throw typeError(SYMBOLS[op], x, y);
          return arithmetic(op, element, other, checking);
        })
      );
    }
    throw typeError(SYMBOLS[op], x, y);
  });
}

export function negate(a: Value, checking: boolean): Value {
  return lift1(a, (x) => {
    if (x.type === 'Int') return checkedInt(-x.value);
    if (x.type === 'Float') return float(-x.value);
    if (x.type === 'Tuple') return tuple(x.elements.map((element) => negate(element, checking)));
    if (checking && x.type === 'Unknown') return UNKNOWN;
    throw typeError('-', x);
  });
}

export function not(a: Value, checking: boolean): Value {
  return lift1(a, (x) => {
    if (x.type === 'Bool') return bool(!x.value);
    if (checking && x.type === 'Unknown') return TRUE;
    throw typeError('!', x);
  });
}

// ============================================================
// COMPARISON AND LOGIC
// ============================================================

export function compare(op: ComparisonOp, a: Value, b: Value, checking: boolean): Value {
  return lift(a, b, (x, y) => {
    if (checking && (x.type === 'Unknown' || y.type === 'Unknown')) return TRUE;
    if ((x.type === 'Int' && y.type === 'Int') || (x.type === 'Float' && y.type === 'Float')) {
      return bool(op === 'Less' ? x.value < y.value : x.value > y.value);
    }
    if (x.type === 'String' && y.type === 'String') {
      return bool(op === 'Less' ? x.value < y.value : x.value > y.value);
    }
    throw typeError(SYMBOLS[op], x, y);
  });
}

export function equal(a: Value, b: Value): Value {
  return bool(valuesEqual(a, b));
}

/** Both operands are always evaluated; only bools combine */
export function logic(op: 'And' | 'Or', a: Value, b: Value, checking: boolean): Value {
  return lift(a, b, (x, y) => {
    if (checking && (x.type === 'Unknown' || y.type === 'Unknown')) return TRUE;
    if (x.type !== 'Bool' || y.type !== 'Bool') throw typeError(SYMBOLS[op], x, y);
    return bool(op === 'And' ? x.value && y.value : x.value || y.value);
  });
}

/** `item in container` */
export function contains(item: Value, container: Value, checking: boolean): Value {
  return lift1(container, (c) => {
    switch (c.type) {
      case 'List':
      case 'Tuple':
        return bool(c.elements.some((element) => valuesEqual(element, item)));
      case 'Set':
        return bool(c.entries.has(item));
      case 'Dict':
        return bool(c.entries.has(item));
      case 'String':
        if (item.type === 'String') return bool(c.value.includes(item.value));
        if (checking && item.type === 'Unknown') return TRUE;
        throw typeError('in', item, c);
      case 'Unknown':
        if (checking) return TRUE;
        throw typeError('in', item, c);
      default:
        throw typeError('in', item, c);
    }
  });
}

// ============================================================
// INDEXING
// ============================================================

function invalidIndex(target: Value, index: Value): RuntimeError {
  return new RuntimeError('SYLT-R012', {
    target: formatType(typeOf(target)),
    index: formatValue(index),
  });
}

function position(target: Value, index: Value, length: number, kind: string): number {
  if (index.type !== 'Int') throw invalidIndex(target, index);
  if (index.value < 0 || index.value >= length) {
    throw new RuntimeError('SYLT-R003', { index: index.value, kind, length });
  }
  return index.value;
}

/** Placeholder for an element of a container's declared element type */
function elementPlaceholder(target: Value): Value {
  const ty = typeOf(target);
  if (ty.kind === 'List' || ty.kind === 'Set') return typeToValue(ty.element);
  if (ty.kind === 'Dict') return typeToValue(ty.value);
  return UNKNOWN;
}

export function getIndex(target: Value, index: Value, checking: boolean): Value {
  return lift(target, index, (t, i) => {
    if (checking && t.type === 'Unknown') return UNKNOWN;
    switch (t.type) {
      case 'List':
        if (checking) {
          if (i.type !== 'Int' && i.type !== 'Unknown') throw invalidIndex(t, i);
          return elementPlaceholder(t);
        }
        return t.elements[position(t, i, t.elements.length, 'list')] ?? UNKNOWN;
      case 'Tuple': {
        if (checking && i.type === 'Unknown') {
          return typeToValue(unionOf(t.elements.map(typeOf)));
        }
        if (checking && i.type === 'Int' && t.elements[i.value] === undefined) {
          return typeToValue(unionOf(t.elements.map(typeOf)));
        }
        return t.elements[position(t, i, t.elements.length, 'tuple')] ?? UNKNOWN;
      }
      case 'String': {
        const chars = [...t.value];
        if (checking) {
          if (i.type !== 'Int' && i.type !== 'Unknown') throw invalidIndex(t, i);
          return str('');
        }
        return str(chars[position(t, i, chars.length, 'string')] ?? '');
      }
      case 'Dict': {
        if (checking) return elementPlaceholder(t);
        const value = t.entries.get(i);
        if (value === undefined) {
          throw new RuntimeError('SYLT-R004', { key: formatValue(i) });
        }
        return value;
      }
      default:
        throw invalidIndex(t, i);
    }
  });
}

/**
 * `target[index] = value`. Typecheck mode mutates nothing and returns the
 * type the container expects for the value, when it has one.
 */
export function assignIndex(
  target: Value,
  index: Value,
  value: Value,
  checking: boolean
): Type | undefined {
  if (checking) {
    const ty = typeOf(target);
    switch (target.type) {
      case 'List':
        if (index.type !== 'Int' && index.type !== 'Unknown') throw invalidIndex(target, index);
        return ty.kind === 'List' ? ty.element : undefined;
      case 'Dict':
        return ty.kind === 'Dict' ? ty.value : undefined;
      case 'Unknown':
      case 'Union':
        return undefined;
      default:
        throw invalidIndex(target, index);
    }
  }

  switch (target.type) {
    case 'List':
      target.elements[position(target, index, target.elements.length, 'list')] = value;
      return undefined;
    case 'Dict':
      target.entries.set(index, value);
      return undefined;
    default:
      throw invalidIndex(target, index);
  }
}
