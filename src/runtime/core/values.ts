/**
 * sylt Value Types and Utilities
 *
 * Core values that flow through sylt programs, shared by the compiler's
 * constant pool and the VM.
 *
 * List, Set, Dict, Instance and Iter values are references: copying the
 * value copies the handle, so every alias observes mutation. Tuples and
 * strings are immutable.
 */

import { RuntimeError } from '../../error-classes.js';
import type { Upvalue } from './upvalue.js';
import {
  BOOL,
  FLOAT,
  INT,
  STRING,
  UNKNOWN_TYPE,
  VOID,
  dictOf,
  formatType,
  iterOf,
  listOf,
  setOf,
  tupleOf,
  typeFits,
  unionOf,
  type BlobShape,
  type Type,
} from './value-types.js';

// ============================================================
// VALUE REPRESENTATION
// ============================================================

export type Value =
  | { readonly type: 'Nil' }
  | { readonly type: 'Bool'; readonly value: boolean }
  | { readonly type: 'Int'; readonly value: number }
  | { readonly type: 'Float'; readonly value: number }
  | { readonly type: 'String'; readonly value: string }
  | { readonly type: 'Tuple'; readonly elements: readonly Value[] }
  | { readonly type: 'List'; readonly elements: Value[] }
  | { readonly type: 'Set'; readonly entries: ValueSet }
  | { readonly type: 'Dict'; readonly entries: ValueMap }
  | {
      readonly type: 'Instance';
      readonly blob: number;
      readonly name: string;
      readonly fields: Map<string, Value>;
    }
  | {
      readonly type: 'Function';
      readonly upvalues: readonly Upvalue[];
      readonly ty: Type;
      readonly block: number;
    }
  | { readonly type: 'ExternFunction'; readonly index: number; readonly name: string }
  | { readonly type: 'Iter'; readonly element: Type; readonly source: ValueIterator }
  | { readonly type: 'Union'; readonly variants: readonly Value[] }
  | { readonly type: 'Unknown' }
  | { readonly type: 'Ty'; readonly ty: Type }
  | { readonly type: 'Field'; readonly name: string }
  | { readonly type: 'Blob'; readonly blob: number; readonly name: string };

export type ValueTag = Value['type'];

/** Narrow a value to one variant of the union */
export type ValueOf<T extends ValueTag> = Extract<Value, { type: T }>;

export const NIL: Value = { type: 'Nil' };
export const UNKNOWN: Value = { type: 'Unknown' };
export const TRUE: Value = { type: 'Bool', value: true };
export const FALSE: Value = { type: 'Bool', value: false };

export function int(value: number): Value {
  return { type: 'Int', value };
}

export function float(value: number): Value {
  return { type: 'Float', value };
}

export function bool(value: boolean): Value {
  return value ? TRUE : FALSE;
}

export function str(value: string): Value {
  return { type: 'String', value };
}

export function tuple(elements: readonly Value[]): Value {
  return { type: 'Tuple', elements };
}

export function list(elements: Value[]): Value {
  return { type: 'List', elements };
}

export function set(values: Iterable<Value>): Value {
  const entries = new ValueSet();
  for (const value of values) entries.add(value);
  return { type: 'Set', entries };
}

export function dict(pairs: Iterable<readonly [Value, Value]>): Value {
  const entries = new ValueMap();
  for (const [key, value] of pairs) entries.set(key, value);
  return { type: 'Dict', entries };
}

export function iter(element: Type, step: () => Value | undefined): Value {
  return { type: 'Iter', element, source: new ValueIterator(step) };
}

// ============================================================
// ITERATORS
// ============================================================

/**
 * Stateful lazy sequence. Once the step function reports the end, the
 * iterator stays exhausted; there is no rewind.
 */
export class ValueIterator {
  private exhausted = false;

  constructor(private readonly step: () => Value | undefined) {}

  get done(): boolean {
    return this.exhausted;
  }

  next(): Value | undefined {
    if (this.exhausted) return undefined;
    const value = this.step();
    if (value === undefined) this.exhausted = true;
    return value;
  }
}

// ============================================================
// EQUALITY AND HASHING
// ============================================================

/**
 * Structural equality.
 * A union equals a value if any of its variants does; values with
 * different tags are never equal. Instances and functions compare by
 * identity.
 */
export function valuesEqual(a: Value, b: Value): boolean {
  if (a.type === 'Union') return a.variants.some((v) => valuesEqual(v, b));
  if (b.type === 'Union') return b.variants.some((v) => valuesEqual(a, v));

  switch (a.type) {
    case 'Nil':
    case 'Unknown':
      return b.type === a.type;
    case 'Bool':
    case 'Int':
    case 'Float':
    case 'String':
      return b.type === a.type && a.value === b.value;
    case 'Tuple':
      return b.type === 'Tuple' && sequencesEqual(a.elements, b.elements);
    case 'List':
      return (
        b.type === 'List' &&
        (a === b || sequencesEqual(a.elements, b.elements))
      );
    case 'Set':
      return b.type === 'Set' && (a === b || a.entries.equals(b.entries));
    case 'Dict':
      return b.type === 'Dict' && (a === b || a.entries.equals(b.entries));
    case 'Instance':
    case 'Function':
    case 'Iter':
      return a === b;
    case 'ExternFunction':
      return b.type === 'ExternFunction' && a.index === b.index;
    case 'Blob':
      return b.type === 'Blob' && a.blob === b.blob;
    case 'Field':
      return b.type === 'Field' && a.name === b.name;
    case 'Ty':
      return b.type === 'Ty' && formatType(a.ty) === formatType(b.ty);
  }
}

function sequencesEqual(a: readonly Value[], b: readonly Value[]): boolean {
  if (a.length !== b.length) return false;
  return a.every((value, i) => {
    const other = b[i];
    return other !== undefined && valuesEqual(value, other);
  });
}

/** Bucket shared by every value without a structural hash */
const UNHASHED = '*';

/**
 * Hash key consistent with valuesEqual for hashable values (nil, bool,
 * int, finite float, string and tuples of those). Everything else shares
 * one bucket and is told apart by equality.
 *
 * @throws RuntimeError (SYLT-R011) for NaN and infinities
 */
export function hashKey(value: Value): string {
  switch (value.type) {
    case 'Nil':
      return 'n';
    case 'Bool':
      return value.value ? 'b1' : 'b0';
    case 'Int':
      return `i${value.value}`;
    case 'Float':
      if (!Number.isFinite(value.value)) {
        throw new RuntimeError('SYLT-R011', { value: String(value.value) });
      }
      return `f${value.value}`;
    case 'String':
      return `s${JSON.stringify(value.value)}`;
    case 'Tuple':
      return `t(${value.elements.map(hashKey).join(',')})`;
    default:
      return UNHASHED;
  }
}

/** Set of values keyed by hashKey + valuesEqual */
export class ValueSet implements Iterable<Value> {
  private readonly buckets = new Map<string, Value[]>();
  private count = 0;

  get size(): number {
    return this.count;
  }

  has(value: Value): boolean {
    const bucket = this.buckets.get(hashKey(value));
    return bucket !== undefined && bucket.some((v) => valuesEqual(v, value));
  }

  /** Returns false when an equal value was already present */
  add(value: Value): boolean {
    const key = hashKey(value);
    const bucket = this.buckets.get(key);
    if (bucket === undefined) {
      this.buckets.set(key, [value]);
    } else if (bucket.some((v) => valuesEqual(v, value))) {
      return false;
    } else {
      bucket.push(value);
    }
    this.count++;
    return true;
  }

  delete(value: Value): boolean {
    const key = hashKey(value);
    const bucket = this.buckets.get(key);
    if (bucket === undefined) return false;
    const index = bucket.findIndex((v) => valuesEqual(v, value));
    if (index < 0) return false;
    bucket.splice(index, 1);
    if (bucket.length === 0) this.buckets.delete(key);
    this.count--;
    return true;
  }

  equals(other: ValueSet): boolean {
    if (this.size !== other.size) return false;
    for (const value of this) {
      if (!other.has(value)) return false;
    }
    return true;
  }

  *[Symbol.iterator](): Iterator<Value> {
    for (const bucket of this.buckets.values()) {
      yield* bucket;
    }
  }
}

/** Map from values to values keyed by hashKey + valuesEqual */
export class ValueMap implements Iterable<[Value, Value]> {
  private readonly buckets = new Map<string, [Value, Value][]>();
  private count = 0;

  get size(): number {
    return this.count;
  }

  private find(key: Value): [Value, Value] | undefined {
    const bucket = this.buckets.get(hashKey(key));
    return bucket?.find(([k]) => valuesEqual(k, key));
  }

  get(key: Value): Value | undefined {
    return this.find(key)?.[1];
  }

  has(key: Value): boolean {
    return this.find(key) !== undefined;
  }

  set(key: Value, value: Value): void {
    const existing = this.find(key);
    if (existing) {
      existing[1] = value;
      return;
    }
    const hash = hashKey(key);
    const bucket = this.buckets.get(hash);
    if (bucket === undefined) {
      this.buckets.set(hash, [[key, value]]);
    } else {
      bucket.push([key, value]);
    }
    this.count++;
  }

  equals(other: ValueMap): boolean {
    if (this.size !== other.size) return false;
    for (const [key, value] of this) {
      const theirs = other.get(key);
      if (theirs === undefined || !valuesEqual(value, theirs)) return false;
    }
    return true;
  }

  keys(): Value[] {
    return [...this].map(([key]) => key);
  }

  *[Symbol.iterator](): Iterator<[Value, Value]> {
    for (const bucket of this.buckets.values()) {
      yield* bucket;
    }
  }
}

// ============================================================
// TYPES OF VALUES
// ============================================================

/** Mutable storage behind a reference value, used to spot cycles */
function storageOf(value: Value): object | undefined {
  switch (value.type) {
    case 'List':
      return value.elements;
    case 'Set':
    case 'Dict':
      return value.entries;
    case 'Instance':
      return value.fields;
    default:
      return undefined;
  }
}

/** Run `f` with `value` marked open; a value already open yields `reentered` */
function guarded<T>(open: Set<object>, value: Value, reentered: T, f: () => T): T {
  const storage = storageOf(value);
  if (storage === undefined) return f();
  if (open.has(storage)) return reentered;
  open.add(storage);
  try {
    return f();
  } finally {
    open.delete(storage);
  }
}

/**
 * Infer the type of a runtime value; empty containers hold `*`, and so
 * does a container reached again through itself.
 */
export function typeOf(value: Value): Type {
  return inferType(value, new Set());
}

function inferType(value: Value, open: Set<object>): Type {
  const of = (inner: Value): Type => inferType(inner, open);
  const elementType = (values: Iterable<Value>): Type => {
    const types = [...values].map(of);
    return types.length === 0 ? UNKNOWN_TYPE : unionOf(types);
  };

  switch (value.type) {
    case 'Tuple':
      return tupleOf(value.elements.map(of));
    case 'List':
      return guarded(open, value, listOf(UNKNOWN_TYPE), () =>
        listOf(elementType(value.elements))
      );
    case 'Set':
      return guarded(open, value, setOf(UNKNOWN_TYPE), () =>
        setOf(elementType(value.entries))
      );
    case 'Dict':
      return guarded(open, value, dictOf(UNKNOWN_TYPE, UNKNOWN_TYPE), () =>
        dictOf(
          elementType(value.entries.keys()),
          elementType([...value.entries].map(([, v]) => v))
        )
      );
    case 'Union':
      return unionOf(value.variants.map(of));
    default:
      return shapeOf(value);
  }
}

/** Type of a value's outer layer; container elements are left as `*` */
export function shapeOf(value: Value): Type {
  switch (value.type) {
    case 'Nil':
      return VOID;
    case 'Bool':
      return BOOL;
    case 'Int':
      return INT;
    case 'Float':
      return FLOAT;
    case 'String':
      return STRING;
    case 'Tuple':
      return tupleOf(value.elements.map(() => UNKNOWN_TYPE));
    case 'List':
      return listOf(UNKNOWN_TYPE);
    case 'Set':
      return setOf(UNKNOWN_TYPE);
    case 'Dict':
      return dictOf(UNKNOWN_TYPE, UNKNOWN_TYPE);
    case 'Instance':
      return { kind: 'Instance', blob: value.blob, name: value.name };
    case 'Function':
      return value.ty;
    case 'ExternFunction':
      return { kind: 'ExternFunction', index: value.index, name: value.name };
    case 'Iter':
      return iterOf(value.element);
    case 'Union':
      return unionOf(value.variants.map(shapeOf));
    case 'Unknown':
      return UNKNOWN_TYPE;
    case 'Ty':
      return { kind: 'Ty' };
    case 'Field':
      return { kind: 'Field', name: value.name };
    case 'Blob':
      return { kind: 'Blob', blob: value.blob, name: value.name };
  }
}

/**
 * Whether a value can be stored where `expected` is declared. Containers
 * are walked only as deep as `expected` spells out their elements, so
 * `[*]` accepts any list without looking inside it.
 */
export function valueFits(expected: Type, value: Value): boolean {
  if (expected.kind === 'Unknown' || value.type === 'Unknown') return true;
  if (value.type === 'Union') return value.variants.every((v) => valueFits(expected, v));
  if (expected.kind === 'Union') return expected.variants.some((ty) => valueFits(ty, value));

  switch (expected.kind) {
    case 'Tuple':
      return (
        value.type === 'Tuple' &&
        value.elements.length === expected.elements.length &&
        expected.elements.every((ty, i) => {
          const element = value.elements[i];
          return element !== undefined && valueFits(ty, element);
        })
      );
    case 'List':
      return value.type === 'List' && allFit(expected.element, value.elements);
    case 'Set':
      return value.type === 'Set' && allFit(expected.element, value.entries);
    case 'Dict': {
      if (value.type !== 'Dict') return false;
      if (expected.key.kind === 'Unknown' && expected.value.kind === 'Unknown') return true;
      for (const [key, entry] of value.entries) {
        if (!valueFits(expected.key, key) || !valueFits(expected.value, entry)) return false;
      }
      return true;
    }
    default:
      return typeFits(expected, shapeOf(value));
  }
}

function allFit(expected: Type, values: Iterable<Value>): boolean {
  if (expected.kind === 'Unknown') return true;
  for (const value of values) {
    if (!valueFits(expected, value)) return false;
  }
  return true;
}

/**
 * Build a representative value of a type.
 * The typecheck pass runs on these placeholders instead of real results.
 * Instances get default fields when the blob table is given; a blob that
 * contains itself gets `*` for the recursive field.
 */
export function typeToValue(
  ty: Type,
  blobs: readonly BlobShape[] = [],
  building: ReadonlySet<number> = new Set()
): Value {
  const of = (inner: Type): Value => typeToValue(inner, blobs, building);

  switch (ty.kind) {
    case 'Void':
      return NIL;
    case 'Unknown':
    case 'Invalid':
      return UNKNOWN;
    case 'Int':
      return int(1);
    case 'Float':
      return float(1.0);
    case 'Bool':
      return TRUE;
    case 'String':
      return str('');
    case 'Tuple':
      return tuple(ty.elements.map(of));
    case 'List':
      return list([of(ty.element)]);
    case 'Set':
      return set([of(ty.element)]);
    case 'Dict':
      return dict([[of(ty.key), of(ty.value)]]);
    case 'Iter':
      return iter(ty.element, () => undefined);
    case 'Function':
      return { type: 'Function', upvalues: [], ty, block: 0 };
    case 'ExternFunction':
      return { type: 'ExternFunction', index: ty.index, name: ty.name };
    case 'Union':
      return { type: 'Union', variants: ty.variants.map(of) };
    case 'Instance': {
      if (building.has(ty.blob)) return UNKNOWN;
      const fields = new Map<string, Value>();
      const shape = blobs[ty.blob];
      if (shape) {
        const inner = new Set(building).add(ty.blob);
        for (const field of shape.fields) {
          fields.set(field.name, typeToValue(field.type, blobs, inner));
        }
      }
      return { type: 'Instance', blob: ty.blob, name: ty.name, fields };
    }
    case 'Blob':
      return { type: 'Blob', blob: ty.blob, name: ty.name };
    case 'Ty':
      return { type: 'Ty', ty: VOID };
    case 'Field':
      return { type: 'Field', name: ty.name };
  }
}

// ============================================================
// FORMATTING
// ============================================================

function formatFloat(value: number): string {
  return Number.isInteger(value) ? `${value}.0` : String(value);
}

/**
 * Format a value for display (what `print` writes).
 * A container that holds itself shows the inner reference as `[...]`,
 * `{...}` or `Name {...}`.
 */
export function formatValue(value: Value): string {
  return render(value, new Set());
}

function render(value: Value, open: Set<object>): string {
  // Strings inside containers are quoted
  const nested = (inner: Value): string =>
    inner.type === 'String' ? JSON.stringify(inner.value) : render(inner, open);

  switch (value.type) {
    case 'Nil':
      return 'nil';
    case 'Bool':
      return value.value ? 'true' : 'false';
    case 'Int':
      return String(value.value);
    case 'Float':
      return formatFloat(value.value);
    case 'String':
      return value.value;
    case 'Tuple':
      if (value.elements.length === 1) {
        return `(${value.elements.map(nested).join('')},)`;
      }
      return `(${value.elements.map(nested).join(', ')})`;
    case 'List':
      return guarded(open, value, '[...]', () => `[${value.elements.map(nested).join(', ')}]`);
    case 'Set':
      return guarded(
        open,
        value,
        '{...}',
        () => `{${[...value.entries].map(nested).join(', ')}}`
      );
    case 'Dict':
      if (value.entries.size === 0) return '{:}';
      return guarded(
        open,
        value,
        '{...}',
        () =>
          `{${[...value.entries].map(([k, v]) => `${nested(k)}: ${nested(v)}`).join(', ')}}`
      );
    case 'Instance': {
      if (value.fields.size === 0) return `${value.name} {}`;
      return guarded(open, value, `${value.name} {...}`, () => {
        const fields = [...value.fields]
          .map(([name, v]) => `${name}: ${nested(v)}`)
          .join(', ');
        return `${value.name} { ${fields} }`;
      });
    }
    case 'Function':
      return `<${formatType(value.ty)}>`;
    case 'ExternFunction':
      return `<extern ${value.name}>`;
    case 'Iter':
      return `<iter ${formatType(value.element)}>`;
    case 'Union':
      return value.variants.map(nested).join(' | ');
    case 'Unknown':
      return '<unknown>';
    case 'Ty':
      return `<type ${formatType(value.ty)}>`;
    case 'Field':
      return `.${value.name}`;
    case 'Blob':
      return `<blob ${value.name}>`;
  }
}
