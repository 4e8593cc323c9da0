/**
 * sylt Type Model
 *
 * Static shapes of values. Used for annotations, for the typecheck pass and
 * for building placeholder values (see typeToValue in values.ts).
 */

// ============================================================
// TYPE REPRESENTATION
// ============================================================

export type Type =
  | { readonly kind: 'Void' }
  | { readonly kind: 'Unknown' }
  | { readonly kind: 'Invalid' }
  | { readonly kind: 'Int' }
  | { readonly kind: 'Float' }
  | { readonly kind: 'Bool' }
  | { readonly kind: 'String' }
  | { readonly kind: 'Tuple'; readonly elements: readonly Type[] }
  | { readonly kind: 'List'; readonly element: Type }
  | { readonly kind: 'Set'; readonly element: Type }
  | { readonly kind: 'Dict'; readonly key: Type; readonly value: Type }
  | { readonly kind: 'Iter'; readonly element: Type }
  | {
      readonly kind: 'Function';
      readonly params: readonly Type[];
      readonly ret: Type;
    }
  | { readonly kind: 'ExternFunction'; readonly index: number; readonly name: string }
  | { readonly kind: 'Union'; readonly variants: readonly Type[] }
  | { readonly kind: 'Instance'; readonly blob: number; readonly name: string }
  | { readonly kind: 'Blob'; readonly blob: number; readonly name: string }
  | { readonly kind: 'Ty' }
  | { readonly kind: 'Field'; readonly name: string };

export type TypeKind = Type['kind'];

/** A compiled blob definition: field names with their declared types */
export interface BlobShape {
  readonly name: string;
  readonly file: string;
  readonly fields: readonly { readonly name: string; readonly type: Type }[];
}

export const VOID: Type = { kind: 'Void' };
export const UNKNOWN_TYPE: Type = { kind: 'Unknown' };
export const INVALID: Type = { kind: 'Invalid' };
export const INT: Type = { kind: 'Int' };
export const FLOAT: Type = { kind: 'Float' };
export const BOOL: Type = { kind: 'Bool' };
export const STRING: Type = { kind: 'String' };

export function listOf(element: Type): Type {
  return { kind: 'List', element };
}

export function setOf(element: Type): Type {
  return { kind: 'Set', element };
}

export function dictOf(key: Type, value: Type): Type {
  return { kind: 'Dict', key, value };
}

export function tupleOf(elements: readonly Type[]): Type {
  return { kind: 'Tuple', elements };
}

export function iterOf(element: Type): Type {
  return { kind: 'Iter', element };
}

export function functionOf(params: readonly Type[], ret: Type): Type {
  return { kind: 'Function', params, ret };
}

// ============================================================
// IDENTITY
// ============================================================

/** Canonical key; two types are the same type iff their keys are equal */
export function typeKey(ty: Type): string {
  switch (ty.kind) {
    case 'Tuple':
      return `(${ty.elements.map(typeKey).join(',')})`;
    case 'List':
      return `[${typeKey(ty.element)}]`;
    case 'Set':
      return `{${typeKey(ty.element)}}`;
    case 'Dict':
      return `{${typeKey(ty.key)}:${typeKey(ty.value)}}`;
    case 'Iter':
      return `iter<${typeKey(ty.element)}>`;
    case 'Function':
      return `fn(${ty.params.map(typeKey).join(',')})->${typeKey(ty.ret)}`;
    case 'ExternFunction':
      return `extern#${ty.index}`;
    case 'Union':
      return `U(${ty.variants.map(typeKey).sort().join('|')})`;
    case 'Instance':
      return `inst#${ty.blob}`;
    case 'Blob':
      return `blob#${ty.blob}`;
    case 'Field':
      return `.${ty.name}`;
    default:
      return ty.kind;
  }
}

export function typeEquals(a: Type, b: Type): boolean {
  return typeKey(a) === typeKey(b);
}

/**
 * Build a union, flattening nested unions and dropping duplicates.
 * A single remaining variant is returned as is.
 */
export function unionOf(variants: readonly Type[]): Type {
  const seen = new Map<string, Type>();
  const add = (ty: Type): void => {
    if (ty.kind === 'Union') {
      ty.variants.forEach(add);
      return;
    }
    const key = typeKey(ty);
    if (!seen.has(key)) seen.set(key, ty);
  };
  variants.forEach(add);

  const flat = [...seen.values()];
  const [only] = flat;
  if (flat.length === 1 && only) return only;
  if (flat.length === 0) return VOID;
  return { kind: 'Union', variants: flat };
}

// ============================================================
// COMPATIBILITY
// ============================================================

/**
 * Can a value of type `actual` be stored where `expected` is declared?
 * Unknown fits everything in both directions. A union actual fits only if
 * every variant fits; a union expected accepts any of its variants.
 * Function parameters are compared contravariantly.
 */
export function typeFits(expected: Type, actual: Type): boolean {
  if (expected.kind === 'Unknown' || actual.kind === 'Unknown') return true;

  if (actual.kind === 'Union') {
    return actual.variants.every((variant) => typeFits(expected, variant));
  }
  if (expected.kind === 'Union') {
    return expected.variants.some((variant) => typeFits(variant, actual));
  }

  switch (expected.kind) {
    case 'Tuple':
      return (
        actual.kind === 'Tuple' &&
        actual.elements.length === expected.elements.length &&
        expected.elements.every((ty, i) => {
          const other = actual.elements[i];
          return other !== undefined && typeFits(ty, other);
        })
      );
    case 'List':
    case 'Set':
    case 'Iter':
      return (
        actual.kind === expected.kind && typeFits(expected.element, actual.element)
      );
    case 'Dict':
      return (
        actual.kind === 'Dict' &&
        typeFits(expected.key, actual.key) &&
        typeFits(expected.value, actual.value)
      );
    case 'Function':
      return (
        actual.kind === 'Function' &&
        actual.params.length === expected.params.length &&
        expected.params.every((ty, i) => {
          const other = actual.params[i];
          return other !== undefined && typeFits(other, ty);
        }) &&
        typeFits(expected.ret, actual.ret)
      );
    case 'Instance':
    case 'Blob':
      return actual.kind === expected.kind && actual.blob === expected.blob;
    case 'ExternFunction':
      return actual.kind === 'ExternFunction' && actual.index === expected.index;
    case 'Field':
      return actual.kind === 'Field' && actual.name === expected.name;
    default:
      return actual.kind === expected.kind;
  }
}

// ============================================================
// FORMATTING
// ============================================================

/** Render a type the way it is written in source */
export function formatType(ty: Type): string {
  switch (ty.kind) {
    case 'Void':
      return 'void';
    case 'Unknown':
      return '*';
    case 'Invalid':
      return '!';
    case 'Int':
      return 'int';
    case 'Float':
      return 'float';
    case 'Bool':
      return 'bool';
    case 'String':
      return 'str';
    case 'Tuple':
      return ty.elements.length === 1
        ? `(${formatType(ty.elements[0] ?? VOID)},)`
        : `(${ty.elements.map(formatType).join(', ')})`;
    case 'List':
      return `[${formatType(ty.element)}]`;
    case 'Set':
      return `{${formatType(ty.element)}}`;
    case 'Dict':
      return `{${formatType(ty.key)}: ${formatType(ty.value)}}`;
    case 'Iter':
      return `iter ${formatType(ty.element)}`;
    case 'Function': {
      const params = ty.params.map(formatType).join(', ');
      const head = params === '' ? 'fn' : `fn ${params}`;
      return `${head} -> ${formatType(ty.ret)}`;
    }
    case 'ExternFunction':
      return `extern ${ty.name}`;
    case 'Union':
      return ty.variants.map(formatType).join(' | ');
    case 'Instance':
      return ty.name;
    case 'Blob':
      return `blob ${ty.name}`;
    case 'Ty':
      return 'type';
    case 'Field':
      return `.${ty.name}`;
  }
}
