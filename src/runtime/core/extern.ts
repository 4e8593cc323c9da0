/**
 * Extern Functions
 *
 * Host functions callable from sylt code. Each extern carries a list of
 * overloads; the first overload whose parameter patterns accept the
 * argument types is used. The typecheck pass only asks an extern for its
 * result type and never invokes it.
 *
 * At run time overloads are matched on the argument values: a concrete
 * pattern looks inside containers only as far as it names element types,
 * and a predicate sees the value's shape (`[*]` for any list).
 */

import { ExternTypeMismatchError } from '../../error-classes.js';
import { typeFits, type Type } from './value-types.js';
import { shapeOf, typeOf, valueFits, type Value } from './values.js';

/** A concrete type, or a predicate for shapes a type can't spell (any list) */
export type ParamPattern = Type | ((ty: Type) => boolean);

export interface ExternOverload {
  readonly params: readonly ParamPattern[];
  /** Result type, or a function of the argument types */
  readonly returns: Type | ((argTypes: readonly Type[]) => Type);
  readonly invoke: (args: readonly Value[]) => Value;
}

export interface ExternFunction {
  readonly name: string;
  /**
   * Run the function.
   * @throws ExternTypeMismatchError when no overload takes the arguments
   */
  invoke(args: readonly Value[]): Value;
  /**
   * Result type for the given argument types, without side effects.
   * @throws ExternTypeMismatchError when no overload takes the arguments
   */
  describeResult(argTypes: readonly Type[]): Type;
}

function accepts(pattern: ParamPattern, ty: Type): boolean {
  if (ty.kind === 'Unknown') return true;
  if (typeof pattern !== 'function') return typeFits(pattern, ty);
  if (ty.kind === 'Union') return ty.variants.every((variant) => accepts(pattern, variant));
  return pattern(ty);
}

function acceptsValue(pattern: ParamPattern, value: Value): boolean {
  if (value.type === 'Unknown') return true;
  if (typeof pattern !== 'function') return valueFits(pattern, value);
  if (value.type === 'Union') {
    return value.variants.every((variant) => acceptsValue(pattern, variant));
  }
  return pattern(shapeOf(value));
}

function selectOverload<T>(
  overloads: readonly ExternOverload[],
  args: readonly T[],
  fits: (pattern: ParamPattern, arg: T) => boolean
): ExternOverload | undefined {
  return overloads.find(
    (candidate) =>
      candidate.params.length === args.length &&
      candidate.params.every((pattern, i) => {
        const arg = args[i];
        return arg !== undefined && fits(pattern, arg);
      })
  );
}

/**
 * Build an extern from its overloads.
 *
 * @example
 * ```typescript
 * const double = defineExtern('double', [
 *   {
 *     params: [INT],
 *     returns: INT,
 *     invoke: ([x]) => (x?.type === 'Int' ? int(x.value * 2) : NIL),
 *   },
 * ]);
 * ```
 */
export function defineExtern(
  name: string,
  overloads: readonly ExternOverload[]
): ExternFunction {
  return {
    name,
    invoke(args) {
      const overload = selectOverload(overloads, args, acceptsValue);
      if (!overload) throw new ExternTypeMismatchError(name, args.map(typeOf));
      return overload.invoke(args);
    },
    describeResult(argTypes) {
      const overload = selectOverload(overloads, argTypes, accepts);
      if (!overload) throw new ExternTypeMismatchError(name, argTypes);
      return typeof overload.returns === 'function'
        ? overload.returns(argTypes)
        : overload.returns;
    },
  };
}
