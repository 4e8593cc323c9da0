/**
 * sylt Bytecode
 *
 * Stack picture notation: `a b Op -> c` means Op pops b then a and pushes c.
 * Indices into the constant pool, string table and block list are baked
 * into the operands, so those orders are part of a compiled program.
 */

import type { Type } from '../runtime/core/value-types.js';

/** Operations without operands */
export type NullaryOpName =
  | 'Pop' //            a Pop ->
  | 'CloseUpvalue' //   a CloseUpvalue ->          (closes the cell for a's slot)
  | 'Add' //            a b Add -> a+b
  | 'Sub'
  | 'Mul'
  | 'Div'
  | 'Neg' //            a Neg -> -a
  | 'Not' //            a Not -> !a
  | 'Equal' //          a b Equal -> a==b
  | 'Less' //           a b Less -> a<b
  | 'Greater' //        a b Greater -> a>b
  | 'And'
  | 'Or'
  | 'Contains' //       a b Contains -> a in b
  | 'Assert' //         a Assert -> a              (fails when a is false)
  | 'GetIndex' //       a i GetIndex -> a[i]
  | 'AssignIndex' //    a i v AssignIndex ->
  | 'Print' //          a Print ->
  | 'Return'; //        a Return -> (a in the caller)

export type Op =
  | { readonly op: NullaryOpName }
  | { readonly op: 'Constant'; readonly index: number }
  | { readonly op: 'ReadLocal'; readonly slot: number }
  | { readonly op: 'AssignLocal'; readonly slot: number }
  | { readonly op: 'ReadUpvalue'; readonly slot: number }
  | { readonly op: 'AssignUpvalue'; readonly slot: number }
  | { readonly op: 'ReadGlobal'; readonly slot: number }
  | { readonly op: 'AssignGlobal'; readonly slot: number }
  /** Duplicate the top `count` values */
  | { readonly op: 'Copy'; readonly count: number }
  | { readonly op: 'Tuple'; readonly count: number }
  | { readonly op: 'List'; readonly count: number }
  | { readonly op: 'Set'; readonly count: number }
  /** `count` is keys plus values */
  | { readonly op: 'Dict'; readonly count: number }
  /** blob (field value){count} Instance -> instance */
  | { readonly op: 'Instance'; readonly count: number }
  /** `field` indexes the string table */
  | { readonly op: 'GetField'; readonly field: number }
  | { readonly op: 'AssignField'; readonly field: number }
  /** callee arg{args} Call -> result */
  | { readonly op: 'Call'; readonly args: number }
  | { readonly op: 'Jump'; readonly target: number }
  /** Pops the condition */
  | { readonly op: 'JumpIfFalse'; readonly target: number }
  /** Drop `count` locals, closing captured ones, then jump (break) */
  | { readonly op: 'Unwind'; readonly count: number; readonly target: number }
  | { readonly op: 'Closure'; readonly block: number }
  /** Declared type of the definition on top; checked by the typecheck pass only */
  | { readonly op: 'Define'; readonly name: string; readonly ty: Type };

export type OpName = Op['op'];

export const NULLARY_OPS: readonly NullaryOpName[] = [
  'Pop',
  'CloseUpvalue',
  'Add',
  'Sub',
  'Mul',
  'Div',
  'Neg',
  'Not',
  'Equal',
  'Less',
  'Greater',
  'And',
  'Or',
  'Contains',
  'Assert',
  'GetIndex',
  'AssignIndex',
  'Print',
  'Return',
];

export function isNullaryOp(name: string): name is NullaryOpName {
  return NULLARY_OPS.some((op) => op === name);
}
