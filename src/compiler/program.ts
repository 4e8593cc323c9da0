/**
 * Compiled Program Layout
 */

import type { ExternFunction } from '../runtime/core/extern.js';
import type { BlobShape, Type } from '../runtime/core/value-types.js';
import type { Value } from '../runtime/core/values.js';
import type { Op } from './opcodes.js';

/** How a closure finds a captured variable when it is created */
export interface UpvalueDescriptor {
  /** true: a local slot of the enclosing frame; false: one of its upvalues */
  readonly isLocal: boolean;
  readonly index: number;
}

/** One compiled function; block 0 is the program entry */
export interface Block {
  readonly name: string;
  readonly ops: Op[];
  /** Source line of each op */
  readonly lines: number[];
  /** Source file of each op; the entry block mixes every module's code */
  readonly files: string[];
  readonly upvalues: UpvalueDescriptor[];
  /** Function type: declared parameter and return types */
  readonly ty: Type;
}

export interface Program {
  readonly blocks: readonly Block[];
  readonly constants: readonly Value[];
  readonly strings: readonly string[];
  readonly blobs: readonly BlobShape[];
  /** Linked in registration order; ExternFunction values index this table */
  readonly externs: readonly ExternFunction[];
  /** Number of global slots, excluding the reserved slot 0 */
  readonly globals: number;
}
