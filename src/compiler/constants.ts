/**
 * Constant Pool and String Table
 *
 * Both tables deduplicate: compiling the same literal twice yields the same
 * index. Nil always sits at constant index 0.
 */

import { NIL, hashKey, valuesEqual, type Value } from '../runtime/core/values.js';

export class ConstantPool {
  readonly values: Value[] = [];
  private readonly buckets = new Map<string, number[]>();

  constructor() {
    this.add(NIL);
  }

  /** Index of an equal constant, adding the value when it is new */
  add(value: Value): number {
    const key = hashKey(value);
    const bucket = this.buckets.get(key) ?? [];
    for (const index of bucket) {
      const existing = this.values[index];
      if (existing !== undefined && existing.type === value.type && valuesEqual(existing, value)) {
        return index;
      }
    }
    const index = this.values.length;
    this.values.push(value);
    bucket.push(index);
    this.buckets.set(key, bucket);
    return index;
  }
}

export class StringTable {
  readonly strings: string[] = [];
  private readonly index = new Map<string, number>();

  intern(text: string): number {
    const existing = this.index.get(text);
    if (existing !== undefined) return existing;
    const slot = this.strings.length;
    this.strings.push(text);
    this.index.set(text, slot);
    return slot;
  }
}
