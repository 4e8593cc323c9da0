/**
 * Upvalues
 *
 * A shared cell for a variable captured by a closure. While the variable's
 * stack slot is live the cell reads and writes the stack; once the slot
 * leaves scope the cell is closed and owns the value itself. Every closure
 * holding the cell sees the same value.
 */

import type { Value } from './values.js';

export class Upvalue {
  private closedValue: Value | undefined;
  private openSlot: number | undefined;

  constructor(
    private readonly stack: Value[],
    slot: number
  ) {
    this.openSlot = slot;
  }

  /** Stack slot while open, undefined once closed */
  get slot(): number | undefined {
    return this.openSlot;
  }

  get(): Value {
    if (this.openSlot !== undefined) {
      const value = this.stack[this.openSlot];
      if (value === undefined) {
        throw new Error(`Upvalue slot ${this.openSlot} is past the stack top`);
      }
      return value;
    }
    if (this.closedValue === undefined) {
      throw new Error('Upvalue was closed without a value');
    }
    return this.closedValue;
  }

  set(value: Value): void {
    if (this.openSlot !== undefined) {
      this.stack[this.openSlot] = value;
    } else {
      this.closedValue = value;
    }
  }

  /** Move the value off the stack into the cell */
  close(): void {
    if (this.openSlot === undefined) return;
    this.closedValue = this.get();
    this.openSlot = undefined;
  }
}

/** Closed cell holding a value; used for placeholder closures */
export function closedUpvalue(value: Value): Upvalue {
  const upvalue = new Upvalue([value], 0);
  upvalue.close();
  return upvalue;
}
