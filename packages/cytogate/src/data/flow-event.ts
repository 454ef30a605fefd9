/**
 * Flow Event
 *
 * One row of per-channel measurements. Channels are addressed by their
 * 1-based parameter number, matching how acquisition files number them.
 *
 * @module data/flow-event
 */

import { DataRetrievalError } from '../core/errors.js';

export class FlowEvent {
  private readonly values: readonly number[];

  constructor(values: readonly number[]) {
    this.values = Object.freeze([...values]);
  }

  /** Number of channels */
  get size(): number {
    return this.values.length;
  }

  /**
   * Value of the channel with 1-based parameter number `parameterNumber`
   */
  valueAt(parameterNumber: number): number {
    if (!Number.isInteger(parameterNumber) || parameterNumber < 1 || parameterNumber > this.values.length) {
      throw new DataRetrievalError(
        `Parameter number ${parameterNumber} out of range for event with ${this.values.length} channels`
      );
    }
    return this.values[parameterNumber - 1];
  }

  data(): readonly number[] {
    return this.values;
  }

  /**
   * Copy of this event with some channels replaced, keyed by parameter number
   */
  withValues(updates: ReadonlyMap<number, number>): FlowEvent {
    const next = [...this.values];
    for (const [parameterNumber, value] of updates) {
      this.valueAt(parameterNumber);
      next[parameterNumber - 1] = value;
    }
    return new FlowEvent(next);
  }

  hasSameData(other: FlowEvent, epsilon = 0): boolean {
    if (other.values.length !== this.values.length) return false;
    return this.values.every((value, i) => Math.abs(value - other.values[i]) <= epsilon);
  }
}
