/**
 * Spillover matrices
 *
 * `spillover(from, to)` is the fraction of the signal of the fluorochrome
 * measured in channel `from` that is observed in detector `to`. Unlisted
 * pairs default to 1 on the diagonal and 0 elsewhere.
 *
 * @module compensation/spillover-matrix
 */

import { InvalidCompensationMatrixError } from '../core/errors.js';
import type { ParameterReference } from '../data/parameter.js';

export interface SpilloverEntry {
  readonly from: ParameterReference;
  readonly to: ParameterReference;
  readonly value: number;
}

export class SpilloverMatrix {
  private readonly entries = new Map<string, number>();
  private readonly referenceList: readonly ParameterReference[];

  constructor(
    public readonly id: string,
    entries: readonly SpilloverEntry[]
  ) {
    const references: ParameterReference[] = [];
    for (const { from, to, value } of entries) {
      if (!Number.isFinite(value)) {
        throw new InvalidCompensationMatrixError(id, `spillover ${from} -> ${to} is not a finite number`);
      }
      const key = entryKey(from, to);
      if (this.entries.has(key)) {
        throw new InvalidCompensationMatrixError(id, `spillover ${from} -> ${to} is defined twice`);
      }
      this.entries.set(key, value);
      if (!references.includes(from)) references.push(from);
      if (!references.includes(to)) references.push(to);
    }
    this.referenceList = Object.freeze(references);
  }

  spillover(from: ParameterReference, to: ParameterReference): number {
    return this.entries.get(entryKey(from, to)) ?? (from === to ? 1 : 0);
  }

  /** Every reference named by an entry, in first-appearance order */
  references(): readonly ParameterReference[] {
    return this.referenceList;
  }
}

function entryKey(from: ParameterReference, to: ParameterReference): string {
  return JSON.stringify([from, to]);
}

/**
 * Matrices from one compensation document, by id
 */
export class SpilloverMatrixSet implements Iterable<SpilloverMatrix> {
  private readonly matrices = new Map<string, SpilloverMatrix>();

  constructor(matrices: Iterable<SpilloverMatrix> = []) {
    for (const matrix of matrices) {
      if (this.matrices.has(matrix.id)) {
        throw new InvalidCompensationMatrixError(matrix.id, 'matrix id is defined twice');
      }
      this.matrices.set(matrix.id, matrix);
    }
  }

  get(id: string): SpilloverMatrix | undefined {
    return this.matrices.get(id);
  }

  has(id: string): boolean {
    return this.matrices.has(id);
  }

  ids(): string[] {
    return [...this.matrices.keys()];
  }

  get size(): number {
    return this.matrices.size;
  }

  [Symbol.iterator](): Iterator<SpilloverMatrix> {
    return this.matrices.values();
  }
}
