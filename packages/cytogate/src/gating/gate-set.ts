/**
 * Gate Set
 *
 * Named gates in insertion order. Boolean gates may name gates that are
 * added later, so a set is built in two phases: add every gate, then
 * validate that all proxy targets exist and that no gate depends on itself.
 *
 * @module gating/gate-set
 */

import {
  DuplicateGateIdError,
  InvalidGateDescriptionError,
  NoSuchGateError,
} from '../core/errors.js';
import type { GateDescriptor } from './descriptors.js';
import { createGate } from './gate-factory.js';
import { proxyTargets, type Gate, type GateLookup } from './gate.js';

export class GateSet implements Iterable<Gate>, GateLookup {
  private readonly gates = new Map<string, Gate>();

  constructor(gates: Iterable<Gate> = []) {
    for (const gate of gates) this.add(gate);
  }

  /**
   * Build and validate a gate set from descriptor records in any order
   */
  static fromDescriptors(descriptors: readonly GateDescriptor[]): GateSet {
    const set = new GateSet(descriptors.map(createGate));
    set.validate();
    return set;
  }

  /**
   * @throws DuplicateGateIdError when a gate with the same id exists
   */
  add(gate: Gate): void {
    if (gate.kind === 'proxy') {
      throw new InvalidGateDescriptionError(gate.id, 'proxy gates cannot be added to a gate set');
    }
    if (this.gates.has(gate.id)) {
      throw new DuplicateGateIdError(gate.id);
    }
    this.gates.set(gate.id, gate);
  }

  get(id: string): Gate | undefined {
    return this.gates.get(id);
  }

  has(id: string): boolean {
    return this.gates.has(id);
  }

  get size(): number {
    return this.gates.size;
  }

  ids(): string[] {
    return [...this.gates.keys()];
  }

  toArray(): Gate[] {
    return [...this.gates.values()];
  }

  [Symbol.iterator](): Iterator<Gate> {
    return this.gates.values();
  }

  /**
   * Check every proxy reference against the completed set.
   *
   * @throws NoSuchGateError listing every missing id
   * @throws InvalidGateDescriptionError naming the first dependency cycle
   */
  validate(): void {
    const missing: string[] = [];
    for (const gate of this.gates.values()) {
      for (const target of proxyTargets(gate)) {
        if (!this.gates.has(target) && !missing.includes(target)) missing.push(target);
      }
    }
    if (missing.length > 0) {
      throw new NoSuchGateError(missing);
    }

    const cycle = this.findCycle();
    if (cycle) {
      throw new InvalidGateDescriptionError(cycle[0], `Gate dependency cycle found: ${cycle.join(' -> ')}`);
    }
  }

  private findCycle(): string[] | null {
    const proven = new Set<string>();

    const visit = (id: string, path: string[]): string[] | null => {
      const start = path.indexOf(id);
      if (start >= 0) return [...path.slice(start), id];
      if (proven.has(id)) return null;

      const gate = this.gates.get(id);
      if (!gate) return null;

      path.push(id);
      for (const target of proxyTargets(gate)) {
        const cycle = visit(target, path);
        if (cycle) return cycle;
      }
      path.pop();
      proven.add(id);
      return null;
    };

    for (const id of this.gates.keys()) {
      const cycle = visit(id, []);
      if (cycle) return cycle;
    }
    return null;
  }
}
