/**
 * GateSet Unit Tests
 */

import { describe, it, expect } from 'vitest';

import {
  DuplicateGateIdError,
  InvalidGateDescriptionError,
  NoSuchGateError,
} from '../../../core/errors.js';
import { createGate, proxyGate } from '../../../gating/gate-factory.js';
import { GateSet } from '../../../gating/gate-set.js';

const lymphocytes = createGate({
  kind: 'rectangle',
  id: 'lymphocytes',
  dimensions: [{ parameter: 'FSC', min: 100, max: 400 }],
});

describe('GateSet', () => {
  it('should keep gates in insertion order', () => {
    const gates = new GateSet([
      lymphocytes,
      createGate({ kind: 'not', id: 'debris', operands: ['lymphocytes'] }),
    ]);

    expect(gates.ids()).toEqual(['lymphocytes', 'debris']);
    expect(gates.size).toBe(2);
    expect(gates.get('lymphocytes')).toBe(lymphocytes);
    expect(gates.has('monocytes')).toBe(false);
  });

  it('should reject a second gate with the same id', () => {
    const gates = new GateSet([lymphocytes]);

    expect(() => gates.add(lymphocytes)).toThrow(DuplicateGateIdError);
    expect(gates.size).toBe(1);
  });

  it('should reject proxy gates', () => {
    expect(() => new GateSet([proxyGate('lymphocytes')])).toThrow(InvalidGateDescriptionError);
  });

  it('should list every missing operand during validation', () => {
    const gates = new GateSet([
      createGate({ kind: 'and', id: 'a', operands: ['x', 'y'] }),
      createGate({ kind: 'or', id: 'b', operands: ['y', 'z'] }),
    ]);

    let caught: unknown;
    try {
      gates.validate();
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(NoSuchGateError);
    if (caught instanceof NoSuchGateError) {
      expect(caught.gateIds).toEqual(['x', 'y', 'z']);
    }
  });

  it('should report a dependency cycle with its path', () => {
    expect(() =>
      GateSet.fromDescriptors([
        { kind: 'not', id: 'a', operands: ['b'] },
        { kind: 'not', id: 'b', operands: ['a'] },
      ])
    ).toThrow('Invalid gate "a": Gate dependency cycle found: a -> b -> a');
  });

  it('should accept a diamond of shared operands', () => {
    const gates = GateSet.fromDescriptors([
      { kind: 'rectangle', id: 'base', dimensions: [{ parameter: 'FSC', min: 0 }] },
      { kind: 'not', id: 'left', operands: ['base'] },
      { kind: 'not', id: 'right', operands: ['base'] },
      { kind: 'and', id: 'top', operands: ['left', 'right'] },
    ]);

    expect(gates.size).toBe(4);
  });

  it('should fail fast on duplicate ids in descriptors', () => {
    expect(() =>
      GateSet.fromDescriptors([
        { kind: 'rectangle', id: 'g', dimensions: [{ parameter: 'FSC', min: 0 }] },
        { kind: 'rectangle', id: 'g', dimensions: [{ parameter: 'SSC', min: 0 }] },
      ])
    ).toThrow('Duplicate gate id: g');
  });
});
