/**
 * Boolean and Decision Tree Gate Unit Tests
 *
 * Set algebra over sub-populations, proxy resolution against a gate set,
 * and decision tree traversal.
 */

import { describe, it, expect } from 'vitest';

import { InvalidGateDescriptionError, NoSuchGateError } from '../../../core/errors.js';
import { compileGate, evaluateGate } from '../../../gating/evaluate.js';
import { andGate, createGate, notGate, orGate, proxyGate } from '../../../gating/gate-factory.js';
import { GateSet } from '../../../gating/gate-set.js';
import { firstColumn, valuesPopulation } from '../../helpers/populations.js';

/**
 * 100 events with x = 0..99:
 * G1 = [0, 40) holds 40 events, G2 = [10, 80) holds 70, and they share 30.
 */
function algebraFixture() {
  const population = valuesPopulation(
    'x',
    Array.from({ length: 100 }, (_, i) => i)
  );
  const gates = GateSet.fromDescriptors([
    { kind: 'rectangle', id: 'G1', dimensions: [{ parameter: 'x', min: 0, max: 40 }] },
    { kind: 'rectangle', id: 'G2', dimensions: [{ parameter: 'x', min: 10, max: 80 }] },
    { kind: 'not', id: 'notG1', operands: ['G1'] },
    { kind: 'and', id: 'G2notG1', operands: ['notG1', 'G2'] },
    { kind: 'or', id: 'either', operands: ['G1', 'G2'] },
    { kind: 'and', id: 'both', operands: ['G1', 'G2'] },
  ]);
  return { population, gates };
}

function count(gates: GateSet, id: string, population = algebraFixture().population): number {
  const gate = gates.get(id);
  if (!gate) throw new Error(`fixture gate ${id} missing`);
  return evaluateGate(gate, population, { gates }).events.length;
}

describe('boolean gates', () => {
  it('should complement a gate with not', () => {
    const { gates } = algebraFixture();

    expect(count(gates, 'G1')).toBe(40);
    expect(count(gates, 'notG1')).toBe(60);
  });

  it('should intersect operands with and', () => {
    const { gates } = algebraFixture();

    expect(count(gates, 'both')).toBe(30);
    expect(count(gates, 'G2notG1')).toBe(40);
  });

  it('should unite operands with or', () => {
    const { gates } = algebraFixture();

    expect(count(gates, 'either')).toBe(80);
  });

  it('should keep event order of the parent population', () => {
    const { gates, population } = algebraFixture();
    const gate = gates.get('G2notG1');
    if (!gate) throw new Error('fixture gate missing');

    const values = firstColumn(evaluateGate(gate, population, { gates }));

    expect(values[0]).toBe(40);
    expect(values[values.length - 1]).toBe(79);
  });

  it('should accept operands defined after the gate that names them', () => {
    const gates = GateSet.fromDescriptors([
      { kind: 'not', id: 'outside', operands: ['inside'] },
      { kind: 'rectangle', id: 'inside', dimensions: [{ parameter: 'x', max: 5 }] },
    ]);
    const outside = gates.get('outside');
    if (!outside) throw new Error('fixture gate missing');

    const result = evaluateGate(outside, valuesPopulation('x', [1, 5, 9]), { gates });

    expect(firstColumn(result)).toEqual([5, 9]);
  });

  it('should fail to evaluate a proxy without a gate lookup', () => {
    const gate = notGate('lonely', proxyGate('G1'));

    expect(() => evaluateGate(gate, valuesPopulation('x', [1]))).toThrow(NoSuchGateError);
  });

  it('should detect a self-referencing boolean gate at evaluation time', () => {
    const loop = notGate('loop', proxyGate('loop'));
    const lookup = { get: (id: string) => (id === 'loop' ? loop : undefined) };

    expect(() => compileGate(loop, { resolver: valuesPopulation('x', [1]).resolver, gates: lookup })).toThrow(
      'Invalid gate "loop": Gate dependency cycle found: loop -> loop'
    );
  });

  it('should require two operands for and / or', () => {
    expect(() => andGate('a', [proxyGate('x')])).toThrow('Invalid gate "a": and gate needs at least 2 operands, got 1');
    expect(() => orGate('o', [])).toThrow(InvalidGateDescriptionError);
  });

  it('should require exactly one operand for not', () => {
    expect(() => createGate({ kind: 'not', id: 'n', operands: ['a', 'b'] })).toThrow(
      'Invalid gate "n": not gate needs exactly 1 operand, got 2'
    );
  });
});

describe('decision tree gates', () => {
  const tree = createGate({
    kind: 'decision-tree',
    id: 'tree',
    root: {
      parameter: 'x',
      threshold: 50,
      greaterOrEqual: { inside: false },
      lessThan: {
        parameter: 'x',
        threshold: 10,
        greaterOrEqual: { inside: true },
        lessThan: { inside: false },
      },
    },
  });

  it('should collect the dimensions it reads', () => {
    expect(tree.dimensions).toEqual(['x']);
  });

  it('should send values equal to a threshold down the greater-or-equal branch', () => {
    const result = evaluateGate(tree, valuesPopulation('x', [9, 10, 49, 50, 70]));

    expect(firstColumn(result)).toEqual([10, 49]);
  });

  it('should only resolve parameters on branches an event reaches', () => {
    const partial = createGate({
      kind: 'decision-tree',
      id: 'partial',
      root: {
        parameter: 'x',
        threshold: 0,
        greaterOrEqual: { inside: true },
        lessThan: { parameter: 'missing', threshold: 1, greaterOrEqual: { inside: true }, lessThan: { inside: false } },
      },
    });

    expect(firstColumn(evaluateGate(partial, valuesPopulation('x', [1, 2, 3])))).toEqual([1, 2, 3]);
    expect(() => evaluateGate(partial, valuesPopulation('x', [1, -1]))).toThrow('No such parameter: missing');
  });

  it('should reject a tree without any branch', () => {
    expect(() => createGate({ kind: 'decision-tree', id: 'leaf', root: { inside: true } })).toThrow(
      'Invalid gate "leaf": gate has zero dimensions'
    );
  });

  it('should reject a non-finite threshold', () => {
    expect(() =>
      createGate({
        kind: 'decision-tree',
        id: 'inf',
        root: { parameter: 'x', threshold: Infinity, greaterOrEqual: { inside: true }, lessThan: { inside: false } },
      })
    ).toThrow('Invalid gate "inf": threshold on x must be finite');
  });
});
