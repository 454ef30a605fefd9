/**
 * Transformation and Statistics Unit Tests
 */

import { describe, it, expect } from 'vitest';

import { DataRetrievalError, InvalidTransformationError } from '../../../core/errors.js';
import { FlowEvent } from '../../../data/flow-event.js';
import { ReferenceResolver } from '../../../data/reference-resolver.js';
import { fractionOfParent, populationStatistics } from '../../../data/statistics.js';
import { derivePopulation } from '../../../data/population.js';
import {
  TransformationCollection,
  createTransformation,
  type TransformationDescriptor,
} from '../../../transformation/transformation.js';
import { channelCollection, valuesPopulation } from '../../helpers/populations.js';

function evaluate(descriptor: TransformationDescriptor, values: readonly number[]): number {
  const channels = channelCollection(['A', 'B']);
  const resolver = new ReferenceResolver([channels, TransformationCollection.fromDescriptors([descriptor])]);
  return resolver.value(descriptor.id, new FlowEvent(values));
}

describe('transformations', () => {
  it('should apply a linear transformation', () => {
    expect(evaluate({ kind: 'linear', id: 't', parameter: 'A', a: 3, b: -1 }, [4, 0])).toBe(11);
  });

  it('should apply a quadratic transformation', () => {
    expect(evaluate({ kind: 'quadratic', id: 't', parameter: 'A', a: 1, b: 2, c: 3 }, [2, 0])).toBe(11);
  });

  it('should scale the natural logarithm by r / d', () => {
    expect(evaluate({ kind: 'ln', id: 't', parameter: 'A', r: 2, d: 1 }, [Math.E, 0])).toBeCloseTo(2, 12);
  });

  it('should apply a logarithm to an arbitrary base', () => {
    expect(evaluate({ kind: 'log', id: 't', parameter: 'A', r: 1, d: 1, base: 10 }, [1000, 0])).toBeCloseTo(3, 12);
  });

  it('should divide two parameters', () => {
    expect(evaluate({ kind: 'ratio', id: 't', numerator: 'A', denominator: 'B' }, [9, 3])).toBe(3);
  });

  it('should chain transformations of transformations', () => {
    const resolver = new ReferenceResolver([
      channelCollection(['A']),
      TransformationCollection.fromDescriptors([
        { kind: 'linear', id: 'double', parameter: 'A', a: 2, b: 0 },
        { kind: 'linear', id: 'plusOne', parameter: 'double', a: 1, b: 1 },
      ]),
    ]);

    expect(resolver.value('plusOne', new FlowEvent([5]))).toBe(11);
  });

  it('should raise DataRetrievalError for a non-finite result', () => {
    expect(() => evaluate({ kind: 'ln', id: 'lnA', parameter: 'A', r: 1, d: 1 }, [0, 0])).toThrow(DataRetrievalError);
    expect(() => evaluate({ kind: 'ratio', id: 'q', numerator: 'A', denominator: 'B' }, [1, 0])).toThrow(
      'Transformation q produced Infinity'
    );
  });

  it('should reject coefficients that never yield a value', () => {
    expect(() => createTransformation({ kind: 'ln', id: 'bad', parameter: 'A', r: 1, d: 0 })).toThrow(
      InvalidTransformationError
    );
    expect(() => createTransformation({ kind: 'log', id: 'bad', parameter: 'A', r: 1, d: 1, base: 1 })).toThrow(
      'Invalid transformation "bad": log base must be positive and not 1, got 1'
    );
  });

  it('should use the label when given', () => {
    expect(createTransformation({ kind: 'linear', id: 't', label: 'Scaled A', parameter: 'A', a: 1, b: 0 }).label).toBe(
      'Scaled A'
    );
  });
});

describe('populationStatistics', () => {
  it('should report sample statistics per parameter', () => {
    const stats = populationStatistics(valuesPopulation('x', [4, 1, 3, 2]), ['x']);

    expect(stats.count).toBe(4);
    expect(stats.parameters[0].min).toBe(1);
    expect(stats.parameters[0].max).toBe(4);
    expect(stats.parameters[0].mean).toBe(2.5);
    expect(stats.parameters[0].median).toBe(2.5);
    expect(stats.parameters[0].standardDeviation).toBeCloseTo(Math.sqrt(5 / 3), 12);
  });

  it('should report zero spread for a single event', () => {
    const stats = populationStatistics(valuesPopulation('x', [7]), ['x']);

    expect(stats.parameters[0].median).toBe(7);
    expect(stats.parameters[0].standardDeviation).toBe(0);
  });

  it('should report NaN aggregates for an empty population', () => {
    const stats = populationStatistics(valuesPopulation('x', []), ['x']);

    expect(stats.count).toBe(0);
    expect(stats.parameters[0].mean).toBeNaN();
  });

  it('should relate a sub-population to its parent', () => {
    const parent = valuesPopulation('x', [1, 2, 3, 4]);
    const child = derivePopulation(parent, 'child', parent.events.slice(0, 1));

    expect(fractionOfParent(child)).toBe(0.25);
    expect(fractionOfParent(parent)).toBeNaN();
  });
});
