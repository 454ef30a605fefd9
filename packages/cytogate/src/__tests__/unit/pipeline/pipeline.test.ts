/**
 * Processing Pipeline Unit Tests
 *
 * - Steps run compensation, then transformation, then gating
 * - Population names accumulate one segment per step
 * - Step failures skip the data set; gate failures are reported per gate
 * - Caching data source loads each location once
 */

import { describe, it, expect } from 'vitest';

import { CachingDataSource } from '../../../pipeline/data-source.js';
import { pipelineHasErrors, runPipeline, type PipelineResult } from '../../../pipeline/pipeline.js';
import { RelationsStore } from '../../../relations/relations-store.js';
import { InMemoryDataSource } from '../../helpers/in-memory-source.js';
import { quietLogger } from '../../helpers/populations.js';

function run(store: RelationsStore, source = InMemoryDataSource.panel()): PipelineResult {
  return runPipeline(store, { source, logger: quietLogger });
}

function outputSummary(result: PipelineResult, index = 0): [string, number][] {
  return result.outcomes[index].outputs.map((population) => [population.name, population.events.length]);
}

describe('runPipeline', () => {
  it('should compensate, transform and then gate regardless of insertion order', () => {
    const store = new RelationsStore();
    store.addFileRelation('tube.csv', { type: 'gating', location: 'gates.yaml' });
    store.addFileRelation('tube.csv', { type: 'transformation', location: 'trans.yaml' });
    store.addFileRelation('tube.csv', { type: 'compensation', location: 'comp.json', matrixId: 'panel' });

    const result = run(store);

    expect(result.errors).toEqual([]);
    expect(result.outcomes).toHaveLength(1);

    const [outcome] = result.outcomes;
    expect(outcome.status).toBe('completed');
    expect(outcome.steps).toEqual(['compensation comp.json (matrix panel)', 'transformation trans.yaml', 'gating gates.yaml']);
    expect(outputSummary(result)).toEqual([
      ['tube_1_comp_trans_lymph', 2],
      ['tube_1_comp_trans_fl1pos', 2],
      ['tube_1_comp_trans_lymphFl1', 1],
      ['tube_1_comp_trans_ratio', 4],
    ]);
    expect(outcome.gateFailures).toEqual([]);
    expect(pipelineHasErrors(result)).toBe(false);
  });

  it('should chain parents through every step', () => {
    const store = new RelationsStore();
    store.addFileRelation('tube.csv', { type: 'compensation', location: 'comp.json', matrixId: 'panel' });
    store.addFileRelation('tube.csv', { type: 'gating', location: 'gates.yaml', gateId: 'lymph' });

    const [lymph] = run(store).outcomes[0].outputs;

    expect(lymph.name).toBe('tube_1_comp_lymph');
    expect(lymph.parent?.name).toBe('tube_1_comp');
    expect(lymph.parent?.parent?.name).toBe('tube_1');
  });

  it('should gate raw values when nothing else applies', () => {
    const store = new RelationsStore();
    store.addFileRelation('tube.csv', { type: 'gating', location: 'gates.yaml', gateId: 'fl1pos' });

    expect(outputSummary(run(store))).toEqual([['tube_1_fl1pos', 3]]);
  });

  it('should record gate failures and keep the other gates', () => {
    const store = new RelationsStore();
    store.addFileRelation('tube.csv', { type: 'gating', location: 'gates.yaml' });

    const result = run(store);
    const [outcome] = result.outcomes;

    expect(outcome.status).toBe('completed');
    expect(outcome.outputs.map((p) => p.name)).toEqual(['tube_1_lymph', 'tube_1_fl1pos', 'tube_1_lymphFl1']);
    expect(outcome.gateFailures).toEqual([{ gateId: 'ratio', message: 'No such parameter: FL1/FL2' }]);
    expect(pipelineHasErrors(result)).toBe(true);
  });

  it('should fan out into one branch per gate for later gating steps', () => {
    const store = new RelationsStore();
    store.addFileRelation('tube.csv', { type: 'gating', location: 'gates.yaml', gateId: 'lymph' });
    store.addFileRelation('tube.csv', { type: 'gating', location: 'gates.yaml', gateId: 'fl1pos' });

    expect(outputSummary(run(store))).toEqual([['tube_1_lymph_fl1pos', 2]]);
  });

  it('should skip a data set whose compensation matrix is missing', () => {
    const store = new RelationsStore();
    store.addFileRelation('tube.csv', { type: 'compensation', location: 'comp.json', matrixId: 'nope' });
    store.addFileRelation('tube.csv', { type: 'gating', location: 'gates.yaml' });

    const result = run(store);
    const [outcome] = result.outcomes;

    expect(outcome.status).toBe('skipped');
    expect(outcome.reason).toBe('Compensation matrix nope not found in comp.json');
    expect(outcome.outputs).toEqual([]);
    expect(pipelineHasErrors(result)).toBe(true);
  });

  it('should skip a data set whose gate is missing from the gate set', () => {
    const store = new RelationsStore();
    store.addFileRelation('tube.csv', { type: 'gating', location: 'gates.yaml', gateId: 'monocytes' });

    const [outcome] = run(store).outcomes;

    expect(outcome.status).toBe('skipped');
    expect(outcome.reason).toBe('Gate monocytes not found in gates.yaml');
  });

  it('should pass through relations it does not process', () => {
    const store = new RelationsStore();
    store.addFileRelation('tube.csv', { type: 'instrumentation', location: 'cyto.xml' });

    const [outcome] = run(store).outcomes;

    expect(outcome.status).toBe('completed');
    expect(outcome.messages).toEqual(['Ignoring instrumentation cyto.xml']);
    expect(outcome.outputs.map((p) => p.name)).toEqual(['tube_1']);
  });

  it('should report a data file that cannot be loaded and go on', () => {
    const store = new RelationsStore();
    store.addFileRelation('missing.csv', { type: 'gating', location: 'gates.yaml' });
    store.addFileRelation('tube.csv', { type: 'gating', location: 'gates.yaml', gateId: 'lymph' });

    const result = run(store);

    expect(result.errors.map((e) => [e.location, e.error.message])).toEqual([
      ['missing.csv', 'Unable to load missing.csv: not found'],
    ]);
    expect(result.outcomes).toHaveLength(1);
    expect(result.outcomes[0].location).toBe('tube.csv');
  });

  it('should apply data-set relations instead of the file defaults', () => {
    const source = InMemoryDataSource.panel();
    const [tube] = source.dataFiles.get('tube.csv') ?? [];
    source.dataFiles.set('two.csv', [tube, tube]);

    const store = new RelationsStore();
    store.addFileRelation('two.csv', { type: 'gating', location: 'gates.yaml', gateId: 'lymph' });
    store.addDataSetRelation('two.csv', 2, { type: 'gating', location: 'gates.yaml', gateId: 'fl1pos' });

    const result = run(store, source);

    expect(result.outcomes.map((o) => [o.dataSetNumber, o.outputs.map((p) => p.name)])).toEqual([
      [1, ['tube_1_lymph']],
      [2, ['tube_1_fl1pos']],
    ]);
  });
});

describe('CachingDataSource', () => {
  it('should load each location once', () => {
    const inner = InMemoryDataSource.panel();
    const source = new CachingDataSource(inner);

    source.loadGateSet('gates.yaml');
    source.loadGateSet('gates.yaml');

    expect(inner.calls).toEqual(['gates:gates.yaml']);
  });

  it('should remember failures', () => {
    const inner = InMemoryDataSource.panel();
    const source = new CachingDataSource(inner);

    expect(() => source.loadTransformations('nope.yaml')).toThrow('Unable to load nope.yaml: not found');
    expect(() => source.loadTransformations('nope.yaml')).toThrow('Unable to load nope.yaml: not found');
    expect(inner.calls).toEqual(['transformations:nope.yaml']);
  });

  it('should load again after clear', () => {
    const inner = InMemoryDataSource.panel();
    const source = new CachingDataSource(inner);

    source.loadSpilloverMatrices('comp.json');
    source.clear();
    source.loadSpilloverMatrices('comp.json');

    expect(inner.calls).toEqual(['matrices:comp.json', 'matrices:comp.json']);
  });
});
