/**
 * File Data Source Unit Tests
 *
 * Reads the documents under __tests__/fixtures and checks that invalid
 * documents surface every issue with its path.
 */

import { describe, it, expect } from 'vitest';
import { fileURLToPath } from 'node:url';

import { DataSourceError, DescriptorValidationError } from '../../../core/errors.js';
import { parseEventCsv } from '../../../io/csv.js';
import { FileDataSource } from '../../../io/file-data-source.js';
import { parseDocumentText } from '../../../io/read-document.js';
import { CachingDataSource } from '../../../pipeline/data-source.js';
import { runPipeline } from '../../../pipeline/pipeline.js';
import { RelationsStore } from '../../../relations/relations-store.js';
import { quietLogger } from '../../helpers/populations.js';

const FIXTURES = fileURLToPath(new URL('../../fixtures/', import.meta.url));

function captureError(action: () => unknown): unknown {
  try {
    action();
  } catch (error) {
    return error;
  }
  throw new Error('expected action to throw');
}

describe('parseEventCsv', () => {
  it('should skip comments and blank lines', () => {
    const table = parseEventCsv('# header follows\nA, B\n\n1,2\n 3 , 4 \n', 'inline.csv');

    expect(table.parameters).toEqual(['A', 'B']);
    expect(table.rows).toEqual([
      [1, 2],
      [3, 4],
    ]);
  });

  it('should report every malformed row', () => {
    const error = captureError(() => parseEventCsv('A,B\n1\n1,x\n1,2', 'bad.csv'));

    expect(error).toBeInstanceOf(DescriptorValidationError);
    if (error instanceof DescriptorValidationError) {
      expect(error.issues).toEqual(['row 2: expected 2 values, got 1', 'row 3: B is not a number']);
    }
  });

  it('should require a header row', () => {
    expect(() => parseEventCsv('# only a comment\n', 'empty.csv')).toThrow(
      'Invalid descriptor document empty.csv: <root>: missing header row'
    );
  });
});

describe('parseDocumentText', () => {
  it('should parse JSON and YAML by extension', () => {
    expect(parseDocumentText('{"a": 1}', 'doc.json')).toEqual({ a: 1 });
    expect(parseDocumentText('a: [1, 2]', 'doc.yaml')).toEqual({ a: [1, 2] });
  });
});

describe('FileDataSource', () => {
  const source = new FileDataSource({ baseDir: FIXTURES, logger: quietLogger });

  it('should load a CSV file as one data set named after the file', () => {
    const file = source.loadDataFile('events.csv');

    expect(file.dataSets).toHaveLength(1);
    const [dataSet] = file.dataSets;
    expect(dataSet.number).toBe(1);
    expect(dataSet.population.name).toBe('events_1');
    expect(dataSet.population.events).toHaveLength(4);
    expect(dataSet.population.resolver.value('FL2', dataSet.population.events[3])).toBe(6);
  });

  it('should number and name data sets of an event document', () => {
    const file = source.loadDataFile('events.yaml');

    expect(file.dataSets.map((d) => [d.number, d.population.name, d.population.events.length])).toEqual([
      [1, 'unstained', 2],
      [5, 'events_5', 1],
    ]);
  });

  it('should load gate sets', () => {
    expect(source.loadGateSet('gates.yaml').ids()).toEqual(['lymph', 'fl1pos', 'lymphFl1', 'ratio']);
  });

  it('should load spillover matrices', () => {
    const matrices = source.loadSpilloverMatrices('compensation.json');

    expect(matrices.ids()).toEqual(['panel']);
    expect(matrices.get('panel')?.spillover('FL2', 'FL1')).toBe(0.2);
  });

  it('should load transformations with their labels', () => {
    const collection = source.loadTransformations('transformations.yaml');

    expect(collection.references()).toEqual(['FL1/FL2', 'logFSC']);
    expect(collection.get('logFSC')?.label).toBe('log10 FSC');
  });

  it('should list every schema issue of an invalid document', () => {
    const error = captureError(() => source.loadGateSet('invalid-gates.yaml'));

    expect(error).toBeInstanceOf(DescriptorValidationError);
    if (error instanceof DescriptorValidationError) {
      expect(error.location).toBe('invalid-gates.yaml');
      expect(error.issues).toHaveLength(2);
      expect(error.issues[0]).toBe('gates.0.dimensions.0.min: Expected number, received string');
      expect(error.issues[1].startsWith('gates.1.kind: ')).toBe(true);
    }
  });

  it('should wrap a missing file in DataSourceError', () => {
    const error = captureError(() => source.loadGateSet('absent.yaml'));

    expect(error).toBeInstanceOf(DataSourceError);
    if (error instanceof DataSourceError) {
      expect(error.location).toBe(source.resolvePath('absent.yaml'));
    }
  });

  it('should run the pipeline over fixture files', () => {
    const store = new RelationsStore();
    store.addFileRelation('events.csv', { type: 'compensation', location: 'compensation.json', matrixId: 'panel' });
    store.addFileRelation('events.csv', { type: 'transformation', location: 'transformations.yaml' });
    store.addFileRelation('events.csv', { type: 'gating', location: 'gates.yaml', gateId: 'ratio' });

    const result = runPipeline(store, { source: new CachingDataSource(source), logger: quietLogger });

    expect(result.outcomes[0].outputs.map((p) => [p.name, p.events.length])).toEqual([
      ['events_1_comp_trans_ratio', 4],
    ]);
  });
});
