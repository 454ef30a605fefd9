/**
 * Data source boundary
 *
 * Everything the pipeline needs from the outside world, addressed by
 * location. The caching wrapper loads each location at most once and
 * remembers failures, so a broken file is reported once per run.
 *
 * @module pipeline/data-source
 */

import type { SpilloverMatrixSet } from '../compensation/spillover-matrix.js';
import type { Population } from '../data/population.js';
import type { GateSet } from '../gating/gate-set.js';
import type { TransformationCollection } from '../transformation/transformation.js';

export interface LoadedDataSet {
  /** 1-based position of the data set in its file */
  readonly number: number;
  readonly population: Population;
}

export interface LoadedDataFile {
  readonly location: string;
  readonly dataSets: readonly LoadedDataSet[];
}

export interface DataSource {
  loadDataFile(location: string): LoadedDataFile;
  loadGateSet(location: string): GateSet;
  loadSpilloverMatrices(location: string): SpilloverMatrixSet;
  loadTransformations(location: string): TransformationCollection;
}

type Outcome<T> = { readonly ok: true; readonly value: T } | { readonly ok: false; readonly error: unknown };

class Memo<T> {
  private readonly entries = new Map<string, Outcome<T>>();

  get(location: string, load: (location: string) => T): T {
    let outcome = this.entries.get(location);
    if (!outcome) {
      try {
        outcome = { ok: true, value: load(location) };
      } catch (error) {
        outcome = { ok: false, error };
      }
      this.entries.set(location, outcome);
    }
    if (!outcome.ok) throw outcome.error;
    return outcome.value;
  }

  clear(): void {
    this.entries.clear();
  }
}

export class CachingDataSource implements DataSource {
  private readonly dataFiles = new Memo<LoadedDataFile>();
  private readonly gateSets = new Memo<GateSet>();
  private readonly matrices = new Memo<SpilloverMatrixSet>();
  private readonly transformations = new Memo<TransformationCollection>();

  constructor(private readonly inner: DataSource) {}

  loadDataFile(location: string): LoadedDataFile {
    return this.dataFiles.get(location, (l) => this.inner.loadDataFile(l));
  }

  loadGateSet(location: string): GateSet {
    return this.gateSets.get(location, (l) => this.inner.loadGateSet(l));
  }

  loadSpilloverMatrices(location: string): SpilloverMatrixSet {
    return this.matrices.get(location, (l) => this.inner.loadSpilloverMatrices(l));
  }

  loadTransformations(location: string): TransformationCollection {
    return this.transformations.get(location, (l) => this.inner.loadTransformations(l));
  }

  clear(): void {
    this.dataFiles.clear();
    this.gateSets.clear();
    this.matrices.clear();
    this.transformations.clear();
  }
}
