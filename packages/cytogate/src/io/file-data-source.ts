/**
 * File-backed data source
 *
 * Reads event tables (.csv, or JSON/YAML event documents) and descriptor
 * documents from disk. Relative locations resolve against `baseDir`.
 *
 * @module io/file-data-source
 */

import { basename, extname, resolve } from 'node:path';

import { SpilloverMatrix, SpilloverMatrixSet } from '../compensation/spillover-matrix.js';
import { DataSourceError, isCytogateError } from '../core/errors.js';
import { createLogger, type Logger } from '../core/utils/logger.js';
import { populationFromRows } from '../data/population.js';
import { GateSet } from '../gating/gate-set.js';
import type { DataSource, LoadedDataFile } from '../pipeline/data-source.js';
import {
  CompensationDocumentSchema,
  EventDocumentSchema,
  GateDocumentSchema,
  TransformationDocumentSchema,
  parseDocument,
} from '../schemas/descriptors.js';
import { TransformationCollection } from '../transformation/transformation.js';
import { parseEventCsv } from './csv.js';
import { readDocument, readText } from './read-document.js';

export interface FileDataSourceOptions {
  readonly baseDir?: string;
  readonly logger?: Logger;
}

export class FileDataSource implements DataSource {
  private readonly baseDir: string;
  private readonly logger: Logger;

  constructor(options: FileDataSourceOptions = {}) {
    this.baseDir = options.baseDir ?? process.cwd();
    this.logger = options.logger ?? createLogger({ module: 'file-data-source' });
  }

  resolvePath(location: string): string {
    return resolve(this.baseDir, location);
  }

  loadDataFile(location: string): LoadedDataFile {
    const path = this.resolvePath(location);
    const stem = basename(path, extname(path));
    this.logger.debug('Loading data file', { location, path });

    return this.wrap(location, () => {
      if (extname(path).toLowerCase() === '.csv') {
        const table = parseEventCsv(readText(path), location);
        return {
          location,
          dataSets: [{ number: 1, population: populationFromRows(`${stem}_1`, table.parameters, table.rows) }],
        };
      }

      const document = parseDocument(EventDocumentSchema, readDocument(path), location);
      return {
        location,
        dataSets: document.dataSets.map((dataSet, i) => {
          const number = dataSet.number ?? i + 1;
          return {
            number,
            population: populationFromRows(dataSet.name ?? `${stem}_${number}`, dataSet.parameters, dataSet.events),
          };
        }),
      };
    });
  }

  loadGateSet(location: string): GateSet {
    return this.wrap(location, () => {
      const document = parseDocument(GateDocumentSchema, readDocument(this.resolvePath(location)), location);
      return GateSet.fromDescriptors(document.gates);
    });
  }

  loadSpilloverMatrices(location: string): SpilloverMatrixSet {
    return this.wrap(location, () => {
      const document = parseDocument(CompensationDocumentSchema, readDocument(this.resolvePath(location)), location);
      return new SpilloverMatrixSet(document.matrices.map((m) => new SpilloverMatrix(m.id, m.spillover)));
    });
  }

  loadTransformations(location: string): TransformationCollection {
    return this.wrap(location, () => {
      const document = parseDocument(
        TransformationDocumentSchema,
        readDocument(this.resolvePath(location)),
        location
      );
      return TransformationCollection.fromDescriptors(document.transformations);
    });
  }

  /**
   * Engine errors pass through; anything else becomes a DataSourceError
   */
  private wrap<T>(location: string, load: () => T): T {
    try {
      return load();
    } catch (error) {
      if (isCytogateError(error)) throw error;
      throw new DataSourceError(location, error);
    }
  }
}
