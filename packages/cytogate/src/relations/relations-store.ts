/**
 * Relations Store
 *
 * File-level relations act as defaults for every data set in a file. Once a
 * data set has relations of its own, those replace the file-level relations
 * of the same type outright, even for types that allow duplicates; other
 * types are still inherited from the file.
 *
 * @module relations/relations-store
 */

import { DuplicateRelationError } from '../core/errors.js';
import { RelationCollection } from './relation-collection.js';
import type { Relation } from './relation.js';

export class RelationsStore {
  private readonly fileRelations = new Map<string, RelationCollection>();
  private readonly dataSetRelations = new Map<string, Map<number, RelationCollection>>();

  /**
   * @throws DuplicateRelationError leaving the store unchanged
   */
  addFileRelation(location: string, relation: Relation): void {
    const current = this.fileRelations.get(location) ?? RelationCollection.EMPTY;
    if (!current.canAdd(relation)) {
      throw new DuplicateRelationError(relation.type, location);
    }
    this.fileRelations.set(location, current.with(relation));
  }

  /**
   * @throws DuplicateRelationError leaving the store unchanged
   */
  addDataSetRelation(location: string, dataSetNumber: number, relation: Relation): void {
    const byNumber = this.dataSetRelations.get(location) ?? new Map<number, RelationCollection>();
    const current = byNumber.get(dataSetNumber) ?? RelationCollection.EMPTY;
    if (!current.canAdd(relation)) {
      throw new DuplicateRelationError(relation.type, location, dataSetNumber);
    }
    byNumber.set(dataSetNumber, current.with(relation));
    this.dataSetRelations.set(location, byNumber);
  }

  /**
   * Relations that apply to data set `dataSetNumber` of `location`
   */
  relationsFor(location: string, dataSetNumber: number): RelationCollection {
    const fileLevel = this.fileRelationsFor(location);
    const specific = this.dataSetRelations.get(location)?.get(dataSetNumber);
    return specific ? specific.merge(fileLevel) : fileLevel;
  }

  fileRelationsFor(location: string): RelationCollection {
    return this.fileRelations.get(location) ?? RelationCollection.EMPTY;
  }

  /**
   * Every location with file- or data-set-level relations, in insertion order
   */
  locations(): string[] {
    const locations = [...this.fileRelations.keys()];
    for (const location of this.dataSetRelations.keys()) {
      if (!locations.includes(location)) locations.push(location);
    }
    return locations;
  }

  /** Data sets of `location` that carry their own relations */
  dataSetNumbers(location: string): number[] {
    return [...(this.dataSetRelations.get(location)?.keys() ?? [])].sort((a, b) => a - b);
  }
}
