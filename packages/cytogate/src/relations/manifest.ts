/**
 * Relation manifests
 *
 * Fills a relations store from a validated manifest document. Locations in
 * the manifest (data files and the files relations point to) can be mapped,
 * e.g. to resolve them against the manifest's directory.
 *
 * @module relations/manifest
 */

import type { RelationManifest } from '../schemas/descriptors.js';
import type { Relation } from './relation.js';
import { RelationsStore } from './relations-store.js';

export type LocationMapper = (location: string) => string;

const identity: LocationMapper = (location) => location;

export function storeFromManifest(
  manifest: RelationManifest,
  mapLocation: LocationMapper = identity,
  store: RelationsStore = new RelationsStore()
): RelationsStore {
  for (const file of manifest.files) {
    const location = mapLocation(file.location);
    for (const relation of file.relations) {
      store.addFileRelation(location, mapRelation(relation, mapLocation));
    }
    for (const dataSet of file.dataSets) {
      for (const relation of dataSet.relations) {
        store.addDataSetRelation(location, dataSet.number, mapRelation(relation, mapLocation));
      }
    }
  }
  return store;
}

function mapRelation(relation: Relation, mapLocation: LocationMapper): Relation {
  switch (relation.type) {
    case 'unknown':
      return relation;
    case 'gating':
    case 'compensation':
    case 'transformation':
    case 'experiment-description':
    case 'instrumentation':
      return { ...relation, location: mapLocation(relation.location) };
  }
}
