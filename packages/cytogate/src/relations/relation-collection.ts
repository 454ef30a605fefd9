/**
 * Relation Collection
 *
 * Immutable list of relations honouring each type's duplicate policy.
 *
 * @module relations/relation-collection
 */

import { DuplicateRelationError } from '../core/errors.js';
import {
  DEFAULT_RELATION_ORDER,
  allowsDuplicates,
  isRelationOfType,
  type Relation,
  type RelationOfType,
  type RelationType,
} from './relation.js';

export class RelationCollection implements Iterable<Relation> {
  static readonly EMPTY = new RelationCollection();

  private readonly relations: readonly Relation[];

  constructor(relations: Iterable<Relation> = []) {
    const list: Relation[] = [];
    for (const relation of relations) {
      if (!admits(list, relation)) {
        throw new DuplicateRelationError(relation.type);
      }
      list.push(relation);
    }
    this.relations = Object.freeze(list);
  }

  get size(): number {
    return this.relations.length;
  }

  isEmpty(): boolean {
    return this.relations.length === 0;
  }

  /**
   * False when `relation`'s type forbids duplicates and one is present
   */
  canAdd(relation: Relation): boolean {
    return admits(this.relations, relation);
  }

  /**
   * Collection with `relation` appended
   *
   * @throws DuplicateRelationError when canAdd is false
   */
  with(relation: Relation): RelationCollection {
    return new RelationCollection([...this.relations, relation]);
  }

  has(type: RelationType): boolean {
    return this.relations.some((relation) => relation.type === type);
  }

  ofType<T extends RelationType>(type: T): RelationOfType<T>[] {
    return this.relations.filter((relation): relation is RelationOfType<T> => isRelationOfType(relation, type));
  }

  /**
   * This collection plus every relation of `defaults` whose type it does not
   * already contain. A present type overrides all defaults of that type.
   */
  merge(defaults: RelationCollection): RelationCollection {
    const inherited = defaults.relations.filter((relation) => !this.has(relation.type));
    return new RelationCollection([...this.relations, ...inherited]);
  }

  /**
   * Relations sorted by type rank in `order`; types not listed go last.
   * Relations of equal rank keep their relative order.
   */
  inOrder(order: readonly RelationType[] = DEFAULT_RELATION_ORDER): Relation[] {
    const rank = (relation: Relation): number => {
      const index = order.indexOf(relation.type);
      return index < 0 ? order.length : index;
    };
    return [...this.relations].sort((a, b) => rank(a) - rank(b));
  }

  toArray(): readonly Relation[] {
    return this.relations;
  }

  [Symbol.iterator](): Iterator<Relation> {
    return this.relations[Symbol.iterator]();
  }
}

function admits(relations: readonly Relation[], relation: Relation): boolean {
  if (allowsDuplicates(relation.type)) return true;
  return !relations.some((existing) => existing.type === relation.type);
}
