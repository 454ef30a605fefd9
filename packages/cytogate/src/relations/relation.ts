/**
 * Relations
 *
 * Typed associations between a data file (or one data set inside it) and the
 * external information used to process it.
 *
 * @module relations/relation
 */

export interface GatingRelation {
  readonly type: 'gating';
  readonly location: string;
  /** Apply only this gate instead of the whole gate set */
  readonly gateId?: string;
}

export interface CompensationRelation {
  readonly type: 'compensation';
  readonly location: string;
  readonly matrixId?: string;
}

export interface TransformationRelation {
  readonly type: 'transformation';
  readonly location: string;
}

export interface ExperimentDescriptionRelation {
  readonly type: 'experiment-description';
  readonly location: string;
}

export interface InstrumentationRelation {
  readonly type: 'instrumentation';
  readonly location: string;
}

export interface UnknownRelation {
  readonly type: 'unknown';
  readonly identifier: string;
  readonly value: string;
}

export type Relation =
  | GatingRelation
  | CompensationRelation
  | TransformationRelation
  | ExperimentDescriptionRelation
  | InstrumentationRelation
  | UnknownRelation;

export type RelationType = Relation['type'];

export type RelationOfType<T extends RelationType> = Extract<Relation, { type: T }>;

/**
 * Whether several relations of a type may apply to the same file or data set
 */
export const DUPLICATES_ALLOWED: Readonly<Record<RelationType, boolean>> = {
  gating: true,
  compensation: false,
  transformation: true,
  'experiment-description': false,
  instrumentation: false,
  unknown: true,
};

/**
 * Processing order: compensate, then transform, then gate
 */
export const DEFAULT_RELATION_ORDER: readonly RelationType[] = [
  'compensation',
  'transformation',
  'gating',
  'experiment-description',
  'instrumentation',
  'unknown',
];

export function allowsDuplicates(type: RelationType): boolean {
  return DUPLICATES_ALLOWED[type];
}

export function isRelationOfType<T extends RelationType>(relation: Relation, type: T): relation is RelationOfType<T> {
  return relation.type === type;
}

/**
 * Human-readable one-line description
 */
export function describeRelation(relation: Relation): string {
  switch (relation.type) {
    case 'gating':
      return relation.gateId === undefined
        ? `gating ${relation.location}`
        : `gating ${relation.location} (gate ${relation.gateId})`;
    case 'compensation':
      return relation.matrixId === undefined
        ? `compensation ${relation.location}`
        : `compensation ${relation.location} (matrix ${relation.matrixId})`;
    case 'transformation':
      return `transformation ${relation.location}`;
    case 'experiment-description':
      return `experiment description ${relation.location}`;
    case 'instrumentation':
      return `instrumentation ${relation.location}`;
    case 'unknown':
      return `unknown ${relation.identifier}=${relation.value}`;
  }
}
