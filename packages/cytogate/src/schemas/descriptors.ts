/**
 * Descriptor document schemas
 *
 * Zod schemas for the JSON/YAML documents the file data source reads: gate
 * sets, spillover matrices, transformations, relation manifests and event
 * tables. Parsed documents are handed to the engine unchanged.
 *
 * @module schemas/descriptors
 */

import { z } from 'zod';

import { DescriptorValidationError } from '../core/errors.js';
import type { DecisionNodeDescriptor } from '../gating/descriptors.js';

const FiniteNumber = z.number().finite();
const Reference = z.string();
const Vector = z.array(FiniteNumber);

// ============================================================================
// Gates
// ============================================================================

const RectangleGateSchema = z.object({
  kind: z.literal('rectangle'),
  id: z.string().min(1),
  dimensions: z
    .array(
      z.object({
        parameter: Reference,
        min: z.number().optional(),
        max: z.number().optional(),
      })
    )
    .min(1, 'rectangle gates need at least one dimension'),
});

const PolygonGateSchema = z.object({
  kind: z.literal('polygon'),
  id: z.string().min(1),
  dimensions: z.array(Reference),
  vertices: z.array(Vector),
});

const PolytopeGateSchema = z.object({
  kind: z.literal('polytope'),
  id: z.string().min(1),
  dimensions: z.array(Reference),
  vertices: z.array(Vector),
});

const EllipsoidShapeSchema = z.discriminatedUnion('form', [
  z.object({
    form: z.literal('foci'),
    foci: z.array(Vector),
    distance: FiniteNumber,
  }),
  z.object({
    form: z.literal('covariance'),
    mean: Vector,
    covariance: z.array(Vector),
    distanceSquare: FiniteNumber,
  }),
]);

const EllipsoidGateSchema = z.object({
  kind: z.literal('ellipsoid'),
  id: z.string().min(1),
  dimensions: z.array(Reference),
  shape: EllipsoidShapeSchema,
});

const DecisionNodeSchema: z.ZodType<DecisionNodeDescriptor> = z.lazy(() =>
  z.union([
    z.object({ inside: z.boolean() }),
    z.object({
      parameter: Reference,
      threshold: FiniteNumber,
      greaterOrEqual: DecisionNodeSchema,
      lessThan: DecisionNodeSchema,
    }),
  ])
);

const DecisionTreeGateSchema = z.object({
  kind: z.literal('decision-tree'),
  id: z.string().min(1),
  root: DecisionNodeSchema,
});

const booleanGateSchema = <K extends 'and' | 'or' | 'not'>(kind: K) =>
  z.object({
    kind: z.literal(kind),
    id: z.string().min(1),
    operands: z.array(z.string().min(1)),
  });

export const GateDescriptorSchema = z.discriminatedUnion('kind', [
  RectangleGateSchema,
  PolygonGateSchema,
  PolytopeGateSchema,
  EllipsoidGateSchema,
  DecisionTreeGateSchema,
  booleanGateSchema('and'),
  booleanGateSchema('or'),
  booleanGateSchema('not'),
]);

export const GateDocumentSchema = z.object({
  gates: z.array(GateDescriptorSchema),
});

export type GateDocument = z.infer<typeof GateDocumentSchema>;

// ============================================================================
// Compensation
// ============================================================================

export const SpilloverMatrixSchema = z.object({
  id: z.string().min(1),
  spillover: z.array(
    z.object({
      from: Reference.min(1),
      to: Reference.min(1),
      value: FiniteNumber,
    })
  ),
});

export const CompensationDocumentSchema = z.object({
  matrices: z.array(SpilloverMatrixSchema),
});

export type CompensationDocument = z.infer<typeof CompensationDocumentSchema>;

// ============================================================================
// Transformations
// ============================================================================

const transformationBase = {
  id: Reference,
  label: z.string().optional(),
  parameter: Reference.min(1),
};

export const TransformationDescriptorSchema = z.discriminatedUnion('kind', [
  z.object({ kind: z.literal('linear'), ...transformationBase, a: FiniteNumber, b: FiniteNumber }),
  z.object({
    kind: z.literal('quadratic'),
    ...transformationBase,
    a: FiniteNumber,
    b: FiniteNumber,
    c: FiniteNumber,
  }),
  z.object({ kind: z.literal('ln'), ...transformationBase, r: FiniteNumber, d: FiniteNumber }),
  z.object({
    kind: z.literal('log'),
    ...transformationBase,
    r: FiniteNumber,
    d: FiniteNumber,
    base: FiniteNumber,
  }),
  z.object({
    kind: z.literal('ratio'),
    id: Reference,
    label: z.string().optional(),
    numerator: Reference.min(1),
    denominator: Reference.min(1),
  }),
]);

export const TransformationDocumentSchema = z.object({
  transformations: z.array(TransformationDescriptorSchema),
});

export type TransformationDocument = z.infer<typeof TransformationDocumentSchema>;

// ============================================================================
// Relations
// ============================================================================

export const RelationSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('gating'), location: z.string().min(1), gateId: z.string().min(1).optional() }),
  z.object({ type: z.literal('compensation'), location: z.string().min(1), matrixId: z.string().min(1).optional() }),
  z.object({ type: z.literal('transformation'), location: z.string().min(1) }),
  z.object({ type: z.literal('experiment-description'), location: z.string().min(1) }),
  z.object({ type: z.literal('instrumentation'), location: z.string().min(1) }),
  z.object({ type: z.literal('unknown'), identifier: z.string(), value: z.string() }),
]);

export const RelationManifestSchema = z.object({
  version: z.literal(1).default(1),
  files: z.array(
    z.object({
      location: z.string().min(1),
      relations: z.array(RelationSchema).default([]),
      dataSets: z
        .array(
          z.object({
            number: z.number().int().positive(),
            relations: z.array(RelationSchema),
          })
        )
        .default([]),
    })
  ),
});

export type RelationManifest = z.infer<typeof RelationManifestSchema>;

// ============================================================================
// Events
// ============================================================================

export const EventDataSetSchema = z
  .object({
    number: z.number().int().positive().optional(),
    name: z.string().optional(),
    parameters: z.array(Reference).min(1),
    events: z.array(Vector),
  })
  .superRefine((dataSet, ctx) => {
    dataSet.events.forEach((row, i) => {
      if (row.length !== dataSet.parameters.length) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['events', i],
          message: `expected ${dataSet.parameters.length} values, got ${row.length}`,
        });
      }
    });
  });

export const EventDocumentSchema = z.object({
  dataSets: z.array(EventDataSetSchema).min(1),
});

export type EventDocument = z.infer<typeof EventDocumentSchema>;

// ============================================================================
// Parsing
// ============================================================================

/**
 * Validate `value` against `schema`
 *
 * @throws DescriptorValidationError listing every issue with its path
 */
export function parseDocument<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, value: unknown, location: string): T {
  const result = schema.safeParse(value);
  if (!result.success) {
    throw new DescriptorValidationError(
      location,
      result.error.issues.map((issue) => `${issue.path.length > 0 ? issue.path.join('.') : '<root>'}: ${issue.message}`)
    );
  }
  return result.data;
}
