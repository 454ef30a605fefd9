/**
 * Gate Evaluation
 *
 * Compiles a gate into a per-event predicate and filters a population with
 * it. Parameter references are resolved once per evaluation, except in
 * decision trees, which resolve a node's parameter when an event reaches it.
 * Proxies are looked up in the supplied gate lookup at compile time.
 *
 * FAILURE POLICY: any error raised while compiling or testing an event
 * aborts the whole gate. No partial result is returned.
 *
 * @module gating/evaluate
 */

import { DEFAULT_ENGINE_CONFIG, appendName, type EngineConfig } from '../core/config.js';
import { InvalidGateDescriptionError, NoSuchGateError } from '../core/errors.js';
import { invert } from '../core/utils/matrix.js';
import type { FlowEvent } from '../data/flow-event.js';
import type { Parameter } from '../data/parameter.js';
import { derivePopulation, type Population } from '../data/population.js';
import type { ReferenceResolver } from '../data/reference-resolver.js';
import {
  isDecisionLeaf,
  type DecisionNode,
  type Gate,
  type GateLookup,
} from './gate.js';
import {
  containsPoint2D,
  convexHull2D,
  euclideanDistance,
  inConvexHull,
  mahalanobisSquared,
  toPolygonFeature,
} from './geometry.js';

export type EventPredicate = (event: FlowEvent) => boolean;

export interface EvaluationContext {
  readonly resolver: ReferenceResolver;
  /** Where proxy gates are looked up; proxies fail without one */
  readonly gates?: GateLookup;
  readonly config?: EngineConfig;
}

const NO_GATES: GateLookup = { get: () => undefined };

/**
 * Events of `population` inside `gate`, as a child population named
 * `<population>_<gate id>`
 */
export function evaluateGate(
  gate: Gate,
  population: Population,
  context: Partial<EvaluationContext> = {}
): Population {
  const resolver = context.resolver ?? population.resolver;
  const config = context.config ?? DEFAULT_ENGINE_CONFIG;
  const predicate = compileGate(gate, { resolver, gates: context.gates, config });
  const inside = population.events.filter(predicate);
  return derivePopulation(population, appendName(population.name, gate.id, config), inside, resolver);
}

/**
 * Build the membership predicate of `gate`
 */
export function compileGate(gate: Gate, context: EvaluationContext): EventPredicate {
  return compile(gate, context, gate.kind === 'proxy' ? [] : [gate.id]);
}

function compile(gate: Gate, context: EvaluationContext, resolving: readonly string[]): EventPredicate {
  const { resolver } = context;

  switch (gate.kind) {
    case 'rectangle': {
      const parameters = resolveAll(gate.dimensions, resolver);
      const ranges = gate.ranges.map(({ min, max }) => ({
        min: min ?? Number.NEGATIVE_INFINITY,
        max: max ?? Number.POSITIVE_INFINITY,
      }));
      return (event) =>
        parameters.every((parameter, i) => {
          const value = resolver.value(parameter, event);
          return value >= ranges[i].min && value < ranges[i].max;
        });
    }

    case 'polygon': {
      const [x, y] = resolveAll(gate.dimensions, resolver);
      const region = toPolygonFeature(gate.vertices);
      return (event) => containsPoint2D(region, resolver.value(x, event), resolver.value(y, event));
    }

    case 'polytope': {
      const parameters = resolveAll(gate.dimensions, resolver);
      if (parameters.length === 2) {
        const hull = convexHull2D(gate.vertices);
        if (!hull) {
          throw new InvalidGateDescriptionError(gate.id, 'polytope vertices are collinear');
        }
        const [x, y] = parameters;
        return (event) => containsPoint2D(hull, resolver.value(x, event), resolver.value(y, event));
      }
      const tolerance = (context.config ?? DEFAULT_ENGINE_CONFIG).polytopeTolerance;
      return (event) =>
        inConvexHull(
          parameters.map((parameter) => resolver.value(parameter, event)),
          gate.vertices,
          tolerance
        );
    }

    case 'ellipsoid': {
      const parameters = resolveAll(gate.dimensions, resolver);
      const coordinates = (event: FlowEvent): number[] =>
        parameters.map((parameter) => resolver.value(parameter, event));
      const { shape } = gate;

      if (shape.form === 'foci') {
        const [first, second] = shape.foci;
        return (event) => {
          const point = coordinates(event);
          return euclideanDistance(point, first) + euclideanDistance(point, second) <= shape.distance;
        };
      }

      const inverse = invert(shape.covariance);
      if (!inverse) {
        throw new InvalidGateDescriptionError(gate.id, 'covariance matrix is singular');
      }
      return (event) => mahalanobisSquared(coordinates(event), shape.mean, inverse) <= shape.distanceSquare;
    }

    case 'decision-tree': {
      return (event) => walkTree(gate.root, resolver, event);
    }

    case 'and': {
      const predicates = gate.operands.map((operand) => compile(operand, context, resolving));
      return (event) => predicates.every((predicate) => predicate(event));
    }

    case 'or': {
      const predicates = gate.operands.map((operand) => compile(operand, context, resolving));
      return (event) => predicates.some((predicate) => predicate(event));
    }

    case 'not': {
      const predicate = compile(gate.operand, context, resolving);
      return (event) => !predicate(event);
    }

    case 'proxy': {
      if (resolving.includes(gate.id)) {
        const path = [...resolving.slice(resolving.indexOf(gate.id)), gate.id];
        throw new InvalidGateDescriptionError(gate.id, `Gate dependency cycle found: ${path.join(' -> ')}`);
      }
      const target = (context.gates ?? NO_GATES).get(gate.id);
      if (!target) {
        throw new NoSuchGateError([gate.id]);
      }
      return compile(target, context, [...resolving, gate.id]);
    }
  }
}

function resolveAll(references: readonly string[], resolver: ReferenceResolver): Parameter[] {
  return references.map((reference) => resolver.resolve(reference));
}

/**
 * Only the nodes an event reaches resolve their parameter
 */
function walkTree(root: DecisionNode, resolver: ReferenceResolver, event: FlowEvent): boolean {
  let node = root;
  while (!isDecisionLeaf(node)) {
    const value = resolver.value(resolver.resolve(node.parameter), event);
    node = value >= node.threshold ? node.greaterOrEqual : node.lessThan;
  }
  return node.inside;
}
