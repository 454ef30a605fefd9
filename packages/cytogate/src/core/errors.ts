/**
 * Cytogate Error Types
 *
 * Every failure the engine reports is a CytogateError carrying a stable
 * `code` plus the offending reference, gate id, relation or cycle path, so
 * callers can render it without re-deriving context.
 *
 * PROPAGATION:
 * - Resolver construction errors (duplicate reference, circular dependency)
 *   abort the analysis of one population
 * - Gate evaluation errors are recorded per gate
 * - Relation duplicate errors abort only the offending add call
 */

import type { Parameter, ParameterReference } from '../data/parameter.js';

export type CytogateErrorCode =
  | 'DUPLICATE_REFERENCE'
  | 'CIRCULAR_DEPENDENCY'
  | 'DATA_RETRIEVAL'
  | 'NO_SUCH_PARAMETER'
  | 'NO_SUCH_GATE'
  | 'INVALID_GATE_DESCRIPTION'
  | 'DUPLICATE_RELATION'
  | 'DUPLICATE_GATE_ID'
  | 'INVALID_COMPENSATION_MATRIX'
  | 'INVALID_TRANSFORMATION'
  | 'DESCRIPTOR_VALIDATION'
  | 'DATA_SOURCE';

/**
 * Base class for all engine errors
 */
export class CytogateError extends Error {
  constructor(
    message: string,
    public readonly code: CytogateErrorCode,
    options?: ErrorOptions
  ) {
    super(message, options);
    this.name = 'CytogateError';

    // Maintain proper stack trace for where error was thrown (V8 only)
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target);
    }
  }

  /**
   * Single-line rendering for log output
   */
  toLogString(): string {
    return `[${this.code}] ${this.name}: ${this.message}`;
  }
}

// ============================================================================
// Reference Resolution
// ============================================================================

/**
 * A non-sentinel reference is defined by more than one contributing collection
 */
export class DuplicateReferenceError extends CytogateError {
  constructor(public readonly references: readonly ParameterReference[]) {
    super(`Duplicate parameter reference: ${references.join(', ')}`, 'DUPLICATE_REFERENCE');
    this.name = 'DuplicateReferenceError';
  }

  /** First duplicated reference */
  get reference(): ParameterReference {
    return this.references[0] ?? '';
  }
}

/**
 * A parameter transitively depends on itself.
 *
 * `cycle` starts and ends with the same parameter, e.g. `[P, P]` for a
 * parameter that depends on its own reference.
 */
export class CircularDependencyError extends CytogateError {
  constructor(public readonly cycle: readonly Parameter[]) {
    super(`Circular parameter dependency: ${formatCycle(cycle)}`, 'CIRCULAR_DEPENDENCY');
    this.name = 'CircularDependencyError';
  }
}

function formatCycle(cycle: readonly Parameter[]): string {
  return cycle.map((p) => (p.reference === '' ? `<${p.label}>` : p.reference)).join(' -> ');
}

/**
 * A value could not be extracted from an event
 */
export class DataRetrievalError extends CytogateError {
  constructor(
    message: string,
    options?: ErrorOptions,
    code: CytogateErrorCode = 'DATA_RETRIEVAL'
  ) {
    super(message, code, options);
    this.name = 'DataRetrievalError';
  }
}

export class NoSuchParameterError extends DataRetrievalError {
  constructor(public readonly reference: ParameterReference) {
    super(`No such parameter: ${reference === '' ? '<unreferenceable>' : reference}`, undefined, 'NO_SUCH_PARAMETER');
    this.name = 'NoSuchParameterError';
  }
}

// ============================================================================
// Gates
// ============================================================================

/**
 * One or more gate ids could not be found in a gate set
 */
export class NoSuchGateError extends CytogateError {
  constructor(public readonly gateIds: readonly string[]) {
    super(`No such gate: ${gateIds.join(', ')}`, 'NO_SUCH_GATE');
    this.name = 'NoSuchGateError';
  }
}

/**
 * A gate descriptor violates a domain rule
 */
export class InvalidGateDescriptionError extends CytogateError {
  constructor(
    public readonly gateId: string,
    public readonly reason: string
  ) {
    super(`Invalid gate "${gateId}": ${reason}`, 'INVALID_GATE_DESCRIPTION');
    this.name = 'InvalidGateDescriptionError';
  }
}

export class DuplicateGateIdError extends CytogateError {
  constructor(public readonly gateId: string) {
    super(`Duplicate gate id: ${gateId}`, 'DUPLICATE_GATE_ID');
    this.name = 'DuplicateGateIdError';
  }
}

// ============================================================================
// Relations
// ============================================================================

export class DuplicateRelationError extends CytogateError {
  constructor(
    public readonly relationType: string,
    public readonly location?: string,
    public readonly dataSetNumber?: number
  ) {
    const scope =
      location === undefined
        ? ''
        : dataSetNumber === undefined
          ? ` for ${location}`
          : ` for ${location} data set ${dataSetNumber}`;
    super(`Duplicate ${relationType} relation${scope}`, 'DUPLICATE_RELATION');
    this.name = 'DuplicateRelationError';
  }
}

// ============================================================================
// Compensation, Transformation and Descriptor Loading
// ============================================================================

export class InvalidCompensationMatrixError extends CytogateError {
  constructor(
    public readonly matrixId: string,
    reason: string
  ) {
    super(`Invalid compensation matrix "${matrixId}": ${reason}`, 'INVALID_COMPENSATION_MATRIX');
    this.name = 'InvalidCompensationMatrixError';
  }
}

export class InvalidTransformationError extends CytogateError {
  constructor(
    public readonly reference: ParameterReference,
    reason: string
  ) {
    super(`Invalid transformation "${reference}": ${reason}`, 'INVALID_TRANSFORMATION');
    this.name = 'InvalidTransformationError';
  }
}

export class DescriptorValidationError extends CytogateError {
  constructor(
    public readonly location: string,
    public readonly issues: readonly string[]
  ) {
    super(`Invalid descriptor document ${location}: ${issues.join('; ')}`, 'DESCRIPTOR_VALIDATION');
    this.name = 'DescriptorValidationError';
  }
}

/**
 * A data source could not load the file at `location`
 */
export class DataSourceError extends CytogateError {
  constructor(
    public readonly location: string,
    cause: unknown
  ) {
    super(`Unable to load ${location}: ${errorMessage(cause)}`, 'DATA_SOURCE', { cause });
    this.name = 'DataSourceError';
  }
}

// ============================================================================
// Helpers
// ============================================================================

export function isCytogateError(error: unknown): error is CytogateError {
  return error instanceof CytogateError;
}

export function isDataRetrievalError(error: unknown): error is DataRetrievalError {
  return error instanceof DataRetrievalError;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Log form of a thrown value: engine errors with their code, others by message
 */
export function describeError(error: unknown): string {
  return isCytogateError(error) ? error.toLogString() : errorMessage(error);
}

/**
 * Normalize a thrown value into an Error instance
 */
export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}
