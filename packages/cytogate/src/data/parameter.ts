/**
 * Parameters
 *
 * A Parameter extracts one scalar from an event, either directly from a
 * measured channel or derived from other parameters it names as
 * dependencies. Parameters are compared by identity, not by reference name.
 *
 * @module data/parameter
 */

import type { FlowEvent } from './flow-event.js';

/**
 * Symbolic name used to look a parameter up
 */
export type ParameterReference = string;

/**
 * Reserved reference for parameters that cannot be looked up by name
 */
export const UNREFERENCEABLE: ParameterReference = '';

export function isReferenceable(reference: ParameterReference): boolean {
  return reference !== UNREFERENCEABLE;
}

/**
 * What a parameter needs in order to compute values of its dependencies
 */
export interface ValueResolver {
  resolve(reference: ParameterReference): Parameter;
  value(target: ParameterReference | Parameter, event: FlowEvent): number;
}

export interface Parameter {
  readonly reference: ParameterReference;
  readonly label: string;
  /** References this parameter reads while computing its value */
  readonly dependencies: readonly ParameterReference[];
  value(event: FlowEvent, resolver: ValueResolver): number;
}

/**
 * A measured channel, read straight from the event
 */
export class ChannelParameter implements Parameter {
  readonly dependencies: readonly ParameterReference[] = [];
  readonly label: string;

  constructor(
    public readonly parameterNumber: number,
    public readonly reference: ParameterReference,
    label?: string
  ) {
    this.label = label ?? (reference === UNREFERENCEABLE ? `P${parameterNumber}` : reference);
  }

  value(event: FlowEvent): number {
    return event.valueAt(this.parameterNumber);
  }
}

export function isChannelParameter(parameter: Parameter): parameter is ChannelParameter {
  return parameter instanceof ChannelParameter;
}
