/**
 * Engine configuration
 *
 * Numeric tolerances and naming conventions shared by the gate evaluator,
 * compensation and the processing pipeline. The CLI layers its file/env
 * configuration on top of these defaults.
 *
 * @module core/config
 */

export interface EngineConfig {
  /** Slack allowed when testing convex-hull membership for N-D polytopes */
  readonly polytopeTolerance: number;
  /** Joins accumulated population name segments */
  readonly nameSeparator: string;
  /** Name segment appended after compensation */
  readonly compensationSuffix: string;
  /** Name segment appended after applying transformations */
  readonly transformationSuffix: string;
}

export const DEFAULT_ENGINE_CONFIG: EngineConfig = {
  polytopeTolerance: 1e-9,
  nameSeparator: '_',
  compensationSuffix: 'comp',
  transformationSuffix: 'trans',
};

export function resolveEngineConfig(overrides: Partial<EngineConfig> = {}): EngineConfig {
  return {
    polytopeTolerance: overrides.polytopeTolerance ?? DEFAULT_ENGINE_CONFIG.polytopeTolerance,
    nameSeparator: overrides.nameSeparator ?? DEFAULT_ENGINE_CONFIG.nameSeparator,
    compensationSuffix: overrides.compensationSuffix ?? DEFAULT_ENGINE_CONFIG.compensationSuffix,
    transformationSuffix:
      overrides.transformationSuffix ?? DEFAULT_ENGINE_CONFIG.transformationSuffix,
  };
}

/**
 * Append a segment to an accumulated population name
 */
export function appendName(name: string, segment: string, config: EngineConfig = DEFAULT_ENGINE_CONFIG): string {
  return `${name}${config.nameSeparator}${segment}`;
}
