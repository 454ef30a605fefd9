/**
 * Compensation
 *
 * Removes spillover from measured channels. With S[i][j] the spillover from
 * channel i into detector j, measured values are m = t·S, so the true values
 * are t = m·S⁻¹. Only matrix references present in the population take
 * part; all other channels are copied unchanged.
 *
 * @module compensation/compensate
 */

import { DEFAULT_ENGINE_CONFIG, appendName, type EngineConfig } from '../core/config.js';
import { InvalidCompensationMatrixError } from '../core/errors.js';
import { invert, multiplyVector } from '../core/utils/matrix.js';
import { isChannelParameter, type ChannelParameter } from '../data/parameter.js';
import { derivePopulation, type Population } from '../data/population.js';
import type { SpilloverMatrix } from './spillover-matrix.js';

export interface CompensateOptions {
  /** Name of the compensated population; defaults to `<name>_comp` */
  readonly name?: string;
  readonly config?: EngineConfig;
}

/**
 * Compensated child population of `population`
 *
 * @throws InvalidCompensationMatrixError when the matrix cannot be inverted or
 *   names a parameter that is not a measured channel
 */
export function compensatePopulation(
  population: Population,
  matrix: SpilloverMatrix,
  options: CompensateOptions = {}
): Population {
  const config = options.config ?? DEFAULT_ENGINE_CONFIG;
  const name = options.name ?? appendName(population.name, config.compensationSuffix, config);
  const channels = compensatedChannels(population, matrix);

  if (channels.length === 0) {
    return derivePopulation(population, name, population.events);
  }

  const spillover = channels.map((from) =>
    channels.map((to) => matrix.spillover(from.reference, to.reference))
  );
  const inverse = invert(spillover);
  if (!inverse) {
    throw new InvalidCompensationMatrixError(matrix.id, 'spillover matrix is singular');
  }

  const events = population.events.map((event) => {
    const measured = channels.map((channel) => event.valueAt(channel.parameterNumber));
    const corrected = multiplyVector(measured, inverse);
    return event.withValues(
      new Map(channels.map((channel, i): [number, number] => [channel.parameterNumber, corrected[i]]))
    );
  });

  return derivePopulation(population, name, events);
}

function compensatedChannels(population: Population, matrix: SpilloverMatrix): ChannelParameter[] {
  const channels: ChannelParameter[] = [];
  for (const reference of matrix.references()) {
    const parameter = population.resolver.find(reference);
    if (!parameter) continue;
    if (!isChannelParameter(parameter)) {
      throw new InvalidCompensationMatrixError(matrix.id, `${reference} is not a measured channel`);
    }
    channels.push(parameter);
  }
  return channels;
}
