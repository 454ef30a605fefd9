/**
 * Pipeline result reporting
 *
 * Flattens a pipeline result into rows for the output formatters and picks
 * the exit code.
 *
 * @module cli/lib/report
 */

import { fractionOfParent } from '../../data/statistics.js';
import { pipelineHasErrors, type PipelineResult } from '../../pipeline/pipeline.js';
import { EXIT_CODES, type ExitCode } from './context.js';
import { formatters, type TableColumn } from './output.js';

export type ReportStatus = 'ok' | 'skipped' | 'gate-failed' | 'load-failed';

export interface ReportRow {
  readonly [key: string]: unknown;
  readonly location: string;
  readonly dataSet: number | null;
  readonly status: ReportStatus;
  readonly population: string | null;
  readonly count: number | null;
  readonly fraction: number | null;
  readonly detail: string | null;
}

export const REPORT_COLUMNS: readonly TableColumn[] = [
  { key: 'location', header: 'Location' },
  { key: 'dataSet', header: 'Set', align: 'right', formatter: formatters.dash },
  { key: 'status', header: 'Status' },
  { key: 'population', header: 'Population', formatter: formatters.dash },
  { key: 'count', header: 'Events', align: 'right', formatter: formatters.dash },
  { key: 'fraction', header: 'Of parent', align: 'right', formatter: formatters.percent },
  { key: 'detail', header: 'Detail', formatter: formatters.dash },
];

export function reportRows(result: PipelineResult): ReportRow[] {
  const rows: ReportRow[] = result.errors.map(({ location, error }): ReportRow => ({
    location,
    dataSet: null,
    status: 'load-failed',
    population: null,
    count: null,
    fraction: null,
    detail: error.message,
  }));

  for (const outcome of result.outcomes) {
    const base = { location: outcome.location, dataSet: outcome.dataSetNumber };
    if (outcome.status === 'skipped') {
      rows.push({
        ...base,
        status: 'skipped',
        population: null,
        count: null,
        fraction: null,
        detail: outcome.reason ?? null,
      });
      continue;
    }

    for (const population of outcome.outputs) {
      const fraction = fractionOfParent(population);
      rows.push({
        ...base,
        status: 'ok',
        population: population.name,
        count: population.events.length,
        fraction: Number.isNaN(fraction) ? null : fraction,
        detail: null,
      });
    }
    for (const failure of outcome.gateFailures) {
      rows.push({
        ...base,
        status: 'gate-failed',
        population: null,
        count: null,
        fraction: null,
        detail: `${failure.gateId}: ${failure.message}`,
      });
    }
  }

  return rows;
}

export function exitCodeFor(result: PipelineResult): ExitCode {
  return pipelineHasErrors(result) ? EXIT_CODES.WARNINGS : EXIT_CODES.SUCCESS;
}
