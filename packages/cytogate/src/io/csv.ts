/**
 * CSV event tables
 *
 * First non-empty line holds the parameter names; every following line is
 * one event. Blank lines and lines starting with `#` are skipped.
 *
 * @module io/csv
 */

import { DescriptorValidationError } from '../core/errors.js';

export interface EventTable {
  readonly parameters: readonly string[];
  readonly rows: readonly (readonly number[])[];
}

export function parseEventCsv(content: string, location: string): EventTable {
  const lines = content
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line !== '' && !line.startsWith('#'));

  const [header, ...body] = lines;
  if (header === undefined) {
    throw new DescriptorValidationError(location, ['<root>: missing header row']);
  }

  const parameters = header.split(',').map((name) => name.trim());
  const issues: string[] = [];
  const rows: number[][] = [];

  body.forEach((line, i) => {
    const cells = line.split(',').map((cell) => cell.trim());
    const rowNumber = i + 2;
    if (cells.length !== parameters.length) {
      issues.push(`row ${rowNumber}: expected ${parameters.length} values, got ${cells.length}`);
      return;
    }
    const values = cells.map(Number);
    const bad = cells.findIndex((cell, j) => cell === '' || !Number.isFinite(values[j]));
    if (bad >= 0) {
      issues.push(`row ${rowNumber}: ${parameters[bad]} is not a number`);
      return;
    }
    rows.push(values);
  });

  if (issues.length > 0) {
    throw new DescriptorValidationError(location, issues);
  }

  return { parameters, rows };
}
