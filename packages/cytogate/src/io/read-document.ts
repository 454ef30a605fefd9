/**
 * Descriptor document reading
 *
 * JSON and YAML documents are both accepted; the extension decides the
 * parser, and anything that is not .json goes through YAML (a superset).
 *
 * @module io/read-document
 */

import { readFileSync } from 'node:fs';
import { extname } from 'node:path';
import { parse as parseYaml } from 'yaml';

import { DataSourceError } from '../core/errors.js';

export function readText(path: string): string {
  try {
    return readFileSync(path, 'utf-8');
  } catch (error) {
    throw new DataSourceError(path, error);
  }
}

/**
 * Read and parse a document without validating its shape
 */
export function readDocument(path: string): unknown {
  const content = readText(path);
  try {
    return parseDocumentText(content, path);
  } catch (error) {
    throw new DataSourceError(path, error);
  }
}

export function parseDocumentText(content: string, path: string): unknown {
  if (extname(path).toLowerCase() === '.json') {
    const parsed: unknown = JSON.parse(content);
    return parsed;
  }
  const parsed: unknown = parseYaml(content);
  return parsed;
}
