/**
 * Document loaders
 *
 * File-system entry points for baseline documents, backend lists and
 * recorded runs. Only used at setup time; matching and scoring never
 * touch the file system.
 */

import { readFileSync, readdirSync } from 'node:fs';
import { extname, resolve } from 'node:path';
import { ConfigurationError } from './errors';
import type { BackendConfig, BackendRunOutput } from './executor';
import type { BaselineRegistry } from './registry';
import {
  parseBackendConfigs,
  parseBaselineDocument,
  parseRecordedRuns,
  type BaselineDocument,
  type DocumentFormat,
  type ParseBaselineOptions,
} from './schema';

const FORMAT_BY_EXTENSION: Record<string, DocumentFormat> = {
  '.yaml': 'yaml',
  '.yml': 'yaml',
  '.json': 'json',
};

export function formatForPath(path: string): DocumentFormat {
  const format = FORMAT_BY_EXTENSION[extname(path).toLowerCase()];
  if (!format) {
    throw new ConfigurationError(`Unsupported document type: ${path} (expected .yaml, .yml or .json)`);
  }
  return format;
}

function readDocument(path: string): string {
  try {
    return readFileSync(path, 'utf-8');
  } catch (error) {
    const code = error instanceof Error && 'code' in error ? String(error.code) : 'EIO';
    throw new ConfigurationError(`Cannot read ${path} (${code})`);
  }
}

export function loadBaselineFile(
  path: string,
  options: Omit<ParseBaselineOptions, 'format' | 'source'> = {}
): BaselineDocument {
  const fullPath = resolve(path);
  return parseBaselineDocument(readDocument(fullPath), {
    ...options,
    format: formatForPath(fullPath),
    source: fullPath,
  });
}

/**
 * Register every baseline document in a directory, in file-name order.
 * Returns the registered test names.
 */
export function loadBaselineDirectory(
  dir: string,
  registry: BaselineRegistry,
  options: Omit<ParseBaselineOptions, 'format' | 'source'> = {}
): string[] {
  const fullDir = resolve(dir);
  const files = readdirSync(fullDir)
    .filter((file) => extname(file).toLowerCase() in FORMAT_BY_EXTENSION)
    .sort();

  const registered: string[] = [];
  for (const file of files) {
    const { baseline, aliases } = loadBaselineFile(resolve(fullDir, file), options);
    registry.register(baseline, { aliases });
    registered.push(baseline.testName);
  }

  console.log(`[BaselineRegistry] Loaded ${registered.length} baseline(s) from ${fullDir}`);
  return registered;
}

export function loadBackendConfigs(path: string): BackendConfig[] {
  const fullPath = resolve(path);
  return parseBackendConfigs(readDocument(fullPath), formatForPath(fullPath), fullPath);
}

export function loadRecordedRuns(path: string): Map<string, BackendRunOutput> {
  const fullPath = resolve(path);
  return parseRecordedRuns(readDocument(fullPath), formatForPath(fullPath), fullPath);
}
