/**
 * Bundled baselines
 *
 * Builds the process-wide registry from the documents shipped in
 * `baselines/`, plus an optional extra directory (EVAL_BASELINES_DIR).
 * Call once at startup, before any test run.
 */

import { resolve, dirname } from 'node:path';
import { fileURLToPath } from 'node:url';
import { config } from './config';
import type { FieldValidator } from './expectation';
import { loadBaselineDirectory } from './loader';
import { BaselineRegistry } from './registry';

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

export const BUNDLED_BASELINES_DIR = resolve(__dirname, '../baselines');

export interface DefaultRegistryOptions {
  /** Extra directory of baseline documents (default from env) */
  extraDir?: string;
  /** Validators available to CUSTOM fields in the documents */
  validators?: FieldValidator[];
}

export function createDefaultRegistry(options: DefaultRegistryOptions = {}): BaselineRegistry {
  const registry = new BaselineRegistry();
  const validators = options.validators ?? [];

  loadBaselineDirectory(BUNDLED_BASELINES_DIR, registry, { validators });

  const extraDir = options.extraDir ?? config.baselinesDir;
  if (extraDir) {
    loadBaselineDirectory(extraDir, registry, { validators });
  }

  return registry.seal();
}
