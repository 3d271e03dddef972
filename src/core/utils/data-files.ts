/**
 * Bundled data tables (data/*.json)
 *
 * Resolved relative to this module so lookups work from the TypeScript
 * sources (src/core/utils) and from the build output (dist/src/core/utils).
 */

import { existsSync, readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import type { z } from 'zod';

const DATA_DIR_CANDIDATES = [
  new URL('../../../data/', import.meta.url),
  new URL('../../../../data/', import.meta.url),
];

function resolveDataDir(): string {
  for (const candidate of DATA_DIR_CANDIDATES) {
    const path = fileURLToPath(candidate);
    if (existsSync(path)) {
      return path;
    }
  }
  throw new Error('Bundled data directory not found');
}

/**
 * Read and validate a bundled JSON table
 *
 * @param relativePath - Path below data/, e.g. "variables/pl94171.json"
 */
export function readDataFile<T>(relativePath: string, schema: z.ZodType<T>): T {
  const path = `${resolveDataDir()}${relativePath}`;
  const content = readFileSync(path, 'utf-8');
  const parsed = schema.safeParse(JSON.parse(content));
  if (!parsed.success) {
    throw new Error(`Invalid bundled data file ${relativePath}: ${parsed.error.message}`);
  }
  return parsed.data;
}
