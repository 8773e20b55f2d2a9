import { readFileSync } from 'node:fs';

/**
 * The repository's data/ directory. Both src/utils and dist/utils sit two
 * levels below the package root.
 */
const DATA_DIR = new URL('../../data/', import.meta.url);

/**
 * Read and parse a JSON file from data/. Callers validate the result.
 */
export function readDataFile(fileName: string): unknown {
  const raw = readFileSync(new URL(fileName, DATA_DIR), 'utf-8');
  const parsed: unknown = JSON.parse(raw);
  return parsed;
}
