import { readFileSync } from 'node:fs';

/**
 * Read and JSON-parse a file from the package's data/ directory.
 */
export function readDataFile(fileName: string): unknown {
  const url = new URL(`../../data/${fileName}`, import.meta.url);
  return JSON.parse(readFileSync(url, 'utf8')) as unknown;
}
