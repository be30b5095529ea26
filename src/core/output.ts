import { promises as fs } from 'node:fs';
import path from 'node:path';
import type { UnifiedDataset } from './types.js';

export const OUTPUT_FILES = {
  drivers: 'drivers.json',
  constructors: 'constructors.json',
  races: 'races.json',
  results: 'results.json',
} as const satisfies Record<keyof UnifiedDataset, string>;

/** Writes one pretty-printed JSON array per entity and returns the paths. */
export async function writeUnifiedDataset(
  outDir: string,
  dataset: UnifiedDataset,
): Promise<string[]> {
  await fs.mkdir(outDir, { recursive: true });
  const tables: ReadonlyArray<readonly [string, readonly unknown[]]> = [
    [OUTPUT_FILES.drivers, dataset.drivers],
    [OUTPUT_FILES.constructors, dataset.constructors],
    [OUTPUT_FILES.races, dataset.races],
    [OUTPUT_FILES.results, dataset.results],
  ];
  const written: string[] = [];
  for (const [filename, rows] of tables) {
    const filePath = path.join(outDir, filename);
    await fs.writeFile(filePath, JSON.stringify(rows, null, 2) + '\n', 'utf-8');
    written.push(filePath);
  }
  return written;
}
