import type { OrderedSources, RecordsBySource } from './types.js';

export type SourcePriorityTable = Readonly<Record<string, number>>;

// Higher wins. wikipedia is only ever used for cross-referencing.
export const SOURCE_PRIORITY: SourcePriorityTable = {
  ergast: 10,
  fia: 9,
  openf1: 8,
  fastf1: 8,
  f1com: 7,
  statsf1: 6,
  wikipedia: 3,
};

export function getSourcePriority(
  source: string,
  table: SourcePriorityTable = SOURCE_PRIORITY,
): number {
  return Object.hasOwn(table, source) ? (table[source] ?? 0) : 0;
}

/**
 * Sources in descending priority. Equal priorities keep the order in which the
 * caller listed them, so a batch processed twice yields the same ids.
 */
export function orderSources(
  recordsBySource: RecordsBySource,
  table: SourcePriorityTable = SOURCE_PRIORITY,
): OrderedSources {
  return Object.entries(recordsBySource)
    .map((entry, index) => ({ entry, index, priority: getSourcePriority(entry[0], table) }))
    .sort((a, b) => b.priority - a.priority || a.index - b.index)
    .map(({ entry }) => entry);
}
