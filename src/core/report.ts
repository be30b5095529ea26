import { SOURCE_PRIORITY, getSourcePriority, type SourcePriorityTable } from './source-priority.js';
import type { EntityKind, MergeEvent, MergeEventSink, UnifiedDataset } from './types.js';

export type SourceContribution = {
  source: string;
  priority: number;
  drivers: number;
  constructors: number;
  races: number;
  results: number;
};

export type SkipReason = { entity: EntityKind; reason: string; count: number };

export type MergeReport = {
  counts: Record<'drivers' | 'constructors' | 'races' | 'results', number>;
  sources: SourceContribution[];
  skipped: SkipReason[];
  conflicts: number;
  // Conflicts per result field, e.g. { position: 2 }.
  conflictFields: Record<string, number>;
  normalizeFailures: number;
};

/** Records every event and forwards it, so a run can be logged and summarized. */
export function createEventCollector(forward?: MergeEventSink) {
  const events: MergeEvent[] = [];
  const sink: MergeEventSink = (event) => {
    events.push(event);
    forward?.(event);
  };
  return { events, sink };
}

export function buildMergeReport(
  dataset: UnifiedDataset,
  events: readonly MergeEvent[],
  priorities: SourcePriorityTable = SOURCE_PRIORITY,
): MergeReport {
  const contributions = new Map<string, SourceContribution>();
  const contribution = (source: string) => {
    let entry = contributions.get(source);
    if (!entry) {
      entry = {
        source,
        priority: getSourcePriority(source, priorities),
        drivers: 0,
        constructors: 0,
        races: 0,
        results: 0,
      };
      contributions.set(source, entry);
    }
    return entry;
  };

  for (const driver of dataset.drivers) {
    for (const source of Object.keys(driver.sourceIds)) contribution(source).drivers += 1;
  }
  for (const constructor of dataset.constructors) {
    for (const source of Object.keys(constructor.sourceIds)) contribution(source).constructors += 1;
  }
  for (const race of dataset.races) {
    for (const source of Object.keys(race.sourceIds)) contribution(source).races += 1;
  }
  for (const result of dataset.results) {
    for (const source of result.sources) contribution(source).results += 1;
  }

  const skipped = new Map<string, SkipReason>();
  const conflictFields: Record<string, number> = {};
  let conflicts = 0;
  let normalizeFailures = 0;

  for (const event of events) {
    if (event.type === 'record-skipped') {
      const key = `${event.entity}:${event.reason}`;
      const entry = skipped.get(key) ?? { entity: event.entity, reason: event.reason, count: 0 };
      entry.count += 1;
      skipped.set(key, entry);
    } else if (event.type === 'field-conflict') {
      conflicts += 1;
      const { field } = event.conflict;
      conflictFields[field] = (conflictFields[field] ?? 0) + 1;
    } else if (event.type === 'normalize-failed') {
      normalizeFailures += 1;
    }
  }

  const sources = [...contributions.values()].sort(
    (a, b) => b.priority - a.priority || a.source.localeCompare(b.source),
  );

  return {
    counts: {
      drivers: dataset.drivers.length,
      constructors: dataset.constructors.length,
      races: dataset.races.length,
      results: dataset.results.length,
    },
    sources,
    skipped: [...skipped.values()],
    conflicts,
    conflictFields,
    normalizeFailures,
  };
}
