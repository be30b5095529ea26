import {
  CONSTRUCTOR_FIELDS,
  RACE_FIELDS,
  RESULT_FIELDS,
  isEmptyValue,
  readCircuitRef,
  readField,
  readInteger,
  readSourceId,
  readString,
  type ResultField,
} from './field-aliases.js';
import { createDriverMatcher, findDriverBySourceId } from './matcher.js';
import {
  alignLapNumber,
  normalizeName,
  normalizeTimestamp,
  normalizePoints,
  normalizePosition,
  normalizeStatus,
  normalizeTimeString,
} from './normalizer.js';
import type { SimilarityStrategy } from './similarity.js';
import {
  SOURCE_PRIORITY,
  getSourcePriority,
  orderSources,
  type SourcePriorityTable,
} from './source-priority.js';
import {
  noopSink,
  type ConflictCandidate,
  type EntityKind,
  type MergeEventSink,
  type RawRecord,
  type RecordsBySource,
  type SourceId,
  type SourceIds,
  type UnifiedConstructor,
  type UnifiedDataset,
  type UnifiedDriver,
  type UnifiedRace,
  type UnifiedResult,
} from './types.js';

export type MergeBatch = {
  drivers?: RecordsBySource;
  constructors?: RecordsBySource;
  races?: RecordsBySource;
  results?: RecordsBySource;
};

export type MergerOptions = {
  priorities?: SourcePriorityTable;
  threshold?: number;
  strategy?: SimilarityStrategy;
  // IANA zone per source for timestamps without an offset; UTC otherwise.
  sourceTimezones?: Readonly<Record<string, string>>;
  log?: MergeEventSink;
};

export type Merger = {
  mergeDrivers: (recordsBySource: RecordsBySource) => UnifiedDriver[];
  mergeConstructors: (recordsBySource: RecordsBySource) => UnifiedConstructor[];
  mergeRaces: (recordsBySource: RecordsBySource) => UnifiedRace[];
  mergeResults: (resultsBySource: RecordsBySource, raceId: number) => UnifiedResult[];
  mergeBatch: (batch: MergeBatch) => UnifiedDataset;
};

/**
 * Highest-priority non-empty value. Equal priorities keep input order, so
 * callers must list values deterministically.
 */
export function resolveConflict<T>(
  values: readonly (T | null | undefined)[],
  priorities: readonly number[],
): T | null {
  const candidates: Array<{ value: T; priority: number }> = [];
  values.forEach((value, index) => {
    const priority = priorities[index];
    if (priority === undefined || value === null || value === undefined) return;
    if (isEmptyValue(value)) return;
    candidates.push({ value, priority });
  });
  candidates.sort((a, b) => b.priority - a.priority);
  return candidates[0]?.value ?? null;
}

function recordSourceId(sourceIds: SourceIds, source: string, id: SourceId | null) {
  // A second record from the same source without an id keeps the earlier id.
  if (id !== null || !Object.hasOwn(sourceIds, source)) {
    sourceIds[source] = id;
  }
}

function collapseWhitespace(value: string): string {
  return value.split(/\s+/).filter(Boolean).join(' ');
}

function raceKey(year: number, round: number): string {
  return `${year}/${round}`;
}

type ResultEntry = { source: string; priority: number; record: RawRecord };

export function createMerger({
  priorities = SOURCE_PRIORITY,
  threshold,
  strategy,
  sourceTimezones = {},
  log = noopSink,
}: MergerOptions = {}): Merger {
  const matcher = createDriverMatcher({ threshold, strategy, log });

  // Only a record that pins a time of day yields a start instant.
  const readRaceStart = (record: RawRecord, source: string): string | null => {
    const date = readString(record, RACE_FIELDS.date);
    if (!date) return null;
    const time = readString(record, RACE_FIELDS.time);
    const hasTimeOfDay = /\d{2}:\d{2}/.test(date);
    if (!time && !hasTimeOfDay) return null;
    const text = time && !hasTimeOfDay ? `${date}T${time}` : date;
    const timezone = Object.hasOwn(sourceTimezones, source) ? sourceTimezones[source] : undefined;
    return normalizeTimestamp(text, timezone, log)?.toISOString() ?? null;
  };

  const finished = (entity: EntityKind, count: number, recordsBySource: RecordsBySource) => {
    log({
      type: 'merge-finished',
      entity,
      count,
      sources: orderSources(recordsBySource, priorities).map(([source]) => source),
    });
  };

  const mergeDrivers = (recordsBySource: RecordsBySource): UnifiedDriver[] => {
    const drivers = matcher.createUnifiedDrivers(orderSources(recordsBySource, priorities));
    finished('driver', drivers.length, recordsBySource);
    return drivers;
  };

  const mergeConstructors = (recordsBySource: RecordsBySource): UnifiedConstructor[] => {
    const constructors: UnifiedConstructor[] = [];
    const byName = new Map<string, UnifiedConstructor>();

    for (const [source, records] of orderSources(recordsBySource, priorities)) {
      for (const record of records) {
        const name = readString(record, CONSTRUCTOR_FIELDS.name);
        const key = normalizeName(name);
        if (!name || !key) {
          log({ type: 'record-skipped', entity: 'constructor', source, reason: 'missing name' });
          continue;
        }
        const sourceId = readSourceId(record, CONSTRUCTOR_FIELDS.sourceId);
        const existing = byName.get(key);
        if (existing) {
          recordSourceId(existing.sourceIds, source, sourceId);
          existing.nationality ??= readString(record, CONSTRUCTOR_FIELDS.nationality);
          log({
            type: 'constructor-matched',
            constructorId: existing.constructorId,
            source,
            name,
          });
          continue;
        }

        const constructorId = constructors.length + 1;
        const created: UnifiedConstructor = {
          constructorId,
          constructorRef:
            readString(record, CONSTRUCTOR_FIELDS.constructorRef) ??
            `constructor_${constructorId}`,
          name: collapseWhitespace(name),
          nationality: readString(record, CONSTRUCTOR_FIELDS.nationality),
          sourceIds: { [source]: sourceId },
        };
        constructors.push(created);
        byName.set(key, created);
        log({ type: 'constructor-created', constructorId, source, name });
      }
    }

    finished('constructor', constructors.length, recordsBySource);
    return constructors;
  };

  const mergeRaces = (recordsBySource: RecordsBySource): UnifiedRace[] => {
    const races: UnifiedRace[] = [];
    const byKey = new Map<string, UnifiedRace>();

    for (const [source, records] of orderSources(recordsBySource, priorities)) {
      for (const record of records) {
        const year = readInteger(record, RACE_FIELDS.year);
        const round = readInteger(record, RACE_FIELDS.round);
        if (year === null || round === null || year <= 0 || round <= 0) {
          log({ type: 'record-skipped', entity: 'race', source, reason: 'missing year or round' });
          continue;
        }
        const sourceId = readSourceId(record, RACE_FIELDS.sourceId);
        const existing = byKey.get(raceKey(year, round));
        if (existing) {
          existing.name ??= readString(record, RACE_FIELDS.name);
          existing.date ??= readString(record, RACE_FIELDS.date);
          existing.startsAt ??= readRaceStart(record, source);
          recordSourceId(existing.sourceIds, source, sourceId);
          log({ type: 'race-matched', raceId: existing.raceId, source, year, round });
          continue;
        }

        const raceId = races.length + 1;
        const created: UnifiedRace = {
          raceId,
          year,
          round,
          name: readString(record, RACE_FIELDS.name),
          date: readString(record, RACE_FIELDS.date),
          startsAt: readRaceStart(record, source),
          circuitId: readSourceId(record, RACE_FIELDS.circuitId),
          circuitRef: readCircuitRef(record),
          sourceIds: { [source]: sourceId },
        };
        races.push(created);
        byKey.set(raceKey(year, round), created);
        log({ type: 'race-created', raceId, source, year, round });
      }
    }

    finished('race', races.length, recordsBySource);
    return races;
  };

  const reportConflict = (
    entries: readonly ResultEntry[],
    field: ResultField,
    values: readonly unknown[],
    driverId: SourceId,
    resolved: unknown,
  ) => {
    const distinct = new Set(
      values.filter((value) => !isEmptyValue(value)).map((value) => String(value)),
    );
    if (distinct.size <= 1) return;
    const candidates: ConflictCandidate[] = entries.map((entry, index) => ({
      source: entry.source,
      priority: entry.priority,
      value: values[index] ?? null,
    }));
    log({
      type: 'field-conflict',
      entity: 'result',
      entityId: driverId,
      conflict: { field, candidates, resolved },
    });
  };

  const resolveField = <T extends number | string>(
    entries: readonly ResultEntry[],
    field: ResultField,
    normalize: (value: unknown, source: string) => T | null,
    driverId: SourceId,
  ): T | null => {
    const values = entries.map((entry) =>
      normalize(readField(entry.record, RESULT_FIELDS[field]), entry.source),
    );
    const resolved = resolveConflict(
      values,
      entries.map((entry) => entry.priority),
    );
    reportConflict(entries, field, values, driverId, resolved);
    return resolved;
  };

  const mergeResults = (resultsBySource: RecordsBySource, raceId: number): UnifiedResult[] => {
    const groups = new Map<string, { driverId: SourceId; entries: ResultEntry[] }>();

    for (const [source, records] of orderSources(resultsBySource, priorities)) {
      const priority = getSourcePriority(source, priorities);
      for (const record of records) {
        const driverId =
          readSourceId(record, RESULT_FIELDS.unifiedDriverId) ??
          readSourceId(record, RESULT_FIELDS.driverId);
        if (driverId === null) {
          log({ type: 'record-skipped', entity: 'result', source, reason: 'missing driver id' });
          continue;
        }
        const key = String(driverId);
        const group = groups.get(key) ?? { driverId, entries: [] };
        group.entries.push({ source, priority, record });
        groups.set(key, group);
      }
    }

    const results: UnifiedResult[] = [];
    for (const { driverId, entries } of groups.values()) {
      const [only] = entries;
      if (entries.length === 1 && only) {
        const { source, record } = only;
        results.push({
          raceId,
          driverId,
          position: normalizePosition(readField(record, RESULT_FIELDS.position)),
          points: normalizePoints(readField(record, RESULT_FIELDS.points)),
          status: normalizeStatus(readField(record, RESULT_FIELDS.status)),
          laps: alignLapNumber(readField(record, RESULT_FIELDS.laps), source, log),
          time: normalizeTimeString(readField(record, RESULT_FIELDS.time)),
          sources: [source],
        });
        continue;
      }

      // Status is resolved on the raw text and normalized afterwards.
      const rawStatuses = entries.map((entry) => readField(entry.record, RESULT_FIELDS.status));
      const status = normalizeStatus(
        resolveConflict(
          rawStatuses,
          entries.map((entry) => entry.priority),
        ),
      );
      reportConflict(
        entries,
        'status',
        rawStatuses.map((value) => (isEmptyValue(value) ? null : normalizeStatus(value))),
        driverId,
        status,
      );

      results.push({
        raceId,
        driverId,
        position: resolveField(entries, 'position', normalizePosition, driverId),
        points: resolveField(entries, 'points', normalizePoints, driverId),
        status,
        laps: resolveField(
          entries,
          'laps',
          (value, source) => alignLapNumber(value, source, log),
          driverId,
        ),
        time: resolveField(entries, 'time', normalizeTimeString, driverId),
        sources: [...new Set(entries.map((entry) => entry.source))],
      });
    }

    log({
      type: 'merge-finished',
      entity: 'result',
      count: results.length,
      sources: orderSources(resultsBySource, priorities).map(([source]) => source),
    });
    return results;
  };

  const mergeBatch = (batch: MergeBatch): UnifiedDataset => {
    const drivers = mergeDrivers(batch.drivers ?? {});
    const constructors = mergeConstructors(batch.constructors ?? {});
    const races = mergeRaces(batch.races ?? {});

    const raceIds = new Map(races.map((race) => [raceKey(race.year, race.round), race.raceId]));
    const perRace = new Map<number, Record<string, RawRecord[]>>();

    for (const [source, records] of orderSources(batch.results ?? {}, priorities)) {
      for (const record of records) {
        const year = readInteger(record, RESULT_FIELDS.year);
        const round = readInteger(record, RESULT_FIELDS.round);
        const raceId = year !== null && round !== null ? raceIds.get(raceKey(year, round)) : undefined;
        if (raceId === undefined) {
          log({ type: 'record-skipped', entity: 'result', source, reason: 'no matching race' });
          continue;
        }

        let unifiedDriverId = readSourceId(record, RESULT_FIELDS.unifiedDriverId);
        if (unifiedDriverId === null) {
          const nativeId = readSourceId(record, RESULT_FIELDS.driverId);
          unifiedDriverId =
            nativeId === null ? null : findDriverBySourceId(drivers, source, nativeId);
        }
        if (unifiedDriverId === null) {
          log({ type: 'record-skipped', entity: 'result', source, reason: 'unresolved driver' });
          continue;
        }

        const bySource = perRace.get(raceId) ?? {};
        const list = bySource[source] ?? [];
        list.push({ ...record, unified_driver_id: unifiedDriverId });
        bySource[source] = list;
        perRace.set(raceId, bySource);
      }
    }

    const results = [...perRace.entries()]
      .sort(([a], [b]) => a - b)
      .flatMap(([raceId, bySource]) => mergeResults(bySource, raceId));

    return { drivers, constructors, races, results };
  };

  return { mergeDrivers, mergeConstructors, mergeRaces, mergeResults, mergeBatch };
}
