import {
  DRIVER_FIELDS,
  readDriverName,
  readField,
  readSourceId,
  readString,
} from './field-aliases.js';
import { normalizeCarNumber, normalizeDriverCode } from './normalizer.js';
import { calculateSimilarity, sequenceRatio, type SimilarityStrategy } from './similarity.js';
import {
  noopSink,
  type MergeEventSink,
  type OrderedSources,
  type RawRecord,
  type SourceId,
  type UnifiedDriver,
} from './types.js';

export const DEFAULT_SIMILARITY_THRESHOLD = 0.85;

export type DriverMatcherOptions = {
  threshold?: number;
  strategy?: SimilarityStrategy;
  log?: MergeEventSink;
};

type DriverCandidate = {
  name: string;
  code: string | null;
  number: number | null;
};

type MatchOutcome = {
  unifiedId: number;
  via: 'code' | 'number' | 'name';
  score: number;
};

export type DriverMatcher = {
  threshold: number;
  similarity: (name1: string, name2: string) => number;
  matchDriver: (record: RawRecord, existingDrivers: readonly UnifiedDriver[]) => number | null;
  createUnifiedDrivers: (
    sources: OrderedSources,
    existingDrivers?: readonly UnifiedDriver[],
  ) => UnifiedDriver[];
};

function readCandidate(record: RawRecord): DriverCandidate | null {
  const name = readDriverName(record)?.split(/\s+/).filter(Boolean).join(' ');
  if (!name) return null;
  return {
    name,
    code: normalizeDriverCode(readField(record, DRIVER_FIELDS.code)),
    number: normalizeCarNumber(readField(record, DRIVER_FIELDS.number)),
  };
}

/** Last whitespace-delimited token is the surname; one token is surname only. */
export function splitDriverName(fullName: string): { forename: string; surname: string } {
  const parts = fullName.split(/\s+/).filter(Boolean);
  if (parts.length === 0) return { forename: '', surname: '' };
  return {
    forename: parts.slice(0, -1).join(' '),
    surname: parts[parts.length - 1] ?? '',
  };
}

export function findDriverBySourceId(
  drivers: readonly UnifiedDriver[],
  source: string,
  sourceId: SourceId,
): number | null {
  const wanted = String(sourceId);
  for (const driver of drivers) {
    const id = driver.sourceIds[source];
    if (id !== undefined && id !== null && String(id) === wanted) return driver.unifiedId;
  }
  return null;
}

function cloneDriver(driver: UnifiedDriver): UnifiedDriver {
  return { ...driver, sourceIds: { ...driver.sourceIds } };
}

export function createDriverMatcher({
  threshold = DEFAULT_SIMILARITY_THRESHOLD,
  strategy = sequenceRatio,
  log = noopSink,
}: DriverMatcherOptions = {}): DriverMatcher {
  if (!Number.isFinite(threshold) || threshold < 0 || threshold > 1) {
    throw new Error(`Similarity threshold must be between 0 and 1, got ${threshold}.`);
  }

  const similarity = (name1: string, name2: string) =>
    calculateSimilarity(name1, name2, strategy);

  const findMatch = (
    candidate: DriverCandidate,
    existingDrivers: readonly UnifiedDriver[],
  ): MatchOutcome | null => {
    if (candidate.code) {
      const byCode = existingDrivers.find((driver) => driver.code === candidate.code);
      if (byCode) return { unifiedId: byCode.unifiedId, via: 'code', score: 1 };
    }

    // Numbers are reused across eras, so a number hit still needs the name to agree.
    if (candidate.number !== null) {
      for (const driver of existingDrivers) {
        if (driver.number !== candidate.number || !driver.fullName) continue;
        const score = similarity(candidate.name, driver.fullName);
        if (score >= threshold) return { unifiedId: driver.unifiedId, via: 'number', score };
      }
    }

    let best: MatchOutcome | null = null;
    for (const driver of existingDrivers) {
      if (!driver.fullName) continue;
      const score = similarity(candidate.name, driver.fullName);
      if (score >= threshold && score > (best?.score ?? 0)) {
        best = { unifiedId: driver.unifiedId, via: 'name', score };
      }
    }
    return best;
  };

  const matchDriver = (record: RawRecord, existingDrivers: readonly UnifiedDriver[]) => {
    const candidate = readCandidate(record);
    if (!candidate) return null;
    return findMatch(candidate, existingDrivers)?.unifiedId ?? null;
  };

  const createUnifiedDrivers = (
    sources: OrderedSources,
    existingDrivers: readonly UnifiedDriver[] = [],
  ): UnifiedDriver[] => {
    const unified = existingDrivers.map(cloneDriver);
    let nextId = unified.reduce((max, driver) => Math.max(max, driver.unifiedId), 0) + 1;

    for (const [source, records] of sources) {
      for (const record of records) {
        const candidate = readCandidate(record);
        if (!candidate) {
          log({ type: 'record-skipped', entity: 'driver', source, reason: 'missing name' });
          continue;
        }
        const sourceId = readSourceId(record, DRIVER_FIELDS.sourceId);
        const match = findMatch(candidate, unified);
        const existing = match
          ? unified.find((driver) => driver.unifiedId === match.unifiedId)
          : undefined;

        if (match && existing) {
          if (sourceId !== null || !Object.hasOwn(existing.sourceIds, source)) {
            existing.sourceIds[source] = sourceId;
          }
          if (!existing.fullName) {
            existing.fullName = candidate.name;
            Object.assign(existing, splitDriverName(candidate.name));
          }
          existing.code ??= candidate.code;
          existing.number ??= candidate.number;
          existing.nationality ??= readString(record, DRIVER_FIELDS.nationality);
          existing.dateOfBirth ??= readString(record, DRIVER_FIELDS.dateOfBirth);
          log({
            type: 'driver-matched',
            unifiedId: existing.unifiedId,
            source,
            name: candidate.name,
            via: match.via,
            score: match.score,
          });
          continue;
        }

        const unifiedId = nextId;
        nextId += 1;
        unified.push({
          unifiedId,
          driverRef: readString(record, DRIVER_FIELDS.driverRef) ?? `driver_${unifiedId}`,
          ...splitDriverName(candidate.name),
          fullName: candidate.name,
          code: candidate.code,
          number: candidate.number,
          nationality: readString(record, DRIVER_FIELDS.nationality),
          dateOfBirth: readString(record, DRIVER_FIELDS.dateOfBirth),
          sourceIds: { [source]: sourceId },
        });
        log({ type: 'driver-created', unifiedId, source, name: candidate.name });
      }
    }
    return unified;
  };

  return { threshold, similarity, matchDriver, createUnifiedDrivers };
}
